import { z } from 'zod';
import { InvalidFieldError, MissingFieldError, type RecordContext } from '../utils/errors';
import { isRecord } from '../utils/validation';

/**
 * Raw DescribeInstances record shapes.
 *
 * Nested structures (State, Tags, CpuOptions, SecurityGroups) are passed
 * through so unknown keys survive the copy.
 */

const StateSchema = z
    .object({
        Code: z.number().optional(),
        Name: z.string().optional(),
    })
    .passthrough();

const TagSchema = z
    .object({
        Key: z.string().optional(),
        Value: z.string().optional(),
    })
    .passthrough();

const CpuOptionsSchema = z
    .object({
        CoreCount: z.number().optional(),
        ThreadsPerCore: z.number().optional(),
    })
    .passthrough();

const SecurityGroupSchema = z
    .object({
        GroupName: z.string().optional(),
        GroupId: z.string().optional(),
    })
    .passthrough();

// The SDK deserializes LaunchTime into a Date; JSON fixtures carry ISO strings.
const LaunchTimeSchema = z.union([
    z.date(),
    z
        .string()
        .datetime({ offset: true })
        .transform((value) => new Date(value)),
]);

const Ipv6EntrySchema = z
    .object({
        Ipv6Address: z.string().optional(),
    })
    .passthrough();

const RawAssociationSchema = z.object({
    IpOwnerId: z.string(),
    PublicDnsName: z.string(),
    PublicIp: z.string().optional(),
});

export const RawNetworkInterfaceSchema = z.object({
    Association: RawAssociationSchema,
    MacAddress: z.string(),
    NetworkInterfaceId: z.string(),
    OwnerId: z.string(),
    PrivateDnsName: z.string(),
    SubnetId: z.string(),
    Status: z.string(),
    Ipv6Addresses: z.union([z.string(), z.array(Ipv6EntrySchema)]).optional(),
    PrivateIpAddress: z.string().optional(),
});

export const RawInstanceSchema = z.object({
    ImageId: z.string().min(1),
    InstanceId: z.string().min(1),
    // Decoded one by one so errors can name the interface index.
    NetworkInterfaces: z.array(z.unknown()),
    State: StateSchema,
    LaunchTime: LaunchTimeSchema,
    Tags: z.array(TagSchema),
    CpuOptions: CpuOptionsSchema,
    InstanceType: z.string(),
    SecurityGroups: z.array(SecurityGroupSchema),
    ClientToken: z.string(),
    StateTransitionReason: z.string(),
    RootDeviceName: z.string(),
    RamdiskId: z.string().optional(),
    PlatformDetails: z.string().optional(),
    KernelId: z.string().optional(),
    HostId: z.string().optional(),
});

export type RawNetworkInterface = z.output<typeof RawNetworkInterfaceSchema>;
export type RawInstance = z.output<typeof RawInstanceSchema>;

type PathSegment = string | number;

function valueAt(root: unknown, path: readonly PathSegment[]): unknown {
    let current = root;
    for (const segment of path) {
        if (!isRecord(current)) return undefined;
        current = current[String(segment)];
    }
    return current;
}

/**
 * Parse a raw record against a schema.
 *
 * The first failing path decides the error: a key that is absent (or
 * undefined) is a MissingFieldError, anything else an InvalidFieldError.
 */
export function decodeRecord<S extends z.ZodTypeAny>(
    schema: S,
    raw: unknown,
    context: RecordContext,
    pathPrefix: readonly PathSegment[] = [],
): z.output<S> {
    const result = schema.safeParse(raw);
    if (result.success) {
        return result.data;
    }

    const issue = result.error.issues[0];
    const field = [...pathPrefix, ...issue.path].join('.') || 'record';

    if (issue.path.length > 0 && valueAt(raw, issue.path) === undefined) {
        throw new MissingFieldError(field, context);
    }
    throw new InvalidFieldError(field, issue.message, context);
}

/** InstanceId of a raw record, when it has a usable one. */
export function readInstanceId(raw: unknown): string | undefined {
    if (!isRecord(raw)) return undefined;
    const instanceId = raw.InstanceId;
    return typeof instanceId === 'string' && instanceId.length > 0 ? instanceId : undefined;
}
