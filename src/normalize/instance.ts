import type { DiagnosticSink, Instance } from '../types';
import { buildNetworkInterface, type NormalizeContext } from './networkInterface';
import { decodeRecord, RawInstanceSchema, RawNetworkInterfaceSchema, readInstanceId } from './schema';

/**
 * Convert one raw DescribeInstances instance record
 *
 * Required fields are copied as returned by AWS. RamdiskId, PlatformDetails,
 * KernelId and HostId default to "" when the record omits them. Every entry
 * of NetworkInterfaces becomes one NetworkInterface, in order.
 *
 * @throws MissingFieldError when a required key is absent, naming its path
 *         (e.g. "NetworkInterfaces.0.Association")
 * @throws InvalidFieldError when a required key has the wrong shape
 */
export function toInstance(raw: unknown, sink: DiagnosticSink, context: NormalizeContext = {}): Instance {
    const recordContext = { region: context.region, instanceId: readInstanceId(raw) ?? context.instanceId };
    const record = decodeRecord(RawInstanceSchema, raw, recordContext);

    const networkInterfaces = record.NetworkInterfaces.map((rawInterface, index) =>
        buildNetworkInterface(
            decodeRecord(RawNetworkInterfaceSchema, rawInterface, recordContext, ['NetworkInterfaces', index]),
            sink,
        ),
    );

    return Object.freeze({
        imageId: record.ImageId,
        instanceId: record.InstanceId,
        networkInterfaces: Object.freeze(networkInterfaces),
        state: record.State,
        launchTime: record.LaunchTime,
        tags: record.Tags,
        cpuDetails: record.CpuOptions,
        instanceType: record.InstanceType,
        securityGroups: record.SecurityGroups,
        clientToken: record.ClientToken,
        stateTransitionReason: record.StateTransitionReason,
        rootDeviceName: record.RootDeviceName,
        ramDiskId: record.RamdiskId ?? '',
        platform: record.PlatformDetails ?? '',
        kernelId: record.KernelId ?? '',
        hostId: record.HostId ?? '',
    });
}
