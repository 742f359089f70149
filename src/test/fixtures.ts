import type { DiagnosticData, DiagnosticSink, InstanceListingClient, InstancePage } from '../types';

export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Diagnostic {
    level: DiagnosticLevel;
    message: string;
    data?: DiagnosticData;
}

/** In-memory DiagnosticSink. */
export class RecordingSink implements DiagnosticSink {
    readonly entries: Diagnostic[] = [];

    debug(message: string, data?: DiagnosticData): void {
        this.entries.push({ level: 'debug', message, data });
    }

    info(message: string, data?: DiagnosticData): void {
        this.entries.push({ level: 'info', message, data });
    }

    warn(message: string, data?: DiagnosticData): void {
        this.entries.push({ level: 'warn', message, data });
    }

    error(message: string, data?: DiagnosticData): void {
        this.entries.push({ level: 'error', message, data });
    }

    at(level: DiagnosticLevel): Diagnostic[] {
        return this.entries.filter((entry) => entry.level === level);
    }
}

/**
 * Listing client that replays canned responses, one per call. An Error in
 * the list is thrown instead of returned.
 */
export class FakeListingClient implements InstanceListingClient {
    readonly calls: Array<string | undefined> = [];

    constructor(private readonly responses: Array<InstancePage | Error>) {}

    async listInstances(nextToken?: string): Promise<InstancePage> {
        this.calls.push(nextToken);
        const response = this.responses[this.calls.length - 1];
        if (response === undefined) {
            throw new Error(`unexpected call ${this.calls.length}`);
        }
        if (response instanceof Error) {
            throw response;
        }
        return response;
    }
}

export function rawNetworkInterface(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        Association: { IpOwnerId: 'o', PublicDnsName: '', PublicIp: '198.51.100.5' },
        MacAddress: '00:00',
        NetworkInterfaceId: 'eni-1',
        OwnerId: 'o',
        PrivateDnsName: '',
        SubnetId: 's-1',
        Status: 'in-use',
        Ipv6Addresses: '',
        PrivateIpAddress: '10.0.0.5',
        ...overrides,
    };
}

export function rawInstance(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        ImageId: 'ami-1',
        InstanceId: 'i-1',
        NetworkInterfaces: [rawNetworkInterface()],
        State: { Code: 16, Name: 'running' },
        LaunchTime: new Date('2024-05-01T12:00:00Z'),
        Tags: [{ Key: 'Name', Value: 'web-1' }],
        CpuOptions: { CoreCount: 1, ThreadsPerCore: 1 },
        InstanceType: 't2.micro',
        SecurityGroups: [{ GroupName: 'default', GroupId: 'sg-1' }],
        ClientToken: '',
        StateTransitionReason: '',
        RootDeviceName: '/dev/sda1',
        ...overrides,
    };
}

export function without(record: Record<string, unknown>, key: string): Record<string, unknown> {
    const copy = { ...record };
    delete copy[key];
    return copy;
}

/** A page holding one reservation per raw instance. */
export function page(instances: unknown[], nextToken?: string): InstancePage {
    return {
        Reservations: instances.map((instance) => ({ Instances: [instance] })),
        ...(nextToken ? { NextToken: nextToken } : {}),
    };
}
