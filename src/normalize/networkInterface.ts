import type { DiagnosticSink, IpAddress, NetworkInterface } from '../types';
import { AddressParseError } from '../utils/errors';
import { parseIpAddress } from '../utils/validation';
import { decodeRecord, RawNetworkInterfaceSchema, type RawNetworkInterface } from './schema';

export interface NormalizeContext {
    region?: string;
    instanceId?: string;
}

type AddressField = 'publicIpAddress' | 'ipv6Address' | 'privateIpAddress';

const ADDRESS_LABELS: Record<AddressField, string> = {
    publicIpAddress: 'public ip address',
    ipv6Address: 'ipv6 address',
    privateIpAddress: 'private ip address',
};

function firstIpv6(value: RawNetworkInterface['Ipv6Addresses']): string | undefined {
    if (typeof value === 'string' || value === undefined) {
        return value;
    }
    return value[0]?.Ipv6Address;
}

/**
 * Parse one optional address. Empty values stay unset; invalid ones are
 * reported and stay unset.
 */
function readAddress(
    field: AddressField,
    value: string | undefined,
    networkInterfaceId: string,
    sink: DiagnosticSink,
): IpAddress | undefined {
    if (!value) {
        return undefined;
    }

    try {
        return parseIpAddress(value);
    } catch (error) {
        if (!(error instanceof AddressParseError)) throw error;

        const message = `${ADDRESS_LABELS[field]} is not valid in network interface with the id ${networkInterfaceId}`;
        const data = { field, value, networkInterfaceId };
        if (field === 'publicIpAddress') {
            sink.debug(message, data);
        } else {
            sink.error(message, data);
        }
        return undefined;
    }
}

export function buildNetworkInterface(raw: RawNetworkInterface, sink: DiagnosticSink): NetworkInterface {
    const id = raw.NetworkInterfaceId;

    const ipv6Address = readAddress('ipv6Address', firstIpv6(raw.Ipv6Addresses), id, sink);
    const publicIpAddress = readAddress('publicIpAddress', raw.Association.PublicIp, id, sink);
    const privateIpAddress = readAddress('privateIpAddress', raw.PrivateIpAddress, id, sink);

    return Object.freeze({
        ipOwnerId: raw.Association.IpOwnerId,
        publicDnsName: raw.Association.PublicDnsName,
        macAddress: raw.MacAddress,
        networkInterfaceId: id,
        ownerId: raw.OwnerId,
        privateDnsName: raw.PrivateDnsName,
        subnetId: raw.SubnetId,
        status: raw.Status,
        ...(publicIpAddress ? { publicIpAddress } : {}),
        ...(ipv6Address ? { ipv6Address } : {}),
        ...(privateIpAddress ? { privateIpAddress } : {}),
    });
}

/**
 * Convert one raw DescribeInstances network interface
 *
 * @throws MissingFieldError when a required key (Association included) is absent
 * @throws InvalidFieldError when a required key has the wrong shape
 */
export function toNetworkInterface(
    raw: unknown,
    sink: DiagnosticSink,
    context: NormalizeContext = {},
): NetworkInterface {
    return buildNetworkInterface(decodeRecord(RawNetworkInterfaceSchema, raw, context), sink);
}
