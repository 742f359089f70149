/**
 * ================================================================================
 * TYPE DEFINITIONS - Core Data Structures
 * ================================================================================
 *
 * Central type definitions for the inventory. These interfaces describe the
 * normalized shape of an EC2 instance and its network interfaces, the paged
 * listing capability the collector drives, and the diagnostic sink every
 * component reports through.
 *
 * KEY INTERFACES:
 * • Instance - One EC2 virtual machine, normalized
 * • NetworkInterface - One virtual NIC attached to an instance
 * • InstanceListingClient - Region-scoped paged DescribeInstances capability
 * • DiagnosticSink - Leveled log target injected into collector and normalizer
 *
 * DESIGN PRINCIPLES:
 * • Immutable Values - Normalized records are readonly once built
 * • AWS Compatibility - Nested structures keep the SDK's key names
 *
 * @version 1.0.0
 * @since 2025
 * @license BSD-3-Clause
 */

import type { IPv4, IPv6 } from 'ipaddr.js';

/**
 * ================================================================================
 * INSTANCE REPRESENTATION
 * ================================================================================
 */

/** Parsed IP address value (ipaddr.js). */
export type IpAddress = IPv4 | IPv6;

export interface InstanceState {
    readonly Code?: number;
    readonly Name?: string;
}

export interface InstanceTag {
    readonly Key?: string;
    readonly Value?: string;
}

export interface CpuDetails {
    readonly CoreCount?: number;
    readonly ThreadsPerCore?: number;
}

export interface SecurityGroupRef {
    readonly GroupName?: string;
    readonly GroupId?: string;
}

/**
 * One virtual NIC attached to an instance
 *
 * //? Address fields are only set when the source value parsed as a valid IP
 */
export interface NetworkInterface {
    readonly ipOwnerId: string;
    readonly publicDnsName: string;
    readonly macAddress: string;
    readonly networkInterfaceId: string;
    readonly ownerId: string;
    readonly privateDnsName: string;
    readonly subnetId: string;
    readonly status: string;

    readonly publicIpAddress?: IpAddress;
    readonly ipv6Address?: IpAddress;
    readonly privateIpAddress?: IpAddress;
}

/**
 * Complete representation of a collected EC2 instance
 *
 * //! IMPORTANT: instanceId is the primary key; it is region-scoped
 * //? ramDiskId, platform, kernelId and hostId are "" when AWS omits them
 */
export interface Instance {
    // Core AWS identifiers
    readonly imageId: string;
    readonly instanceId: string;

    // Owned interfaces, one per raw NetworkInterfaces entry
    readonly networkInterfaces: readonly NetworkInterface[];

    readonly state: InstanceState;
    readonly launchTime: Date;
    readonly tags: readonly InstanceTag[];
    readonly cpuDetails: CpuDetails;
    readonly instanceType: string;
    readonly securityGroups: readonly SecurityGroupRef[];
    readonly clientToken: string;
    readonly stateTransitionReason: string;
    readonly rootDeviceName: string;

    // Optional in the DescribeInstances response
    readonly ramDiskId: string;
    readonly platform: string;
    readonly kernelId: string;
    readonly hostId: string;
}

/**
 * ================================================================================
 * LISTING CAPABILITY
 * ================================================================================
 */

export interface RawReservation {
    readonly Instances?: readonly unknown[];
}

/**
 * One DescribeInstances page. Structurally compatible with
 * DescribeInstancesCommandOutput.
 */
export interface InstancePage {
    readonly Reservations?: readonly RawReservation[];
    readonly NextToken?: string;
}

export interface InstanceListingClient {
    listInstances(nextToken?: string): Promise<InstancePage>;
}

export type RegionClientFactory = (region: string) => InstanceListingClient;

/**
 * ================================================================================
 * DIAGNOSTICS
 * ================================================================================
 */

export type DiagnosticData = Record<string, unknown>;

export interface DiagnosticSink {
    debug(message: string, data?: DiagnosticData): void;
    info(message: string, data?: DiagnosticData): void;
    warn(message: string, data?: DiagnosticData): void;
    error(message: string, data?: DiagnosticData): void;
}
