/**
 * ================================================================================
 * VALIDATION UTILITY - Input Validation and Data Processing
 * ================================================================================
 *
 * Validation functions and formatting helpers shared by the normalizer, the
 * configuration service and the CLI.
 *
 * KEY FEATURES:
 * • IP Address Parsing - Strict IPv4/IPv6 parsing into ipaddr.js values
 * • Region Validation - Verify AWS region identifier shape
 * • Page Size Validation - Keep DescribeInstances MaxResults in range
 * • Uptime Formatting - Human-readable time duration display
 * • Type Guards - Narrowing for untyped SDK and record values
 *
 * @version 1.0.0
 * @since 2025
 * @license BSD-3-Clause
 */

import * as ipaddr from 'ipaddr.js';
import { AddressParseError } from './errors';
import type { IpAddress } from '../types';

/**
 * ================================================================
 * NETWORK ADDRESS VALIDATION
 * ================================================================
 */

/**
 * Parse an IPv4 or IPv6 address string
 *
 * IPv4 must be plain four-part decimal; the shorthand forms ipaddr.js also
 * accepts ("10.1", "0x7f.0.0.1") are rejected.
 *
 * @throws AddressParseError when the value is not a valid address
 */
export function parseIpAddress(value: string): IpAddress {
    if (ipaddr.IPv4.isValidFourPartDecimal(value)) {
        return ipaddr.IPv4.parse(value);
    }
    if (ipaddr.IPv6.isValid(value)) {
        return ipaddr.IPv6.parse(value);
    }
    throw new AddressParseError(value);
}

/**
 * ================================================================
 * AWS RESOURCE VALIDATION
 * ================================================================
 */

// us-east-1, eu-central-2, us-gov-west-1, ap-southeast-5 ...
const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

/**
 * Validate AWS region identifier shape
 *
 * //! LIMITATION: Only checks the shape, not that the region exists
 */
export function validateRegion(region: string): boolean {
    return REGION_PATTERN.test(region);
}

/**
 * DescribeInstances accepts MaxResults between 5 and 1000.
 */
export function validatePageSize(pageSize: number): boolean {
    return Number.isInteger(pageSize) && pageSize >= 5 && pageSize <= 1000;
}

/**
 * ================================================================
 * DISPLAY FORMATTING UTILITIES
 * ================================================================
 */

/**
 * Format instance uptime in human-readable format
 *
 * @param launchTime - Instance launch timestamp
 * @param now - Reference time, defaults to the current time
 * @returns Formatted uptime (e.g., "2d 5h 30m", "3h 45m", "25m")
 */
export function formatUptime(launchTime: Date, now: Date = new Date()): string {
    const uptimeMs = Math.max(0, now.getTime() - launchTime.getTime());

    const days = Math.floor(uptimeMs / (1000 * 60 * 60 * 24));
    const hours = Math.floor((uptimeMs % (1000 * 60 * 60 * 24)) / (1000 * 60 * 60));
    const minutes = Math.floor((uptimeMs % (1000 * 60 * 60)) / (1000 * 60));

    if (days > 0) {
        return `${days}d ${hours}h ${minutes}m`;
    } else if (hours > 0) {
        return `${hours}h ${minutes}m`;
    } else {
        return `${minutes}m`;
    }
}

/**
 * ================================================================
 * TYPE GUARDS
 * ================================================================
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}
