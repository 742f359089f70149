import { describe, expect, it } from 'vitest';

import { AddressParseError } from './errors';
import { formatUptime, isRecord, parseIpAddress, validatePageSize, validateRegion } from './validation';

describe('parseIpAddress', () => {
    it('parses IPv4 addresses', () => {
        const address = parseIpAddress('198.51.100.5');
        expect(address.kind()).toBe('ipv4');
        expect(address.toString()).toBe('198.51.100.5');
    });

    it('parses IPv6 addresses', () => {
        const address = parseIpAddress('2001:db8::10');
        expect(address.kind()).toBe('ipv6');
        expect(address.toString()).toBe('2001:db8::10');
    });

    it('rejects shorthand IPv4 forms', () => {
        expect(() => parseIpAddress('10.1')).toThrow(AddressParseError);
    });

    it('rejects text that is not an address', () => {
        expect(() => parseIpAddress('not-an-ip')).toThrow(AddressParseError);
        expect(() => parseIpAddress('not-an-ip')).toThrow('"not-an-ip" is not a valid IP address');
    });
});

describe('validateRegion', () => {
    it('accepts AWS region identifiers', () => {
        expect(validateRegion('us-east-1')).toBe(true);
        expect(validateRegion('ap-southeast-2')).toBe(true);
        expect(validateRegion('us-gov-west-1')).toBe(true);
    });

    it('rejects other strings', () => {
        expect(validateRegion('us-east')).toBe(false);
        expect(validateRegion('US-EAST-1')).toBe(false);
        expect(validateRegion('')).toBe(false);
    });
});

describe('validatePageSize', () => {
    it('keeps MaxResults within 5..1000', () => {
        expect(validatePageSize(5)).toBe(true);
        expect(validatePageSize(1000)).toBe(true);
        expect(validatePageSize(4)).toBe(false);
        expect(validatePageSize(1001)).toBe(false);
        expect(validatePageSize(10.5)).toBe(false);
    });
});

describe('formatUptime', () => {
    const launch = new Date('2024-05-01T12:00:00Z');

    it('uses the largest relevant unit', () => {
        expect(formatUptime(launch, new Date('2024-05-02T14:30:00Z'))).toBe('1d 2h 30m');
        expect(formatUptime(launch, new Date('2024-05-01T15:45:00Z'))).toBe('3h 45m');
        expect(formatUptime(launch, new Date('2024-05-01T12:25:00Z'))).toBe('25m');
    });

    it('never goes negative', () => {
        expect(formatUptime(launch, new Date('2024-04-30T12:00:00Z'))).toBe('0m');
    });
});

describe('isRecord', () => {
    it('accepts objects and arrays only', () => {
        expect(isRecord({ InstanceId: 'i-1' })).toBe(true);
        expect(isRecord([])).toBe(true);
        expect(isRecord(null)).toBe(false);
        expect(isRecord('i-1')).toBe(false);
    });
});
