/**
 * ================================================================================
 * ERROR TYPES - Inventory Failure Taxonomy
 * ================================================================================
 *
 * RECOVERABLE:
 * • RegionAccessError - A region could not be listed (auth, permission,
 *   opt-in, network, or a throttled/failing service). The collector logs it
 *   and moves to the next region.
 * • AddressParseError - An address string is not a valid IP. The normalizer
 *   logs it and leaves the field unset.
 *
 * FATAL:
 * • MissingFieldError - A required key is absent from a raw record.
 * • InvalidFieldError - A required key is present with the wrong shape.
 * • InvalidConfigError - A configuration value cannot be used.
 *
 * @version 1.0.0
 * @since 2025
 * @license BSD-3-Clause
 */

export type InventoryErrorCode =
    | 'REGION_ACCESS'
    | 'ADDRESS_PARSE'
    | 'MISSING_FIELD'
    | 'INVALID_FIELD'
    | 'INVALID_CONFIG';

export class InventoryError extends Error {
    readonly code: InventoryErrorCode;

    constructor(code: InventoryErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export type RegionAccessCategory = 'auth' | 'permission' | 'opt_in' | 'network' | 'service';

export class RegionAccessError extends InventoryError {
    readonly region: string;
    readonly category: RegionAccessCategory;
    readonly errorCode: string;
    readonly httpStatus?: number;

    constructor(args: {
        region: string;
        category: RegionAccessCategory;
        errorCode: string;
        message: string;
        httpStatus?: number;
        cause?: unknown;
    }) {
        super('REGION_ACCESS', `Could not pull instances from region ${args.region}: ${args.message}`, {
            cause: args.cause,
        });
        this.region = args.region;
        this.category = args.category;
        this.errorCode = args.errorCode;
        this.httpStatus = args.httpStatus;
    }
}

export class AddressParseError extends InventoryError {
    readonly value: string;

    constructor(value: string) {
        super('ADDRESS_PARSE', `"${value}" is not a valid IP address`);
        this.value = value;
    }
}

/** Where a raw record came from, for fatal decode errors. */
export interface RecordContext {
    region?: string;
    instanceId?: string;
}

function describeRecord(context: RecordContext): string {
    const parts: string[] = [];
    if (context.instanceId) parts.push(`instance ${context.instanceId}`);
    if (context.region) parts.push(`region ${context.region}`);
    return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

export class MissingFieldError extends InventoryError {
    readonly field: string;
    readonly region?: string;
    readonly instanceId?: string;

    constructor(field: string, context: RecordContext = {}) {
        super('MISSING_FIELD', `Required field "${field}" is missing${describeRecord(context)}`);
        this.field = field;
        this.region = context.region;
        this.instanceId = context.instanceId;
    }
}

export class InvalidFieldError extends InventoryError {
    readonly field: string;
    readonly region?: string;
    readonly instanceId?: string;

    constructor(field: string, detail: string, context: RecordContext = {}) {
        super('INVALID_FIELD', `Field "${field}" is invalid${describeRecord(context)}: ${detail}`);
        this.field = field;
        this.region = context.region;
        this.instanceId = context.instanceId;
    }
}

export class InvalidConfigError extends InventoryError {
    readonly setting: string;

    constructor(setting: string, message: string) {
        super('INVALID_CONFIG', `Invalid ${setting}: ${message}`);
        this.setting = setting;
    }
}
