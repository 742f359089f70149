/**
 * ================================================================================
 * CONFIG SERVICE - Application Configuration Management
 * ================================================================================
 *
 * Centralized configuration for the inventory CLI. Resolves settings from
 * explicit options first, then the environment (.env is loaded by dotenv),
 * then defaults, and validates AWS credentials before a run.
 *
 * SETTINGS:
 * • regions - INVENTORY_REGIONS (comma separated), defaults to DEFAULT_REGIONS
 * • profile - AWS_PROFILE
 * • pageSize - INVENTORY_PAGE_SIZE, DescribeInstances MaxResults
 * • requestTimeoutMs - INVENTORY_REQUEST_TIMEOUT_MS, per SDK call
 * • logFile - INVENTORY_LOG_FILE
 *
 * @version 1.0.0
 * @since 2025
 * @license BSD-3-Clause
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { DEFAULT_LOG_FILE, DEFAULT_REGIONS, DEFAULT_REQUEST_TIMEOUT_MS } from '../config/defaults';
import type { InventoryConfig, InventoryConfigOptions } from '../config/types';
import type { DiagnosticSink } from '../types';
import { InvalidConfigError } from '../utils/errors';
import { validatePageSize, validateRegion } from '../utils/validation';

// STS is global; any commercial region answers GetCallerIdentity.
const CREDENTIAL_CHECK_REGION = 'us-east-1';

type Env = Record<string, string | undefined>;

export function parseRegionList(value: string): string[] {
    return value
        .split(',')
        .map((region) => region.trim())
        .filter((region) => region.length > 0);
}

function parseInteger(setting: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidConfigError(setting, `"${value}" is not an integer`);
    }
    return parsed;
}

/**
 * Resolve and validate configuration
 *
 * @throws InvalidConfigError for malformed regions, page size or timeout
 */
export function resolveConfig(options: InventoryConfigOptions = {}, env: Env = process.env): InventoryConfig {
    const envRegions = env.INVENTORY_REGIONS ? parseRegionList(env.INVENTORY_REGIONS) : [];
    const regions = options.regions?.length ? options.regions : envRegions.length ? envRegions : [...DEFAULT_REGIONS];

    const invalidRegions = regions.filter((region) => !validateRegion(region));
    if (invalidRegions.length > 0) {
        throw new InvalidConfigError('regions', `unrecognized region ${invalidRegions.join(', ')}`);
    }

    const pageSize =
        options.pageSize ??
        (env.INVENTORY_PAGE_SIZE ? parseInteger('pageSize', env.INVENTORY_PAGE_SIZE) : undefined);
    if (pageSize !== undefined && !validatePageSize(pageSize)) {
        throw new InvalidConfigError('pageSize', `${pageSize} is outside 5..1000`);
    }

    const requestTimeoutMs =
        options.requestTimeoutMs ??
        (env.INVENTORY_REQUEST_TIMEOUT_MS
            ? parseInteger('requestTimeoutMs', env.INVENTORY_REQUEST_TIMEOUT_MS)
            : DEFAULT_REQUEST_TIMEOUT_MS);
    if (requestTimeoutMs <= 0) {
        throw new InvalidConfigError('requestTimeoutMs', 'must be positive');
    }

    const profile = options.profile ?? (env.AWS_PROFILE || undefined);

    return {
        regions,
        ...(profile ? { profile } : {}),
        ...(pageSize !== undefined ? { pageSize } : {}),
        requestTimeoutMs,
        logFile: options.logFile ?? (env.INVENTORY_LOG_FILE || DEFAULT_LOG_FILE),
    };
}

/**
 * ================================================================================
 * CONFIG SERVICE CLASS
 * ================================================================================
 *
 * //! DEPENDENCY: validateAWSCredentials() requires AWS credentials to be configured
 */
export class ConfigService {
    private config: InventoryConfig;
    private readonly sink: DiagnosticSink;

    constructor(sink: DiagnosticSink, options: InventoryConfigOptions = {}, env: Env = process.env) {
        this.sink = sink;
        this.config = resolveConfig(options, env);

        sink.debug('ConfigService initialized', {
            regions: this.config.regions.length,
            profile: this.config.profile || 'default',
            pageSize: this.config.pageSize,
        });
    }

    /**
     * ================================================================
     * CREDENTIAL VALIDATION
     * ================================================================
     */

    /**
     * Validate AWS credentials and populate account information
     *
     * @returns True if GetCallerIdentity succeeded
     *
     * //? A failed check only means no region will be readable; per-region
     * //? access is still decided region by region during collection
     */
    async validateAWSCredentials(stsClient?: STSClient): Promise<boolean> {
        const client =
            stsClient ??
            new STSClient({
                region: CREDENTIAL_CHECK_REGION,
                ...(this.config.profile ? { profile: this.config.profile } : {}),
            });

        try {
            const result = await client.send(new GetCallerIdentityCommand({}));
            this.config.accountId = result.Account;
            this.sink.debug('Credential validation successful', {
                accountId: result.Account,
                arn: result.Arn,
            });
            return true;
        } catch (error) {
            this.sink.error('AWS credentials validation failed. Please ensure your AWS CLI is configured.', {
                message: error instanceof Error ? error.message : String(error),
                profile: this.config.profile,
            });

            if (error instanceof Error) {
                if (error.message.includes('Could not load credentials')) {
                    this.sink.info('Hint: Run "aws configure" to set up your credentials');
                } else if (error.message.includes('expired')) {
                    this.sink.info('Hint: Your AWS credentials may have expired - refresh them');
                }
            }
            return false;
        }
    }

    /**
     * ================================================================
     * CONFIGURATION ACCESS
     * ================================================================
     */

    getConfig(): InventoryConfig {
        return { ...this.config, regions: [...this.config.regions] };
    }

    getSummary(): { regions: number; profile: string; account?: string } {
        return {
            regions: this.config.regions.length,
            profile: this.config.profile || 'default',
            account: this.config.accountId,
        };
    }
}
