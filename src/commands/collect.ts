/**
 * ================================================================================
 * COLLECT COMMAND - Multi-Region Instance Inventory
 * ================================================================================
 *
 * Pulls every EC2 instance the configured credentials can see, region by
 * region, and prints the normalized result.
 *
 * COMMAND FEATURES:
 * • Region Selection - --regions, INVENTORY_REGIONS, or every default region
 * • Partial Access - Regions the credentials cannot read are skipped and listed
 * • Output - Readable listing, or JSON with --json
 *
 * USAGE:
 * instance-inventory collect --regions us-east-2 us-west-2
 *
 * @version 1.0.0
 * @since 2025
 * @license BSD-3-Clause
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ec2ClientFactory } from '../aws/clients';
import { ConfigService, parseRegionList } from '../services/config';
import { InstanceInventoryService, type CollectionResult } from '../services/inventory';
import type { Instance, NetworkInterface, RegionClientFactory } from '../types';
import { logger, type Logger } from '../utils/logger';
import { formatUptime } from '../utils/validation';

export interface CollectOptions {
    regions?: string[];
    profile?: string;
    pageSize?: number;
    json?: boolean;
    credentialCheck?: boolean;
}

export interface CollectDependencies {
    log: Logger;
    clientFactory?: RegionClientFactory;
    // Recorded with the execution id
    command?: string;
}

/**
 * ================================================================================
 * OUTPUT FORMATTING
 * ================================================================================
 */

function interfaceToJSON(networkInterface: NetworkInterface): Record<string, string | null> {
    return {
        networkInterfaceId: networkInterface.networkInterfaceId,
        ipOwnerId: networkInterface.ipOwnerId,
        publicDnsName: networkInterface.publicDnsName,
        privateDnsName: networkInterface.privateDnsName,
        macAddress: networkInterface.macAddress,
        ownerId: networkInterface.ownerId,
        subnetId: networkInterface.subnetId,
        status: networkInterface.status,
        publicIpAddress: networkInterface.publicIpAddress?.toString() ?? null,
        ipv6Address: networkInterface.ipv6Address?.toString() ?? null,
        privateIpAddress: networkInterface.privateIpAddress?.toString() ?? null,
    };
}

/**
 * Plain JSON view of an instance; addresses become strings, absent ones null.
 */
export function instanceToJSON(instance: Instance): Record<string, unknown> {
    return {
        instanceId: instance.instanceId,
        imageId: instance.imageId,
        instanceType: instance.instanceType,
        state: instance.state,
        launchTime: instance.launchTime.toISOString(),
        tags: instance.tags,
        cpuDetails: instance.cpuDetails,
        securityGroups: instance.securityGroups,
        clientToken: instance.clientToken,
        stateTransitionReason: instance.stateTransitionReason,
        rootDeviceName: instance.rootDeviceName,
        ramDiskId: instance.ramDiskId,
        platform: instance.platform,
        kernelId: instance.kernelId,
        hostId: instance.hostId,
        networkInterfaces: instance.networkInterfaces.map(interfaceToJSON),
    };
}

/**
 * Readable lines for one instance, without colour.
 */
export function formatInstance(instance: Instance, now: Date = new Date()): string[] {
    const name = instance.tags.find((tag) => tag.Key === 'Name')?.Value;
    const lines = [
        `Instance ID: ${instance.instanceId}${name ? ` (${name})` : ''}`,
        `  Type: ${instance.instanceType}`,
        `  State: ${instance.state.Name ?? 'unknown'}`,
        `  Image: ${instance.imageId}`,
        `  Platform: ${instance.platform || 'N/A'}`,
        `  Launch Time: ${instance.launchTime.toISOString()}`,
        `  Uptime: ${formatUptime(instance.launchTime, now)}`,
    ];

    for (const networkInterface of instance.networkInterfaces) {
        lines.push(
            `  Interface ${networkInterface.networkInterfaceId}: ` +
                `private ${networkInterface.privateIpAddress?.toString() ?? 'N/A'}, ` +
                `public ${networkInterface.publicIpAddress?.toString() ?? 'N/A'}, ` +
                `ipv6 ${networkInterface.ipv6Address?.toString() ?? 'N/A'}`
        );
    }
    return lines;
}

function printResult(result: CollectionResult, json: boolean, log: Logger): void {
    if (json) {
        console.log(JSON.stringify(result.instances.map(instanceToJSON), null, 2));
    } else if (result.instances.length === 0) {
        log.info('No instances found.');
    } else {
        console.log(chalk.bold('\n📋 Instances:\n'));
        for (const instance of result.instances) {
            const [header, ...details] = formatInstance(instance);
            console.log(chalk.bold(header));
            details.forEach((line) => console.log(line));
            console.log('');
        }
    }

    const skipped = result.regions.filter((report) => report.status === 'skipped');
    if (skipped.length > 0) {
        log.warn(`Skipped ${skipped.length} inaccessible region(s): ${skipped.map((r) => r.region).join(', ')}`);
    }
    log.success(
        `Collected ${result.instances.length} instances from ${result.regions.length - skipped.length} region(s)`
    );
}

/**
 * ================================================================================
 * COMMAND EXECUTION
 * ================================================================================
 *
 * //? Fatal errors (malformed records, bad configuration) propagate to the caller
 */
export async function runCollect(options: CollectOptions, deps: CollectDependencies): Promise<CollectionResult | null> {
    const { log } = deps;
    const configService = new ConfigService(log, {
        ...(options.regions?.length ? { regions: options.regions } : {}),
        ...(options.profile ? { profile: options.profile } : {}),
        ...(options.pageSize !== undefined ? { pageSize: options.pageSize } : {}),
    });
    const config = configService.getConfig();
    log.setLogFile(config.logFile);
    log.startExecution(deps.command ?? 'collect');

    if (options.credentialCheck !== false) {
        const credsOk = await configService.validateAWSCredentials();
        if (!credsOk) {
            return null;
        }
    }

    const summary = configService.getSummary();
    log.info(`AWS account ${summary.account ?? 'unknown'} (profile ${summary.profile}), ${summary.regions} region(s)`);

    const inventory = new InstanceInventoryService({
        clientFactory:
            deps.clientFactory ??
            ec2ClientFactory({
                profile: config.profile,
                pageSize: config.pageSize,
                requestTimeoutMs: config.requestTimeoutMs,
            }),
        sink: log,
        regions: config.regions,
    });

    const spinner = options.json ? null : log.spinner(`Pulling instances from ${config.regions.length} region(s)...`);
    const timer = log.timer('collect');
    try {
        const result = await inventory.collectWithReport(config.regions);
        spinner?.succeed('Instances pulled');
        timer.end();
        printResult(result, options.json ?? false, log);
        return result;
    } catch (error) {
        spinner?.fail('Collection failed');
        throw error;
    }
}

function parsePageSize(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Page size must be an integer.');
    }
    return parsed;
}

/**
 * ================================================================================
 * COLLECT COMMAND DEFINITION
 * ================================================================================
 */
export const collectCommand = new Command('collect')
    .description('Collect EC2 instances across AWS regions')
    .option('-r, --regions <regions...>', 'Regions to pull from (space or comma separated)')
    .option('-p, --profile <profile>', 'AWS profile to use')
    .option('--page-size <size>', 'DescribeInstances page size (5-1000)', parsePageSize)
    .option('--json', 'Print instances as JSON')
    .option('--no-credential-check', 'Skip the STS credential check')
    .action(async (opts: CollectOptions) => {
        try {
            const regions = opts.regions?.flatMap(parseRegionList);
            const command = `collect ${process.argv.slice(3).join(' ')}`.trim();
            const result = await runCollect({ ...opts, regions }, { log: logger, command });
            if (!result) {
                process.exitCode = 1;
            }
        } catch (error) {
            logger.error('Failed to collect instances', error instanceof Error ? error : { error: String(error) });
            process.exitCode = 1;
        }
    });
