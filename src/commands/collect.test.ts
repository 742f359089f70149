import chalk from 'chalk';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { toInstance } from '../normalize';
import { FakeListingClient, page, rawInstance, rawNetworkInterface, RecordingSink } from '../test/fixtures';
import { Logger } from '../utils/logger';
import { formatInstance, instanceToJSON, runCollect } from './collect';

describe('formatInstance', () => {
    it('renders one instance', () => {
        const instance = toInstance(rawInstance(), new RecordingSink());

        expect(formatInstance(instance, new Date('2024-05-02T14:30:00Z'))).toEqual([
            'Instance ID: i-1 (web-1)',
            '  Type: t2.micro',
            '  State: running',
            '  Image: ami-1',
            '  Platform: N/A',
            '  Launch Time: 2024-05-01T12:00:00.000Z',
            '  Uptime: 1d 2h 30m',
            '  Interface eni-1: private 10.0.0.5, public 198.51.100.5, ipv6 N/A',
        ]);
    });

    it('omits the name when the instance has no Name tag', () => {
        const instance = toInstance(rawInstance({ Tags: [], PlatformDetails: 'Windows' }), new RecordingSink());

        const [header, , , , platform] = formatInstance(instance, new Date('2024-05-01T12:00:00Z'));

        expect(header).toBe('Instance ID: i-1');
        expect(platform).toBe('  Platform: Windows');
    });
});

describe('instanceToJSON', () => {
    it('turns addresses into strings and absent ones into null', () => {
        const instance = toInstance(
            rawInstance({ NetworkInterfaces: [rawNetworkInterface({ Ipv6Addresses: '2001:db8::10' })] }),
            new RecordingSink()
        );

        const json = instanceToJSON(instance);

        expect(json.launchTime).toBe('2024-05-01T12:00:00.000Z');
        expect(json.networkInterfaces).toEqual([
            {
                networkInterfaceId: 'eni-1',
                ipOwnerId: 'o',
                publicDnsName: '',
                privateDnsName: '',
                macAddress: '00:00',
                ownerId: 'o',
                subnetId: 's-1',
                status: 'in-use',
                publicIpAddress: '198.51.100.5',
                ipv6Address: '2001:db8::10',
                privateIpAddress: '10.0.0.5',
            },
        ]);
    });
});

describe('runCollect', () => {
    const logFile = path.join(os.tmpdir(), `inventory-collect-${process.pid}.log`);
    let log: Logger;
    let consoleLog: MockInstance;

    beforeEach(() => {
        consoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        log = new Logger({ logFile });
    });

    afterEach(() => {
        log.close();
        consoleLog.mockRestore();
        vi.unstubAllEnvs();
    });

    it('starts the execution on the configured log file', async () => {
        const configured = path.join(os.tmpdir(), `inventory-collect-${process.pid}-configured.log`);
        vi.stubEnv('INVENTORY_LOG_FILE', configured);
        vi.stubEnv('AWS_PROFILE', '');

        await runCollect(
            { regions: ['us-east-1'], json: true, credentialCheck: false },
            { log, clientFactory: () => new FakeListingClient([page([])]), command: 'collect --json' }
        );

        expect(log.getLogFilePath()).toBe(configured);
        expect(consoleLog).toHaveBeenNthCalledWith(2, chalk.gray('📄'), `Log file: ${configured}`);
        expect(consoleLog).toHaveBeenCalledWith(
            chalk.blue('ℹ'),
            `[${log.getExecutionId().slice(0, 8)}] AWS account unknown (profile default), 1 region(s)`
        );
    });

    it('prints the instances as JSON', async () => {
        const clientFactory = vi.fn(() => new FakeListingClient([page([rawInstance()])]));

        const result = await runCollect(
            { regions: ['us-east-1'], json: true, credentialCheck: false },
            { log, clientFactory }
        );

        expect(result?.instances).toHaveLength(1);
        expect(result?.regions).toEqual([{ region: 'us-east-1', status: 'ok', instanceCount: 1, pageCount: 1 }]);
        expect(clientFactory).toHaveBeenCalledWith('us-east-1');

        const printed = consoleLog.mock.calls
            .map(([first]) => first)
            .find((first) => typeof first === 'string' && first.startsWith('['));
        expect(JSON.parse(String(printed))).toEqual([expect.objectContaining({ instanceId: 'i-1', imageId: 'ami-1' })]);
    });
});
