import { Command } from 'commander';
import { DEFAULT_REGIONS } from '../config/defaults';

/**
 * Print the regions swept when neither --regions nor INVENTORY_REGIONS is set.
 */
export const regionsCommand = new Command('regions')
    .description('List the default AWS regions collected from')
    .action(() => {
        DEFAULT_REGIONS.forEach((region) => console.log(region));
    });
