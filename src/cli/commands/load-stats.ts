/**
 * fleetscope load-stats command
 */

import { Command } from 'commander';
import { ApiClient } from '../api-client.js';
import { failCommand, writeJson } from '../output.js';
import { parseTimestamp } from './parse.js';

export function loadStatsCommand(program: Command): void {
    program
        .command('load-stats')
        .description('Fetch a resource-usage series for a client')
        .argument('<clientId>', 'Client id')
        .requiredOption('-m, --metric <metric>', 'CPU_PERCENT, CPU_USER, IO_READ_BYTES, MEMORY_RSS_SIZE, ...')
        .option('--start <time>', 'Range start (default: 30 minutes before end)', parseTimestamp)
        .option('--end <time>', 'Range end (default: now)', parseTimestamp)
        .action(async (clientId: string, options: { metric: string; start?: number; end?: number }) => {
            try {
                const client = new ApiClient();
                writeJson(await client.getLoadStats(clientId, options.metric, { start: options.start, end: options.end }));
            } catch (error) {
                failCommand(error);
            }
        });
}
