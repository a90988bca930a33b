/**
 * fleetscope client command
 */

import { Command } from 'commander';
import { ApiClient } from '../api-client.js';
import { failCommand, writeJson } from '../output.js';
import { parseTimestamp } from './parse.js';

export function clientCommand(program: Command): void {
    program
        .command('client')
        .description('Show one client record')
        .argument('<clientId>', 'Client id, e.g. C.1000000000000000')
        .option('-t, --timestamp <time>', 'Show the record as of this time', parseTimestamp)
        .action(async (clientId: string, options: { timestamp?: number }) => {
            try {
                const client = new ApiClient();
                writeJson(await client.getClient(clientId, options.timestamp));
            } catch (error) {
                failCommand(error);
            }
        });
}
