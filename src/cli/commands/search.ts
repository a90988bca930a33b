/**
 * fleetscope search command
 */

import { Command } from 'commander';
import { ApiClient } from '../api-client.js';
import { failCommand, writeJson } from '../output.js';
import { parseNonNegativeInt } from './parse.js';

export function searchCommand(program: Command): void {
    program
        .command('search')
        .description('Search clients by keywords and labels (e.g. "label:prod host:web")')
        .argument('[query...]', 'Search query; shell-style quoting is kept')
        .option('-o, --offset <n>', 'Number of results to skip', parseNonNegativeInt, 0)
        .option('-c, --count <n>', 'Maximum number of results (0 = all)', parseNonNegativeInt, 0)
        .action(async (query: string[], options: { offset: number; count: number }) => {
            try {
                const client = new ApiClient();
                writeJson(await client.searchClients(query.join(' '), options));
            } catch (error) {
                failCommand(error);
            }
        });
}
