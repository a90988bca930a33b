#!/usr/bin/env node
/**
 * Fleetscope CLI - Command-line interface for the Fleetscope REST API
 */

import { Command } from 'commander';
import { searchCommand } from './commands/search.js';
import { clientCommand } from './commands/client.js';
import { labelsCommand } from './commands/labels.js';
import { loadStatsCommand } from './commands/load-stats.js';
import { interrogateCommands } from './commands/interrogate.js';
import { getApiUrl, getApiUser } from './config.js';

const program = new Command();

program
    .name('fleetscope')
    .description('CLI tool for searching, labelling and inspecting managed clients')
    .version('1.0.0')
    .option('-u, --url <url>', 'Fleetscope API base URL', getApiUrl())
    .option('--user <name>', 'User name sent to the API', getApiUser())
    .hook('preAction', (thisCommand) => {
        // Store the global options for use in commands
        const opts = thisCommand.opts<{ url?: string; user?: string }>();
        if (opts.url) {
            process.env['FLEETSCOPE_API_URL'] = opts.url;
        }
        if (opts.user) {
            process.env['FLEETSCOPE_USER'] = opts.user;
        }
    });

searchCommand(program);
clientCommand(program);
labelsCommand(program);
loadStatsCommand(program);
interrogateCommands(program);

program.parseAsync().catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});
