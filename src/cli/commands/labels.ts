/**
 * fleetscope labels command group
 */

import { Command } from 'commander';
import { ApiClient } from '../api-client.js';
import { failCommand, writeJson } from '../output.js';

interface MutationOptions {
    client: string[];
    label: string[];
}

export function labelsCommand(program: Command): void {
    const labels = program
        .command('labels')
        .description('List, add or remove client labels');

    labels
        .command('list')
        .description('List label names used on any client')
        .action(async () => {
            try {
                writeJson(await new ApiClient().listLabels());
            } catch (error) {
                failCommand(error);
            }
        });

    labels
        .command('add')
        .description('Add labels to clients, owned by the current user')
        .requiredOption('--client <id...>', 'Client ids')
        .requiredOption('--label <name...>', 'Label names')
        .action(async (options: MutationOptions) => {
            try {
                writeJson(await new ApiClient().addLabels(options.client, options.label));
            } catch (error) {
                failCommand(error);
            }
        });

    labels
        .command('remove')
        .description('Remove labels the current user controls from clients')
        .requiredOption('--client <id...>', 'Client ids')
        .requiredOption('--label <name...>', 'Label names')
        .action(async (options: MutationOptions) => {
            try {
                writeJson(await new ApiClient().removeLabels(options.client, options.label));
            } catch (error) {
                failCommand(error);
            }
        });
}
