/**
 * fleetscope interrogate and interrogation-state commands
 */

import { Command } from 'commander';
import { ApiClient } from '../api-client.js';
import { failCommand, writeJson } from '../output.js';

export function interrogateCommands(program: Command): void {
    program
        .command('interrogate')
        .description('Start an interrogation of a client')
        .argument('<clientId>', 'Client id')
        .action(async (clientId: string) => {
            try {
                writeJson(await new ApiClient().interrogate(clientId));
            } catch (error) {
                failCommand(error);
            }
        });

    program
        .command('interrogation-state')
        .description('Show whether an interrogation is still running')
        .argument('<clientId>', 'Client id')
        .argument('<operationId>', 'Operation id returned by interrogate')
        .action(async (clientId: string, operationId: string) => {
            try {
                writeJson(await new ApiClient().getInterrogationState(clientId, operationId));
            } catch (error) {
                failCommand(error);
            }
        });
}
