import { OperationNotFoundError, ClientNotFoundError } from '../../types/errors.js';
import type { Caller } from '../../utils/caller-context.js';
import { logger } from '../../utils/logger.js';
import { IDGenerator } from '../id-generator.js';
import type { IKeyValueStore } from '../key-value-store.js';
import type { ClientStore } from '../storage/types.js';
import type { ClientId } from './client-id.js';

export const INTERROGATE_FLOW = 'Interrogate';

export type OperationState = 'RUNNING' | 'FINISHED';

interface FlowRecord {
    flowName: string;
    creator: string;
    state: OperationState;
    startedAt: number;
    finishedAt?: number;
}

/** Boundary to the flow subsystem that runs interrogations. */
export interface FlowRunner {
    /** Starts a flow and returns its operation id. */
    startFlow(clientId: ClientId, flowName: string, creator: string): Promise<string>;
    /** null when no such operation exists for the client. */
    getFlowState(clientId: ClientId, operationId: string): Promise<OperationState | null>;
}

const flowKey = (clientId: ClientId): string => `client:${clientId.toString()}:flows`;

/**
 * Records flows in the key-value store. The flow engine calls markFinished
 * when it is done with one.
 */
export class KeyValueFlowRunner implements FlowRunner {
    constructor(
        private readonly kv: IKeyValueStore,
        private readonly now: () => number = Date.now
    ) { }

    private async readFlow(clientId: ClientId, operationId: string): Promise<FlowRecord | null> {
        const raw = await this.kv.hget(flowKey(clientId), operationId);
        return raw === null ? null : JSON.parse(raw) as FlowRecord;
    }

    async startFlow(clientId: ClientId, flowName: string, creator: string): Promise<string> {
        const operationId = IDGenerator.generateOperationId();
        const record: FlowRecord = { flowName, creator, state: 'RUNNING', startedAt: this.now() };
        await this.kv.hset(flowKey(clientId), operationId, JSON.stringify(record));
        return operationId;
    }

    async getFlowState(clientId: ClientId, operationId: string): Promise<OperationState | null> {
        return (await this.readFlow(clientId, operationId))?.state ?? null;
    }

    async markFinished(clientId: ClientId, operationId: string): Promise<void> {
        const record = await this.readFlow(clientId, operationId);
        if (!record) {
            throw new OperationNotFoundError(operationId);
        }
        const finished: FlowRecord = { ...record, state: 'FINISHED', finishedAt: this.now() };
        await this.kv.hset(flowKey(clientId), operationId, JSON.stringify(finished));
    }
}

export class InterrogationService {
    constructor(
        private readonly runner: FlowRunner,
        private readonly clients: ClientStore
    ) { }

    async interrogate(caller: Caller, clientId: ClientId): Promise<string> {
        if (!(await this.clients.hasClient(clientId))) {
            throw new ClientNotFoundError(clientId.toString());
        }
        const operationId = await this.runner.startFlow(clientId, INTERROGATE_FLOW, caller.username);
        logger.op('interrogation', 'interrogate', `client=${clientId.toString()} operation=${operationId} user=${caller.username}`);
        return operationId;
    }

    async getInterrogationState(clientId: ClientId, operationId: string): Promise<OperationState> {
        const state = IDGenerator.isOperationId(operationId)
            ? await this.runner.getFlowState(clientId, operationId)
            : null;
        if (state === null) {
            throw new OperationNotFoundError(operationId);
        }
        return state;
    }
}
