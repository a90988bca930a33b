import { AUDIT_CHANNEL } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { IKeyValueStore } from '../key-value-store.js';

export type AuditAction = 'CLIENT_ADD_LABEL' | 'CLIENT_REMOVE_LABEL';

export interface AuditEvent {
    user: string;
    action: AuditAction;
    /** Component that produced the event. */
    flowName: string;
    client: string;
    description: string;
    timestamp: number;
}

export interface AuditSink {
    /** Delivers one batch; called once per label mutation request. */
    publish(events: readonly AuditEvent[]): Promise<void>;
}

/** Writes audit events to the structured log. */
export class LoggingAuditSink implements AuditSink {
    async publish(events: readonly AuditEvent[]): Promise<void> {
        for (const event of events) {
            logger.op('audit', 'audit', `${event.action} user=${event.user} client=${event.client} description="${event.description}"`);
        }
    }
}

/** Publishes the batch as one JSON message on the audit channel. */
export class PubSubAuditSink implements AuditSink {
    constructor(
        private readonly kv: IKeyValueStore,
        private readonly channel: string = AUDIT_CHANNEL
    ) { }

    async publish(events: readonly AuditEvent[]): Promise<void> {
        if (events.length === 0) return;
        const receivers = await this.kv.publish(this.channel, JSON.stringify(events));
        logger.debug(`[audit] published ${events.length} event(s) on "${this.channel}" to ${receivers} subscriber(s)`);
    }
}

/** Fans a batch out to several sinks; every sink is attempted before the first failure is rethrown. */
export class CompositeAuditSink implements AuditSink {
    constructor(private readonly sinks: readonly AuditSink[]) { }

    async publish(events: readonly AuditEvent[]): Promise<void> {
        const results = await Promise.allSettled(this.sinks.map(sink => sink.publish(events)));
        const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
        if (failure) {
            throw failure.reason;
        }
    }
}
