/**
 * Wires the client-management services on top of the storage backends.
 */

import type { AuditSink } from './audit/audit-sink.js';
import { CompositeAuditSink, LoggingAuditSink, PubSubAuditSink } from './audit/audit-sink.js';
import { ClientRegistrar } from './clients/client-registrar.js';
import type { FlowRunner } from './clients/interrogation.js';
import { InterrogationService, KeyValueFlowRunner } from './clients/interrogation.js';
import { ClientAddressService, IpResolver } from './clients/ip-resolver.js';
import { ClientLabelService } from './clients/label-service.js';
import { ClientRecordReader } from './clients/record-reader.js';
import type { IKeyValueStore } from './key-value-store.js';
import { SearchQueryEngine } from './search/search-engine.js';
import type { SearchPolicy } from './search/search-policy.js';
import { DEFAULT_SEARCH_POLICY } from './search/search-policy.js';
import { MetricSeriesBuilder } from './stats/load-series.js';
import type { StorageBackends } from './storage/backend-factory.js';

export interface FleetServices {
    kv: IKeyValueStore;
    storage: StorageBackends;
    reader: ClientRecordReader;
    search: SearchQueryEngine;
    searchPolicy: SearchPolicy;
    labels: ClientLabelService;
    loadStats: MetricSeriesBuilder;
    interrogation: InterrogationService;
    addresses: ClientAddressService;
    registrar: ClientRegistrar;
}

export interface FleetServiceOptions {
    audit?: AuditSink;
    flowRunner?: FlowRunner;
    ipResolver?: IpResolver;
    searchPolicy?: SearchPolicy;
    now?: () => number;
}

export function createFleetServices(
    kv: IKeyValueStore,
    storage: StorageBackends,
    options: FleetServiceOptions = {}
): FleetServices {
    const now = options.now ?? Date.now;
    const { primary, mirror } = storage;
    const reader = new ClientRecordReader(primary, now);
    const audit = options.audit ?? new CompositeAuditSink([new LoggingAuditSink(), new PubSubAuditSink(kv)]);

    return {
        kv,
        storage,
        reader,
        search: new SearchQueryEngine(primary, reader),
        searchPolicy: options.searchPolicy ?? DEFAULT_SEARCH_POLICY,
        labels: new ClientLabelService(primary, mirror, audit, undefined, now),
        loadStats: new MetricSeriesBuilder(primary.clients, now),
        interrogation: new InterrogationService(options.flowRunner ?? new KeyValueFlowRunner(kv, now), primary.clients),
        addresses: new ClientAddressService(primary.clients, options.ipResolver ?? new IpResolver()),
        registrar: new ClientRegistrar(mirror ? [primary, mirror] : [primary])
    };
}
