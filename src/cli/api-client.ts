/**
 * API Client for the Fleetscope REST API
 */

import { getApiUrl, getApiUser } from './config.js';

export type FetchFn = typeof fetch;

export interface ApiClientOptions {
    baseUrl?: string;
    user?: string;
    fetchImpl?: FetchFn;
}

export interface TimeRangeArgs {
    start?: number;
    end?: number;
}

/** Error body the API answers with. */
interface ApiErrorBody {
    error?: unknown;
    message?: unknown;
}

function isErrorBody(value: unknown): value is ApiErrorBody {
    return typeof value === 'object' && value !== null && ('error' in value || 'message' in value);
}

export class ApiClientError extends Error {
    constructor(message: string, public readonly status: number, public readonly code?: string) {
        super(message);
        this.name = 'ApiClientError';
    }
}

export class ApiClient {
    private readonly baseUrl: string;
    private readonly user: string;
    private readonly fetchImpl: FetchFn;

    constructor(options: ApiClientOptions = {}) {
        // getApiUrl() sees the --url value through the env var the CLI hook sets
        this.baseUrl = (options.baseUrl || getApiUrl()).replace(/\/$/, '');
        this.user = options.user || getApiUser();
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    private async request(endpoint: string, init: { method?: string; body?: unknown } = {}): Promise<unknown> {
        const url = `${this.baseUrl}${endpoint}`;
        const response = await this.fetchImpl(url, {
            method: init.method ?? 'GET',
            headers: {
                'Content-Type': 'application/json',
                'x-fleet-user': this.user
            },
            body: init.body === undefined ? undefined : JSON.stringify(init.body)
        });

        let data: unknown;
        try {
            data = await response.json();
        } catch (error) {
            throw new ApiClientError(`Failed to parse response from ${url}: ${error instanceof Error ? error.message : String(error)}`, response.status);
        }

        if (!response.ok) {
            const body = isErrorBody(data) ? data : {};
            const code = typeof body.error === 'string' ? body.error : undefined;
            const message = typeof body.message === 'string' ? body.message : `HTTP ${response.status}: ${response.statusText}`;
            throw new ApiClientError(message, response.status, code);
        }

        return data;
    }

    private static query(params: Record<string, string | number | undefined>): string {
        const search = new URLSearchParams();
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) search.set(key, String(value));
        }
        const encoded = search.toString();
        return encoded ? `?${encoded}` : '';
    }

    async searchClients(query: string, page: { offset?: number; count?: number } = {}): Promise<unknown> {
        return this.request(`/api/clients${ApiClient.query({ query, offset: page.offset, count: page.count })}`);
    }

    async getClient(clientId: string, timestamp?: number): Promise<unknown> {
        return this.request(`/api/clients/${encodeURIComponent(clientId)}${ApiClient.query({ timestamp })}`);
    }

    async listLabels(): Promise<unknown> {
        return this.request('/api/clients/labels');
    }

    async addLabels(clientIds: string[], labels: string[]): Promise<unknown> {
        return this.request('/api/clients/labels/add', { method: 'POST', body: { client_ids: clientIds, labels } });
    }

    async removeLabels(clientIds: string[], labels: string[]): Promise<unknown> {
        return this.request('/api/clients/labels/remove', { method: 'POST', body: { client_ids: clientIds, labels } });
    }

    async getLoadStats(clientId: string, metric: string, range: TimeRangeArgs = {}): Promise<unknown> {
        const query = ApiClient.query({ metric, start: range.start, end: range.end });
        return this.request(`/api/clients/${encodeURIComponent(clientId)}/load-stats${query}`);
    }

    async interrogate(clientId: string): Promise<unknown> {
        return this.request(`/api/clients/${encodeURIComponent(clientId)}/actions/interrogate`, { method: 'POST', body: {} });
    }

    async getInterrogationState(clientId: string, operationId: string): Promise<unknown> {
        return this.request(
            `/api/clients/${encodeURIComponent(clientId)}/actions/interrogate/${encodeURIComponent(operationId)}`
        );
    }
}
