export class FleetError extends Error {
    constructor(
        message: string,
        public code: string,
        public statusCode: number = 500,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'FleetError';
    }
}

/** Malformed client id string. Raised at construction, never at lookup. */
export class InvalidIdentifierError extends FleetError {
    constructor(value: string) {
        super(`Invalid client id: ${value}`, 'INVALID_CLIENT_ID', 400, { value });
        this.name = 'InvalidIdentifierError';
    }
}

export class InvalidQueryError extends FleetError {
    constructor(message: string, query: string) {
        super(message, 'INVALID_QUERY', 400, { query });
        this.name = 'InvalidQueryError';
    }
}

export class ValidationError extends FleetError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'INVALID_INPUT', 400, details);
        this.name = 'ValidationError';
    }
}

export class UnknownMetricError extends FleetError {
    constructor(metric: string) {
        super(`Unknown metric: ${metric}`, 'UNKNOWN_METRIC', 400, { metric });
        this.name = 'UnknownMetricError';
    }
}

export class ForbiddenError extends FleetError {
    constructor(message: string) {
        super(message, 'FORBIDDEN', 403);
        this.name = 'ForbiddenError';
    }
}

export class ClientNotFoundError extends FleetError {
    constructor(clientId: string) {
        super(`Client ${clientId} not found`, 'CLIENT_NOT_FOUND', 404, { client_id: clientId });
        this.name = 'ClientNotFoundError';
    }
}

export class OperationNotFoundError extends FleetError {
    constructor(operationId: string) {
        super(`Operation with id ${operationId} not found`, 'OPERATION_NOT_FOUND', 404, { operation_id: operationId });
        this.name = 'OperationNotFoundError';
    }
}

/**
 * A label write reached a backend that holds no record of the client yet.
 */
export class LegacyRecordMismatchError extends FleetError {
    constructor(clientId: string, backend: string) {
        super(
            `Client ${clientId} has no record in the ${backend} backend yet`,
            'LEGACY_RECORD_MISMATCH',
            409,
            { client_id: clientId, backend }
        );
        this.name = 'LegacyRecordMismatchError';
    }
}

export class StorageError extends FleetError {
    constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, 'STORAGE_FAILURE', 500, details);
        this.name = 'StorageError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

export class LabelMutationError extends StorageError {
    constructor(clientId: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Label mutation failed for client ${clientId}: ${reason}`, { client_id: clientId }, { cause });
        this.name = 'LabelMutationError';
    }
}
