/**
 * ID Generator Service for Fleetscope
 *
 * Generates identifiers for flow operations.
 */

import { v4 as uuidv4 } from 'uuid';

const OPERATION_PREFIX = 'F:';

export class IDGenerator {
    /**
     * Generate an operation id: "F:" followed by 8 upper-case hex digits
     * taken from a random UUID.
     */
    static generateOperationId(): string {
        return OPERATION_PREFIX + uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase();
    }

    static isOperationId(value: string): boolean {
        return /^F:[0-9A-F]{8}$/.test(value);
    }
}
