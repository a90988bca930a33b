/**
 * CLI Configuration
 */

function getEnvString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

/**
 * Get the Fleetscope API base URL
 * Defaults to http://localhost:3000 if not set
 */
export function getApiUrl(): string {
    return getEnvString('FLEETSCOPE_API_URL', 'http://localhost:3000');
}

/** User name sent in the x-fleet-user header. */
export function getApiUser(): string {
    return getEnvString('FLEETSCOPE_USER', process.env['USER'] || 'anonymous');
}
