/**
 * Build version reported by /health, /api and the Prometheus default labels.
 *
 * Format: v1.0.0+20251129.204700 (package version plus UTC start time),
 * unless FLEETSCOPE_BUILD_VERSION pins it, e.g. from a release pipeline.
 * Computed once per process.
 */

import { readFileSync } from 'fs';
import { join } from 'path';

const getPackageVersion = (): string => {
  try {
    const packageJsonPath = join(process.cwd(), 'package.json');
    const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version?: unknown };
    return typeof packageJson.version === 'string' ? packageJson.version : '1.0.0';
  } catch {
    // started outside the project root
    return '1.0.0';
  }
};

function utcStamp(now: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `.${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
}

const buildVersion: string = process.env['FLEETSCOPE_BUILD_VERSION']?.trim()
  || `v${getPackageVersion()}+${utcStamp(new Date())}`;

export function getBuildVersion(): string {
  return buildVersion;
}
