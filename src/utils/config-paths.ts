/**
 * Configuration file path utilities
 * Provides cross-platform paths for user config files
 */

import envPaths from 'env-paths';
import { makeDirectory } from 'make-dir';
import { join } from 'node:path';

// suffix: '' removes the default '-nodejs' suffix
const paths = envPaths('upstream-aggregator', { suffix: '' });

/**
 * Get the config directory path
 * This is where backends.json is stored
 */
export function getConfigDir(): string {
    return paths.data;
}

/**
 * Get the full path to the backends config file
 */
export function getBackendsConfigPath(): string {
    return join(paths.data, 'backends.json');
}

/**
 * Ensure the config directory exists
 * Creates it if it doesn't exist
 */
export async function ensureConfigDir(): Promise<string> {
    await makeDirectory(paths.data);
    return paths.data;
}
