/**
 * JSON configuration loading
 *
 * - JSON parsing with file-level error messages
 * - Zod schema validation with per-issue messages
 * - Optional fallback when the file does not exist
 */

import { access, constants, readFile } from 'node:fs/promises';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import _ from 'lodash';
import { ConfigError } from '../errors.js';
import { BackendsFileSchema, type BackendDefinition } from '../types/config.js';
import { logger } from './logger.js';

/**
 * Options for loading JSON configuration
 */
export interface LoadJsonConfigOptions<T> {
    /** Path to the configuration file */
    path: string

    /** Zod schema for validation */
    schema: ZodType<T, ZodTypeDef, unknown>

    /** Whether to return a default value if the file doesn't exist */
    fallbackOnMissing?: boolean

    /** Raw value validated in place of the file when it is missing */
    defaultValue?: unknown
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path, constants.F_OK);
        return true;
    } catch{
        return false;
    }
}

function formatZodError(error: ZodError): string {
    return _.map(error.issues, issue => `${_.join(issue.path, '.') || '(root)'}: ${issue.message}`).join(', ');
}

/**
 * Load and validate a JSON configuration file
 *
 * @throws ConfigError if the file is missing (and no fallback), is invalid JSON, or fails validation
 *
 * @example
 * ```typescript
 * const file = await loadJsonConfig({
 *   path: getBackendsConfigPath(),
 *   schema: BackendsFileSchema,
 *   fallbackOnMissing: true,
 *   defaultValue: { backends: {} }
 * });
 * ```
 */
export async function loadJsonConfig<T>(options: LoadJsonConfigOptions<T>): Promise<T> {
    const { path, schema, fallbackOnMissing = false, defaultValue } = options;

    let data: unknown;
    if(await fileExists(path)) {
        const content = await readFile(path, 'utf-8');
        try {
            data = JSON.parse(content);
        } catch (error) {
            throw new ConfigError(`Invalid JSON in config file ${path}: ${_.isError(error) ? error.message : String(error)}`);
        }
    } else if(fallbackOnMissing && defaultValue !== undefined) {
        logger.debug({ path }, 'Config file not found, using default value');
        data = _.cloneDeep(defaultValue);
    } else {
        throw new ConfigError(`Config file not found: ${path}`);
    }

    try {
        return schema.parse(data);
    } catch (error) {
        if(error instanceof ZodError) {
            logger.error({ error: error.issues, configPath: path }, 'Invalid configuration file');
            throw new ConfigError(`Invalid configuration in ${path}: ${formatZodError(error)}`);
        }
        throw error;
    }
}

/**
 * Read the backend list. Entries come back unvalidated, in file order; each
 * is validated when it is added.
 *
 * @param required - fail when the file is missing instead of starting empty
 */
export async function loadBackendDefinitions(path: string, required = false): Promise<BackendDefinition[]> {
    const file = await loadJsonConfig({
        path,
        schema:            BackendsFileSchema,
        fallbackOnMissing: !required,
        defaultValue:      { backends: {} },
    });
    return _.map(_.toPairs(file.backends), ([id, config]) => ({ id, config }));
}
