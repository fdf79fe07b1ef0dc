/**
 * Backend configuration validation
 *
 * Everything here runs before a backend is created. Any failure is a
 * ConfigError and the backend never exists.
 */

import { access, constants } from 'node:fs/promises';
import { createServer } from 'node:net';
import { delimiter, isAbsolute, join, resolve as resolvePath } from 'node:path';
import _ from 'lodash';
import { ConfigError } from '../errors.js';
import { BackendConfigSchema, BackendIdSchema, type BackendConfig } from '../types/config.js';

const ENV_REFERENCE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Checks against the host that `add` performs; injectable for tests
 */
export interface HostChecks {
    commandExists: (command: string, cwd?: string) => Promise<boolean>
    portAvailable: (port: number) => Promise<boolean>
}

export function validateBackendId(id: string): string {
    const parsed = BackendIdSchema.safeParse(id);
    if(!parsed.success) {
        throw new ConfigError(`Invalid backend name "${id}": ${_.map(parsed.error.issues, 'message').join(', ')}`);
    }
    return parsed.data;
}

export function parseBackendConfig(id: string, raw: unknown): BackendConfig {
    const parsed = BackendConfigSchema.safeParse(raw);
    if(!parsed.success) {
        const messages = _.map(parsed.error.issues, issue => `${_.join(issue.path, '.') || 'config'}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration for backend "${id}": ${messages.join(', ')}`);
    }
    return parsed.data;
}

/**
 * Resolve a `$NAME` reference against the environment.
 *
 * Literal values are returned unchanged. An unset or empty variable is an
 * error rather than an empty secret.
 */
export function resolveSecret(value: string, field: string, env: NodeJS.ProcessEnv = process.env): string {
    if(!_.startsWith(value, '$')) {
        return value;
    }

    const varName = value.slice(1);
    if(!ENV_REFERENCE_PATTERN.test(varName)) {
        throw new ConfigError(`${field}: "${value}" is not a valid environment variable reference`);
    }

    const resolved = env[varName];
    if(resolved === undefined || resolved === '') {
        throw new ConfigError(`${field}: environment variable ${varName} is not set`);
    }
    return resolved;
}

function resolveEnvMap(envMap: Record<string, string> | undefined, env: NodeJS.ProcessEnv): Record<string, string> | undefined {
    if(!envMap) {
        return undefined;
    }
    return _.mapValues(envMap, (value, key) => resolveSecret(value, `env.${key}`, env));
}

/**
 * Return a copy of `config` with every secret field resolved
 */
export function resolveBackendSecrets(config: BackendConfig, env: NodeJS.ProcessEnv = process.env): BackendConfig {
    switch(config.kind) {
        case 'http':
            return config.bearerToken === undefined
                ? { ...config }
                : { ...config, bearerToken: resolveSecret(config.bearerToken, 'bearerToken', env) };
        case 'stdio':
            return { ...config, env: resolveEnvMap(config.env, env) };
        case 'service':
            return { ...config, env: resolveEnvMap(config.env, env) };
    }
}

/**
 * Host-dependent checks: URL scheme, executable command, free port
 */
export async function validateAgainstHost(id: string, config: BackendConfig, checks: HostChecks): Promise<void> {
    switch(config.kind) {
        case 'http': {
            const protocol = new URL(config.url).protocol;
            if(protocol !== 'http:' && protocol !== 'https:') {
                throw new ConfigError(`Backend "${id}": url must use http or https, got ${protocol}`);
            }
            return;
        }
        case 'stdio':
            if(!await checks.commandExists(config.command, config.cwd)) {
                throw new ConfigError(`Backend "${id}": command "${config.command}" was not found or is not executable`);
            }
            return;
        case 'service':
            if(!await checks.commandExists(config.command, config.cwd)) {
                throw new ConfigError(`Backend "${id}": command "${config.command}" was not found or is not executable`);
            }
            if(!await checks.portAvailable(config.port)) {
                throw new ConfigError(`Backend "${id}": port ${config.port} is already in use`);
            }
    }
}

async function isExecutable(path: string): Promise<boolean> {
    try {
        await access(path, constants.X_OK);
        return true;
    } catch{
        return false;
    }
}

/**
 * Whether `command` names an executable file, either by path or via PATH
 */
export async function commandExists(command: string, cwd?: string): Promise<boolean> {
    if(isAbsolute(command)) {
        return isExecutable(command);
    }
    if(_.includes(command, '/') || _.includes(command, '\\')) {
        return isExecutable(resolvePath(cwd ?? process.cwd(), command));
    }

    const directories = _.compact(_.split(process.env.PATH ?? '', delimiter));
    const extensions = process.platform === 'win32'
        ? ['', ..._.split(process.env.PATHEXT ?? '.EXE;.CMD;.BAT', ';')]
        : [''];

    for(const directory of directories) {
        for(const extension of extensions) {
            if(await isExecutable(join(directory, command + extension))) {
                return true;
            }
        }
    }
    return false;
}

/**
 * Whether a TCP listener can currently be bound on the loopback port
 */
export async function isPortAvailable(port: number, host = '127.0.0.1'): Promise<boolean> {
    return new Promise((resolve) => {
        const server = createServer();
        server.once('error', () => {
            resolve(false);
        });
        server.listen(port, host, () => {
            server.close(() => {
                resolve(true);
            });
        });
    });
}

export const defaultHostChecks: HostChecks = {
    commandExists,
    portAvailable: port => isPortAvailable(port),
};
