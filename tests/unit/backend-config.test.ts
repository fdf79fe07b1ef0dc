/**
 * Backend configuration: id rules, schema parsing, secret resolution and
 * host checks
 */

import { describe, it, expect } from 'vitest';
import { createServer, type Server } from 'node:net';
import _ from 'lodash';
import {
    commandExists,
    isPortAvailable,
    parseBackendConfig,
    resolveBackendSecrets,
    resolveSecret,
    validateAgainstHost,
    validateBackendId
} from '../../src/backend/backend-config.js';
import { ConfigError } from '../../src/errors.js';
import { fakeHostChecks } from '../helpers/mocks.js';

async function listenOnFreePort(): Promise<{ server: Server, port: number }> {
    const server = createServer();
    await new Promise<void>((resolve) => {
        server.listen(0, '127.0.0.1', () => {
            resolve();
        });
    });
    const address = server.address();
    if(address === null || typeof address === 'string') {
        throw new Error('Expected a TCP address');
    }
    return { server, port: address.port };
}

async function close(server: Server): Promise<void> {
    await new Promise<void>((resolve) => {
        server.close(() => {
            resolve();
        });
    });
}

describe('validateBackendId', () => {
    it('accepts letters, digits and dashes up to 50 characters', () => {
        expect(validateBackendId('alpha-1')).toBe('alpha-1');
        expect(validateBackendId(_.repeat('a', 50))).toBe(_.repeat('a', 50));
    });

    it('rejects the separator character', () => {
        expect(() => validateBackendId('has_underscore')).toThrow(
            'Invalid backend name "has_underscore": Backend name must be 1-50 letters, digits or "-" ("_" is reserved)'
        );
    });

    it('rejects empty and over-long names', () => {
        expect(() => validateBackendId('')).toThrow(ConfigError);
        expect(() => validateBackendId(_.repeat('a', 51))).toThrow(ConfigError);
    });
});

describe('parseBackendConfig', () => {
    it('fills stdio and service defaults', () => {
        expect(parseBackendConfig('tools', { kind: 'stdio', command: 'node' })).toEqual({
            kind:    'stdio',
            command: 'node',
            args:    [],
        });
        expect(parseBackendConfig('svc', { kind: 'service', command: 'node', port: 4100 })).toEqual({
            kind:            'service',
            command:         'node',
            args:            [],
            port:            4100,
            healthCheckPath: '/mcp',
            mcpPath:         '/mcp',
        });
    });

    it('names the offending field', () => {
        expect(() => parseBackendConfig('remote', { kind: 'http' }))
            .toThrow('Invalid configuration for backend "remote": url: Required');
        expect(() => parseBackendConfig('svc', { kind: 'service', command: 'node', port: 80 }))
            .toThrow('Invalid configuration for backend "svc": port: Port must be 1024 or above');
    });

    it('rejects unknown kinds and unknown keys', () => {
        expect(() => parseBackendConfig('x', { kind: 'carrier-pigeon' })).toThrow(ConfigError);
        expect(() => parseBackendConfig('x', { kind: 'http', url: 'http://127.0.0.1:9000', extra: true }))
            .toThrow(ConfigError);
    });

    it('rejects a malformed URL', () => {
        expect(() => parseBackendConfig('remote', { kind: 'http', url: 'not a url' }))
            .toThrow('Invalid configuration for backend "remote": url: Must be a well-formed URL');
    });
});

describe('resolveSecret', () => {
    const env = { TOKEN: 'test-secret', EMPTY: '' };

    it('returns literal values unchanged', () => {
        expect(resolveSecret('plain-value', 'bearerToken', env)).toBe('plain-value');
    });

    it('resolves $NAME from the environment', () => {
        expect(resolveSecret('$TOKEN', 'bearerToken', env)).toBe('test-secret');
    });

    it('fails for unset and empty variables', () => {
        expect(() => resolveSecret('$MISSING', 'bearerToken', env))
            .toThrow('bearerToken: environment variable MISSING is not set');
        expect(() => resolveSecret('$EMPTY', 'env.API_KEY', env))
            .toThrow('env.API_KEY: environment variable EMPTY is not set');
    });

    it('fails for a reference that is not a variable name', () => {
        expect(() => resolveSecret('$1BAD', 'bearerToken', env))
            .toThrow('bearerToken: "$1BAD" is not a valid environment variable reference');
    });
});

describe('resolveBackendSecrets', () => {
    const env = { TOKEN: 'test-secret', KEY: 'test-key' };

    it('resolves the bearer token of an http backend', () => {
        const config = parseBackendConfig('remote', { kind: 'http', url: 'http://127.0.0.1:9000/mcp', bearerToken: '$TOKEN' });

        expect(resolveBackendSecrets(config, env)).toEqual({
            kind:        'http',
            url:         'http://127.0.0.1:9000/mcp',
            bearerToken: 'test-secret',
        });
    });

    it('resolves every env entry and leaves the input untouched', () => {
        const config = parseBackendConfig('tools', { kind: 'stdio', command: 'node', env: { API_KEY: '$KEY', MODE: 'fast' } });

        const resolved = resolveBackendSecrets(config, env);

        expect(resolved).toEqual({ kind: 'stdio', command: 'node', args: [], env: { API_KEY: 'test-key', MODE: 'fast' } });
        expect(config).toEqual({ kind: 'stdio', command: 'node', args: [], env: { API_KEY: '$KEY', MODE: 'fast' } });
    });
});

describe('validateAgainstHost', () => {
    it('rejects non-http URL schemes', async () => {
        const config = parseBackendConfig('remote', { kind: 'http', url: 'ftp://127.0.0.1/mcp' });

        await expect(validateAgainstHost('remote', config, fakeHostChecks()))
            .rejects.toThrow('Backend "remote": url must use http or https, got ftp:');
    });

    it('rejects a command that cannot be found', async () => {
        const config = parseBackendConfig('tools', { kind: 'stdio', command: 'no-such-tool' });
        const checks = fakeHostChecks({ commandExists: async () => false });

        await expect(validateAgainstHost('tools', config, checks))
            .rejects.toThrow('Backend "tools": command "no-such-tool" was not found or is not executable');
    });

    it('rejects a service port that is taken', async () => {
        const config = parseBackendConfig('svc', { kind: 'service', command: 'node', port: 4100 });
        const checks = fakeHostChecks({ portAvailable: async () => false });

        await expect(validateAgainstHost('svc', config, checks))
            .rejects.toThrow('Backend "svc": port 4100 is already in use');
    });

    it('passes a valid service backend', async () => {
        const config = parseBackendConfig('svc', { kind: 'service', command: 'node', port: 4100 });

        await expect(validateAgainstHost('svc', config, fakeHostChecks())).resolves.toBeUndefined();
    });
});

describe('host checks', () => {
    it('finds the running node binary by absolute path', async () => {
        expect(await commandExists(process.execPath)).toBe(true);
    });

    it('does not find a made-up command on PATH', async () => {
        expect(await commandExists('definitely-not-a-real-command-4821')).toBe(false);
    });

    it('reports a bound port as unavailable and a released one as available', async () => {
        const { server, port } = await listenOnFreePort();

        expect(await isPortAvailable(port)).toBe(false);

        await close(server);
        expect(await isPortAvailable(port)).toBe(true);
    });
});
