/**
 * Tests for JSON configuration loading and the backend list
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { z } from 'zod';
import { loadBackendDefinitions, loadJsonConfig } from '../../src/utils/config-loader.js';
import { ConfigError } from '../../src/errors.js';
import { cleanup, createTempDir, createTempFile } from '../helpers/fs-utils.js';

describe('loadJsonConfig', () => {
    afterEach(async () => {
        await cleanup();
    });

    const schema = z.object({ name: z.string() });

    it('parses and validates a file', async () => {
        const path = await createTempFile({ name: 'alpha' }, { filename: 'config.json' });

        expect(await loadJsonConfig({ path, schema })).toEqual({ name: 'alpha' });
    });

    it('reports invalid JSON with the file path', async () => {
        const path = await createTempFile('{ not json', { filename: 'broken.json' });

        await expect(loadJsonConfig({ path, schema })).rejects.toThrow(`Invalid JSON in config file ${path}`);
    });

    it('reports schema violations per field', async () => {
        const path = await createTempFile({ name: 42 }, { filename: 'wrong.json' });

        await expect(loadJsonConfig({ path, schema }))
            .rejects.toThrow(`Invalid configuration in ${path}: name: Expected string, received number`);
    });

    it('fails on a missing file without a fallback', async () => {
        const path = join(await createTempDir(), 'missing.json');

        await expect(loadJsonConfig({ path, schema })).rejects.toBeInstanceOf(ConfigError);
    });

    it('validates the default value when the file is missing', async () => {
        const path = join(await createTempDir(), 'missing.json');

        const config = await loadJsonConfig({ path, schema, fallbackOnMissing: true, defaultValue: { name: 'default' } });

        expect(config).toEqual({ name: 'default' });
    });
});

describe('loadBackendDefinitions', () => {
    afterEach(async () => {
        await cleanup();
    });

    it('returns entries in file order without validating them', async () => {
        const path = await createTempFile({
            backends: {
                'zeta':   { kind: 'http', url: 'http://127.0.0.1:9000/mcp' },
                'bad id': { kind: 'nonsense' },
            },
        }, { filename: 'backends.json' });

        expect(await loadBackendDefinitions(path)).toEqual([
            { id: 'zeta', config: { kind: 'http', url: 'http://127.0.0.1:9000/mcp' } },
            { id: 'bad id', config: { kind: 'nonsense' } },
        ]);
    });

    it('starts empty when the file is missing and not required', async () => {
        const path = join(await createTempDir(), 'backends.json');

        expect(await loadBackendDefinitions(path)).toEqual([]);
    });

    it('fails when a required file is missing', async () => {
        const path = join(await createTempDir(), 'backends.json');

        await expect(loadBackendDefinitions(path, true)).rejects.toThrow(`Config file not found: ${path}`);
    });

    it('treats a file without a backends key as empty', async () => {
        const path = await createTempFile({}, { filename: 'backends.json' });

        expect(await loadBackendDefinitions(path)).toEqual([]);
    });
});
