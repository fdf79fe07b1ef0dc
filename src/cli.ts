#!/usr/bin/env node
/**
 * Upstream Aggregator CLI Entry Point
 *
 * Modes:
 * - serve: Start the aggregator and its HTTP front end
 * - list-backends: List all configured backends
 * - validate: Validate the backends file without connecting to anything
 * - config-path: Show the configuration directory path
 */

import { Command } from 'commander';
import _ from 'lodash';
import { VERSION } from './version.js';

interface ConfigOption {
    config?: string
}

const program = new Command();

program
    .name('upstream-aggregator')
    .description('Aggregate the tools of many MCP servers behind one endpoint')
    .version(VERSION);

// Serve command - start the aggregator
program
    .command('serve')
    .description('Start the aggregator and its HTTP front end')
    .option('-c, --config <path>', 'Backends file to load instead of the default')
    .action(async (options: ConfigOption) => {
        const { startServer } = await import('./frontend/index.js');
        await startServer({ configPath: options.config });
    });

// List backends command
program
    .command('list-backends')
    .description('List all configured backends')
    .option('-c, --config <path>', 'Backends file to read instead of the default')
    .action(async (options: ConfigOption) => {
        const { loadBackendDefinitions } = await import('./utils/config-loader.js');
        const { getBackendsConfigPath } = await import('./utils/config-paths.js');
        const definitions = await loadBackendDefinitions(options.config ?? getBackendsConfigPath(), options.config !== undefined);

        if(definitions.length === 0) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log('No backends configured.');
            return;
        }

        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log('\nConfigured Backends:\n');
        for(const { id, config } of definitions) {
            const kind = _.get(config, 'kind');
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`  ${id} (${_.isString(kind) ? kind : 'unknown transport'})`);

            const url = _.get(config, 'url');
            const command = _.get(config, 'command');
            if(_.isString(url)) {
                // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
                console.log(`    URL: ${url}`);
            } else if(_.isString(command)) {
                const args = _.filter(_.castArray(_.get(config, 'args', [])), _.isString);
                // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
                console.log(`    Command: ${_.trim(`${command} ${args.join(' ')}`)}`);
            }
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log();
        }
    });

// Validate command
program
    .command('validate')
    .description('Validate the backends file')
    .option('-c, --config <path>', 'Backends file to validate instead of the default')
    .action(async (options: ConfigOption) => {
        const { loadBackendDefinitions } = await import('./utils/config-loader.js');
        const { getBackendsConfigPath } = await import('./utils/config-paths.js');
        const { parseBackendConfig, validateBackendId } = await import('./backend/backend-config.js');
        const { errorMessage } = await import('./errors.js');

        const path = options.config ?? getBackendsConfigPath();
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(`Validating ${path}...`);

        const definitions = await loadBackendDefinitions(path, true);
        const failures: string[] = [];
        for(const { id, config } of definitions) {
            try {
                validateBackendId(id);
                parseBackendConfig(id, config);
                // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
                console.log(`✓ ${id}`);
            } catch (error) {
                failures.push(errorMessage(error));
                // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
                console.error(`✗ ${id}: ${errorMessage(error)}`);
            }
        }

        if(failures.length > 0) {
            throw new Error(`${failures.length} of ${definitions.length} backends are invalid`);
        }
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(`\nAll ${definitions.length} backends are valid.`);
    });

// Config-path command - show where config files are located
program
    .command('config-path')
    .description('Show the configuration directory path, creating it if missing')
    .option('-v, --verbose', 'Show the path of the backends file as well')
    .action(async (options: { verbose?: boolean }) => {
        const { ensureConfigDir, getBackendsConfigPath } = await import('./utils/config-paths.js');
        const configDir = await ensureConfigDir();

        if(options.verbose) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log('\nConfiguration paths:');
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`  Config directory: ${configDir}`);
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`  Backends config:  ${getBackendsConfigPath()}`);
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log();
        } else {
            // Just output the directory path for easy scripting
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(configDir);
        }
    });

program.parseAsync().catch((error: unknown) => {
    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
    console.error(_.isError(error) ? error.message : String(error));
    process.exitCode = 1;
});
