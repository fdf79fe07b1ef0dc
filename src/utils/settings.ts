/**
 * Runtime settings, read from the environment and validated with zod.
 */

import { z } from 'zod';
import _ from 'lodash';
import { ConfigError } from '../errors.js';

// Treat `VAR=` the same as an unset variable
const optionalString = z.preprocess(
    value => (value === '' ? undefined : value),
    z.string().optional()
);

const duration = (defaultMs: number) => z.coerce.number().int().positive().default(defaultMs);

const SettingsEnvSchema = z.object({
    AGGREGATOR_API_TOKEN:     optionalString,
    UI_PASSWORD:              optionalString,
    HOST:                     z.string().min(1).default('127.0.0.1'),
    PORT:                     z.coerce.number().int().min(0).max(65535).default(3050),
    CONNECT_TIMEOUT_MS:       duration(30_000),
    DISCOVERY_TIMEOUT_MS:     duration(30_000),
    TOOL_CALL_TIMEOUT_MS:     duration(60_000),
    HEALTH_CHECK_INTERVAL_MS: duration(1_000),
    HEALTH_CHECK_ATTEMPTS:    z.coerce.number().int().positive().default(30),
    HEALTH_PROBE_TIMEOUT_MS:  duration(2_000),
    STOP_GRACE_MS:            duration(5_000),
    SHUTDOWN_GRACE_MS:        duration(10_000),
    DISCOVERY_CONCURRENCY:    z.coerce.number().int().positive().default(4),
    SESSION_TTL_MS:           duration(60 * 60 * 1000),
});

export interface Settings {
    /** Bearer token for the tool-invocation endpoints; unset leaves them open */
    apiToken?:             string
    /** Dashboard login password; unset disables login */
    uiPassword?:           string
    host:                  string
    port:                  number
    connectTimeoutMs:      number
    discoveryTimeoutMs:    number
    toolCallTimeoutMs:     number
    healthCheckIntervalMs: number
    healthCheckAttempts:   number
    healthProbeTimeoutMs:  number
    stopGraceMs:           number
    shutdownGraceMs:       number
    discoveryConcurrency:  number
    sessionTtlMs:          number
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = SettingsEnvSchema.safeParse(env);
    if(!parsed.success) {
        const messages = _.map(parsed.error.issues, issue => `${_.join(issue.path, '.')}: ${issue.message}`);
        throw new ConfigError(`Invalid settings: ${messages.join(', ')}`);
    }

    const values = parsed.data;
    return {
        apiToken:              values.AGGREGATOR_API_TOKEN,
        uiPassword:            values.UI_PASSWORD,
        host:                  values.HOST,
        port:                  values.PORT,
        connectTimeoutMs:      values.CONNECT_TIMEOUT_MS,
        discoveryTimeoutMs:    values.DISCOVERY_TIMEOUT_MS,
        toolCallTimeoutMs:     values.TOOL_CALL_TIMEOUT_MS,
        healthCheckIntervalMs: values.HEALTH_CHECK_INTERVAL_MS,
        healthCheckAttempts:   values.HEALTH_CHECK_ATTEMPTS,
        healthProbeTimeoutMs:  values.HEALTH_PROBE_TIMEOUT_MS,
        stopGraceMs:           values.STOP_GRACE_MS,
        shutdownGraceMs:       values.SHUTDOWN_GRACE_MS,
        discoveryConcurrency:  values.DISCOVERY_CONCURRENCY,
        sessionTtlMs:          values.SESSION_TTL_MS,
    };
}
