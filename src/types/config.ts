/**
 * Configuration type definitions for the upstream aggregator
 */

import { z } from 'zod';

/** Joins a backend id and a tool's original name into its qualified name */
export const QUALIFIED_NAME_SEPARATOR = '_';

/**
 * Backend ids may not contain the qualified-name separator, so every
 * qualified name splits back into exactly one backend id.
 */
export const BACKEND_ID_PATTERN = /^[A-Za-z0-9-]{1,50}$/;

export const BackendIdSchema = z.string().regex(
    BACKEND_ID_PATTERN,
    `Backend name must be 1-50 letters, digits or "-" ("${QUALIFIED_NAME_SEPARATOR}" is reserved)`
);

export const TRANSPORT_KINDS = ['http', 'stdio', 'service'] as const;
export const TransportKindSchema = z.enum(TRANSPORT_KINDS);
export type TransportKind = z.infer<typeof TransportKindSchema>;

const EnvSchema = z.record(z.string(), z.string());

/** Remote backend reached over Streamable HTTP */
export const HttpBackendConfigSchema = z.object({
    kind:        z.literal('http'),
    url:         z.string().url('Must be a well-formed URL'),
    // Literal token or `$NAME` reference to an environment variable
    bearerToken: z.string().min(1).optional(),
}).strict();

/** Backend spawned by the MCP SDK and spoken to over its stdin/stdout */
export const StdioBackendConfigSchema = z.object({
    kind:    z.literal('stdio'),
    command: z.string().min(1, 'Command cannot be empty'),
    args:    z.array(z.string()).default([]),
    env:     EnvSchema.optional(),
    cwd:     z.string().optional(),
}).strict();

/**
 * Long-running local service: spawned and health-checked by the supervisor,
 * then reached over Streamable HTTP on localhost.
 */
export const ServiceBackendConfigSchema = z.object({
    kind:            z.literal('service'),
    command:         z.string().min(1, 'Command cannot be empty'),
    args:            z.array(z.string()).default([]),
    port:            z.number().int().min(1024, 'Port must be 1024 or above').max(65535),
    healthCheckPath: z.string().startsWith('/').default('/mcp'),
    mcpPath:         z.string().startsWith('/').default('/mcp'),
    env:             EnvSchema.optional(),
    cwd:             z.string().optional(),
}).strict();

export const BackendConfigSchema = z.discriminatedUnion('kind', [
    HttpBackendConfigSchema,
    StdioBackendConfigSchema,
    ServiceBackendConfigSchema,
]);

export type ServiceBackendConfig = z.infer<typeof ServiceBackendConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;

/**
 * On-disk backend list. Entries stay unvalidated here so that one malformed
 * backend is rejected on its own when it is added, not the whole file.
 */
export const BackendsFileSchema = z.object({
    backends: z.record(z.string(), z.unknown()).default({}),
});

export interface BackendDefinition {
    id:     string
    config: unknown
}
