/**
 * Upstream aggregation engine
 *
 * - ProcessSupervisor: spawns and health-checks service backends
 * - ConnectionRegistry: configured backends, their status and live clients
 * - ToolCatalog: the merged, namespaced tool directory
 * - RequestRouter: routes qualified tool calls and normalizes results
 * - UpstreamAggregator: owns and wires all of the above
 */

export { UpstreamAggregator } from './aggregator.js';
export type { AggregatorOptions, AggregatorSettings, BackendSummary, StartupResult } from './aggregator.js';
export { ConnectionRegistry } from './connection-registry.js';
export type { BackendSnapshot, BackendStatus, BackendCrashEvent, StatusChangeEvent } from './connection-registry.js';
export { ProcessSupervisor, httpHealthProbe } from './process-supervisor.js';
export type { ProcessHandle, ProcessState, SupervisedProcess } from './process-supervisor.js';
export { RequestRouter } from './request-router.js';
export type { ToolCallResult } from './request-router.js';
export { ToolCatalog, qualifyName } from './tool-catalog.js';
export type { RefreshResult, ToolEntry } from './tool-catalog.js';
export { SdkClientFactory } from './transports.js';
export type { BackendClient, ClientFactory, ConnectionTarget } from './transports.js';
