/**
 * Process Supervisor
 *
 * Owns the OS processes behind `service` backends:
 * - Launches the command and waits for the spawn to succeed
 * - Polls a localhost health URL until the service answers
 * - Reports unexpected exits through the `crashed` event
 * - Stops processes with SIGTERM, escalating to SIGKILL after a grace period
 *
 * The supervisor never restarts anything on its own; the connection registry
 * decides what to do with a crash.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import _ from 'lodash';
import {
    HealthCheckTimeout,
    ProcessExitedError,
    SpawnError,
    errorMessage,
    summarizeError,
    type AggregatorError,
    type ErrorSummary
} from '../errors.js';
import { logger } from '../utils/logger.js';
import { cancellableDelay, withTimeout } from '../utils/timeout.js';

export type ProcessState = 'not-started' | 'launching' | 'health-checking' | 'running' | 'crashed' | 'stopped';

const ALLOWED_TRANSITIONS: Record<ProcessState, readonly ProcessState[]> = {
    'not-started':     ['launching'],
    'launching':       ['health-checking', 'crashed', 'stopped'],
    'health-checking': ['running', 'crashed', 'stopped'],
    'running':         ['crashed', 'stopped'],
    'crashed':         ['stopped'],
    'stopped':         [],
};

const STDERR_TAIL_LINES = 50;
const STDERR_LINE_MAX_LENGTH = 1000;

/**
 * The slice of a child process the supervisor relies on. Node's ChildProcess
 * satisfies it; tests hand in an EventEmitter-based fake.
 */
export interface ServiceProcess {
    readonly pid?:   number | undefined
    readonly stdout: Readable | null
    readonly stderr: Readable | null
    kill(signal?: NodeJS.Signals): boolean
    on(event: 'error', listener: (error: Error) => void): unknown
    once(event: 'spawn', listener: () => void): unknown
    once(event: 'error', listener: (error: Error) => void): unknown
    once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ServiceProcess;

/** Resolves true when the URL answers with a non-5xx status */
export type HealthProbe = (url: string, timeoutMs: number) => Promise<boolean>;

export interface ServiceLaunchSpec {
    command:         string
    args:            string[]
    port:            number
    healthCheckPath: string
    env?:            Record<string, string>
    cwd?:            string
    /** How many times this backend's process has been relaunched before */
    restartCount?:   number
}

/** Opaque reference to one launched process */
export interface ProcessHandle {
    readonly id:        number
    readonly backendId: string
}

export interface SupervisedProcess {
    backendId:      string
    state:          ProcessState
    pid?:           number
    startedAt?:     Date
    healthCheckUrl: string
    restartCount:   number
    exitCode:       number | null
    signal:         NodeJS.Signals | null
    error?:         ErrorSummary
    stderrTail:     string[]
}

export interface ProcessCrashEvent {
    handle:   ProcessHandle
    exitCode: number | null
    signal:   NodeJS.Signals | null
    error:    AggregatorError
}

export interface ProcessSupervisorOptions {
    host?:                  string
    healthCheckIntervalMs?: number
    healthCheckAttempts?:   number
    healthProbeTimeoutMs?:  number
    stopGraceMs?:           number
    spawn?:                 SpawnFunction
    probe?:                 HealthProbe
}

interface ProcessRecord {
    handle:         ProcessHandle
    spec:           ServiceLaunchSpec
    state:          ProcessState
    healthCheckUrl: string
    child?:         ServiceProcess
    startedAt?:     Date
    exitCode:       number | null
    signal:         NodeJS.Signals | null
    exitObserved:   boolean
    exited:         Promise<void>
    error?:         AggregatorError
    stderrTail:     string[]
    cancelWait?:    () => void
    // Set once stop() begins; the state moves to `stopped` when it settles
    stopping?:      Promise<void>
}

/**
 * Probe a health URL with fetch; any response below 500 counts as healthy
 */
export async function httpHealthProbe(url: string, timeoutMs: number): Promise<boolean> {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    await response.body?.cancel();
    return response.status < 500;
}

const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, args, options);

export class ProcessSupervisor extends EventEmitter {
    private processes = new Map<number, ProcessRecord>();
    private nextHandleId = 0;

    private readonly host:                  string;
    private readonly healthCheckIntervalMs: number;
    private readonly healthCheckAttempts:   number;
    private readonly healthProbeTimeoutMs:  number;
    private readonly stopGraceMs:           number;
    private readonly spawnProcess:          SpawnFunction;
    private readonly probe:                 HealthProbe;

    constructor(options: ProcessSupervisorOptions = {}) {
        super();
        this.host = options.host ?? '127.0.0.1';
        this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 1000;
        this.healthCheckAttempts = options.healthCheckAttempts ?? 30;
        this.healthProbeTimeoutMs = options.healthProbeTimeoutMs ?? 2000;
        this.stopGraceMs = options.stopGraceMs ?? 5000;
        this.spawnProcess = options.spawn ?? defaultSpawn;
        this.probe = options.probe ?? httpHealthProbe;
    }

    /**
     * Launch a service and wait until it passes its health check.
     *
     * Rejects with SpawnError when the process cannot be launched or exits
     * while starting, and with HealthCheckTimeout when it never turns healthy
     * (the process is terminated first).
     */
    async start(backendId: string, spec: ServiceLaunchSpec): Promise<ProcessHandle> {
        const handle: ProcessHandle = { id: ++this.nextHandleId, backendId };
        const record: ProcessRecord = {
            handle,
            spec,
            state:          'not-started',
            healthCheckUrl: `http://${this.host}:${spec.port}${spec.healthCheckPath}`,
            exitCode:       null,
            signal:         null,
            exitObserved:   false,
            exited:         Promise.resolve(),
            stderrTail:     [],
        };
        this.processes.set(handle.id, record);

        try {
            await this.launch(record);
            this.assertState(record, 'launching');
            this.transition(record, 'health-checking');
            await this.waitUntilHealthy(record);
            this.transition(record, 'running');
        } catch (error) {
            await (record.stopping ?? this.terminate(record));
            this.processes.delete(handle.id);
            throw error;
        }

        logger.info({ backendId, pid: record.child?.pid, url: record.healthCheckUrl }, 'Service backend is healthy');
        return handle;
    }

    /**
     * Stop a process. Safe to call in any state and more than once; the
     * process reports `stopped` once its exit is confirmed.
     */
    async stop(handle: ProcessHandle): Promise<void> {
        const record = this.processes.get(handle.id);
        if(!record) {
            return;
        }

        if(record.state !== 'stopped') {
            record.stopping ??= this.runStop(record);
            await record.stopping;
        }
        this.processes.delete(handle.id);
    }

    async stopAll(): Promise<void> {
        await Promise.all(_.map(Array.from(this.processes.values()), async record => this.stop(record.handle)));
    }

    /** State of the process; handles that were stopped and released report `stopped` */
    status(handle: ProcessHandle): ProcessState {
        return this.processes.get(handle.id)?.state ?? 'stopped';
    }

    describe(handle: ProcessHandle): SupervisedProcess | undefined {
        const record = this.processes.get(handle.id);
        if(!record) {
            return undefined;
        }
        return {
            backendId:      handle.backendId,
            state:          record.state,
            pid:            record.child?.pid,
            startedAt:      record.startedAt,
            healthCheckUrl: record.healthCheckUrl,
            restartCount:   record.spec.restartCount ?? 0,
            exitCode:       record.exitCode,
            signal:         record.signal,
            error:          record.error ? summarizeError(record.error) : undefined,
            stderrTail:     [...record.stderrTail],
        };
    }

    /** Number of processes not yet stopped */
    get activeCount(): number {
        return _.filter(Array.from(this.processes.values()), record => record.state !== 'stopped').length;
    }

    private async runStop(record: ProcessRecord): Promise<void> {
        record.cancelWait?.();
        await this.terminate(record);
        this.transition(record, 'stopped');
        logger.info({ backendId: record.handle.backendId, exitCode: record.exitCode, signal: record.signal }, 'Service backend stopped');
    }

    private transition(record: ProcessRecord, to: ProcessState): void {
        const from = record.state;
        if(!_.includes(ALLOWED_TRANSITIONS[from], to)) {
            throw new Error(`Invalid process state transition for ${record.handle.backendId}: ${from} -> ${to}`);
        }
        record.state = to;
        logger.debug({ backendId: record.handle.backendId, from, to }, 'Service process state changed');
        this.emit('state', { handle: record.handle, from, to });
    }

    private async launch(record: ProcessRecord): Promise<void> {
        const { backendId } = record.handle;
        const { spec } = record;
        this.transition(record, 'launching');
        logger.info({ backendId, command: spec.command, args: spec.args, port: spec.port }, 'Launching service backend');

        let child: ServiceProcess;
        try {
            child = this.spawnProcess(spec.command, spec.args, {
                env:   { ...process.env, ...spec.env },
                cwd:   spec.cwd,
                stdio: ['ignore', 'pipe', 'pipe'],
            });
        } catch (error) {
            throw this.crash(record, new SpawnError(`Failed to launch "${spec.command}" for backend ${backendId}: ${errorMessage(error)}`, { cause: error }));
        }

        record.child = child;
        record.exited = new Promise<void>((resolve) => {
            child.once('exit', (code, signal) => {
                this.handleExit(record, code, signal);
                resolve();
            });
        });
        child.on('error', (error) => {
            logger.error({ backendId, error: error.message }, 'Service backend process error');
        });
        this.captureOutput(record, child);

        try {
            await new Promise<void>((resolve, reject) => {
                child.once('spawn', () => {
                    resolve();
                });
                child.once('error', reject);
            });
        } catch (error) {
            throw this.crash(record, new SpawnError(`Failed to launch "${spec.command}" for backend ${backendId}: ${errorMessage(error)}`, { cause: error }));
        }

        record.startedAt = new Date();
        logger.info({ backendId, pid: child.pid }, 'Service backend launched');
    }

    private async waitUntilHealthy(record: ProcessRecord): Promise<void> {
        const { backendId } = record.handle;

        for(let attempt = 1; attempt <= this.healthCheckAttempts; attempt++) {
            this.assertState(record, 'health-checking');
            const healthy = await this.probeOnce(record);
            this.assertState(record, 'health-checking');

            if(healthy) {
                logger.debug({ backendId, attempt }, 'Health check passed');
                return;
            }

            if(attempt < this.healthCheckAttempts) {
                const wait = cancellableDelay(this.healthCheckIntervalMs);
                record.cancelWait = wait.cancel;
                await wait.promise;
                record.cancelWait = undefined;
            }
        }

        throw this.crash(record, new HealthCheckTimeout(
            `Service backend ${backendId} did not pass its health check at ${record.healthCheckUrl} after ${this.healthCheckAttempts} attempts`
        ));
    }

    /**
     * Startup steps bail out once a stop or an exit has moved the process on
     */
    private assertState(record: ProcessRecord, expected: ProcessState): void {
        if(record.state === expected && !record.stopping) {
            return;
        }
        throw record.error ?? new SpawnError(`Service backend ${record.handle.backendId} was stopped before it became healthy`);
    }

    private async probeOnce(record: ProcessRecord): Promise<boolean> {
        try {
            return await this.probe(record.healthCheckUrl, this.healthProbeTimeoutMs);
        } catch (error) {
            logger.debug({ backendId: record.handle.backendId, error: errorMessage(error) }, 'Health probe failed');
            return false;
        }
    }

    /**
     * Record a failure on the process and move it to `crashed`
     */
    private crash(record: ProcessRecord, error: AggregatorError): AggregatorError {
        if(record.state !== 'crashed' && record.state !== 'stopped' && !record.stopping) {
            record.error = error;
            this.transition(record, 'crashed');
            logger.error({ backendId: record.handle.backendId, error: error.message }, 'Service backend failed');
        }
        return record.error ?? error;
    }

    private handleExit(record: ProcessRecord, code: number | null, signal: NodeJS.Signals | null): void {
        record.exitObserved = true;
        record.exitCode = code;
        record.signal = signal;

        const { backendId } = record.handle;
        const wasRunning = record.state === 'running';
        if(record.state === 'stopped' || record.state === 'crashed' || record.stopping) {
            logger.debug({ backendId, code, signal }, 'Service backend exited');
            return;
        }

        const tail = _.last(record.stderrTail);
        const detail = `exit code ${code ?? 'none'}${signal ? `, signal ${signal}` : ''}${tail ? ` (stderr: ${tail})` : ''}`;
        const error = wasRunning
            ? new ProcessExitedError(`Service backend ${backendId} exited unexpectedly: ${detail}`)
            : new SpawnError(`Service backend ${backendId} exited during startup: ${detail}`);

        this.crash(record, error);
        record.cancelWait?.();

        if(wasRunning) {
            const event: ProcessCrashEvent = { handle: record.handle, exitCode: code, signal, error };
            this.emit('crashed', event);
        }
    }

    private captureOutput(record: ProcessRecord, child: ServiceProcess): void {
        const { backendId } = record.handle;

        child.stderr?.on('data', (data: Buffer) => {
            for(const line of _.split(_.trim(data.toString()), '\n')) {
                const trimmedLine = _.trim(line);
                if(!trimmedLine) {
                    continue;
                }
                logger.debug({ backendId }, trimmedLine);
                record.stderrTail.push(_.truncate(trimmedLine, { length: STDERR_LINE_MAX_LENGTH }));
                if(record.stderrTail.length > STDERR_TAIL_LINES) {
                    record.stderrTail.shift();
                }
            }
        });

        // Services speak MCP over HTTP; stdout is only drained so the pipe never fills
        child.stdout?.on('data', (data: Buffer) => {
            logger.debug({ backendId, stream: 'stdout' }, _.trim(data.toString()));
        });
    }

    /**
     * SIGTERM, wait out the grace period, then SIGKILL. Never waits unbounded.
     */
    private async terminate(record: ProcessRecord): Promise<void> {
        const { child } = record;
        if(!child || child.pid === undefined || record.exitObserved) {
            return;
        }

        const { backendId } = record.handle;
        logger.info({ backendId, pid: child.pid }, 'Sending SIGTERM to service backend');
        child.kill('SIGTERM');
        if(await this.waitForExit(record)) {
            return;
        }

        logger.warn({ backendId, pid: child.pid }, 'Service backend did not exit gracefully, killing');
        child.kill('SIGKILL');
        if(!await this.waitForExit(record)) {
            logger.error({ backendId, pid: child.pid }, 'Service backend did not confirm exit after SIGKILL');
        }
    }

    private async waitForExit(record: ProcessRecord): Promise<boolean> {
        try {
            await withTimeout(record.exited, this.stopGraceMs, 'exit wait timed out');
            return true;
        } catch{
            return false;
        }
    }
}
