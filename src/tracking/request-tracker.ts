/**
 * In-memory record of recent tool calls, for the dashboard.
 *
 * Bounded two ways: at most `maxSize` records (oldest evicted first) and
 * nothing older than the retention window.
 */

import { randomUUID } from 'node:crypto';
import _ from 'lodash';
import { logger } from '../utils/logger.js';

export const REQUEST_STATUSES = ['pending', 'in-progress', 'completed', 'failed'] as const;
export type RequestStatus = typeof REQUEST_STATUSES[number];

export interface TrackedRequest {
    id:            string
    qualifiedName: string
    backendId:     string
    toolName:      string
    arguments:     Record<string, unknown>
    status:        RequestStatus
    createdAt:     Date
    startedAt?:    Date
    completedAt?:  Date
    durationMs?:   number
    /** `degraded` when part of the result had to be stringified */
    outcome?:      'success' | 'degraded'
    error?:        string
    clientIp?:     string
}

export interface NewRequest {
    qualifiedName: string
    backendId:     string
    toolName:      string
    arguments:     Record<string, unknown>
    clientIp?:     string
}

export interface RequestFilter {
    limit?:     number
    status?:    RequestStatus
    backendId?: string
}

export interface RequestStatistics {
    total:             number
    byStatus:          Record<RequestStatus, number>
    byBackend:         Record<string, number>
    completed:         number
    averageDurationMs: number
}

export interface RequestTrackerOptions {
    maxSize?:     number
    retentionMs?: number
    now?:         () => Date
}

export class RequestTracker {
    // Insertion order doubles as age order
    private requests = new Map<string, TrackedRequest>();

    private readonly maxSize:     number;
    private readonly retentionMs: number;
    private readonly now:         () => Date;

    constructor(options: RequestTrackerOptions = {}) {
        this.maxSize = options.maxSize ?? 1000;
        this.retentionMs = options.retentionMs ?? 24 * 60 * 60 * 1000;
        this.now = options.now ?? (() => new Date());
    }

    create(request: NewRequest): string {
        const id = randomUUID();
        this.requests.set(id, {
            ...request,
            id,
            status:    'pending',
            createdAt: this.now(),
        });
        this.evict();
        logger.debug({ requestId: id, backendId: request.backendId, tool: request.toolName }, 'Tracking tool call');
        return id;
    }

    start(id: string): void {
        const request = this.requests.get(id);
        if(request) {
            request.status = 'in-progress';
            request.startedAt = this.now();
        }
    }

    complete(id: string, outcome: 'success' | 'degraded' = 'success'): void {
        const request = this.requests.get(id);
        if(request) {
            request.status = 'completed';
            request.outcome = outcome;
            this.finish(request);
        }
    }

    fail(id: string, error: string): void {
        const request = this.requests.get(id);
        if(request) {
            request.status = 'failed';
            request.error = error;
            this.finish(request);
        }
    }

    get(id: string): TrackedRequest | undefined {
        const request = this.requests.get(id);
        return request ? { ...request } : undefined;
    }

    /**
     * Newest first
     */
    list(filter: RequestFilter = {}): TrackedRequest[] {
        const { limit = 100, status, backendId } = filter;
        const matching = _.filter(Array.from(this.requests.values()), request =>
            (status === undefined || request.status === status)
            && (backendId === undefined || request.backendId === backendId));
        return _.map(_.take(matching.reverse(), limit), request => ({ ...request }));
    }

    statistics(): RequestStatistics {
        const byStatus: Record<RequestStatus, number> = {
            'pending':     0,
            'in-progress': 0,
            'completed':   0,
            'failed':      0,
        };
        const byBackend: Record<string, number> = {};
        let totalDuration = 0;
        let completed = 0;

        for(const request of this.requests.values()) {
            byStatus[request.status] += 1;
            byBackend[request.backendId] = (byBackend[request.backendId] ?? 0) + 1;
            // Failed calls are excluded from the average
            if(request.status === 'completed' && request.durationMs !== undefined) {
                totalDuration += request.durationMs;
                completed += 1;
            }
        }

        return {
            total:             this.requests.size,
            byStatus,
            byBackend,
            completed,
            averageDurationMs: completed > 0 ? _.round(totalDuration / completed, 2) : 0,
        };
    }

    get size(): number {
        return this.requests.size;
    }

    private finish(request: TrackedRequest): void {
        request.completedAt = this.now();
        if(request.startedAt) {
            request.durationMs = request.completedAt.getTime() - request.startedAt.getTime();
        }
    }

    private evict(): void {
        const cutoff = this.now().getTime() - this.retentionMs;
        let expired = 0;
        for(const [id, request] of this.requests) {
            if(request.createdAt.getTime() < cutoff) {
                this.requests.delete(id);
                expired += 1;
            }
        }

        while(this.requests.size > this.maxSize) {
            const oldest = this.requests.keys().next();
            if(oldest.done) {
                break;
            }
            this.requests.delete(oldest.value);
        }

        if(expired > 0) {
            logger.debug({ expired }, 'Dropped expired request records');
        }
    }
}
