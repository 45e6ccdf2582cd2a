// src/core/fetching/boundedFetchExecutor.ts

import type {
    FetchFailureKind,
    FetchResult,
    IFetchExecutorOptions,
    IFetchTask,
} from '../../@types/index.ts';
import pLimit, { type LimitFunction } from 'p-limit';
import { setTimeout as sleep } from 'node:timers/promises';
import type { HttpClient } from '../../utils/http/httpClient.ts';
import { HttpStatusError, isRetryableError, NetworkError, toError } from '../../utils/errors/errors.ts';
import { computeBackoffDelay } from './backoff.ts';

function classifyFailure(error: Error): FetchFailureKind {
    if (error instanceof NetworkError) return 'network';
    if (error instanceof HttpStatusError) return 'http-status';
    return 'unknown';
}

/**
 * Runs byte downloads with a ceiling on requests in flight. Each task is retried on transient
 * failures with exponential backoff; a task that runs out of attempts settles as a failure value
 * and never disturbs its siblings.
 *
 * One executor instance owns one ceiling: callers that must share a ceiling share the instance.
 */
export class BoundedFetchExecutor {
    private readonly limit: LimitFunction;

    constructor(
        private readonly http: HttpClient,
        private readonly options: IFetchExecutorOptions,
    ) {
        if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
            throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
        }
        if (!Number.isInteger(options.retry.attempts) || options.retry.attempts < 1) {
            throw new RangeError(`Retry attempts must be a positive integer, got ${options.retry.attempts}`);
        }
        this.limit = pLimit(options.concurrency);
    }

    /**
     * Fetches every task and resolves once all of them have settled, in task order.
     */
    async fetchAll<K>(tasks: IFetchTask<K>[]): Promise<FetchResult<K>[]> {
        return Promise.all(tasks.map((task) => this.fetchOne(task)));
    }

    /**
     * Fetches one task under the shared ceiling. Never rejects.
     */
    fetchOne<K>(task: IFetchTask<K>): Promise<FetchResult<K>> {
        return this.limit(() => this.fetchWithRetry(task));
    }

    private async fetchWithRetry<K>(task: IFetchTask<K>): Promise<FetchResult<K>> {
        const { retry, logger } = this.options;
        let attempt = 0;
        while (true) {
            attempt += 1;
            const delay = computeBackoffDelay(attempt, retry);
            if (delay > 0) {
                await sleep(delay);
            }
            try {
                const data = await this.http.getBytes(task.url);
                if (attempt > 1) {
                    logger.debug(`Fetched ${task.url} on attempt ${attempt}.`);
                }
                return { ok: true, key: task.key, url: task.url, data, attempts: attempt };
            } catch (caught) {
                const error = toError(caught);
                const retryable = isRetryableError(error);
                if (!retryable || attempt >= retry.attempts) {
                    logger.debug(`Giving up on ${task.url} after ${attempt} attempt(s): ${error.message}`);
                    return {
                        ok: false,
                        key: task.key,
                        url: task.url,
                        failure: { kind: classifyFailure(error), message: error.message, attempts: attempt, error },
                    };
                }
                logger.debug(`Attempt ${attempt} for ${task.url} failed, retrying: ${error.message}`);
            }
        }
    }
}
