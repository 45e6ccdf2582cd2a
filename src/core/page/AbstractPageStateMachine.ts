// src/core/page/AbstractPageStateMachine.ts

import type { ILogger, IPageDescriptor, IProgressReporter, PageOutcome, SkipReason } from '../../@types/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { PageStates } from '../../stateMachine/definedStates.ts';
import type { BoundedFetchExecutor } from '../fetching/boundedFetchExecutor.ts';
import { filePathExists } from '../../utils/storage/storageUtils.ts';

export interface IPageMachineOptions<P extends IPageDescriptor> {
    page: P;
    executor: BoundedFetchExecutor;
    progress: IProgressReporter;
    logger: ILogger;
    verbose: boolean;
}

/**
 * Lifecycle shared by every page: `PENDING -> (SKIPPED | FETCHING -> [COMPOSING] -> SAVED) | FAILED`.
 *
 * A page ends with exactly one progress event. Failures end the page in `FAILED` and are
 * returned as an outcome instead of being thrown, so sibling pages carry on.
 */
export abstract class AbstractPageStateMachine<
    P extends IPageDescriptor,
    O extends IPageMachineOptions<P> = IPageMachineOptions<P>,
> extends AbstractStateMachine<PageStates, O> {
    private outcome: PageOutcome | null = null;

    protected constructor(options: O) {
        super(PageStates.PENDING, options);
    }

    /**
     * Runs the page to a terminal state and reports how it ended.
     */
    async process(): Promise<PageOutcome> {
        await this.run();
        if (this.outcome === null) {
            const error = new Error(`Page ${this.options.page.fileName} ended in ${this.state} without an outcome`);
            this.fail(error);
            return { status: 'failed', page: this.options.page, error };
        }
        return this.outcome;
    }

    protected getCompletionState(): PageStates {
        return PageStates.SAVED;
    }

    protected getErrorState(): PageStates {
        return PageStates.FAILED;
    }

    protected handleError(error: Error): void {
        this.fail(error);
    }

    /**
     * An existing target file means the page was saved by an earlier run.
     */
    protected checkExisting(): void {
        const { page, logger } = this.options;
        if (filePathExists(page.targetPath)) {
            logger.debug(`${page.fileName} already exists, skipping.`);
            this.skip('exists');
        }
    }

    protected skip(reason: SkipReason, detail?: string): void {
        const { page, progress } = this.options;
        this.outcome = { status: 'skipped', page, reason };
        progress.pageSkipped(page, reason, detail);
        this.halt(PageStates.SKIPPED);
    }

    /**
     * Records a saved page; with missing tiles the page counts as degraded.
     */
    protected saved(failedTiles = 0, totalTiles = 0): void {
        const { page, progress, logger } = this.options;
        if (failedTiles > 0) {
            logger.warn(`${page.fileName} saved with ${failedTiles} of ${totalTiles} tile(s) missing.`);
            this.outcome = { status: 'degraded', page, path: page.targetPath, failedTiles, totalTiles };
            progress.pageDegraded(page, failedTiles, totalTiles);
        } else {
            logger.debug(`${page.fileName} saved to ${page.targetPath}.`);
            this.outcome = { status: 'saved', page, path: page.targetPath };
            progress.pageSaved(page);
        }
    }

    private fail(error: Error): void {
        const { page, progress } = this.options;
        this.outcome = { status: 'failed', page, error };
        progress.pageFailed(page, error);
    }
}
