// src/utils/progress/progressReporters.ts

import type { ILogger, IPageDescriptor, IProgressReporter, SkipReason } from '../../@types/index.ts';
import cliProgress from 'cli-progress';
import type { SingleBar } from 'cli-progress';
import { formatError } from '../logging/logUtils.ts';

function describeMissingImage(detail: string | undefined): string {
    return detail ? `no image available (${detail})` : 'no image available';
}

export const NoopProgressReporter: IProgressReporter = {
    start: (): void => {},
    pageSkipped: (): void => {},
    pageSaved: (): void => {},
    pageDegraded: (): void => {},
    pageFailed: (): void => {},
    stop: (): void => {},
};

/**
 * Reports page events as log lines.
 */
export class LogProgressReporter implements IProgressReporter {
    constructor(private readonly logger: ILogger) {}

    start(total: number, description: string): void {
        this.logger.info(`${description} (${total} page(s))`);
    }

    pageSkipped(page: IPageDescriptor, reason: SkipReason, detail?: string): void {
        if (reason === 'exists') {
            this.logger.info(`Skipped ${page.fileName}: already downloaded`);
        } else {
            this.logger.warn(`Skipped ${page.fileName}: ${describeMissingImage(detail)}`);
        }
    }

    pageSaved(page: IPageDescriptor): void {
        this.logger.success(`Downloaded ${page.fileName}`);
    }

    pageDegraded(page: IPageDescriptor, failedTiles: number, totalTiles: number): void {
        this.logger.warn(`Saved ${page.fileName} with ${failedTiles} of ${totalTiles} tile(s) missing`);
    }

    pageFailed(page: IPageDescriptor, error: Error): void {
        this.logger.error(`Failed ${page.fileName}: ${formatError(error, this.logger.verbose)}`);
    }

    stop(): void {}
}

/**
 * Renders a progress bar; problems are printed below it so they remain visible once the bar finishes.
 */
export class CliProgressReporter implements IProgressReporter {
    private readonly bar: SingleBar;
    private readonly problems: string[] = [];

    constructor(private readonly verbose: boolean) {
        this.bar = new cliProgress.SingleBar(
            {
                format: 'Downloading |{bar}| {percentage}% || {value}/{total} {page}',
                barCompleteChar: '█',
                barIncompleteChar: '░',
                hideCursor: true,
            },
            cliProgress.Presets.shades_grey,
        );
    }

    start(total: number, description: string): void {
        this.bar.start(total, 0, { page: description });
    }

    pageSkipped(page: IPageDescriptor, reason: SkipReason, detail?: string): void {
        if (reason === 'no-image') {
            this.problems.push(`Skipped ${page.fileName}: ${describeMissingImage(detail)}`);
        }
        this.bar.increment({ page: `Skipped ${page.fileName}` });
    }

    pageSaved(page: IPageDescriptor): void {
        this.bar.increment({ page: `Downloaded ${page.fileName}` });
    }

    pageDegraded(page: IPageDescriptor, failedTiles: number, totalTiles: number): void {
        this.problems.push(`${page.fileName} saved with ${failedTiles} of ${totalTiles} tile(s) missing`);
        this.bar.increment({ page: `Degraded ${page.fileName}` });
    }

    pageFailed(page: IPageDescriptor, error: Error): void {
        this.problems.push(`Error downloading ${page.fileName}: ${formatError(error, this.verbose)}`);
        this.bar.increment({ page: `Failed ${page.fileName}` });
    }

    stop(): void {
        this.bar.stop();
        for (const problem of this.problems) {
            console.error(problem);
        }
    }
}
