// src/core/manuscript/stateMachine.ts

import type {
    DownloadMode,
    ICanvasPage,
    IDownloadOptions,
    IDownloadSummary,
    ILegacyPage,
    IRetryPolicy,
    PageOutcome,
} from '../../@types/index.ts';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import _ from 'lodash';
import { config } from '../../config/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { ManuscriptStates } from '../../stateMachine/definedStates.ts';
import { HttpClient } from '../../utils/http/httpClient.ts';
import { ensureOutputDirectory } from '../../utils/storage/storageUtils.ts';
import { BoundedFetchExecutor } from '../fetching/boundedFetchExecutor.ts';
import { fetchManifest } from '../manifest/fetchManifest.ts';
import { resolveManifest } from '../manifest/resolveManifest.ts';
import { describeCanvasPages, expandLegacyPages } from '../page/pageDescriptors.ts';
import { CanvasStateMachine } from '../page/canvasStateMachine.ts';
import { LegacyPageStateMachine } from '../page/legacyPageStateMachine.ts';
import { type IPageRange, parseRange } from '../range/parseRange.ts';

/**
 * Anything starting with `http` is a manifest URL; everything else is a legacy manuscript id.
 */
export function detectMode(input: string): DownloadMode {
    return input.startsWith('http') ? 'manifest' : 'legacy';
}

/**
 * Output folder of a manifest download: the last path segment of its URL.
 */
export function manifestFolderName(manifestUrl: string): string {
    const segments = manifestUrl.split('/');
    return segments[segments.length - 1] || config.output.defaultManifestFolder;
}

export class ManuscriptStateMachine extends AbstractStateMachine<ManuscriptStates, IDownloadOptions> {
    private readonly http: HttpClient;
    private readonly retry: IRetryPolicy;
    private mode: DownloadMode = 'legacy';
    private range: IPageRange | null = null;
    private targetDir = '';
    private legacyPages: ILegacyPage[] = [];
    private canvasPages: ICanvasPage[] = [];
    private outcomes: PageOutcome[] = [];

    constructor(options: IDownloadOptions) {
        super(ManuscriptStates.INIT, options);
        this.http = new HttpClient({
            timeoutMs: config.http.timeoutMs,
            userAgent: config.http.userAgent,
            fetchFn: options.fetchFn,
        });
        this.retry = options.retry ?? config.retry;
        this.stateTransitions = [
            { state: ManuscriptStates.INIT, handler: this.init },
            { state: ManuscriptStates.RESOLVE_PAGES, handler: this.resolvePages },
            { state: ManuscriptStates.PREPARE_OUTPUT, handler: this.prepareOutput },
            { state: ManuscriptStates.DOWNLOAD_PAGES, handler: this.downloadPages },
        ];
    }

    protected getCompletionState(): ManuscriptStates {
        return ManuscriptStates.COMPLETED;
    }

    protected getErrorState(): ManuscriptStates {
        return ManuscriptStates.ERROR;
    }

    /**
     * Chooses the mode and validates the range before any request is made.
     */
    private init(): void {
        const { input, range, settings, logger } = this.options;
        this.mode = detectMode(input);
        this.range = range ? parseRange(range) : null;
        const folder = this.mode === 'manifest' ? manifestFolderName(input) : input;
        this.targetDir = path.resolve(settings.basedir, folder);
        logger.info(`${this.mode === 'manifest' ? 'IIIF' : 'Legacy'} mode detected for "${input}"`);
    }

    private async resolvePages(): Promise<void> {
        const { input, settings, logger } = this.options;
        if (this.mode === 'legacy') {
            const range = this.range ?? { start: settings.rangebegin, end: settings.rangeend };
            this.legacyPages = expandLegacyPages(range, this.targetDir);
            logger.debug(`Pages ${range.start}-${range.end} expand to ${this.legacyPages.length} page image(s).`);
            return;
        }

        const manifest = await fetchManifest(this.http, input);
        const canvases = resolveManifest(manifest, this.range ?? undefined);
        this.canvasPages = describeCanvasPages(canvases, this.targetDir);
        logger.debug(`Manifest lists ${manifest.items.length} canvas(es), ${canvases.length} selected.`);
    }

    private prepareOutput(): void {
        const { logger } = this.options;
        ensureOutputDirectory(this.targetDir);
        logger.debug(`Ensured output folder "${this.targetDir}".`);
    }

    private async downloadPages(): Promise<void> {
        const { progress, logger } = this.options;
        const total = this.mode === 'legacy' ? this.legacyPages.length : this.canvasPages.length;
        progress.start(total, `Downloading ${total} ${this.mode === 'legacy' ? 'pages' : 'items'}...`);
        try {
            if (this.mode === 'legacy') {
                await this.downloadLegacyPages();
            } else {
                await this.downloadCanvases();
            }
        } finally {
            progress.stop();
        }
        logger.info(`Download complete: ${this.targetDir}`);
    }

    /**
     * Legacy pages run in fixed-size batches; a batch settles completely before the next starts.
     */
    private async downloadLegacyPages(): Promise<void> {
        const { settings, logger, verbose, progress, input } = this.options;
        const batches = _.chunk(this.legacyPages, config.legacy.batchSize);
        for (const [position, batch] of batches.entries()) {
            const outcomes = await Promise.all(
                batch.map((page) =>
                    new LegacyPageStateMachine({
                        page,
                        executor: new BoundedFetchExecutor(this.http, {
                            concurrency: config.concurrency.tilesPerPage,
                            retry: this.retry,
                            logger,
                        }),
                        progress,
                        logger,
                        verbose,
                        baseUrl: settings.baseurl,
                        manuscriptId: input,
                        zoomLevel: config.legacy.zoomLevel,
                        jpegQuality: config.output.jpegQuality,
                    }).process()
                ),
            );
            this.outcomes.push(...outcomes);
            if (settings.sleeptime > 0 && position < batches.length - 1) {
                await sleep(settings.sleeptime * 1_000);
            }
        }
    }

    /**
     * Every canvas starts at once; the shared executor bounds how many download concurrently.
     */
    private async downloadCanvases(): Promise<void> {
        const { logger, verbose, progress } = this.options;
        const executor = new BoundedFetchExecutor(this.http, {
            concurrency: config.concurrency.canvases,
            retry: this.retry,
            logger,
        });
        const outcomes = await Promise.all(
            this.canvasPages.map((page) =>
                new CanvasStateMachine({ page, executor, progress, logger, verbose }).process()
            ),
        );
        this.outcomes.push(...outcomes);
    }

    get summary(): IDownloadSummary {
        const count = (predicate: (outcome: PageOutcome) => boolean) => this.outcomes.filter(predicate).length;
        return {
            mode: this.mode,
            targetDir: this.targetDir,
            total: this.outcomes.length,
            saved: count((outcome) => outcome.status === 'saved'),
            degraded: count((outcome) => outcome.status === 'degraded'),
            skipped: count((outcome) => outcome.status === 'skipped' && outcome.reason === 'exists'),
            noImage: count((outcome) => outcome.status === 'skipped' && outcome.reason === 'no-image'),
            failed: count((outcome) => outcome.status === 'failed'),
        };
    }
}
