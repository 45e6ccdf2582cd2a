// src/core/manuscript/index.ts

import type { IDownloadOptions, IDownloadSummary } from '../../@types/index.ts';

import { ManuscriptStateMachine } from './stateMachine.ts';

/**
 * Downloads every page of a manuscript, from a IIIF manifest URL or a legacy manuscript id.
 *
 * Individual page failures are counted in the summary. Input errors and a failing manifest
 * fetch reject.
 *
 * @param options - The options to configure the download.
 */
export async function downloadManuscript(options: IDownloadOptions): Promise<IDownloadSummary> {
    const stateMachine = new ManuscriptStateMachine(options);
    await stateMachine.run();
    return stateMachine.summary;
}
