// src/config/index.ts

import type { ISettings } from '../@types/index.ts';

export const config = {
    http: {
        timeoutMs: 60_000,
        userAgent: 'Mozilla/5.0',
    },
    retry: {
        attempts: 5,
        baseDelayMs: 1_000,
        minDelayMs: 1_000,
        maxDelayMs: 10_000,
    },
    concurrency: {
        tilesPerPage: 5, // in-flight tile requests for one legacy page
        canvases: 5, // in-flight image downloads shared by all manifest canvases
    },
    legacy: {
        zoomLevel: 13,
        batchSize: 5, // pages per batch; a batch settles before the next starts
    },
    output: {
        jpegQuality: 90,
        partialSuffix: '.part',
        defaultManifestFolder: 'download',
    },
    settingsFile: 'folio.yaml',
    envPrefix: 'FOLIO_',
};

export const defaultSettings: ISettings = {
    basedir: '.',
    baseurl: 'http://www.bl.uk/manuscripts/Proxy.ashx?view=',
    rangebegin: 1,
    rangeend: 259,
    sleeptime: 0,
};
