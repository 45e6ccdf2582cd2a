// src/index.ts

export type * from './@types/index.ts';
export { config, defaultSettings } from './config/index.ts';
export { loadSettings } from './config/settings.ts';
export { downloadManuscript } from './core/manuscript/index.ts';
export { BoundedFetchExecutor } from './core/fetching/boundedFetchExecutor.ts';
export { fetchManifest, parseManifest } from './core/manifest/fetchManifest.ts';
export { extractLabel, resolveImageUrl, resolveManifest } from './core/manifest/resolveManifest.ts';
export { parsePageMetadata } from './core/tiles/pageMetadata.ts';
export { createTileUrlTemplate, planTileGrid } from './core/tiles/tileGrid.ts';
export { compositeTiles, encodeCanvas } from './core/tiles/compositor.ts';
export { parseRange } from './core/range/parseRange.ts';
export { HttpClient } from './utils/http/httpClient.ts';
export {
    HttpStatusError,
    InputError,
    ManifestError,
    MetadataParseError,
    NetworkError,
    TileDecodeError,
} from './utils/errors/errors.ts';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.ts';
export { CliProgressReporter, LogProgressReporter, NoopProgressReporter } from './utils/progress/progressReporters.ts';
