// src/core/manifest/fetchManifest.ts

import type { IIIFManifest } from '../../@types/index.ts';
import type { HttpClient } from '../../utils/http/httpClient.ts';
import { ManifestError } from '../../utils/errors/errors.ts';
import { manifestSchema } from './manifestSchema.ts';

/**
 * Validates a decoded manifest body.
 *
 * @throws {ManifestError} When the body does not have the manifest shape.
 */
export function parseManifest(body: unknown, source: string): IIIFManifest {
    const result = manifestSchema.safeParse(body);
    if (!result.success) {
        const issues = result.error.issues
            .slice(0, 5)
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new ManifestError(`Manifest at ${source} has an unexpected shape: ${issues}`, { cause: result.error });
    }
    return result.data;
}

/**
 * Downloads and validates the manifest at `url`. Not retried: a failing manifest fetch ends the run.
 */
export async function fetchManifest(http: HttpClient, url: string): Promise<IIIFManifest> {
    const text = await http.getText(url);
    let body: unknown;
    try {
        body = JSON.parse(text);
    } catch (error) {
        throw new ManifestError(`Manifest at ${url} is not valid JSON`, { cause: error });
    }
    return parseManifest(body, url);
}
