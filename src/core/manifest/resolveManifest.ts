// src/core/manifest/resolveManifest.ts

import type {
    CanvasLabel,
    IIIFCanvas,
    IIIFManifest,
    IIIFService,
    ImageUrlResolution,
    IResolvedCanvas,
} from '../../@types/index.ts';
import { type IPageRange, selectRange } from '../range/parseRange.ts';

/**
 * Picks the display label of a canvas: plain text as is, otherwise the first English value,
 * falling back to the canvas index.
 */
export function extractLabel(label: CanvasLabel, index: number): string {
    if (label.kind === 'plain') {
        return label.text;
    }
    return label.values['en']?.[0] ?? String(index);
}

/**
 * A service speaks Image API 3 when its type mentions `3` (`ImageService3`) or its id
 * contains a `/3/` path segment.
 */
export function isImageApiV3(service: IIIFService): boolean {
    const type = (service.type ?? '').toLowerCase();
    return type.includes('3') || (service.id ?? '').includes('/3/');
}

/**
 * Derives the full-resolution image URL of a canvas from the first service of the image body
 * of its first annotation.
 */
export function resolveImageUrl(canvas: IIIFCanvas): ImageUrlResolution {
    const annotationPage = canvas.items[0];
    if (!annotationPage) return { kind: 'unavailable', reason: 'no-annotation-page' };

    const annotation = annotationPage.items[0];
    if (!annotation) return { kind: 'unavailable', reason: 'no-annotation' };

    const body = annotation.body;
    if (!body) return { kind: 'unavailable', reason: 'no-image-body' };

    const service = body.service[0];
    if (!service) return { kind: 'unavailable', reason: 'no-service' };

    const base = (service.id ?? '').replace(/\/+$/, '');
    if (!base) return { kind: 'unavailable', reason: 'no-service-id' };

    return isImageApiV3(service)
        ? { kind: 'resolved', url: `${base}/full/max/0/default.jpg`, apiVersion: 3 }
        : { kind: 'resolved', url: `${base}/full/full/0/default.jpg`, apiVersion: 2 };
}

/**
 * Lists the canvases of a manifest in manifest order, each with its label and image URL.
 * With a range only the selected canvases are listed, numbered from 1 within the selection.
 * Canvases without a usable image service carry an empty URL and the reason.
 *
 * @throws {InputError} When the range reaches past the last canvas.
 */
export function resolveManifest(manifest: IIIFManifest, range?: IPageRange): IResolvedCanvas[] {
    const canvases = range ? selectRange(manifest.items, range) : manifest.items;
    return canvases.map((canvas, position) => {
        const index = position + 1;
        const label = extractLabel(canvas.label, index);
        const resolution = resolveImageUrl(canvas);
        return resolution.kind === 'resolved'
            ? { canvas, index, label, imageUrl: resolution.url }
            : { canvas, index, label, imageUrl: '', unavailableReason: resolution.reason };
    });
}
