// src/core/page/pageDescriptors.ts

import type { ICanvasPage, ILegacyPage, IResolvedCanvas, PageSide } from '../../@types/index.ts';
import * as path from 'node:path';
import type { IPageRange } from '../range/parseRange.ts';

const SIDES: readonly PageSide[] = ['r', 'v'];

/**
 * Legacy page stem: `f` + zero-padded page number + side, e.g. `f001r`.
 */
export function legacyPageStem(pageNumber: number, side: PageSide): string {
    return `f${String(pageNumber).padStart(3, '0')}${side}`;
}

/**
 * Manifest page file name: zero-padded 1-based index and label, e.g. `0001_Page_1.jpg`.
 * Whitespace and path separators in the label become underscores.
 */
export function canvasFileName(index: number, label: string): string {
    const safeLabel = label.replace(/[\s/\\]/g, '_');
    return `${String(index).padStart(4, '0')}_${safeLabel}.jpg`;
}

/**
 * Expands a page range into recto and verso pages, in that order for every page number.
 */
export function expandLegacyPages(range: IPageRange, targetDir: string): ILegacyPage[] {
    const pages: ILegacyPage[] = [];
    for (let pageNumber = range.start; pageNumber <= range.end; pageNumber++) {
        for (const side of SIDES) {
            const stem = legacyPageStem(pageNumber, side);
            const fileName = `${stem}.jpg`;
            pages.push({
                index: pages.length + 1,
                label: stem,
                fileName,
                targetPath: path.join(targetDir, fileName),
                pageNumber,
                side,
                stem,
            });
        }
    }
    return pages;
}

export function describeCanvasPages(canvases: IResolvedCanvas[], targetDir: string): ICanvasPage[] {
    return canvases.map(({ index, label, imageUrl, unavailableReason }) => {
        const fileName = canvasFileName(index, label);
        return { index, label, fileName, targetPath: path.join(targetDir, fileName), imageUrl, unavailableReason };
    });
}
