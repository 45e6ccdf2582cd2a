import { describe, expect, it } from 'vitest';
import path from 'node:path';
import {
    canvasFileName,
    describeCanvasPages,
    expandLegacyPages,
    legacyPageStem,
} from '../src/core/page/pageDescriptors.ts';

describe('legacy pages', () => {
    it('pads the page number to three digits', () => {
        expect(legacyPageStem(1, 'r')).toBe('f001r');
        expect(legacyPageStem(259, 'v')).toBe('f259v');
    });

    it('expands each page number into recto then verso', () => {
        const pages = expandLegacyPages({ start: 9, end: 10 }, '/data/ms1');

        expect(pages.map((page) => page.fileName)).toEqual(['f009r.jpg', 'f009v.jpg', 'f010r.jpg', 'f010v.jpg']);
        expect(pages.map((page) => page.index)).toEqual([1, 2, 3, 4]);
        expect(pages[3]).toEqual({
            index: 4,
            label: 'f010v',
            fileName: 'f010v.jpg',
            targetPath: path.join('/data/ms1', 'f010v.jpg'),
            pageNumber: 10,
            side: 'v',
            stem: 'f010v',
        });
    });
});

describe('canvas pages', () => {
    it('numbers files by canvas index and keeps the label', () => {
        expect(canvasFileName(1, 'Page 1')).toBe('0001_Page_1.jpg');
        expect(canvasFileName(12, 'fol. 2r/2v')).toBe('0012_fol._2r_2v.jpg');
    });

    it('carries the reason a canvas has no image', () => {
        const canvas = { id: 'c2', label: { kind: 'plain' as const, text: 'Blank' }, items: [] };

        const [described] = describeCanvasPages(
            [{ canvas, index: 2, label: 'Blank', imageUrl: '', unavailableReason: 'no-annotation-page' }],
            '/data/book',
        );

        expect(described).toMatchObject({ fileName: '0002_Blank.jpg', imageUrl: '', unavailableReason: 'no-annotation-page' });
    });

    it('carries the image URL of each canvas', () => {
        const canvas = { id: 'c1', label: { kind: 'plain' as const, text: 'Cover' }, items: [] };

        const pages = describeCanvasPages(
            [{ canvas, index: 3, label: 'Cover', imageUrl: 'http://x/svc/full/full/0/default.jpg' }],
            '/data/book',
        );

        expect(pages).toEqual([
            {
                index: 3,
                label: 'Cover',
                fileName: '0003_Cover.jpg',
                targetPath: path.join('/data/book', '0003_Cover.jpg'),
                imageUrl: 'http://x/svc/full/full/0/default.jpg',
            },
        ]);
    });
});
