import { describe, expect, it } from 'vitest';
import { createTileUrlTemplate, planTileGrid, planTileTasks } from '../src/core/tiles/tileGrid.ts';

describe('planTileGrid', () => {
    it('derives rows from the width and columns from the height', () => {
        const grid = planTileGrid({ width: 999, height: 1999, tileSize: 256 });

        expect(grid.rows).toBe(4);
        expect(grid.cols).toBe(8);
        expect(grid.coordinates).toHaveLength(32);
    });

    it('plans a single tile when the page fits into one', () => {
        const grid = planTileGrid({ width: 99, height: 99, tileSize: 100 });

        expect(grid.coordinates).toEqual([{ row: 0, col: 0 }]);
    });

    it('adds a row when the width is an exact multiple of the tile size', () => {
        const grid = planTileGrid({ width: 200, height: 50, tileSize: 100 });

        expect(grid.rows).toBe(3);
        expect(grid.cols).toBe(1);
    });

    it('lists every coordinate exactly once, row by row', () => {
        const grid = planTileGrid({ width: 29, height: 19, tileSize: 10 });
        const keys = grid.coordinates.map(({ row, col }) => `${row}_${col}`);

        expect(new Set(keys).size).toBe(grid.rows * grid.cols);
        expect(keys).toEqual(['0_0', '0_1', '1_0', '1_1', '2_0', '2_1']);
    });

    it('rejects a non-positive tile size', () => {
        expect(() => planTileGrid({ width: 10, height: 10, tileSize: 0 })).toThrow(RangeError);
    });

    it('rejects negative dimensions', () => {
        expect(() => planTileGrid({ width: -1, height: 10, tileSize: 10 })).toThrow(RangeError);
    });
});

describe('tile URLs', () => {
    it('addresses tiles by zoom level, row and column', () => {
        const tileUrl = createTileUrlTemplate('http://test.com/', 'ms1', 'f001r', 13);

        expect(tileUrl(2, 5)).toBe('http://test.com/ms1_f001r_files/13/2_5.jpg');
    });

    it('pairs each coordinate with its URL', () => {
        const grid = planTileGrid({ width: 15, height: 5, tileSize: 10 });
        const tasks = planTileTasks(grid, createTileUrlTemplate('http://test.com/', 'ms1', 'f002v', 13));

        expect(tasks).toEqual([
            { key: { row: 0, col: 0 }, url: 'http://test.com/ms1_f002v_files/13/0_0.jpg' },
            { key: { row: 1, col: 0 }, url: 'http://test.com/ms1_f002v_files/13/1_0.jpg' },
        ]);
    });
});
