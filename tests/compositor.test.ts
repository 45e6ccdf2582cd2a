import type { ITileImage } from '../src/@types/index.ts';
import { describe, expect, it } from 'vitest';
import sharp from 'sharp';
import {
    compositeTiles,
    createBlankCanvas,
    encodeCanvas,
    type IDecodedTile,
    type IRawCanvas,
    pasteTile,
} from '../src/core/tiles/compositor.ts';
import { planTileGrid } from '../src/core/tiles/tileGrid.ts';
import { type IColour, solidTile } from './helpers/fixtures.ts';
import { MockLogger } from './helpers/mockLogger.ts';

const TILE_SIZE = 10;

function colourOf(row: number, col: number): IColour {
    return { r: 40 + row * 60, g: 30 + col * 70, b: 200 };
}

function pixelAt(canvas: IRawCanvas, x: number, y: number): number[] {
    const offset = (y * canvas.width + x) * canvas.channels;
    return [...canvas.data.subarray(offset, offset + canvas.channels)];
}

async function gridTiles(width: number, height: number): Promise<ITileImage[]> {
    const grid = planTileGrid({ width, height, tileSize: TILE_SIZE });
    return Promise.all(
        grid.coordinates.map(async ({ row, col }) => ({
            row,
            col,
            data: await solidTile(TILE_SIZE, TILE_SIZE, colourOf(row, col)),
        })),
    );
}

function solidDecodedTile(width: number, height: number, channels: number, value: number): IDecodedTile {
    return { row: 0, col: 0, width, height, channels, data: Buffer.alloc(width * height * channels, value) };
}

describe('createBlankCanvas', () => {
    it('starts black', () => {
        const canvas = createBlankCanvas(2, 3);

        expect(canvas.data).toHaveLength(18);
        expect(canvas.data.every((value) => value === 0)).toBe(true);
    });

    it('rejects an empty canvas', () => {
        expect(() => createBlankCanvas(0, 5)).toThrow(RangeError);
    });
});

describe('pasteTile', () => {
    it('clips a tile that overhangs the canvas', () => {
        const canvas = createBlankCanvas(5, 5);

        const written = pasteTile(canvas, solidDecodedTile(4, 4, 3, 255), 3, 3);

        expect(written).toBe(4);
        expect(pixelAt(canvas, 4, 4)).toEqual([255, 255, 255]);
        expect(pixelAt(canvas, 2, 4)).toEqual([0, 0, 0]);
        expect(pixelAt(canvas, 4, 2)).toEqual([0, 0, 0]);
    });

    it('writes nothing for a tile placed past the edge', () => {
        const canvas = createBlankCanvas(5, 5);

        expect(pasteTile(canvas, solidDecodedTile(4, 4, 3, 255), 5, 0)).toBe(0);
    });

    it('expands grey tiles to RGB', () => {
        const canvas = createBlankCanvas(2, 2);

        pasteTile(canvas, solidDecodedTile(2, 2, 1, 200), 0, 0);

        expect(pixelAt(canvas, 1, 1)).toEqual([200, 200, 200]);
    });
});

describe('compositeTiles', () => {
    it('places tile (row, col) at x = row * tileSize and y = col * tileSize', async () => {
        const tiles = await gridTiles(19, 9);

        const { canvas, placed } = await compositeTiles({
            width: 19,
            height: 9,
            tileSize: TILE_SIZE,
            tiles,
            logger: new MockLogger(),
        });

        expect(placed).toEqual([
            { row: 0, col: 0 },
            { row: 1, col: 0 },
        ]);
        expect(pixelAt(canvas, 5, 5)).toEqual([40, 30, 200]);
        expect(pixelAt(canvas, 15, 5)).toEqual([100, 30, 200]);
    });

    it('produces the same page whatever order the tiles arrive in', async () => {
        const tiles = await gridTiles(29, 29);
        const compose = (ordered: ITileImage[]) =>
            compositeTiles({ width: 29, height: 29, tileSize: TILE_SIZE, tiles: ordered, logger: new MockLogger() });

        const inOrder = await compose(tiles);
        const reversed = await compose([...tiles].reverse());
        const interleaved = await compose([...tiles.filter((_, i) => i % 2 === 1), ...tiles.filter((_, i) => i % 2 === 0)]);

        expect(reversed.canvas.data.equals(inOrder.canvas.data)).toBe(true);
        expect(interleaved.canvas.data.equals(inOrder.canvas.data)).toBe(true);
        expect((await encodeCanvas(reversed.canvas)).equals(await encodeCanvas(inOrder.canvas))).toBe(true);
    });

    it('leaves a black region for every missing tile', async () => {
        const missing = new Set(['0_1', '2_2']);
        const tiles = (await gridTiles(29, 29)).filter(({ row, col }) => !missing.has(`${row}_${col}`));

        const { canvas, placed } = await compositeTiles({
            width: 29,
            height: 29,
            tileSize: TILE_SIZE,
            tiles,
            logger: new MockLogger(),
        });

        expect(placed).toHaveLength(7);
        for (let row = 0; row < 3; row++) {
            for (let col = 0; col < 3; col++) {
                const centre = pixelAt(canvas, row * TILE_SIZE + 5, col * TILE_SIZE + 5);
                const { r, g, b } = colourOf(row, col);
                expect(centre).toEqual(missing.has(`${row}_${col}`) ? [0, 0, 0] : [r, g, b]);
            }
        }
    });

    it('counts tiles that cannot be decoded and leaves their region black', async () => {
        const logger = new MockLogger();
        const tiles: ITileImage[] = [
            { row: 0, col: 0, data: await solidTile(TILE_SIZE, TILE_SIZE, { r: 255, g: 0, b: 0 }) },
            { row: 1, col: 0, data: Buffer.from('not an image') },
        ];

        const { canvas, placed, decodeFailures } = await compositeTiles({
            width: 19,
            height: 9,
            tileSize: TILE_SIZE,
            tiles,
            logger,
        });

        expect(placed).toEqual([{ row: 0, col: 0 }]);
        expect(decodeFailures).toEqual([{ row: 1, col: 0 }]);
        expect(logger.warnMessages).toHaveLength(1);
        expect(logger.warnMessages[0]).toMatch(/^Tile 1_0 could not be decoded: /);
        expect(pixelAt(canvas, 15, 5)).toEqual([0, 0, 0]);
    });
});

describe('encodeCanvas', () => {
    it('encodes the canvas as a JPEG of the same size', async () => {
        const canvas = createBlankCanvas(12, 7);

        const metadata = await sharp(await encodeCanvas(canvas)).metadata();

        expect(metadata.format).toBe('jpeg');
        expect(metadata.width).toBe(12);
        expect(metadata.height).toBe(7);
    });
});
