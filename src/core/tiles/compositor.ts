// src/core/tiles/compositor.ts

import type { ILogger, ITileCoordinate, ITileImage } from '../../@types/index.ts';
import sharp from 'sharp';
import { config } from '../../config/index.ts';
import { TileDecodeError, toError } from '../../utils/errors/errors.ts';

const CANVAS_CHANNELS = 3;

export interface IRawCanvas {
    data: Buffer;
    width: number;
    height: number;
    channels: typeof CANVAS_CHANNELS;
}

export interface IDecodedTile extends ITileCoordinate {
    data: Buffer;
    width: number;
    height: number;
    channels: number;
}

export interface ICompositeOptions {
    width: number;
    height: number;
    tileSize: number;
    tiles: ITileImage[];
    logger: ILogger;
}

export interface ICompositeResult {
    canvas: IRawCanvas;
    placed: ITileCoordinate[];
    decodeFailures: ITileCoordinate[];
}

/**
 * Allocates a black RGB canvas. Regions no tile is pasted onto stay black.
 */
export function createBlankCanvas(width: number, height: number): IRawCanvas {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
        throw new RangeError(`Canvas dimensions must be positive integers, got ${width}x${height}`);
    }
    return { data: Buffer.alloc(width * height * CANVAS_CHANNELS), width, height, channels: CANVAS_CHANNELS };
}

/**
 * Decodes a tile payload to raw sRGB pixels.
 *
 * @throws {TileDecodeError} When the payload is not a readable image.
 */
export async function decodeTile(tile: ITileImage): Promise<IDecodedTile> {
    try {
        const { data, info } = await sharp(tile.data)
            .removeAlpha()
            .toColourspace('srgb')
            .raw()
            .toBuffer({ resolveWithObject: true });
        return { row: tile.row, col: tile.col, data, width: info.width, height: info.height, channels: info.channels };
    } catch (error) {
        throw new TileDecodeError(`Tile ${tile.row}_${tile.col} could not be decoded: ${toError(error).message}`, {
            cause: error,
        });
    }
}

/**
 * Copies a decoded tile onto the canvas with its top-left corner at (x, y), clipping whatever
 * falls outside the canvas. Synchronous; grey tiles are expanded to RGB.
 *
 * @return Number of pixels written.
 */
export function pasteTile(canvas: IRawCanvas, tile: IDecodedTile, x: number, y: number): number {
    const copyWidth = Math.min(tile.width, canvas.width - x);
    const copyHeight = Math.min(tile.height, canvas.height - y);
    if (copyWidth <= 0 || copyHeight <= 0) {
        return 0;
    }

    for (let ty = 0; ty < copyHeight; ty++) {
        const targetStart = ((y + ty) * canvas.width + x) * CANVAS_CHANNELS;
        const sourceStart = ty * tile.width * tile.channels;
        if (tile.channels === CANVAS_CHANNELS) {
            tile.data.copy(canvas.data, targetStart, sourceStart, sourceStart + copyWidth * CANVAS_CHANNELS);
            continue;
        }
        for (let tx = 0; tx < copyWidth; tx++) {
            const source = sourceStart + tx * tile.channels;
            const target = targetStart + tx * CANVAS_CHANNELS;
            const grey = tile.channels < CANVAS_CHANNELS;
            canvas.data[target] = tile.data[source];
            canvas.data[target + 1] = tile.data[grey ? source : source + 1];
            canvas.data[target + 2] = tile.data[grey ? source : source + 2];
        }
    }
    return copyWidth * copyHeight;
}

/**
 * Assembles a page from its tiles. Tile (row, col) lands at pixel offset
 * (row * tileSize, col * tileSize). Tiles that fail to decode are counted and their region is
 * left blank. Placement is keyed by coordinate, so the input order does not affect the result.
 */
export async function compositeTiles(options: ICompositeOptions): Promise<ICompositeResult> {
    const { width, height, tileSize, tiles, logger } = options;
    const canvas = createBlankCanvas(width, height);

    const decoded = await Promise.all(
        tiles.map(async (tile) => {
            try {
                return await decodeTile(tile);
            } catch (error) {
                logger.warn(toError(error).message);
                return { row: tile.row, col: tile.col, failed: true as const };
            }
        }),
    );

    const placed: ITileCoordinate[] = [];
    const decodeFailures: ITileCoordinate[] = [];
    const ordered = [...decoded].sort((a, b) => a.row - b.row || a.col - b.col);
    for (const tile of ordered) {
        if ('failed' in tile) {
            decodeFailures.push({ row: tile.row, col: tile.col });
            continue;
        }
        pasteTile(canvas, tile, tile.row * tileSize, tile.col * tileSize);
        placed.push({ row: tile.row, col: tile.col });
    }

    logger.debug(`Composited ${placed.length} tile(s) onto a ${width}x${height} canvas.`);
    return { canvas, placed, decodeFailures };
}

/**
 * Encodes a raw canvas as JPEG.
 */
export async function encodeCanvas(canvas: IRawCanvas, quality: number = config.output.jpegQuality): Promise<Buffer> {
    return sharp(canvas.data, {
        raw: {
            width: canvas.width,
            height: canvas.height,
            channels: canvas.channels,
        },
    })
        .jpeg({ quality })
        .toBuffer();
}
