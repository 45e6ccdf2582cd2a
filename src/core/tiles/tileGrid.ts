// src/core/tiles/tileGrid.ts

import type { IFetchTask, IPageMetadata, ITileCoordinate, ITileGrid, TileUrlTemplate } from '../../@types/index.ts';

/**
 * Computes the tile grid of a deep-zoom page.
 *
 * The width determines the number of rows and the height the number of columns: a row index
 * addresses the x axis and a column index the y axis, matching the tile server's `{row}_{col}`
 * naming. Both counts are `floor(dimension / tileSize) + 1`.
 *
 * @throws {RangeError} When the tile size is not a positive integer.
 */
export function planTileGrid({ width, height, tileSize }: IPageMetadata): ITileGrid {
    if (!Number.isInteger(tileSize) || tileSize <= 0) {
        throw new RangeError(`Tile size must be a positive integer, got ${tileSize}`);
    }
    if (width < 0 || height < 0) {
        throw new RangeError(`Page dimensions must not be negative, got ${width}x${height}`);
    }
    const rows = Math.floor(width / tileSize) + 1;
    const cols = Math.floor(height / tileSize) + 1;

    const coordinates: ITileCoordinate[] = [];
    for (let row = 0; row < rows; row++) {
        for (let col = 0; col < cols; col++) {
            coordinates.push({ row, col });
        }
    }
    return { rows, cols, tileSize, coordinates };
}

/**
 * Tile URLs of one page: `{baseUrl}{manuscriptId}_{pageStem}_files/{zoomLevel}/{row}_{col}.jpg`.
 */
export function createTileUrlTemplate(
    baseUrl: string,
    manuscriptId: string,
    pageStem: string,
    zoomLevel: number,
): TileUrlTemplate {
    const prefix = `${baseUrl}${manuscriptId}_${pageStem}_files/${zoomLevel}/`;
    return (row, col) => `${prefix}${row}_${col}.jpg`;
}

export function planTileTasks(grid: ITileGrid, tileUrl: TileUrlTemplate): IFetchTask<ITileCoordinate>[] {
    return grid.coordinates.map((coordinate) => ({
        key: coordinate,
        url: tileUrl(coordinate.row, coordinate.col),
    }));
}
