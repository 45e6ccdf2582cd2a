// src/core/page/legacyPageStateMachine.ts

import type { ILegacyPage, IPageMetadata, ITileGrid, ITileImage } from '../../@types/index.ts';
import { PageStates } from '../../stateMachine/definedStates.ts';
import { AbstractPageStateMachine, type IPageMachineOptions } from './AbstractPageStateMachine.ts';
import { buildMetadataUrl, parsePageMetadata } from '../tiles/pageMetadata.ts';
import { createTileUrlTemplate, planTileGrid, planTileTasks } from '../tiles/tileGrid.ts';
import { compositeTiles, encodeCanvas } from '../tiles/compositor.ts';
import { writeBufferToFile } from '../../utils/storage/storageUtils.ts';

export interface ILegacyPageOptions extends IPageMachineOptions<ILegacyPage> {
    baseUrl: string;
    manuscriptId: string;
    zoomLevel: number;
    jpegQuality: number;
}

/**
 * Downloads one deep-zoom page tile by tile and stitches it into a single JPEG.
 *
 * Tiles that cannot be fetched or decoded leave a black gap; the page is still written and
 * reported as degraded.
 */
export class LegacyPageStateMachine extends AbstractPageStateMachine<ILegacyPage, ILegacyPageOptions> {
    private metadata: IPageMetadata | null = null;
    private grid: ITileGrid | null = null;
    private tiles: ITileImage[] = [];
    private failedFetches = 0;

    constructor(options: ILegacyPageOptions) {
        super(options);
        this.stateTransitions = [
            { state: PageStates.PENDING, handler: this.checkExisting },
            { state: PageStates.FETCHING, handler: this.fetchTiles },
            { state: PageStates.COMPOSING, handler: this.composePage },
        ];
    }

    /**
     * Reads the page descriptor, plans the tile grid and downloads every tile.
     */
    private async fetchTiles(): Promise<void> {
        const { page, executor, logger, baseUrl, manuscriptId, zoomLevel } = this.options;

        const metadataUrl = buildMetadataUrl(baseUrl, manuscriptId, page.stem);
        logger.debug(`Fetching metadata for ${page.fileName} from ${metadataUrl}`);
        const descriptor = await executor.fetchOne({ key: page.stem, url: metadataUrl });
        if (!descriptor.ok) {
            throw new Error(`Error fetching info for ${page.fileName}: ${descriptor.failure.message}`, {
                cause: descriptor.failure.error,
            });
        }
        const metadata = parsePageMetadata(descriptor.data.toString('utf-8'), page.stem);
        this.metadata = metadata;

        const grid = planTileGrid(metadata);
        this.grid = grid;
        logger.debug(
            `${page.fileName}: ${metadata.width}x${metadata.height}, tile size ${metadata.tileSize}, ` +
                `${grid.rows}x${grid.cols} tiles`,
        );

        const tileUrl = createTileUrlTemplate(baseUrl, manuscriptId, page.stem, zoomLevel);
        const results = await executor.fetchAll(planTileTasks(grid, tileUrl));
        for (const result of results) {
            if (result.ok) {
                this.tiles.push({ ...result.key, data: result.data });
            } else {
                this.failedFetches += 1;
                logger.warn(`Tile ${result.key.row}_${result.key.col} of ${page.fileName} failed: ${result.failure.message}`);
            }
        }
    }

    /**
     * Pastes the fetched tiles onto the page canvas and writes the JPEG.
     */
    private async composePage(): Promise<void> {
        const { page, logger, jpegQuality } = this.options;
        if (!this.metadata || !this.grid) {
            throw new Error(`No tile plan for ${page.fileName}`);
        }

        const { canvas, decodeFailures } = await compositeTiles({
            width: this.metadata.width,
            height: this.metadata.height,
            tileSize: this.metadata.tileSize,
            tiles: this.tiles,
            logger,
        });
        this.tiles = [];
        writeBufferToFile(page.targetPath, await encodeCanvas(canvas, jpegQuality));

        this.saved(this.failedFetches + decodeFailures.length, this.grid.coordinates.length);
    }
}
