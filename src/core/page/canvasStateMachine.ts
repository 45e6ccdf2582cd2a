// src/core/page/canvasStateMachine.ts

import type { ICanvasPage } from '../../@types/index.ts';
import { PageStates } from '../../stateMachine/definedStates.ts';
import { AbstractPageStateMachine, type IPageMachineOptions } from './AbstractPageStateMachine.ts';
import { writeBufferToFile } from '../../utils/storage/storageUtils.ts';

/**
 * Downloads the ready-made image of one manifest canvas and stores it unchanged.
 */
export class CanvasStateMachine extends AbstractPageStateMachine<ICanvasPage> {
    constructor(options: IPageMachineOptions<ICanvasPage>) {
        super(options);
        this.stateTransitions = [
            { state: PageStates.PENDING, handler: this.checkCanvas },
            { state: PageStates.FETCHING, handler: this.downloadImage },
        ];
    }

    private checkCanvas(): void {
        const { page, logger } = this.options;
        this.checkExisting();
        if (!this.halted && !page.imageUrl) {
            const reason = page.unavailableReason ?? 'no-image-url';
            logger.error(`No image URL found for ${page.fileName} (${reason})`);
            this.skip('no-image', reason);
        }
    }

    private async downloadImage(): Promise<void> {
        const { page, executor } = this.options;
        const result = await executor.fetchOne({ key: page.index, url: page.imageUrl });
        if (!result.ok) {
            throw new Error(`Error downloading ${page.fileName}: ${result.failure.message}`, {
                cause: result.failure.error,
            });
        }
        writeBufferToFile(page.targetPath, result.data);
        this.saved();
    }
}
