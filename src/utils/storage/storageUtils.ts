// src/utils/storage/storageUtils.ts

import * as fs from 'node:fs';
import { config } from '../../config/index.ts';

/**
 * Ensures that the specified output directory exists. If the directory
 * does not exist, it creates the directory and any necessary subdirectories.
 *
 * @param outputFolder - The path of the output directory to ensure.
 */
export function ensureOutputDirectory(outputFolder: string): void {
    fs.mkdirSync(outputFolder, { recursive: true });
}

/**
 * Checks if a file or directory exists at the given file path.
 *
 * @param filePath - The path to the file or directory.
 * @return Returns true if the file or directory exists, otherwise false.
 */
export function filePathExists(filePath: string): boolean {
    try {
        fs.statSync(filePath);
        return true;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return false;
        }
        throw error; // Re-throw if it's a different error
    }
}

/**
 * Writes a buffer next to `filePath` under a temporary name and renames it into place,
 * so an interrupted run never leaves a truncated file at the final path.
 *
 * @param filePath - Final location of the file.
 * @param data - The bytes to persist.
 */
export function writeBufferToFile(filePath: string, data: Uint8Array): void {
    const partialPath = `${filePath}${config.output.partialSuffix}`;
    fs.writeFileSync(partialPath, data);
    fs.renameSync(partialPath, filePath);
}

