import type { IProgressReporter, IRetryPolicy, ISettings } from '../../src/@types/index.ts';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { vi } from 'vitest';

export interface IColour {
    r: number;
    g: number;
    b: number;
}

/** Retries without waiting between attempts. */
export const instantRetry: IRetryPolicy = { attempts: 5, baseDelayMs: 0, minDelayMs: 0, maxDelayMs: 0 };

export function solidTile(width: number, height: number, colour: IColour, format: 'png' | 'jpeg' = 'png'): Promise<Buffer> {
    const image = sharp({ create: { width, height, channels: 3, background: colour } });
    return (format === 'png' ? image.png() : image.jpeg()).toBuffer();
}

export function deepZoomDescriptor(width: number, height: number, tileSize: number): string {
    return [
        '<?xml version="1.0" encoding="UTF-8"?>',
        `<Image TileSize="${tileSize}" Overlap="0" Format="jpg" xmlns="http://schemas.microsoft.com/deepzoom/2008">`,
        `    <Size Width="${width}" Height="${height}"/>`,
        '</Image>',
    ].join('\n');
}

export function createRecordingProgress() {
    return {
        start: vi.fn(),
        pageSkipped: vi.fn(),
        pageSaved: vi.fn(),
        pageDegraded: vi.fn(),
        pageFailed: vi.fn(),
        stop: vi.fn(),
    } satisfies IProgressReporter;
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'folio-harvest-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function testSettings(basedir: string, overrides: Partial<ISettings> = {}): ISettings {
    return {
        basedir,
        baseurl: 'http://test.com/',
        rangebegin: 1,
        rangeend: 1,
        sleeptime: 0,
        ...overrides,
    };
}
