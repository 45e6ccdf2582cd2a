import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { ensureOutputDirectory, filePathExists, writeBufferToFile } from '../src/utils/storage/storageUtils.ts';
import { makeTempDir, removeDir } from './helpers/fixtures.ts';

describe('storage utilities', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = makeTempDir();
    });

    afterEach(() => {
        removeDir(tempDir);
    });

    it('creates nested output folders and tolerates existing ones', () => {
        const nested = path.join(tempDir, 'a', 'b');

        ensureOutputDirectory(nested);
        ensureOutputDirectory(nested);

        expect(filePathExists(nested)).toBe(true);
    });

    it('reports a missing path as absent', () => {
        expect(filePathExists(path.join(tempDir, 'nothing.jpg'))).toBe(false);
    });

    it('writes the final file and leaves no partial file behind', () => {
        const target = path.join(tempDir, 'f001r.jpg');

        writeBufferToFile(target, Buffer.from('jpeg bytes'));

        expect(fs.readFileSync(target, 'utf-8')).toBe('jpeg bytes');
        expect(fs.readdirSync(tempDir)).toEqual(['f001r.jpg']);
    });

    it('replaces a stale partial file from an interrupted run', () => {
        const target = path.join(tempDir, 'f001r.jpg');
        fs.writeFileSync(`${target}.part`, 'truncated');

        writeBufferToFile(target, Buffer.from('complete'));

        expect(fs.readFileSync(target, 'utf-8')).toBe('complete');
        expect(filePathExists(`${target}.part`)).toBe(false);
    });
});
