import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import { readTextFile, writeFileReported } from './FileUtil';

describe('FileUtil', () => {
    let dir: string;
    beforeEach(async () => {
        dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'mrkjson-files-'));
    });
    afterEach(async () => {
        vi.restoreAllMocks();
        await fsp.rm(dir, { recursive: true, force: true });
    });

    it('writes text and bytes', async () => {
        const text = path.join(dir, 'a.txt');
        const bytes = path.join(dir, 'b.bin');
        expect(await writeFileReported(text, 'hello\n')).toBe(true);
        expect(await writeFileReported(bytes, new Uint8Array([1, 2, 3]))).toBe(true);
        expect(await readTextFile(text)).toBe('hello\n');
        expect([...(await fsp.readFile(bytes))]).toEqual([1, 2, 3]);
    });

    it('replaces an existing file', async () => {
        const file = path.join(dir, 'a.txt');
        await writeFileReported(file, 'a much longer first version');
        await writeFileReported(file, 'short');
        expect(await readTextFile(file)).toBe('short');
    });

    it('reports a write it could not make', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const file = path.join(dir, 'nope', 'a.txt');
        expect(await writeFileReported(file, 'x')).toBe(false);
        expect(error).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledWith(`Could not write to '${file}'`, expect.any(Error));
    });

    it('names the file it could not read', async () => {
        const file = path.join(dir, 'missing.json');
        await expect(readTextFile(file)).rejects.toThrow(`Error reading file '${file}'`);
    });
});
