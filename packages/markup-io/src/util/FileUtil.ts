import * as fsp from 'fs/promises';

export async function readTextFile(filePath: string): Promise<string> {
    try {
        return await fsp.readFile(filePath, { encoding: 'utf8' });
    } catch (error) {
        throw new Error(`Error reading file '${filePath}': ${error}`);
    }
}

/**
 * Write a whole file, reporting rather than throwing on failure.
 * Resolves to whether the write went through.
 */
export async function writeFileReported(filePath: string, content: string | Uint8Array): Promise<boolean> {
    let fh: fsp.FileHandle | undefined;
    try {
        fh = await fsp.open(filePath, 'w');
        await fh.writeFile(content);
        return true;
    } catch (error) {
        console.error(`Could not write to '${filePath}'`, error);
        return false;
    } finally {
        await fh?.close().catch((error: unknown) => {
            console.error(`Could not close '${filePath}'`, error);
        });
    }
}
