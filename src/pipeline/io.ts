import fs from 'fs-extra';
import path from 'path';
import { tmpName } from 'tmp-promise';

/** Write via a temp file in the same directory, then rename over the target. */
export async function atomicWrite(filePath: string, content: string | Buffer): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.ensureDir(dir);
    const tempPath = await tmpName({ dir, prefix: `.${path.basename(filePath)}-` });
    try {
        await fs.writeFile(tempPath, content);
        await fs.rename(tempPath, filePath);
    } catch (e) {
        await fs.remove(tempPath);
        throw e;
    }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
    await atomicWrite(filePath, JSON.stringify(data, null, 2) + '\n');
}
