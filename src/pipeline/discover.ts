import fs from 'fs-extra';
import path from 'path';
import { writeJsonAtomic } from './io';
import { info, warn } from './log';
import type { ManifestEntry } from './types';

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
    '.mp4',
    '.avi',
    '.mkv',
    '.mov',
    '.wmv',
    '.flv',
    '.webm',
    '.m4v',
    '.mpg',
    '.mpeg',
]);

export function isVideoFile(name: string): boolean {
    return VIDEO_EXTENSIONS.has(path.extname(name).toLowerCase());
}

/** Video files directly inside `directory`, sorted by name. */
export async function scanVideos(directory: string): Promise<string[]> {
    const names = await fs.readdir(directory);
    const videos: string[] = [];
    for (const name of names) {
        if (!isVideoFile(name)) continue;
        try {
            const st = await fs.stat(path.join(directory, name));
            if (st.isFile()) videos.push(name);
        } catch (e) {
            // Dangling symlink or raced deletion
            warn('discover.stat.fail', { name, error: e instanceof Error ? e.message : String(e) });
        }
    }
    return videos.sort();
}

export function buildManifest(files: readonly string[]): ManifestEntry[] {
    return files.map((filename) => ({ filename, base_name: '', directory_name: '' }));
}

export interface GenerateResult {
    manifestPath: string;
    count: number;
}

/**
 * Writes a fresh titles manifest for every video in `inputDir`.
 * Returns null (and writes nothing) when there are no videos.
 */
export async function generateManifest(
    inputDir: string,
    manifestPath: string
): Promise<GenerateResult | null> {
    const files = await scanVideos(inputDir);
    if (!files.length) {
        info('discover.empty', { inputDir });
        return null;
    }
    if (await fs.pathExists(manifestPath)) {
        warn('discover.overwrite', { manifestPath });
    }
    await writeJsonAtomic(manifestPath, buildManifest(files));
    info('discover.manifest', { inputDir, manifestPath, count: files.length });
    return { manifestPath, count: files.length };
}
