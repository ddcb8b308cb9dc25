import fs from 'fs-extra';
import { ManifestInvalidError, ManifestNotFoundError } from './errors';
import { writeJsonAtomic } from './io';
import { debug, info, warn } from './log';
import { ManifestSchema, type ManifestEntry } from './types';

export const BACKUP_SUFFIX = '.bak';

export function backupPathFor(manifestPath: string): string {
    return manifestPath + BACKUP_SUFFIX;
}

export function parseManifest(manifestPath: string, raw: string): ManifestEntry[] {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (e) {
        throw new ManifestInvalidError(manifestPath, e instanceof Error ? e.message : String(e));
    }
    const parsed = ManifestSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length ? issue.path.join('.') : '(root)';
        throw new ManifestInvalidError(manifestPath, `${where}: ${issue.message}`);
    }
    return parsed.data;
}

/**
 * Owns the in-memory titles manifest and its file. Loading always leaves a
 * `.bak` snapshot of the on-disk bytes; every successful removal rewrites the
 * file atomically.
 */
export class ManifestStore {
    private items: ManifestEntry[];

    private constructor(
        readonly manifestPath: string,
        readonly backupPath: string,
        items: ManifestEntry[]
    ) {
        this.items = items;
    }

    static async load(manifestPath: string): Promise<ManifestStore> {
        if (!(await fs.pathExists(manifestPath))) {
            throw new ManifestNotFoundError(manifestPath);
        }
        const raw = await fs.readFile(manifestPath);
        const items = parseManifest(manifestPath, raw.toString('utf8'));

        const backupPath = backupPathFor(manifestPath);
        await fs.writeFile(backupPath, raw);
        info('manifest.load', { manifestPath, entries: items.length, backup: backupPath });

        const seen = new Set<string>();
        for (const item of items) {
            if (seen.has(item.filename)) {
                warn('manifest.duplicate', { manifestPath, filename: item.filename });
            }
            seen.add(item.filename);
        }
        return new ManifestStore(manifestPath, backupPath, items);
    }

    entries(): readonly ManifestEntry[] {
        return this.items;
    }

    get size(): number {
        return this.items.length;
    }

    /** Drops every entry for `filename`; persists only when something was removed. */
    async remove(filename: string): Promise<boolean> {
        const remaining = this.items.filter((e) => e.filename !== filename);
        const removed = this.items.length - remaining.length;
        if (removed === 0) {
            debug('manifest.remove.miss', { filename });
            return false;
        }
        await writeJsonAtomic(this.manifestPath, remaining);
        this.items = remaining;
        info('manifest.remove', { filename, removed, remaining: remaining.length });
        return true;
    }
}
