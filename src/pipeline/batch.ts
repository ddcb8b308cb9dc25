import fs from 'fs-extra';
import path from 'path';
import {
    ConfigurationIncompleteError,
    RelocationError,
    SourceMissingError,
    ToolFailureError,
    errorMessage,
} from './errors';
import { debug, error, info, startStep, warn } from './log';
import { ManifestStore } from './manifest';
import { buildSegmentArgs, createSegmenter } from './segment';
import type {
    BatchSummary,
    ItemResult,
    ItemState,
    ManifestEntry,
    SegmenterConfig,
    Segmenter,
} from './types';

export interface BatchDeps {
    segment?: Segmenter;
}

export function resolveOutputDir(
    entry: Pick<ManifestEntry, 'base_name' | 'directory_name'>,
    splitDir: string,
    folderPerSplit: boolean
): string {
    if (!folderPerSplit) return splitDir;
    return path.join(splitDir, entry.directory_name || entry.base_name);
}

function transition(filename: string, state: ItemState, meta?: Record<string, unknown>) {
    debug('batch.item.state', { filename, state, ...meta });
}

async function relocate(from: string, to: string): Promise<RelocationError | undefined> {
    try {
        await fs.move(from, to, { overwrite: true });
        info('batch.item.moved', { from, to });
        return undefined;
    } catch (e) {
        const err = new RelocationError(from, to, errorMessage(e));
        warn('batch.item.move.fail', { from, to, error: errorMessage(e) });
        return err;
    }
}

/**
 * Splits every video listed in the titles manifest, one at a time, in
 * manifest order. A missing source or an ffmpeg failure only fails that
 * entry; an entry without a base_name aborts the batch with
 * ConfigurationIncompleteError.
 */
export async function runBatch(config: SegmenterConfig, deps: BatchDeps = {}): Promise<BatchSummary> {
    const segment = deps.segment ?? createSegmenter();
    const store = await ManifestStore.load(config.manifestPath);
    const summary: BatchSummary = { processed: 0, failed: 0, planned: 0, items: [] };

    // Snapshot: entries are removed from the store while we iterate
    const entries = [...store.entries()];
    if (!entries.length) {
        info('batch.empty', { manifestPath: config.manifestPath });
        return summary;
    }

    if (!config.dryRun) {
        await fs.ensureDir(config.splitDir);
        await fs.ensureDir(config.completedDir);
    }

    const timer = startStep('batch', {
        entries: entries.length,
        segmentMinutes: config.segmentMinutes,
        dryRun: Boolean(config.dryRun),
    });

    for (const [index, entry] of entries.entries()) {
        const { filename } = entry;
        const sourcePath = path.join(config.inputDir, filename);
        transition(filename, 'pending');

        transition(filename, 'validating');
        if (!(await fs.pathExists(sourcePath))) {
            const err = new SourceMissingError(sourcePath);
            error('batch.item.missing', { filename, sourcePath });
            transition(filename, 'failed');
            summary.items.push({ filename, status: 'failed', error: err });
            summary.failed++;
            timer.eta(index + 1, entries.length);
            continue;
        }
        if (!entry.base_name) {
            error('batch.abort', { filename, reason: 'empty base_name', processed: summary.processed });
            throw new ConfigurationIncompleteError(filename);
        }

        const outputDir = resolveOutputDir(entry, config.splitDir, config.folderPerSplit);
        const request = {
            sourcePath,
            outputDir,
            baseName: entry.base_name,
            segmentMinutes: config.segmentMinutes,
        };

        if (config.dryRun) {
            info('batch.dryRun.plan', { filename, outputDir, args: buildSegmentArgs(request) });
            summary.items.push({ filename, status: 'planned', outputDir });
            summary.planned++;
            timer.eta(index + 1, entries.length);
            continue;
        }

        transition(filename, 'segmenting', { outputDir });
        const outcome = await segment(request);
        if (outcome.status === 'failure') {
            transition(filename, 'failed');
            summary.items.push({
                filename,
                status: 'failed',
                outputDir,
                error: new ToolFailureError(filename, outcome.diagnostic),
            });
            summary.failed++;
            timer.eta(index + 1, entries.length);
            continue;
        }

        transition(filename, 'relocating');
        const warning = await relocate(sourcePath, path.join(config.completedDir, filename));

        // The entry goes once segmentation succeeded, moved or not
        transition(filename, 'reconciling');
        await store.remove(filename);

        const result: ItemResult = { filename, status: 'processed', outputDir };
        if (warning) result.warning = warning;
        summary.items.push(result);
        summary.processed++;
        transition(filename, 'done');
        timer.eta(index + 1, entries.length);
    }

    timer.end();
    info('batch.complete', {
        processed: summary.processed,
        failed: summary.failed,
        planned: summary.planned,
    });
    return summary;
}
