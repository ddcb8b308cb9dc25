/* eslint-disable no-console */
import path from 'path';
import { runBatch, type BatchDeps } from '../pipeline/batch';
import { generateManifest } from '../pipeline/discover';
import type { BatchSummary, SegmenterConfig } from '../pipeline/types';

export async function generateAction(config: SegmenterConfig): Promise<void> {
    const res = await generateManifest(config.inputDir, config.manifestPath);
    if (!res) {
        console.log(`No video files found in ${config.inputDir}`);
        return;
    }
    const name = path.basename(res.manifestPath);
    console.log(`\n✓ Generated titles file: ${res.manifestPath}`);
    console.log(`  Found ${res.count} video file(s)`);
    console.log(`\nPlease edit ${name} to fill in 'base_name' and 'directory_name' fields.`);
}

export function printSummary(summary: BatchSummary) {
    for (const item of summary.items) {
        if (item.status === 'failed' && item.error) {
            console.log(`✗ ${item.filename}: ${item.error.message}`);
        } else if (item.status === 'processed') {
            console.log(`✓ ${item.filename} → ${item.outputDir}`);
            if (item.warning) console.log(`  Warning: ${item.warning.message}`);
        } else if (item.status === 'planned') {
            console.log(`· ${item.filename} → ${item.outputDir} (dry run)`);
        }
    }
    console.log(`\n${'='.repeat(60)}`);
    console.log('Processing complete!');
    console.log(`  Successfully processed: ${summary.processed}`);
    console.log(`  Failed: ${summary.failed}`);
    if (summary.planned) console.log(`  Planned (dry run): ${summary.planned}`);
    console.log('='.repeat(60));
}

export async function splitAction(config: SegmenterConfig, deps: BatchDeps = {}): Promise<BatchSummary> {
    console.log(
        `Mode: ${config.dryRun ? 'DRY-RUN (nothing is split, moved or removed)' : 'REAL RUN'}`
    );
    const summary = await runBatch(config, deps);
    if (!summary.items.length) {
        console.log('No videos found in titles file.');
        return summary;
    }
    printSummary(summary);
    return summary;
}
