import { execa, ExecaError } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { debug, info, warn } from './log';
import type { SegmentOutcome, SegmentRequest, Segmenter } from './types';

export interface SegmentOptions {
    ffmpegBin?: string;
    // 0 disables
    timeoutSec?: number;
}

/** Whole minutes to an ffmpeg HH:MM:SS duration. */
export function formatTime(minutes: number): string {
    if (!Number.isInteger(minutes) || minutes < 0) {
        throw new RangeError(`Segment length must be a non-negative whole number of minutes, got ${minutes}`);
    }
    const hours = Math.floor(minutes / 60);
    const mins = minutes % 60;
    return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}:00`;
}

export function outputPattern(outputDir: string, baseName: string): string {
    // Always .mp4 regardless of source container
    return path.join(outputDir, `${baseName}_%03d.mp4`);
}

export function buildSegmentArgs(req: SegmentRequest): string[] {
    return [
        '-hide_banner',
        '-nostdin',
        '-loglevel',
        'error',
        '-i',
        req.sourcePath,
        '-c',
        'copy',
        '-map',
        '0',
        '-segment_time',
        formatTime(req.segmentMinutes),
        '-f',
        'segment',
        '-reset_timestamps',
        '1',
        outputPattern(req.outputDir, req.baseName),
    ];
}

function diagnosticOf(e: unknown): string {
    if (e instanceof ExecaError) {
        if (e.timedOut) return `ffmpeg timed out: ${e.shortMessage}`;
        const stderr = String(e.stderr ?? '').trim();
        return stderr || e.shortMessage;
    }
    return e instanceof Error ? e.message : String(e);
}

export async function segmentVideo(
    req: SegmentRequest,
    opts: SegmentOptions = {}
): Promise<SegmentOutcome> {
    const bin = opts.ffmpegBin ?? ENV.ffmpegBin;
    const timeoutSec = opts.timeoutSec ?? ENV.ffmpegTimeoutSec;
    const args = buildSegmentArgs(req);

    info('segment.start', {
        source: req.sourcePath,
        outputDir: req.outputDir,
        segmentMinutes: req.segmentMinutes,
    });
    debug('segment.exec', { bin, args });

    try {
        // A clash with an existing file fails this video only
        await fs.ensureDir(req.outputDir);
        await execa(bin, args, {
            stdin: 'ignore',
            timeout: timeoutSec > 0 ? timeoutSec * 1000 : undefined,
        });
    } catch (e) {
        const diagnostic = diagnosticOf(e);
        warn('segment.fail', { source: req.sourcePath, error: diagnostic });
        return { status: 'failure', diagnostic };
    }
    info('segment.complete', { source: req.sourcePath, outputDir: req.outputDir });
    return { status: 'success' };
}

export function createSegmenter(opts: SegmentOptions = {}): Segmenter {
    return (req) => segmentVideo(req, opts);
}

/** True when `<bin> -version` runs and exits 0. */
export async function checkTool(bin: string = ENV.ffmpegBin): Promise<boolean> {
    try {
        await execa(bin, ['-version'], { stdin: 'ignore' });
        return true;
    } catch (e) {
        debug('segment.preflight.fail', { bin, error: diagnosticOf(e) });
        return false;
    }
}
