import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildSegmentArgs,
  checkTool,
  createSegmenter,
  formatTime,
  outputPattern,
  segmentVideo,
} from '../src/pipeline/segment';
import { makeTempDir, writeFakeTool } from './helpers';

describe('formatTime', () => {
  it('formats whole minutes as HH:MM:00', () => {
    expect(formatTime(15)).toBe('00:15:00');
    expect(formatTime(90)).toBe('01:30:00');
    expect(formatTime(0)).toBe('00:00:00');
    expect(formatTime(59)).toBe('00:59:00');
    expect(formatTime(60)).toBe('01:00:00');
  });

  it('matches hours = m div 60, mins = m mod 60 across a range', () => {
    for (let m = 0; m <= 600; m += 7) {
      const hh = String(Math.floor(m / 60)).padStart(2, '0');
      const mm = String(m % 60).padStart(2, '0');
      expect(formatTime(m)).toBe(`${hh}:${mm}:00`);
    }
  });

  it('widens the hour field past 99 hours', () => {
    expect(formatTime(6000)).toBe('100:00:00');
  });

  it('rejects negative and fractional minutes', () => {
    expect(() => formatTime(-1)).toThrow(RangeError);
    expect(() => formatTime(1.5)).toThrow(RangeError);
  });
});

describe('buildSegmentArgs', () => {
  it('requests stream copy, all streams, segment muxer and per-segment timestamps', () => {
    const args = buildSegmentArgs({
      sourcePath: '/in/talk.mkv',
      outputDir: '/out/talk',
      baseName: 'talk',
      segmentMinutes: 15,
    });
    expect(args).toEqual([
      '-hide_banner',
      '-nostdin',
      '-loglevel',
      'error',
      '-i',
      '/in/talk.mkv',
      '-c',
      'copy',
      '-map',
      '0',
      '-segment_time',
      '00:15:00',
      '-f',
      'segment',
      '-reset_timestamps',
      '1',
      '/out/talk/talk_%03d.mp4',
    ]);
  });

  it('always names segments .mp4', () => {
    expect(outputPattern('/out', 'lecture')).toBe(path.join('/out', 'lecture_%03d.mp4'));
  });
});

describe('segmentVideo', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('creates the output directory and reports success on exit 0', async () => {
    const argsFile = path.join(dir, 'args.txt');
    const bin = await writeFakeTool(dir, 'ffmpeg-ok', `for a in "$@"; do printf '%s\\n' "$a"; done > "${argsFile}"`);
    const req = {
      sourcePath: path.join(dir, 'in.mp4'),
      outputDir: path.join(dir, 'split', 'nested', 'intro'),
      baseName: 'intro',
      segmentMinutes: 90,
    };

    const outcome = await segmentVideo(req, { ffmpegBin: bin, timeoutSec: 0 });

    expect(outcome).toEqual({ status: 'success' });
    expect(await fs.pathExists(req.outputDir)).toBe(true);
    const recorded = (await fs.readFile(argsFile, 'utf8')).trimEnd().split('\n');
    expect(recorded).toEqual(buildSegmentArgs(req));
  });

  it('classifies a non-zero exit as failure carrying stderr', async () => {
    const bin = await writeFakeTool(
      dir,
      'ffmpeg-bad',
      'echo "Invalid data found when processing input" >&2\nexit 1'
    );
    const outcome = await segmentVideo(
      { sourcePath: 'x.mp4', outputDir: path.join(dir, 'out'), baseName: 'x', segmentMinutes: 1 },
      { ffmpegBin: bin }
    );
    expect(outcome).toEqual({
      status: 'failure',
      diagnostic: 'Invalid data found when processing input',
    });
  });

  it('reports an output folder blocked by a file as failure', async () => {
    const bin = await writeFakeTool(dir, 'ffmpeg-ok', 'exit 0');
    const blocked = path.join(dir, 'out');
    await fs.writeFile(blocked, '');
    const outcome = await segmentVideo(
      { sourcePath: 'x.mp4', outputDir: blocked, baseName: 'x', segmentMinutes: 1 },
      { ffmpegBin: bin }
    );
    expect(outcome.status).toBe('failure');
    if (outcome.status === 'failure') {
      expect(outcome.diagnostic).toContain('EEXIST');
    }
  });

  it('classifies a launch error as failure', async () => {
    const outcome = await segmentVideo(
      { sourcePath: 'x.mp4', outputDir: path.join(dir, 'out'), baseName: 'x', segmentMinutes: 1 },
      { ffmpegBin: path.join(dir, 'no-such-ffmpeg') }
    );
    expect(outcome.status).toBe('failure');
    if (outcome.status === 'failure') {
      expect(outcome.diagnostic).toContain('ENOENT');
    }
  });

  it('fails a run that exceeds the timeout', async () => {
    const bin = await writeFakeTool(dir, 'ffmpeg-hang', 'exec sleep 5');
    const segment = createSegmenter({ ffmpegBin: bin, timeoutSec: 1 });
    const outcome = await segment({
      sourcePath: 'x.mp4',
      outputDir: path.join(dir, 'out'),
      baseName: 'x',
      segmentMinutes: 1,
    });
    expect(outcome.status).toBe('failure');
    if (outcome.status === 'failure') {
      expect(outcome.diagnostic.startsWith('ffmpeg timed out')).toBe(true);
    }
  });
});

describe('checkTool', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('is true when the binary answers -version', async () => {
    const bin = await writeFakeTool(dir, 'ffmpeg', 'echo "ffmpeg version test"');
    expect(await checkTool(bin)).toBe(true);
  });

  it('is false for a missing binary', async () => {
    expect(await checkTool(path.join(dir, 'missing'))).toBe(false);
  });

  it('is false when the binary exits non-zero', async () => {
    const bin = await writeFakeTool(dir, 'ffmpeg', 'exit 127');
    expect(await checkTool(bin)).toBe(false);
  });
});
