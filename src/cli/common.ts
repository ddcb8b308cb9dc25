import fs from 'fs-extra';
import path from 'path';
import type { Argv } from 'yargs';
import { ENV } from '../pipeline/env';
import {
    InputDirectoryError,
    ToolUnavailableError,
    errorMessage,
    exitCodeFor,
    isFatal,
} from '../pipeline/errors';
import { error, isLogLevel, setLogFile, setLogFormat, setLogLevel } from '../pipeline/log';
import { checkTool } from '../pipeline/segment';
import type { SegmenterConfig } from '../pipeline/types';

export function segmenterOptions<T>(y: Argv<T>) {
    return y
        .option('input-dir', {
            alias: 'i',
            type: 'string',
            default: ENV.inputDir,
            describe: 'Input directory containing video files',
        })
        .option('split-dir', {
            alias: 's',
            type: 'string',
            default: ENV.splitDir,
            describe: 'Output directory for split videos',
        })
        .option('completed-dir', {
            alias: 'c',
            type: 'string',
            default: ENV.completedDir,
            describe: 'Directory to move completed videos to',
        })
        .option('folder-per-split', {
            alias: 'f',
            type: 'boolean',
            default: ENV.folderPerSplit,
            describe: 'Create a separate folder for each split video',
        })
        .option('segment-length', {
            alias: 'l',
            type: 'number',
            default: ENV.segmentMinutes,
            describe: 'Segment length in minutes',
        })
        .option('titles-file', {
            alias: 't',
            type: 'string',
            default: ENV.titlesFile,
            describe: 'Name of the titles JSON file',
        })
        .option('log-level', {
            type: 'string',
            choices: ['debug', 'info', 'warn', 'error'],
            default: ENV.logLevel,
            describe: 'Minimum level to log',
        })
        .option('log-format', {
            type: 'string',
            choices: ['json', 'pretty'],
            default: ENV.logFormat,
            describe: 'JSON lines or coloured human-readable output',
        })
        .option('log-file', {
            type: 'string',
            default: ENV.logFile,
            describe: 'Also append JSON log lines to this file',
        })
        .check((argv) => {
            const minutes = argv['segment-length'];
            if (!Number.isInteger(minutes) || minutes < 0) {
                throw new Error(`--segment-length must be a non-negative integer, got ${minutes}`);
            }
            return true;
        });
}

export interface SegmenterArgs {
    'input-dir': string;
    'split-dir': string;
    'completed-dir': string;
    'folder-per-split': boolean;
    'segment-length': number;
    'titles-file': string;
    'log-level'?: string;
    'log-format'?: string;
    'log-file'?: string;
    'dry-run'?: boolean;
}

/** Relative paths resolve against `workDir`, never the ambient cwd. */
export function resolveConfig(argv: SegmenterArgs, workDir: string): SegmenterConfig {
    return {
        inputDir: path.resolve(workDir, argv['input-dir']),
        splitDir: path.resolve(workDir, argv['split-dir']),
        completedDir: path.resolve(workDir, argv['completed-dir']),
        manifestPath: path.resolve(workDir, argv['titles-file']),
        folderPerSplit: argv['folder-per-split'],
        segmentMinutes: argv['segment-length'],
        dryRun: argv['dry-run'] ?? false,
    };
}

/** Runs before any command touches files. */
export async function preflight(config: SegmenterConfig, ffmpegBin: string = ENV.ffmpegBin) {
    if (!(await checkTool(ffmpegBin))) {
        throw new ToolUnavailableError(ffmpegBin);
    }
    const exists = await fs.pathExists(config.inputDir);
    if (!exists || !(await fs.stat(config.inputDir)).isDirectory()) {
        throw new InputDirectoryError(config.inputDir);
    }
}

export function applyLogging(
    argv: Pick<SegmenterArgs, 'log-level' | 'log-format' | 'log-file'>,
    workDir: string
) {
    const level = argv['log-level'];
    if (isLogLevel(level)) setLogLevel(level);
    if (argv['log-format']) setLogFormat(argv['log-format'] === 'pretty' ? 'pretty' : 'json');
    const file = argv['log-file'];
    if (file) setLogFile(path.resolve(workDir, file));
}

export function runMain(main: () => Promise<void>) {
    main().catch((e) => {
        // eslint-disable-next-line no-console
        console.error(`\n✗ Error: ${errorMessage(e)}`);
        error('cli.exit', { error: errorMessage(e), fatal: isFatal(e) });
        process.exit(exitCodeFor(e));
    });
}
