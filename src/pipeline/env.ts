import * as dotenv from 'dotenv';
dotenv.config();

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export const ENV = {
    // Directory containing the source videos
    inputDir: process.env.INPUT_DIR || '.',
    // Root for split output; per-video subfolders live under it in folder-per-split mode
    splitDir: process.env.SPLIT_DIR || 'split',
    // Originals are moved here once segmented
    completedDir: process.env.COMPLETED_DIR || 'completed',
    // Manifest (titles file) name, resolved against the working directory
    titlesFile: process.env.TITLES_FILE || 'video_titles.json',
    segmentMinutes: Number(process.env.SEGMENT_MINUTES || 15),
    folderPerSplit: flag(process.env.FOLDER_PER_SPLIT, false),
    // Optional: override ffmpeg binary name/path
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    // Watchdog timeout (seconds) for a single ffmpeg run. 0 disables.
    ffmpegTimeoutSec: Number(process.env.FFMPEG_TIMEOUT_SEC || 0),
    logLevel: process.env.LOG_LEVEL || 'info',
    logFormat: process.env.LOG_FORMAT || 'json',
    logFile: process.env.LOG_FILE || '',
};
