/**
 * Error classes for the segmenter pipeline
 */

export type SegmenterErrorCode =
  | 'TOOL_UNAVAILABLE'
  | 'INPUT_DIRECTORY'
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_INVALID'
  | 'SOURCE_MISSING'
  | 'CONFIGURATION_INCOMPLETE'
  | 'TOOL_FAILURE'
  | 'RELOCATION_FAILED';

/**
 * Base class for all segmenter errors
 */
export class SegmenterError extends Error {
  code: SegmenterErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, code: SegmenterErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SegmenterError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.message} (code: ${this.code})`;
  }
}

/**
 * ffmpeg is missing or cannot be executed
 */
export class ToolUnavailableError extends SegmenterError {
  constructor(readonly tool: string) {
    super(
      `${tool} is not installed or not found in PATH. Please install ffmpeg before running this tool.`,
      'TOOL_UNAVAILABLE',
      { tool }
    );
    this.name = 'ToolUnavailableError';
  }
}

/**
 * Input directory does not exist or is not a directory
 */
export class InputDirectoryError extends SegmenterError {
  constructor(readonly directory: string) {
    super(`Input directory does not exist: ${directory}`, 'INPUT_DIRECTORY');
    this.name = 'InputDirectoryError';
  }
}

export class ManifestNotFoundError extends SegmenterError {
  constructor(readonly manifestPath: string) {
    super(
      `Titles file not found: ${manifestPath}. Generate it first (scan) and fill in the 'base_name' fields.`,
      'MANIFEST_NOT_FOUND'
    );
    this.name = 'ManifestNotFoundError';
  }
}

export class ManifestInvalidError extends SegmenterError {
  constructor(readonly manifestPath: string, reason: string) {
    super(`Titles file is not valid: ${manifestPath}: ${reason}`, 'MANIFEST_INVALID', { reason });
    this.name = 'ManifestInvalidError';
  }
}

export class SourceMissingError extends SegmenterError {
  constructor(readonly sourcePath: string) {
    super(`Video not found: ${sourcePath}`, 'SOURCE_MISSING');
    this.name = 'SourceMissingError';
  }
}

/**
 * An entry reached during a batch has no base_name; aborts the whole batch
 */
export class ConfigurationIncompleteError extends SegmenterError {
  constructor(readonly filename: string) {
    super(
      `'base_name' is empty for ${filename}. Please edit the titles file and fill in the 'base_name' field for all videos.`,
      'CONFIGURATION_INCOMPLETE',
      { filename }
    );
    this.name = 'ConfigurationIncompleteError';
  }
}

/**
 * ffmpeg ran (or failed to launch) for one video; diagnostic holds its stderr
 */
export class ToolFailureError extends SegmenterError {
  constructor(readonly filename: string, readonly diagnostic: string) {
    super(`Error splitting ${filename}: ${diagnostic}`, 'TOOL_FAILURE', { filename });
    this.name = 'ToolFailureError';
  }
}

export class RelocationError extends SegmenterError {
  constructor(readonly from: string, readonly to: string, reason: string) {
    super(`Could not move ${from} to ${to}: ${reason}`, 'RELOCATION_FAILED', { reason });
    this.name = 'RelocationError';
  }
}

const FATAL_CODES: ReadonlySet<SegmenterErrorCode> = new Set([
  'TOOL_UNAVAILABLE',
  'INPUT_DIRECTORY',
  'CONFIGURATION_INCOMPLETE',
]);

export function isFatal(err: unknown): boolean {
  if (err instanceof SegmenterError) return FATAL_CODES.has(err.code);
  return true;
}

export function exitCodeFor(err: unknown): number {
  return isFatal(err) ? 1 : 0;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
