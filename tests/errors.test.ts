import { describe, expect, it } from 'vitest';
import {
  ConfigurationIncompleteError,
  InputDirectoryError,
  ManifestInvalidError,
  ManifestNotFoundError,
  RelocationError,
  SegmenterError,
  SourceMissingError,
  ToolFailureError,
  ToolUnavailableError,
  exitCodeFor,
  isFatal,
} from '../src/pipeline/errors';

describe('Error Classes', () => {
  it('should carry name, code and details', () => {
    const error = new ConfigurationIncompleteError('a.mp4');
    expect(error).toBeInstanceOf(SegmenterError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigurationIncompleteError');
    expect(error.code).toBe('CONFIGURATION_INCOMPLETE');
    expect(error.details).toEqual({ filename: 'a.mp4' });
    expect(error.message).toBe(
      "'base_name' is empty for a.mp4. Please edit the titles file and fill in the 'base_name' field for all videos."
    );
  });

  it('should format toString with the code', () => {
    expect(new SourceMissingError('/in/a.mp4').toString()).toBe(
      'Video not found: /in/a.mp4 (code: SOURCE_MISSING)'
    );
  });

  it('should keep the ffmpeg diagnostic', () => {
    const error = new ToolFailureError('a.mp4', 'Invalid data found when processing input');
    expect(error.diagnostic).toBe('Invalid data found when processing input');
    expect(error.message).toBe('Error splitting a.mp4: Invalid data found when processing input');
  });
});

describe('exit policy', () => {
  it('stops the process for tool, input directory and incomplete configuration errors', () => {
    expect(exitCodeFor(new ToolUnavailableError('ffmpeg'))).toBe(1);
    expect(exitCodeFor(new InputDirectoryError('/nope'))).toBe(1);
    expect(exitCodeFor(new ConfigurationIncompleteError('a.mp4'))).toBe(1);
  });

  it('keeps going for manifest and per-item errors', () => {
    expect(exitCodeFor(new ManifestNotFoundError('/t.json'))).toBe(0);
    expect(exitCodeFor(new ManifestInvalidError('/t.json', 'bad'))).toBe(0);
    expect(isFatal(new SourceMissingError('/in/a.mp4'))).toBe(false);
    expect(isFatal(new ToolFailureError('a.mp4', 'x'))).toBe(false);
    expect(isFatal(new RelocationError('/a', '/b', 'EXDEV'))).toBe(false);
  });

  it('treats unknown errors as fatal', () => {
    expect(isFatal(new Error('boom'))).toBe(true);
    expect(exitCodeFor('boom')).toBe(1);
  });
});
