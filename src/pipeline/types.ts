import { z } from 'zod';
import type { RelocationError, SourceMissingError, ToolFailureError } from './errors';

// Missing or null naming fields read as "not yet configured"
const namingField = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

export const ManifestEntrySchema = z
  .object({
    filename: z.string().min(1, 'filename must not be empty'),
    base_name: namingField,
    directory_name: namingField,
  })
  .passthrough();

export const ManifestSchema = z.array(ManifestEntrySchema);

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export interface SegmenterConfig {
  inputDir: string;
  splitDir: string;
  completedDir: string;
  manifestPath: string;
  folderPerSplit: boolean;
  segmentMinutes: number;
  dryRun?: boolean;
}

export interface SegmentRequest {
  sourcePath: string;
  outputDir: string;
  baseName: string;
  segmentMinutes: number;
}

export type SegmentOutcome =
  | { status: 'success' }
  | { status: 'failure'; diagnostic: string };

export type Segmenter = (request: SegmentRequest) => Promise<SegmentOutcome>;

export type ItemState =
  | 'pending'
  | 'validating'
  | 'segmenting'
  | 'relocating'
  | 'failed'
  | 'reconciling'
  | 'done';

export interface ItemResult {
  filename: string;
  status: 'processed' | 'failed' | 'planned';
  outputDir?: string;
  error?: SourceMissingError | ToolFailureError;
  warning?: RelocationError;
}

export interface BatchSummary {
  processed: number;
  failed: number;
  planned: number;
  items: ItemResult[];
}
