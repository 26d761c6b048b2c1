/**
 * Ingestion Types
 */

import { z } from 'zod';

export const IngestionSourceSchema = z.object({
  url: z.string().url(),
  /** Subject label stored with every chunk; drives routing */
  topic: z.string().min(1).optional(),
});

export type IngestionSource = z.infer<typeof IngestionSourceSchema>;

export interface LoadedPage {
  url: string;
  title?: string | undefined;
  text: string;
}

export interface IngestionResult {
  url: string;
  success: boolean;
  chunkCount: number;
  error?: string;
}

export interface IngestionSummary {
  results: IngestionResult[];
  succeeded: number;
  failed: number;
  totalChunks: number;
}
