import { z } from 'zod';

export const documentIngestionEventSchema = z.object({
  sourceService: z.string().default('API'),
  documentLocation: z.string().regex(/^minio:\/\/[^/]+\/.+$/, 'expected minio://<bucket>/<object>'),
  documentMimeType: z.string().optional(),
  fileName: z.string().min(1),
  timestamp: z.string(),
  batchId: z.string().optional(),
  fileIndex: z.number().int().positive().optional(),
  totalFiles: z.number().int().positive().optional(),
});

/**
 * Published once per uploaded file; the consumer downloads the object and
 * indexes it under `fileName`.
 */
export type DocumentIngestionEvent = z.infer<typeof documentIngestionEventSchema>;

export function objectNameFromLocation(location: string): string {
  return location.slice(location.indexOf('/', 'minio://'.length) + 1);
}
