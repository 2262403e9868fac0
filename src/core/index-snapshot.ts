import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { Document } from '../ports/DocumentSource';
import type { ChunkOptions } from './chunker';
import { IndexCorruptError, getErrorMessage } from '../errors';

export const SNAPSHOT_VERSION = 1;

const chunkSchema = z.object({
  id: z.string(),
  source: z.string(),
  ordinal: z.number().int().nonnegative(),
  text: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

const entrySchema = z.object({
  chunk: chunkSchema,
  vector: z.array(z.number()),
});

export const indexSnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    createdAt: z.string(),
    embeddingModel: z.string().min(1),
    dimension: z.number().int().positive().nullable(),
    fingerprint: z.string(),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    entries: z.array(entrySchema),
  })
  .superRefine((snapshot, ctx) => {
    if (snapshot.entries.length > 0 && snapshot.dimension === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'non-empty index without a dimension' });
    }
    snapshot.entries.forEach((entry, index) => {
      if (entry.vector.length !== snapshot.dimension) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index, 'vector'],
          message: `expected ${snapshot.dimension} values, got ${entry.vector.length}`,
        });
      }
    });
  });

export type IndexSnapshot = z.infer<typeof indexSnapshotSchema>;
export type IndexEntry = z.infer<typeof entrySchema>;

/** Validates a decoded snapshot, whatever store it came from. */
export function parseSnapshot(raw: unknown, location: string): IndexSnapshot {
  const result = indexSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new IndexCorruptError(`Invalid index snapshot in ${location}${where}: ${issue?.message ?? 'unknown issue'}`, result.error);
  }
  return result.data;
}

export function decodeSnapshot(json: string, location: string): IndexSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new IndexCorruptError(`Index snapshot in ${location} is not valid JSON: ${getErrorMessage(error)}`, error);
  }
  return parseSnapshot(raw, location);
}

/**
 * Identifies the inputs an index was built from: chunking parameters,
 * embedding model and every document's name and text.
 */
export function fingerprintDocuments(documents: Document[], options: ChunkOptions, embeddingModel: string): string {
  const hash = createHash('sha256');
  hash.update(`${options.chunkSize}:${options.chunkOverlap}:${embeddingModel}\n`);
  for (const document of [...documents].sort((a, b) => a.id.localeCompare(b.id))) {
    hash.update(`${document.id.length}:${document.id}`);
    hash.update(`${document.text.length}:${document.text}`);
  }
  return hash.digest('hex');
}
