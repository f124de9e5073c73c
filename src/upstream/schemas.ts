import { z } from 'zod';

// Only the members this bridge reads are declared; everything else the API
// returns is kept as-is.
export const LibrarySchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().optional(),
  totalSnippets: z.number().optional(),
  trustScore: z.number().optional(),
  benchmarkScore: z.number().optional(),
  versions: z.array(z.string()).optional(),
}).passthrough();
export type Library = z.infer<typeof LibrarySchema>;

export const LibrarySearchResponseSchema = z.object({
  error: z.string().optional(),
  results: z.array(LibrarySchema),
}).passthrough();
export type LibrarySearchResponse = z.infer<typeof LibrarySearchResponseSchema>;

export type DocsContentType = 'txt' | 'json';
