import { z } from 'zod';

import { isPlainObject } from './utils.js';

export const TextPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});
export type TextPart = z.infer<typeof TextPartSchema>;

/**
 * The unit returned to the host and persisted in the cache: ordered text
 * parts, an optional structured (JSON object) part and an optional error flag.
 * The shape matches an MCP `CallToolResult`.
 */
export const ToolResultSchema = z.object({
  content: z.array(TextPartSchema),
  // Passed through as-is; own "__proto__" members must survive a round trip.
  structuredContent: z.custom<Record<string, unknown>>((value) => isPlainObject(value)).optional(),
  isError: z.boolean().optional(),
});
export type ToolResult = z.infer<typeof ToolResultSchema>;

export const textResult = (text: string, structuredContent?: Record<string, unknown>): ToolResult => (
  structuredContent !== undefined
    ? { content: [{ type: 'text', text }], structuredContent }
    : { content: [{ type: 'text', text }] }
);

export const errorResult = (message: string): ToolResult => ({
  content: [{ type: 'text', text: message }],
  isError: true,
});

export const parseToolResult = (value: unknown): ToolResult | undefined => {
  const parsed = ToolResultSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
};
