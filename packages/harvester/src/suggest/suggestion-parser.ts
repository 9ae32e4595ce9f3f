import { z } from 'zod';

const suggestionEntrySchema = z.object({
  data: z.string(),
});

const suggestionResponseSchema = z.object({
  suggestions: z.array(z.unknown()),
});

/**
 * Pulls the `data` field out of every suggestion entry. Bodies without a
 * `suggestions` array yield no values, and entries without a string `data`
 * are skipped.
 */
export function extractSuggestions(body: unknown): string[] {
  const parsedBody = suggestionResponseSchema.safeParse(body);
  if (!parsedBody.success) {
    return [];
  }

  const values: string[] = [];
  for (const entry of parsedBody.data.suggestions) {
    const parsedEntry = suggestionEntrySchema.safeParse(entry);
    if (parsedEntry.success) {
      values.push(parsedEntry.data.data);
    }
  }

  return values;
}
