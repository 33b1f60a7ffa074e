import * as cheerio from "cheerio";

/**
 * Reduce storage-format markup to its text content: tags dropped, entities decoded, trimmed.
 * Applied the same way to every content type.
 */
export function stripMarkup(storage: string | null): string {
  if (!storage) return "";
  const $ = cheerio.load(storage);
  return $.root().text().trim();
}
