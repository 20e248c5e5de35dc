/**
 * Reading the reply text out of a provider's message content.
 *
 * The same logical item arrives in different shapes depending on the
 * provider and SDK version: a bare string, a plain `{ text }` mapping, an
 * object exposing `text` as an attribute, or a list of parts. Each shape has
 * one extractor and the first one that recognizes the item wins.
 */

import { ContentExtractionError } from "../errors";

export interface ContentTextExtractor {
  readonly shape: string;
  matches(item: unknown): boolean;
  /** Text carried by the item, or null when the item has none. */
  read(item: unknown): string | null;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function nonEmpty(v: unknown): string | null {
  return typeof v === "string" && v.length > 0 ? v : null;
}

export const stringContent: ContentTextExtractor = {
  shape: "string",
  matches: (item) => typeof item === "string",
  read: (item) => nonEmpty(item),
};

export const mappingContent: ContentTextExtractor = {
  shape: "mapping",
  matches: (item) => isPlainObject(item),
  read: (item) => (isPlainObject(item) ? nonEmpty(item.text) : null),
};

export const attributeContent: ContentTextExtractor = {
  shape: "attribute",
  matches: (item) => typeof item === "object" && item !== null && !Array.isArray(item) && !isPlainObject(item),
  read: (item) => (typeof item === "object" && item !== null && "text" in item ? nonEmpty(Reflect.get(item, "text")) : null),
};

export const partsContent: ContentTextExtractor = {
  shape: "parts",
  matches: (item) => Array.isArray(item),
  read: (item) => {
    if (!Array.isArray(item)) return null;
    for (const part of item) {
      const extractor = SINGLE_ITEM_EXTRACTORS.find((e) => e.matches(part));
      const found = extractor?.read(part) ?? null;
      if (found) return found;
    }
    return null;
  },
};

const SINGLE_ITEM_EXTRACTORS: ReadonlyArray<ContentTextExtractor> = [stringContent, mappingContent, attributeContent];

export const DEFAULT_CONTENT_EXTRACTORS: ReadonlyArray<ContentTextExtractor> = [
  ...SINGLE_ITEM_EXTRACTORS,
  partsContent,
];

export function extractContentText(
  content: unknown,
  extractors: ReadonlyArray<ContentTextExtractor> = DEFAULT_CONTENT_EXTRACTORS,
): string {
  if (content === undefined || content === null) {
    throw new ContentExtractionError("No message content found in API response");
  }
  const extractor = extractors.find((e) => e.matches(content));
  if (!extractor) {
    throw new ContentExtractionError(`Unsupported message content shape: ${typeof content}`);
  }
  const text = extractor.read(content);
  if (!text) {
    throw new ContentExtractionError(`No text content found in API response (${extractor.shape} content)`);
  }
  return text;
}
