import fs from 'node:fs';
import { z } from 'zod';

/**
 * Recognized ssh_config keywords, keyed by their lowercase spelling.
 * Loaded once from data/keywords.json and never mutated afterwards.
 */

const KEYWORDS_FILE = new URL('../../data/keywords.json', import.meta.url);

const KeywordListSchema = z.array(z.string().regex(/^[A-Za-z0-9]+$/)).min(1);

// Block keywords open a new section and never appear inside a KeywordSet.
export const BLOCK_KEYWORDS: ReadonlySet<string> = new Set(['host', 'match']);

let table: ReadonlyMap<string, string> | undefined;

function loadTable(): ReadonlyMap<string, string> {
  const raw: unknown = JSON.parse(fs.readFileSync(KEYWORDS_FILE, 'utf-8'));
  const keywords = KeywordListSchema.parse(raw);
  const map = new Map<string, string>();
  for (const keyword of keywords) {
    map.set(keyword.toLowerCase(), keyword);
  }
  return map;
}

function getTable(): ReadonlyMap<string, string> {
  if (!table) {
    table = loadTable();
  }
  return table;
}

/**
 * Canonical spelling of `name`, or undefined when it is not a data keyword.
 */
export function canonicalKeyword(name: string): string | undefined {
  return getTable().get(name.toLowerCase());
}

export function isKnownKeyword(name: string): boolean {
  return canonicalKeyword(name) !== undefined;
}

export function isBlockKeyword(name: string): boolean {
  return BLOCK_KEYWORDS.has(name.toLowerCase());
}

export function listKeywords(): string[] {
  return Array.from(getTable().values());
}
