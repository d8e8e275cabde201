import { z } from 'zod';

import { logger } from '../logger.js';
import type { RecipeFormat } from '../recipes/types.js';
import { fail, ok, type Result } from './errors.js';
import type { IndexToIdMap, InterpretedSelection, SelectionStats } from './types.js';

/** Responses longer than this multiple of the requested count are rejected outright */
export const MAX_RESPONSE_RATIO = 1.5;

const DEFAULT_REASONING = 'AI curation applied';

export interface InterpretOptions {
  /** `indexed` expects integer indices, `legacy` expects track id strings */
  mode: RecipeFormat;
  /**
   * Source ids in their original order, used to backfill a short selection.
   * Defaults to `indexMap` order.
   */
  backfillOrder?: readonly string[];
}

export type LocatedJson =
  | { shape: 'object'; text: string }
  | { shape: 'array'; text: string }
  | { shape: 'raw'; text: string };

const selectionEntrySchema = z.union([z.number(), z.string()]);

const objectResponseSchema = z.object({
  track_ids: z.array(selectionEntrySchema, {
    invalid_type_error: 'track_ids must be a list'
  }),
  reasoning: z.string({ invalid_type_error: 'reasoning must be a string' }).optional()
});

const arrayResponseSchema = z.array(selectionEntrySchema);

type Selection =
  | { kind: 'indices'; selectedIndices: number[] }
  | { kind: 'identifiers'; selectedIds: string[] };

const malformed = (message: string): { ok: false; error: { kind: 'malformed-response'; message: string } } =>
  fail({ kind: 'malformed-response', message });

const FENCE_PATTERN = /```[\w-]*[^\S\n]*\n?([\s\S]*?)\n?[^\S\n]*```/;

/**
 * Remove markdown code fences around the response, keeping the fenced body.
 */
export const stripCodeFence = (raw: string): string => {
  const text = raw.trim();
  const fenced = FENCE_PATTERN.exec(text);
  if (fenced) {
    return fenced[1].trim();
  }
  // Opening fence without a closing one (truncated response)
  if (text.startsWith('```')) {
    const newline = text.indexOf('\n');
    return newline === -1 ? '' : text.slice(newline + 1).trim();
  }
  return text;
};

/**
 * Index just past the bracket matching the one at `start`, or -1.
 * Brackets inside JSON strings are ignored.
 */
const findClosing = (text: string, start: number): number => {
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (char === '\\') {
        i++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === open) {
      depth++;
    } else if (char === close) {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  return -1;
};

const findBalanced = (text: string, opener: '{' | '[', accept: (candidate: string) => boolean): string | null => {
  for (let start = text.indexOf(opener); start !== -1; start = text.indexOf(opener, start + 1)) {
    const end = findClosing(text, start);
    if (end === -1) {
      continue;
    }
    const candidate = text.slice(start, end);
    if (accept(candidate)) {
      return candidate;
    }
  }
  return null;
};

const isSelectionArray = (candidate: string, mode: RecipeFormat): boolean => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitizeJson(candidate));
  } catch {
    return false;
  }
  if (!Array.isArray(parsed)) {
    return false;
  }
  return mode === 'legacy'
    ? parsed.every(entry => typeof entry === 'string')
    : parsed.every(entry => Number.isInteger(entry));
};

/**
 * Find the JSON inside a response: an object with `track_ids`, else the first bare
 * array shaped like a selection (integers, or id strings in legacy mode), else the
 * first bare array, else the whole text.
 */
export const locateJson = (text: string, mode: RecipeFormat = 'indexed'): LocatedJson => {
  const object = findBalanced(text, '{', candidate => candidate.includes('"track_ids"'));
  if (object) {
    return { shape: 'object', text: object };
  }
  const array =
    findBalanced(text, '[', candidate => isSelectionArray(candidate, mode)) ?? findBalanced(text, '[', () => true);
  if (array) {
    return { shape: 'array', text: array };
  }
  return { shape: 'raw', text };
};

/**
 * Remove `//` line comments and trailing commas outside of string literals.
 */
export const sanitizeJson = (text: string): string => {
  let out = '';
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      out += char;
      if (char === '\\' && i + 1 < text.length) {
        out += text[++i];
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      out += char;
      continue;
    }

    if (char === '/' && text[i + 1] === '/') {
      while (i < text.length && text[i] !== '\n') {
        i++;
      }
      if (i < text.length) {
        out += '\n';
      }
      continue;
    }

    if (char === ',') {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) {
        j++;
      }
      // A comment may sit between the comma and the bracket
      if (text[j] === '/' && text[j + 1] === '/') {
        let k = j;
        while (k < text.length && text[k] !== '\n') k++;
        while (k < text.length && /\s/.test(text[k])) k++;
        j = k;
      }
      if (text[j] === ']' || text[j] === '}') {
        continue;
      }
    }

    out += char;
  }

  return out;
};

const describeIssue = (issue: z.ZodIssue): string => {
  if (issue.path.length > 1) {
    return 'track_ids must contain only numbers or strings';
  }
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `${issue.path.join('.')} is required`;
  }
  return issue.message;
};

const parseSelection = (located: LocatedJson, mode: RecipeFormat): Result<{ entries: Array<number | string>; reasoning: string }> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitizeJson(located.text));
  } catch (error) {
    return malformed(`AI returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (Array.isArray(parsed)) {
    const result = arrayResponseSchema.safeParse(parsed);
    if (!result.success) {
      return malformed('AI response failed validation: track list must contain numbers or strings');
    }
    return ok({ entries: result.data, reasoning: '' });
  }

  const result = objectResponseSchema.safeParse(parsed);
  if (!result.success) {
    return malformed(`AI response failed validation: ${describeIssue(result.error.issues[0])}`);
  }
  logger.trace({ mode, entries: result.data.track_ids.length }, 'parsed ai selection');
  return ok({ entries: result.data.track_ids, reasoning: result.data.reasoning ?? '' });
};

const classifyEntries = (entries: Array<number | string>, mode: RecipeFormat): Result<Selection> => {
  const numbers = entries.filter((entry): entry is number => typeof entry === 'number');
  const strings = entries.filter((entry): entry is string => typeof entry === 'string');

  if (numbers.length > 0 && strings.length > 0) {
    return malformed('AI response failed validation: track_ids mixes numbers and strings');
  }

  if (mode === 'legacy') {
    return strings.length > 0
      ? ok({ kind: 'identifiers', selectedIds: strings })
      : malformed('AI response failed validation: expected track id strings');
  }
  if (strings.length > 0 || !numbers.every(Number.isInteger)) {
    return malformed('AI response failed validation: track_ids must contain integer indices');
  }
  return ok({ kind: 'indices', selectedIndices: numbers });
};

/**
 * Turn raw model text into an ordered, bounds-checked list of track ids.
 *
 * Never throws: every failure is returned as `malformed-response`. A successful
 * result holds exactly `min(requestedCount, number of source tracks)` distinct ids
 * in response order, followed by any backfilled ids.
 */
export const interpretResponse = (
  rawText: string,
  indexMap: IndexToIdMap,
  requestedCount: number,
  options: InterpretOptions
): Result<InterpretedSelection> => {
  const located = locateJson(stripCodeFence(rawText), options.mode);
  const parsed = parseSelection(located, options.mode);
  if (!parsed.ok) {
    return parsed;
  }

  const { entries, reasoning } = parsed.value;
  if (entries.length === 0) {
    return malformed('AI response failed validation: no tracks returned');
  }
  if (entries.length > requestedCount * MAX_RESPONSE_RATIO) {
    return malformed(
      `AI response failed validation: returned ${entries.length} tracks for ${requestedCount} requested`
    );
  }

  const classified = classifyEntries(entries, options.mode);
  if (!classified.ok) {
    return classified;
  }

  const stats: SelectionStats = {
    returned: entries.length,
    outOfRange: 0,
    duplicates: 0,
    unknownIds: 0,
    backfilled: 0,
    truncated: 0
  };
  const selected: string[] = [];
  const seen = new Set<string>();

  if (classified.value.kind === 'indices') {
    for (const index of classified.value.selectedIndices) {
      if (index < 0 || index >= indexMap.length) {
        stats.outOfRange++;
        continue;
      }
      const id = indexMap[index];
      if (seen.has(id)) {
        stats.duplicates++;
        continue;
      }
      seen.add(id);
      selected.push(id);
    }
  } else {
    const known = new Set(indexMap);
    for (const id of classified.value.selectedIds) {
      if (!known.has(id)) {
        stats.unknownIds++;
        continue;
      }
      if (seen.has(id)) {
        stats.duplicates++;
        continue;
      }
      seen.add(id);
      selected.push(id);
    }
  }

  if (selected.length === 0) {
    return malformed('AI response failed validation: no valid track selections');
  }

  if (selected.length < requestedCount) {
    for (const id of options.backfillOrder ?? indexMap) {
      if (selected.length >= requestedCount) break;
      if (seen.has(id)) continue;
      seen.add(id);
      selected.push(id);
      stats.backfilled++;
    }
  }

  if (selected.length > requestedCount) {
    stats.truncated = selected.length - requestedCount;
    selected.length = requestedCount;
  }

  if (stats.outOfRange + stats.duplicates + stats.unknownIds + stats.backfilled + stats.truncated > 0) {
    logger.warn({ ...stats, requestedCount }, 'repaired ai selection');
  }

  return ok({
    trackIds: selected,
    reasoning: reasoning.trim() || DEFAULT_REASONING,
    aiCurated: true,
    stats
  });
};
