import type { Response } from 'express';
import type { Position, ReadingConfig } from '../../src/types';
import { CorpusLoadError, InvalidPositionError } from '../../src/errors';
import { readingMode } from '../../src/reading/pacing';
import { isRecord } from '../utils/json-file';

function isIndex(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

// Route params and query values arrive as strings
export function parseIndexParam(value: unknown): number | null {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return null;
  return Number(value);
}

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function parsePosition(value: unknown): Position | null {
  if (!isRecord(value)) return null;
  const { bookIndex, chapterIndex, verseIndex } = value;
  if (!isIndex(bookIndex) || !isIndex(chapterIndex) || !isIndex(verseIndex)) return null;
  return { bookIndex, chapterIndex, verseIndex };
}

// null when any supplied field has the wrong type
export function parseConfigPatch(value: unknown): Partial<ReadingConfig> | null {
  if (!isRecord(value)) return null;
  const patch: Partial<ReadingConfig> = {};

  const { mode } = value;
  if (mode !== undefined) {
    if (mode !== 'chunks' && mode !== 'word-by-word') return null;
    patch.mode = readingMode(mode);
  }
  for (const key of ['wordSpeedSeconds', 'fontSize'] as const) {
    const field = value[key];
    if (field === undefined) continue;
    if (typeof field !== 'number' || !Number.isFinite(field)) return null;
    patch[key] = field;
  }
  for (const key of ['nightMode', 'fullscreen'] as const) {
    const field = value[key];
    if (field === undefined) continue;
    if (typeof field !== 'boolean') return null;
    patch[key] = field;
  }
  return patch;
}

export function sendFailure(res: Response, err: unknown, action: string): void {
  if (err instanceof InvalidPositionError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof CorpusLoadError) {
    console.error(err.message, err.cause ?? '');
    res.status(503).json({ error: err.message });
    return;
  }
  console.error(`Failed to ${action}:`, err);
  res.status(500).json({ error: `Failed to ${action}` });
}
