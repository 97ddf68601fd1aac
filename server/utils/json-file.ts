import * as fs from 'fs';
import * as path from 'path';
import { PersistenceReadError, PersistenceWriteError } from '../../src/errors';

// undefined when the file does not exist yet
export function readJsonDocument(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw new PersistenceReadError(filePath, { cause: err });
  }

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new PersistenceReadError(filePath, { cause: err });
  }
}

// Whole-document overwrite: temp file, then rename over the old one
export function writeJsonDocument(filePath: string, document: unknown): void {
  const tmpPath = `${filePath}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, JSON.stringify(document, null, 2), 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    throw new PersistenceWriteError(filePath, { cause: err });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
