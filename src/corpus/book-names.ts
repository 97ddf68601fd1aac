import * as fs from 'fs';

// Abbreviation → display name, shipped as data/book-names.json
let bookNames: Map<string, string> | null = null;

function loadBookNames(): Map<string, string> {
  const url = new URL('../../data/book-names.json', import.meta.url);
  const parsed: unknown = JSON.parse(fs.readFileSync(url, 'utf-8'));
  const names = new Map<string, string>();
  if (parsed && typeof parsed === 'object') {
    for (const [abbrev, name] of Object.entries(parsed)) {
      if (typeof name === 'string') {
        names.set(abbrev, name);
      }
    }
  }
  return names;
}

export function getBookNames(): ReadonlyMap<string, string> {
  if (bookNames === null) {
    bookNames = loadBookNames();
  }
  return bookNames;
}

export function bookDisplayName(abbrev: string): string {
  return getBookNames().get(abbrev) ?? abbrev.toUpperCase();
}
