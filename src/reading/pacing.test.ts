import { describe, expect, it } from 'vitest';
import {
  buildFrames,
  CHUNKS,
  countWords,
  frameDelayMs,
  normalizeReadingConfig,
  stepWordSpeed,
  WORD_BY_WORD,
} from './pacing';

describe('buildFrames', () => {
  it('shows a whole verse as one frame lasting word count × speed', () => {
    expect(buildFrames('In the beginning', CHUNKS, 1.0)).toEqual([
      { text: 'In the beginning', durationSeconds: 3 },
    ]);
  });

  it('keeps a short verse on screen for at least half a second', () => {
    expect(buildFrames('Jesus wept.', CHUNKS, 0.1)).toEqual([
      { text: 'Jesus wept.', durationSeconds: 0.5 },
    ]);
  });

  it('splits words on any whitespace and keeps punctuation attached', () => {
    const frames = buildFrames('  Then God said,\t"Let there\nbe light."  ', WORD_BY_WORD, 0.25);
    expect(frames.map(f => f.text)).toEqual(['Then', 'God', 'said,', '"Let', 'there', 'be', 'light."']);
    expect(frames.every(f => f.durationSeconds === 0.25)).toBe(true);
  });

  it('has one word frame per word', () => {
    const verse = 'And God saw the light, that it was good';
    expect(buildFrames(verse, WORD_BY_WORD, 2)).toHaveLength(countWords(verse));
  });

  it.each([CHUNKS, WORD_BY_WORD])('produces one empty floor-length frame for a blank verse (%o)', mode => {
    expect(buildFrames('', mode, 3)).toEqual([{ text: '', durationSeconds: 0.5 }]);
    expect(buildFrames(' \t\n', mode, 3)).toEqual([{ text: '', durationSeconds: 0.5 }]);
  });
});

describe('frameDelayMs', () => {
  it('rounds to whole milliseconds', () => {
    expect(frameDelayMs({ text: 'x', durationSeconds: 0.30000000000000004 })).toBe(300);
  });
});

describe('stepWordSpeed', () => {
  it('moves in tenths without float drift and stays in range', () => {
    expect(stepWordSpeed(0.7, 0.1)).toBe(0.8);
    expect(stepWordSpeed(4.95, 0.1)).toBe(5);
    expect(stepWordSpeed(0.1, -0.1)).toBe(0.1);
  });
});

describe('normalizeReadingConfig', () => {
  it('clamps speed and font size and rounds the font size', () => {
    const config = normalizeReadingConfig({
      mode: WORD_BY_WORD,
      wordSpeedSeconds: 0.01,
      fontSize: 40.6,
      nightMode: true,
      fullscreen: false,
    });
    expect(config).toEqual({
      mode: { kind: 'word-by-word' },
      wordSpeedSeconds: 0.1,
      fontSize: 41,
      nightMode: true,
      fullscreen: false,
    });
  });

  it('replaces non-finite speed and font size with the defaults', () => {
    const config = normalizeReadingConfig({
      mode: CHUNKS,
      wordSpeedSeconds: Number.NaN,
      fontSize: Number.NEGATIVE_INFINITY,
      nightMode: false,
      fullscreen: false,
    });
    expect(config.wordSpeedSeconds).toBe(1.0);
    expect(config.fontSize).toBe(32);
  });
});
