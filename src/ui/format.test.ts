import { describe, expect, it } from 'vitest';
import { formatDuration, tableRow } from './format.js';

describe('formatDuration', () => {
  it('scales from milliseconds to minutes', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(12_300)).toBe('12.3s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});

describe('tableRow', () => {
  it('pads the label', () => {
    expect(tableRow('Failed', 2, 8)).toBe('  Failed   2');
  });
});
