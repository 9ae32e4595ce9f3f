import { describe, it, expect } from 'vitest';
import {
  houseNumberQueryKey,
  parseQueryKey,
  streetQueryKey,
} from './query-keys.js';

describe('query keys', () => {
  it('uses the bare prefix for street queries', () => {
    expect(streetQueryKey('Ab')).toBe('Ab');
    expect(parseQueryKey('Ab')).toEqual({ kind: 'street', prefix: 'Ab' });
  });

  it('joins street and prefix for house-number queries', () => {
    const key = houseNumberQueryKey('Königstraße', '12');

    expect(key).toBe('Königstraße#12');
    expect(parseQueryKey(key)).toEqual({
      kind: 'house-number',
      street: 'Königstraße',
      prefix: '12',
    });
  });

  it('splits on the last separator', () => {
    expect(parseQueryKey('Weg #5#1')).toEqual({
      kind: 'house-number',
      street: 'Weg #5',
      prefix: '1',
    });
  });
});
