import { describe, expect, test } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

describe('mergeHeaderOptions', () => {
  test('merge records', () => {
    const merged = mergeHeaderOptions({ Accept: 'application/json' }, { 'User-Agent': 'releasy-test/1.0' });

    expect(merged.get('accept')).toBe('application/json');
    expect(merged.get('user-agent')).toBe('releasy-test/1.0');
  });

  test('merge headers instances', () => {
    const merged = mergeHeaderOptions(new Headers({ a: 'b' }), new Headers({ a: 'd', e: 'f' }));

    expect(merged.get('a')).toBe('d');
    expect(merged.get('e')).toBe('f');
  });

  test('later layers win regardless of key casing', () => {
    const merged = mergeHeaderOptions(
      { 'Content-Type': 'text/plain' },
      new Headers({ accept: '*/*' }),
      { 'content-type': 'application/json', Accept: 'application/json' },
    );

    expect([...merged.entries()]).toEqual([
      ['accept', 'application/json'],
      ['content-type', 'application/json'],
    ]);
  });

  test('drops headers explicitly set to undefined/null', () => {
    const merged = mergeHeaderOptions({ keep: '1', remove: 'x' }, { remove: null, gone: undefined });

    expect(merged.get('keep')).toBe('1');
    expect(merged.has('remove')).toBe(false);
    expect(merged.has('gone')).toBe(false);
  });

  test('throws for a value Headers rejects', () => {
    expect(() => mergeHeaderOptions({ 'Idempotency-Key': 'idem\n1' })).toThrow(TypeError);
  });

  test('returns empty headers without input', () => {
    const merged = mergeHeaderOptions();

    expect([...merged.keys()]).toEqual([]);
  });
});
