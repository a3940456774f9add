import { describe, expect, test } from 'vitest';
import { matchPattern, statusOf } from '../src';

describe('matchPattern', () => {
  test('full anchor requires the whole string', () => {
    expect(matchPattern('foo', 'foo', 'full')).toEqual({ ok: true, matched: true });
    expect(matchPattern('foobar', 'foo', 'full')).toEqual({ ok: true, matched: false });
  });

  test('prefix anchor only binds the start', () => {
    expect(matchPattern('foobar', 'foo', 'prefix')).toEqual({ ok: true, matched: true });
    expect(matchPattern('barfoo', 'foo', 'prefix')).toEqual({ ok: true, matched: false });
  });

  test('reports a pattern that does not compile', () => {
    const result = matchPattern('x', '[', 'full');
    expect(result.ok).toBe(false);
  });

  test('does not treat $ inside the output as a line end', () => {
    expect(matchPattern('a\nb', 'a', 'full')).toEqual({ ok: true, matched: false });
    expect(matchPattern('a\nb', 'a', 'prefix')).toEqual({ ok: true, matched: true });
  });
});

describe('statusOf', () => {
  test('accepts a bare code or a result object', () => {
    expect(statusOf(4)).toBe(4);
    expect(statusOf({ status: 0 })).toBe(0);
    expect(statusOf({ status: null })).toBeNull();
  });
});
