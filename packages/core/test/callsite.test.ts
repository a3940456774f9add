import { describe, expect, test } from 'vitest';
import { callerLine, firstFrameLine, parseFrameLine } from '../src';

describe('parseFrameLine', () => {
  test('reads the line of a named frame', () => {
    expect(parseFrameLine('at testEcho (file:///work/echo.test.ts:12:5)')).toBe(12);
  });

  test('reads the line of an anonymous frame', () => {
    expect(parseFrameLine('at file:///work/echo.test.ts:40:11')).toBe(40);
  });

  test('returns undefined without a location', () => {
    expect(parseFrameLine('at new Promise (<anonymous>)')).toBeUndefined();
  });
});

describe('firstFrameLine', () => {
  test('skips the message and node internals', () => {
    const stack = [
      'Error: boom',
      '    at process.processTicksAndRejections (node:internal/process/task_queues:95:5)',
      '    at testBoom (/work/boom.test.ts:8:9)',
      '    at runTests (/work/runner.ts:100:3)'
    ].join('\n');
    expect(firstFrameLine(stack)).toBe(8);
  });

  test('returns 0 for a missing or frameless stack', () => {
    expect(firstFrameLine(undefined)).toBe(0);
    expect(firstFrameLine('Error: boom')).toBe(0);
  });
});

describe('callerLine', () => {
  function probe(): number {
    return callerLine(probe);
  }

  test('resolves the line that called the boundary function', () => {
    // Both calls sit on the same line, so they must agree however lines are mapped
    const [expected, actual] = [firstFrameLine(new Error('here').stack), probe()];
    expect(actual).toBeGreaterThan(0);
    expect(actual).toBe(expected);
  });
});
