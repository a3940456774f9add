import type { TestContext } from '@scriptunit/core';

export function testThrows(t: TestContext) {
  t.assertEqual('a', 'a');
  throw new Error('boom');
}
