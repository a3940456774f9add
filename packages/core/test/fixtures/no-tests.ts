import { main } from '@scriptunit/core';

export function helper(): string {
  return 'not a test';
}

await main();
