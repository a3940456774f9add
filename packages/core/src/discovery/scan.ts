import type { TestCaseDescriptor } from '../types';

export const TEST_NAME_PATTERN = /^test[A-Za-z0-9_]+$/;

// Definition forms recognised at the start of a line (indentation allowed):
//   function testX(            export async function testX(
//   const testX = (            export const testX = async () =>
//   const testX = function     let testX: TestFn = t =>
const DEFINITION_PATTERNS: RegExp[] = [
  /^\s*(?:export\s+)?(?:async\s+)?function\b\s*\*?\s*(test[A-Za-z0-9_]+)\s*\(/,
  /^\s*(?:export\s+)?(?:const|let|var)\s+(test[A-Za-z0-9_]+)\s*(?::[^=]+)?=\s*(?:async\b\s*)?(?:function\b|\(|[A-Za-z_$][\w$]*\s*=>)/
];

export function isTestName(name: string): boolean {
  return TEST_NAME_PATTERN.test(name);
}

/**
 * Statically list the test functions a script defines, in first-appearance
 * order, without evaluating it. A name defined twice keeps its first line.
 */
export function scanTestDefinitions(source: string): TestCaseDescriptor[] {
  const lines = source.split(/\r?\n/);
  const seen = new Set<string>();
  const found: TestCaseDescriptor[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    for (const pattern of DEFINITION_PATTERNS) {
      const name = pattern.exec(line)?.[1];
      if (name === undefined) continue;
      if (!seen.has(name)) {
        seen.add(name);
        found.push({ name, line: i + 1 });
      }
      break;
    }
  }

  return found;
}
