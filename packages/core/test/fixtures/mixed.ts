import { capture, main, type TestContext, test } from '@scriptunit/core';

function testStatus(t: TestContext) {
  const result = capture('exit 2');
  t.assertReturn(result, 2);
  t.assertNotReturn(result, 0);
}

function testPending(t: TestContext) {
  t.skip();
}

test(testStatus);
test(testPending);
test('testPrefix', (t) => {
  t.assertStartsWith(capture('echo hello world').output, 'hello');
  t.assertMatches(capture('printf "a\\nb"').output, 'a\nb');
});

await main();
