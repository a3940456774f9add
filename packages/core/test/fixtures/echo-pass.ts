import { capture, main, test } from '@scriptunit/core';

test('testEcho', (t) => {
  t.assertEqual(capture('echo foo').output, 'foo');
});

await main();
