// Strings first, so comment markers inside them are never touched.
// Blanks before a line comment go with it.
const JSONC_TOKEN = /"(?:[^"\\\n]|\\.)*"|[ \t]*\/\/[^\n\r]*|\/\*[\s\S]*?\*\//g;

/**
 * Remove `//` and `/* *\/` comments from `scriptunit.jsonc` text.
 * Block comments leave their line breaks behind so parse errors keep their line.
 */
export function stripJsonComments(content: string): string {
  return content.replace(JSONC_TOKEN, (token) => {
    if (token.startsWith('"')) return token;
    if (token.startsWith('/*')) return token.replace(/[^\n\r]/g, '');
    return '';
  });
}

/**
 * @throws {SyntaxError} when the text is not valid JSON once comments are gone
 */
export function parseJsonc(content: string): unknown {
  try {
    return JSON.parse(stripJsonComments(content));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new SyntaxError(`Invalid JSONC: ${err.message}`);
    }
    throw err;
  }
}
