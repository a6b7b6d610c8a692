/**
 * JSONC (JSON with Comments) support for feedwire.jsonc.
 *
 * `//` and block comments are removed outside string literals; a base URL
 * such as "https://api.example.com" keeps its slashes.
 */

type State = 'code' | 'string' | 'line-comment' | 'block-comment';

export function stripJsonComments(content: string): string {
  let out = '';
  let state: State = 'code';

  for (let i = 0; i < content.length; i++) {
    const char = content.charAt(i);
    const next = content.charAt(i + 1);

    if (state === 'string') {
      out += char;
      if (char === '\\') {
        out += next;
        i++;
      } else if (char === '"') {
        state = 'code';
      }
      continue;
    }

    if (state === 'line-comment') {
      if (char === '\n' || char === '\r') {
        out += char;
        state = 'code';
      }
      continue;
    }

    if (state === 'block-comment') {
      if (char === '*' && next === '/') {
        state = 'code';
        i++;
      } else if (char === '\n') {
        // Keep line numbers stable for JSON.parse errors
        out += char;
      }
      continue;
    }

    if (char === '"') {
      state = 'string';
      out += char;
    } else if (char === '/' && next === '/') {
      out = out.replace(/[ \t]+$/, '');
      state = 'line-comment';
      i++;
    } else if (char === '/' && next === '*') {
      state = 'block-comment';
      i++;
    } else {
      out += char;
    }
  }

  return out;
}

/**
 * Parse JSONC content.
 *
 * @throws {SyntaxError} if the content is not valid JSON after stripping comments
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
