/**
 * Format String Tokenizer
 *
 * Single left-to-right scan over a format string such as
 * `{{ artist }} - {{ uc(title) }}`, driven by four states:
 *
 *   passthrough    literal text, until `{{`
 *   inside         after `{{`, buffering a variable or function name
 *   params-open    after `name(`, buffering the argument name until `)`
 *   params-closed  after `)`, only whitespace allowed before `}}`
 *
 * Any malformed input throws a FormatError carrying the offset where the
 * scan stopped. `}}`, `(` and `)` outside an expression are plain text.
 */

import { FormatError } from './errors.js';
import type { Token } from './types.js';

export const MAX_FORMAT_LENGTH = 1028;

type ScanState = 'passthrough' | 'inside' | 'params-open' | 'params-closed';

export function tokenize(format: string): Token[] {
  if (format.length > MAX_FORMAT_LENGTH) {
    throw new FormatError(
      `the maximum format string length is ${MAX_FORMAT_LENGTH} (got ${format.length})`,
      'input-too-long',
    );
  }

  const tokens: Token[] = [];
  let state: ScanState = 'passthrough';
  let buffer = '';
  let functionName = '';
  let expressionStart = 0;
  let paramsStart = 0;

  let i = 0;
  while (i < format.length) {
    const char = format[i];
    // undefined past the last character, so a trailing `{` or `}` stays literal
    const next: string | undefined = format[i + 1];

    if (char === '{' && next === '{') {
      if (state !== 'passthrough') {
        throw FormatError.syntax('unexpected token: "{{"', i);
      }
      if (buffer.length > 0) {
        tokens.push({ type: 'literal', text: buffer });
      }
      buffer = '';
      expressionStart = i;
      state = 'inside';
      i += 2;
      continue;
    }

    if (char === '}' && next === '}' && state !== 'passthrough') {
      if (state === 'params-open') {
        throw FormatError.syntax('unexpected token: "}}" (expected closing parens ")")', i);
      }

      if (state === 'inside') {
        const name = buffer.trim();
        if (name.length === 0) {
          throw FormatError.syntax('got empty template expression', i);
        }
        tokens.push({ type: 'variable', name });
      } else {
        const stray = buffer.search(/\S/);
        if (stray !== -1) {
          throw FormatError.syntax('got unexpected input after closing parens', i - buffer.length + stray);
        }
      }

      buffer = '';
      state = 'passthrough';
      i += 2;
      continue;
    }

    if (char === '(' && state !== 'passthrough') {
      if (state !== 'inside') {
        throw FormatError.syntax('unexpected token: "("', i);
      }
      const name = buffer.trim();
      if (name.length === 0) {
        throw FormatError.syntax('expected a function name to call', i);
      }
      functionName = name;
      buffer = '';
      paramsStart = i;
      state = 'params-open';
      i += 1;
      continue;
    }

    if (char === ')' && state !== 'passthrough') {
      if (state !== 'params-open') {
        throw FormatError.syntax('unexpected token: ")"', i);
      }
      const name = buffer.trim();
      if (name.length === 0) {
        throw FormatError.syntax('expected a function parameter', i);
      }
      tokens.push({
        type: 'call',
        name: functionName,
        argument: { type: 'variable', name },
      });
      buffer = '';
      state = 'params-closed';
      i += 1;
      continue;
    }

    buffer += char;
    i += 1;
  }

  if (state === 'inside' || state === 'params-closed') {
    throw FormatError.syntax('unmatched opener "{{" (expected a matching "}}" at the end)', expressionStart);
  }
  if (state === 'params-open') {
    throw FormatError.syntax('unmatched opener "(" (expected a matching ")")', paramsStart);
  }

  if (buffer.length > 0) {
    tokens.push({ type: 'literal', text: buffer });
  }

  return tokens;
}
