/**
 * Format Evaluator
 *
 * Walks a token sequence against a context and produces the rendered string.
 * Missing context keys and helpers that decline their input render as
 * nothing; an unknown helper name aborts the whole render.
 */

import { FormatError } from './errors.js';
import { getHelper } from './helpers.js';
import { tokenize } from './tokenizer.js';
import { formatValue } from './values.js';
import type { Context, Token } from './types.js';

export function render(tokens: readonly Token[], context: Context): string {
  let output = '';

  for (const token of tokens) {
    switch (token.type) {
      case 'literal':
        output += token.text;
        break;

      case 'variable': {
        const value = context.get(token.name);
        if (value !== undefined) {
          output += formatValue(value);
        }
        break;
      }

      case 'call': {
        const helper = getHelper(token.name);
        if (!helper) {
          throw FormatError.unknownFunction(token.name);
        }
        const value = context.get(token.argument.name);
        if (value !== undefined) {
          output += helper(value) ?? '';
        }
        break;
      }
    }
  }

  return output;
}

/** Tokenize and render in one step */
export function expandFormat(format: string, context: Context): string {
  return render(tokenize(format), context);
}
