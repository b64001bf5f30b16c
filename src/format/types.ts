/**
 * Format Template Types
 *
 * Tokens produced by the tokenizer, the values a render context holds,
 * and the helper function signature.
 */

// ============================================================================
// Tokens
// ============================================================================

export interface LiteralToken {
  readonly type: 'literal';
  readonly text: string;
}

export interface VariableToken {
  readonly type: 'variable';
  readonly name: string;
}

/** `{{ fn(arg) }}` - the argument is always a variable reference */
export interface CallToken {
  readonly type: 'call';
  readonly name: string;
  readonly argument: VariableToken;
}

export type Token = LiteralToken | VariableToken | CallToken;

// ============================================================================
// Context values
// ============================================================================

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface StringListValue {
  readonly kind: 'string-list';
  readonly value: readonly string[];
}

/** MPRIS positions and lengths are int64 microseconds */
export interface Int64Value {
  readonly kind: 'int64';
  readonly value: bigint;
}

export interface Float64Value {
  readonly kind: 'float64';
  readonly value: number;
}

export type ContextValue = StringValue | StringListValue | Int64Value | Float64Value;

/** Insertion-ordered, read-only during a render. A missing key is "absent". */
export type Context = ReadonlyMap<string, ContextValue>;

/** Returns `undefined` when the value has the wrong shape for the helper */
export type Helper = (value: ContextValue) => string | undefined;
