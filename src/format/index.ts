export { tokenize, MAX_FORMAT_LENGTH } from './tokenizer.js';
export { render, expandFormat } from './evaluator.js';
export { HELPERS, getHelper } from './helpers.js';
export { FormatError, FORMAT_ERROR_PREFIX, type FormatErrorKind } from './errors.js';
export {
  formatValue,
  createContext,
  stringValue,
  stringListValue,
  int64Value,
  float64Value,
} from './values.js';
export {
  statusContext,
  positionContext,
  volumeContext,
  metadataContext,
  METADATA_ALIASES,
} from './context.js';
export type {
  Token,
  LiteralToken,
  VariableToken,
  CallToken,
  Context,
  ContextValue,
  StringValue,
  StringListValue,
  Int64Value,
  Float64Value,
  Helper,
} from './types.js';
