export const FORMAT_ERROR_PREFIX = '[format error] ';

export type FormatErrorKind = 'malformed-syntax' | 'unknown-function' | 'input-too-long';

export class FormatError extends Error {
  constructor(
    message: string,
    public readonly kind: FormatErrorKind,
    public readonly position?: number,
    public readonly functionName?: string,
  ) {
    super(FORMAT_ERROR_PREFIX + message);
    this.name = 'FormatError';
  }

  static syntax(message: string, position: number): FormatError {
    return new FormatError(`${message} (position ${position})`, 'malformed-syntax', position);
  }

  static unknownFunction(name: string): FormatError {
    return new FormatError(`unknown template function: ${name}`, 'unknown-function', undefined, name);
  }
}
