export type ParseFailureCode = 'null_argument' | 'format' | 'overflow';

export type ParseFailure = {
  code: ParseFailureCode;
  raw: string | null; // null when the input itself was absent
};

export class NumberParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseFailureCode,
    public readonly raw: string | null
  ) {
    super(message);
    this.name = 'NumberParseError';
  }
}

export class NullArgumentError extends NumberParseError {
  constructor(param = 'input') {
    super(`Value cannot be null. (Parameter '${param}')`, 'null_argument', null);
    this.name = 'NullArgumentError';
  }
}

export class NumberFormatError extends NumberParseError {
  constructor(raw: string) {
    super('Error! Format Exception!', 'format', raw);
    this.name = 'NumberFormatError';
  }
}

export class NumberOverflowError extends NumberParseError {
  constructor(raw: string) {
    super('Error! Overflow Exception!', 'overflow', raw);
    this.name = 'NumberOverflowError';
  }
}

export function errorFromFailure(failure: ParseFailure): NumberParseError {
  switch (failure.code) {
    case 'null_argument':
      return new NullArgumentError();
    case 'format':
      return new NumberFormatError(failure.raw ?? '');
    case 'overflow':
      return new NumberOverflowError(failure.raw ?? '');
  }
}
