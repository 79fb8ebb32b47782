export type ParseResult<T> = {
  remaining: Uint8Array;
  value: T;
};

export type Parser<T> = (input: Uint8Array) => ParseResult<T> | null;

export function map<T1, T2>(
  parser: Parser<T1>,
  fn: (value: T1) => T2,
): Parser<T2> {
  return (input) => {
    const result = parser(input);
    if (!result) {
      return null;
    }

    return {
      remaining: result.remaining,
      value: fn(result.value),
    };
  };
}

export function sequence<T1, T2>(
  parser1: Parser<T1>,
  parser2: Parser<T2>,
): Parser<[T1, T2]> {
  return (input) => {
    const result1 = parser1(input);
    if (!result1) {
      return null;
    }

    const result2 = parser2(result1.remaining);
    if (!result2) {
      return null;
    }

    return {
      remaining: result2.remaining,
      value: [result1.value, result2.value],
    };
  };
}

export function alt<T>(parser1: Parser<T>, parser2: Parser<T>): Parser<T> {
  return (input) => {
    return parser1(input) ?? parser2(input);
  };
}

export function tag(byte: number): Parser<number> {
  return (input) => {
    if (input.length > 0 && input[0] === byte) {
      return {
        remaining: input.subarray(1),
        value: byte,
      };
    }

    return null;
  };
}

export function takeExactly<Inner>(
  count: number,
  parse: Parser<Inner>,
): Parser<Inner[]> {
  return (input) => {
    const results: Inner[] = [];
    let remaining = input;

    for (let i = 0; i < count; i++) {
      const result = parse(remaining);
      if (!result) {
        return null;
      }

      results.push(result.value);
      remaining = result.remaining;
    }

    return {
      remaining,
      value: results,
    };
  };
}

// Always succeeds; stops at the first failure or when the input is exhausted.
export function parseRepeated<Inner>(parseFn: Parser<Inner>): Parser<Inner[]> {
  return (input) => {
    const results: Inner[] = [];
    let remaining = input;

    while (remaining.length > 0) {
      const result = parseFn(remaining);
      if (!result || result.remaining.length === remaining.length) {
        break;
      }

      results.push(result.value);
      remaining = result.remaining;
    }

    return {
      remaining,
      value: results,
    };
  };
}

export function parseMatching(
  predicate: (byte: number) => boolean,
): Parser<number> {
  return (input) => {
    if (input.length < 1) {
      return null;
    }

    const byte = input[0];
    if (!predicate(byte)) {
      return null;
    }

    return {
      remaining: input.subarray(1),
      value: byte,
    };
  };
}
