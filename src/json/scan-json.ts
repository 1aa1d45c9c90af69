/**
 * Byte-level JSON scanner. Finds where the first top-level value ends and
 * reports the first syntax problem with its 1-based byte position, or that the
 * input stopped in the middle of a value.
 */

export type ScanResult =
  | { status: true; start: number; end: number }
  | { status: false; kind: "syntax"; offset: number; reason: string }
  | { status: false; kind: "truncated" }
  | { status: false; kind: "empty" };

type ScanFailure = Exclude<ScanResult, { status: true }>;
type Step = number | ScanFailure;

const SPACE = 0x20;
const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COMMA = 0x2c;
const COLON = 0x3a;
const MINUS = 0x2d;
const PLUS = 0x2b;
const DOT = 0x2e;
const ZERO = 0x30;
const NINE = 0x39;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

export const MAX_NESTING_DEPTH = 10_000;

const ESCAPES = new Set(Array.from('"\\/bfnrtu', (c) => c.charCodeAt(0)));
const LITERALS = new Map(
  ["true", "false", "null"].map((word) => [
    word.charCodeAt(0),
    Array.from(word, (c) => c.charCodeAt(0)),
  ])
);

const TRUNCATED: ScanFailure = { status: false, kind: "truncated" };

const isDigit = (byte: number | undefined): byte is number =>
  byte !== undefined && byte >= ZERO && byte <= NINE;

const isHex = (byte: number | undefined): boolean =>
  isDigit(byte) ||
  (byte !== undefined &&
    ((byte >= 0x41 && byte <= 0x46) || (byte >= 0x61 && byte <= 0x66)));

function describeByte(byte: number): string {
  if (byte >= 0x20 && byte < 0x7f) {
    return `'${String.fromCharCode(byte)}'`;
  }
  return `byte 0x${byte.toString(16).padStart(2, "0")}`;
}

function syntax(data: Uint8Array, index: number, context: string): ScanFailure {
  const byte = data[index] ?? 0;
  return {
    status: false,
    kind: "syntax",
    offset: index + 1,
    reason: `invalid character ${describeByte(byte)} ${context}`,
  };
}

export function skipWhitespace(data: Uint8Array, index: number): number {
  let i = index;
  while (i < data.length) {
    const byte = data[i];
    if (byte !== SPACE && byte !== TAB && byte !== LF && byte !== CR) {
      break;
    }
    i++;
  }
  return i;
}

/** `index` points at the opening quote */
function scanString(data: Uint8Array, index: number): Step {
  let i = index + 1;
  while (i < data.length) {
    const byte = data[i] ?? 0;
    if (byte === QUOTE) {
      return i + 1;
    }
    if (byte < 0x20) {
      return syntax(data, i, "in string literal");
    }
    if (byte === BACKSLASH) {
      const escape = data[i + 1];
      if (escape === undefined) {
        return TRUNCATED;
      }
      if (!ESCAPES.has(escape)) {
        return syntax(data, i + 1, "in string escape code");
      }
      if (escape === 0x75) {
        for (let h = i + 2; h < i + 6; h++) {
          if (h >= data.length) {
            return TRUNCATED;
          }
          if (!isHex(data[h])) {
            return syntax(data, h, "in \\u hexadecimal character escape");
          }
        }
        i += 6;
        continue;
      }
      i += 2;
      continue;
    }
    i++;
  }
  return TRUNCATED;
}

function scanDigits(data: Uint8Array, index: number, context: string): Step {
  if (index >= data.length) {
    return TRUNCATED;
  }
  if (!isDigit(data[index])) {
    return syntax(data, index, context);
  }
  let i = index;
  while (isDigit(data[i])) {
    i++;
  }
  return i;
}

function scanNumber(data: Uint8Array, index: number): Step {
  let i = index;
  if (data[i] === MINUS) {
    i++;
  }
  if (i >= data.length) {
    return TRUNCATED;
  }
  if (data[i] === ZERO) {
    i++;
  } else {
    const digits = scanDigits(data, i, "in numeric literal");
    if (typeof digits !== "number") {
      return digits;
    }
    i = digits;
  }

  if (data[i] === DOT) {
    const fraction = scanDigits(data, i + 1, "after decimal point in numeric literal");
    if (typeof fraction !== "number") {
      return fraction;
    }
    i = fraction;
  }

  if (data[i] === 0x65 || data[i] === 0x45) {
    i++;
    if (data[i] === PLUS || data[i] === MINUS) {
      i++;
    }
    const exponent = scanDigits(data, i, "in exponent of numeric literal");
    if (typeof exponent !== "number") {
      return exponent;
    }
    i = exponent;
  }
  return i;
}

function scanLiteral(data: Uint8Array, index: number, word: number[]): Step {
  for (let k = 0; k < word.length; k++) {
    const i = index + k;
    if (i >= data.length) {
      return TRUNCATED;
    }
    if (data[i] !== word[k]) {
      return syntax(data, i, "in literal");
    }
  }
  return index + word.length;
}

/** Scans an object key and the colon after it; returns the index after the colon */
function scanKey(data: Uint8Array, index: number): Step {
  const start = skipWhitespace(data, index);
  if (start >= data.length) {
    return TRUNCATED;
  }
  if (data[start] !== QUOTE) {
    return syntax(data, start, "looking for beginning of object key string");
  }
  const afterKey = scanString(data, start);
  if (typeof afterKey !== "number") {
    return afterKey;
  }
  const colon = skipWhitespace(data, afterKey);
  if (colon >= data.length) {
    return TRUNCATED;
  }
  if (data[colon] !== COLON) {
    return syntax(data, colon, "after object key");
  }
  return colon + 1;
}

/** Scans a scalar value, or returns null when `index` opens a container */
function scanScalar(data: Uint8Array, index: number): Step | null {
  const byte = data[index] ?? 0;
  if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
    return null;
  }
  if (byte === QUOTE) {
    return scanString(data, index);
  }
  if (byte === MINUS || isDigit(byte)) {
    return scanNumber(data, index);
  }
  const literal = LITERALS.get(byte);
  if (literal) {
    return scanLiteral(data, index, literal);
  }
  return syntax(data, index, "looking for beginning of value");
}

/**
 * Scans the first JSON value in `data`, starting at `from`.
 * Containers are tracked on an explicit stack, so deep nesting cannot
 * overflow the call stack.
 */
export function scanJSONValue(data: Uint8Array, from = 0): ScanResult {
  const start = skipWhitespace(data, from);
  if (start >= data.length) {
    return { status: false, kind: "empty" };
  }

  const containers: Array<typeof CLOSE_BRACE | typeof CLOSE_BRACKET> = [];
  let i = start;

  for (;;) {
    // Expecting a value at i
    i = skipWhitespace(data, i);
    if (i >= data.length) {
      return TRUNCATED;
    }

    const scalar = scanScalar(data, i);
    if (scalar === null) {
      if (containers.length >= MAX_NESTING_DEPTH) {
        return {
          status: false,
          kind: "syntax",
          offset: i + 1,
          reason: "exceeded max nesting depth",
        };
      }
      const isObject = data[i] === OPEN_BRACE;
      const close = isObject ? CLOSE_BRACE : CLOSE_BRACKET;
      const inner = skipWhitespace(data, i + 1);
      if (inner >= data.length) {
        return TRUNCATED;
      }
      if (data[inner] === close) {
        i = inner + 1;
      } else {
        containers.push(close);
        if (isObject) {
          const afterKey = scanKey(data, inner);
          if (typeof afterKey !== "number") {
            return afterKey;
          }
          i = afterKey;
        } else {
          i = inner;
        }
        continue;
      }
    } else if (typeof scalar !== "number") {
      return scalar;
    } else {
      i = scalar;
    }

    // A value just ended; close containers or move to the next element
    let expectValue = false;
    while (!expectValue) {
      const close = containers.at(-1);
      if (close === undefined) {
        return { status: true, start, end: i };
      }
      i = skipWhitespace(data, i);
      if (i >= data.length) {
        return TRUNCATED;
      }
      const byte = data[i];
      if (byte === close) {
        containers.pop();
        i++;
      } else if (byte === COMMA) {
        if (close === CLOSE_BRACE) {
          const afterKey = scanKey(data, i + 1);
          if (typeof afterKey !== "number") {
            return afterKey;
          }
          i = afterKey;
        } else {
          i++;
        }
        expectValue = true;
      } else {
        const where =
          close === CLOSE_BRACE
            ? "after object key:value pair"
            : "after array element";
        return syntax(data, i, where);
      }
    }
  }
}
