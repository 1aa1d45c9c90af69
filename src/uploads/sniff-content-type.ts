/**
 * Content-type sniffing from leading bytes, following the WHATWG MIME Sniffing
 * table: markup signatures, byte-order marks, images, media, fonts and
 * archives, then a plain-text check. Never looks at a filename.
 */

/** Number of leading bytes considered when sniffing */
export const SNIFF_LENGTH = 512;

export const TEXT_PLAIN = "text/plain; charset=utf-8";
export const OCTET_STREAM = "application/octet-stream";

interface Signature {
  mimeType: string;
  pattern: number[];
  /** Bytes where the mask is 0x00 are ignored */
  mask?: number[];
  /** Leading whitespace is skipped before matching */
  skipWhitespace?: boolean;
}

const bytesOf = (text: string): number[] =>
  Array.from(text, (char) => char.charCodeAt(0));

const WHITESPACE = new Set([0x09, 0x0a, 0x0c, 0x0d, 0x20]);

const HTML_TAGS = [
  "<!DOCTYPE HTML",
  "<HTML",
  "<HEAD",
  "<SCRIPT",
  "<IFRAME",
  "<H1",
  "<DIV",
  "<FONT",
  "<TABLE",
  "<A",
  "<STYLE",
  "<TITLE",
  "<B",
  "<BODY",
  "<BR",
  "<P",
  "<!--",
].map(bytesOf);

const RIFF_MASK = [
  0xff, 0xff, 0xff, 0xff, 0x00, 0x00, 0x00, 0x00, 0xff, 0xff, 0xff, 0xff,
];

// Order matters: the first match wins
const SIGNATURES: Signature[] = [
  {
    mimeType: "text/xml; charset=utf-8",
    pattern: bytesOf("<?xml"),
    skipWhitespace: true,
  },
  { mimeType: "application/pdf", pattern: bytesOf("%PDF-") },
  { mimeType: "application/postscript", pattern: bytesOf("%!PS-Adobe-") },

  // Byte-order marks
  { mimeType: "text/plain; charset=utf-16be", pattern: [0xfe, 0xff] },
  { mimeType: "text/plain; charset=utf-16le", pattern: [0xff, 0xfe] },
  { mimeType: TEXT_PLAIN, pattern: [0xef, 0xbb, 0xbf] },

  // Images
  { mimeType: "image/x-icon", pattern: [0x00, 0x00, 0x01, 0x00] },
  { mimeType: "image/x-icon", pattern: [0x00, 0x00, 0x02, 0x00] },
  { mimeType: "image/bmp", pattern: bytesOf("BM") },
  { mimeType: "image/gif", pattern: bytesOf("GIF87a") },
  { mimeType: "image/gif", pattern: bytesOf("GIF89a") },
  {
    mimeType: "image/webp",
    pattern: bytesOf("RIFF\0\0\0\0WEBPVP"),
    mask: [...RIFF_MASK, 0xff, 0xff],
  },
  {
    mimeType: "image/png",
    pattern: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
  },
  { mimeType: "image/jpeg", pattern: [0xff, 0xd8, 0xff] },

  // Audio and video
  {
    mimeType: "audio/aiff",
    pattern: bytesOf("FORM\0\0\0\0AIFF"),
    mask: RIFF_MASK,
  },
  { mimeType: "audio/mpeg", pattern: bytesOf("ID3") },
  { mimeType: "application/ogg", pattern: bytesOf("OggS\0") },
  { mimeType: "audio/midi", pattern: bytesOf("MThd\0\0\0\x06") },
  {
    mimeType: "video/avi",
    pattern: bytesOf("RIFF\0\0\0\0AVI "),
    mask: RIFF_MASK,
  },
  {
    mimeType: "audio/wave",
    pattern: bytesOf("RIFF\0\0\0\0WAVE"),
    mask: RIFF_MASK,
  },
  { mimeType: "video/webm", pattern: [0x1a, 0x45, 0xdf, 0xa3] },

  // Fonts
  { mimeType: "font/ttf", pattern: [0x00, 0x01, 0x00, 0x00] },
  { mimeType: "font/otf", pattern: bytesOf("OTTO") },
  { mimeType: "font/collection", pattern: bytesOf("ttcf") },
  { mimeType: "font/woff", pattern: bytesOf("wOFF") },
  { mimeType: "font/woff2", pattern: bytesOf("wOF2") },

  // Archives
  { mimeType: "application/x-gzip", pattern: [0x1f, 0x8b, 0x08] },
  { mimeType: "application/zip", pattern: bytesOf("PK\x03\x04") },
  {
    mimeType: "application/x-rar-compressed",
    pattern: bytesOf("Rar!\x1a\x07\x00"),
  },
  {
    mimeType: "application/x-rar-compressed",
    pattern: bytesOf("Rar!\x1a\x07\x01\x00"),
  },
  { mimeType: "application/wasm", pattern: bytesOf("\0asm") },
];

function firstNonWhitespace(data: Uint8Array): number {
  let index = 0;
  while (index < data.length && WHITESPACE.has(data[index] ?? -1)) {
    index++;
  }
  return index;
}

function matchesSignature(data: Uint8Array, signature: Signature): boolean {
  const start = signature.skipWhitespace ? firstNonWhitespace(data) : 0;
  const { pattern, mask } = signature;
  if (data.length - start < pattern.length) {
    return false;
  }
  return pattern.every((expected, i) => {
    const maskByte = mask?.[i] ?? 0xff;
    return ((data[start + i] ?? 0) & maskByte) === expected;
  });
}

/** Case-insensitive HTML tag match followed by a space or '>' */
function isHtml(data: Uint8Array): boolean {
  const start = firstNonWhitespace(data);
  return HTML_TAGS.some((tag) => {
    if (data.length - start < tag.length + 1) {
      return false;
    }
    const sameTag = tag.every((expected, i) => {
      let actual = data[start + i] ?? 0;
      // Uppercase ASCII letters in the data before comparing
      if (expected >= 0x41 && expected <= 0x5a) {
        actual &= 0xdf;
      }
      return actual === expected;
    });
    const terminator = data[start + tag.length];
    return sameTag && (terminator === 0x20 || terminator === 0x3e);
  });
}

const FTYP = bytesOf("ftyp");
const MP4 = bytesOf("mp4");

/** ISO base media file with an "mp4" brand in its ftyp box */
function isMp4(data: Uint8Array): boolean {
  if (data.length < 12) {
    return false;
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const boxSize = view.getUint32(0);
  if (data.length < boxSize || boxSize % 4 !== 0) {
    return false;
  }
  if (!FTYP.every((byte, i) => data[4 + i] === byte)) {
    return false;
  }
  for (let offset = 8; offset < boxSize; offset += 4) {
    if (offset === 12) {
      // Skip the minor version field
      continue;
    }
    if (MP4.every((byte, i) => data[offset + i] === byte)) {
      return true;
    }
  }
  return false;
}

/** Bytes that never appear in plain text */
const isBinaryByte = (byte: number): boolean =>
  byte <= 0x08 ||
  byte === 0x0b ||
  (byte >= 0x0e && byte <= 0x1a) ||
  (byte >= 0x1c && byte <= 0x1f);

/**
 * Classifies content by its first SNIFF_LENGTH bytes.
 * Always returns a MIME type; unrecognized binary data is application/octet-stream.
 *
 * @example
 * detectContentType(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])); // "image/png"
 */
export function detectContentType(content: Uint8Array): string {
  const data = content.subarray(0, SNIFF_LENGTH);

  if (isHtml(data)) {
    return "text/html; charset=utf-8";
  }

  const signature = SIGNATURES.find((entry) => matchesSignature(data, entry));
  if (signature) {
    return signature.mimeType;
  }

  if (isMp4(data)) {
    return "video/mp4";
  }

  return data.some(isBinaryByte) ? OCTET_STREAM : TEXT_PLAIN;
}

/** Case-insensitive allowlist check; an empty allowlist accepts everything */
export function isContentTypeAllowed(
  contentType: string,
  allowed: readonly string[]
): boolean {
  if (allowed.length === 0) {
    return true;
  }
  const normalized = contentType.toLowerCase();
  return allowed.some((entry) => entry.toLowerCase() === normalized);
}
