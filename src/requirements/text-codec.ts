import { UnreadableEncodingError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type TextEncoding = "utf-8" | "utf-16le" | "utf-16be";

export type Newline = "\n" | "\r\n" | "\r";

export type DecodedText = {
  text: string;
  encoding: TextEncoding;
  bom: boolean;
};

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const UTF16LE_BOM = Buffer.from([0xff, 0xfe]);
const UTF16BE_BOM = Buffer.from([0xfe, 0xff]);

// =============================================================================
// DECODING
// =============================================================================

export function decodeRequirementBytes(bytes: Buffer, filePath: string): DecodedText {
  if (startsWith(bytes, UTF8_BOM)) {
    return { text: decodeStrict(bytes.subarray(3), "utf-8", filePath), encoding: "utf-8", bom: true };
  }
  if (startsWith(bytes, UTF16LE_BOM)) {
    return {
      text: decodeStrict(bytes.subarray(2), "utf-16le", filePath),
      encoding: "utf-16le",
      bom: true,
    };
  }
  if (startsWith(bytes, UTF16BE_BOM)) {
    return {
      text: decodeStrict(bytes.subarray(2), "utf-16be", filePath),
      encoding: "utf-16be",
      bom: true,
    };
  }
  return { text: decodeStrict(bytes, "utf-8", filePath), encoding: "utf-8", bom: false };
}

// =============================================================================
// ENCODING
// =============================================================================

export function encodeRequirementText(text: string, encoding: TextEncoding, bom: boolean): Buffer {
  let body: Buffer;
  let mark: Buffer;

  switch (encoding) {
    case "utf-8":
      body = Buffer.from(text, "utf8");
      mark = UTF8_BOM;
      break;
    case "utf-16le":
      body = Buffer.from(text, "utf16le");
      mark = UTF16LE_BOM;
      break;
    case "utf-16be":
      body = Buffer.from(text, "utf16le").swap16();
      mark = UTF16BE_BOM;
      break;
  }

  return bom ? Buffer.concat([mark, body]) : body;
}

// =============================================================================
// NEWLINES
// =============================================================================

/** First line ending in the text wins; "\n" when there is none. */
export function detectNewline(text: string): Newline {
  const match = /\r\n|\r|\n/.exec(text);
  if (!match) return "\n";
  if (match[0] === "\r\n") return "\r\n";
  return match[0] === "\r" ? "\r" : "\n";
}

// =============================================================================
// INTERNALS
// =============================================================================

function startsWith(bytes: Buffer, prefix: Buffer): boolean {
  return bytes.length >= prefix.length && bytes.subarray(0, prefix.length).equals(prefix);
}

function decodeStrict(bytes: Buffer, encoding: TextEncoding, filePath: string): string {
  // Node's TextDecoder has no utf-16be without full ICU; swap a copy and read it as LE.
  const label = encoding === "utf-16be" ? "utf-16le" : encoding;
  let input: Buffer = bytes;

  if (encoding !== "utf-8" && bytes.length % 2 !== 0) {
    throw new UnreadableEncodingError(filePath, encoding);
  }
  if (encoding === "utf-16be") {
    input = Buffer.from(bytes).swap16();
  }

  try {
    return new TextDecoder(label, { fatal: true, ignoreBOM: true }).decode(input);
  } catch (err) {
    throw new UnreadableEncodingError(filePath, encoding, err);
  }
}
