/**
 * Binary netpbm decoder (PGM `P5`, PPM `P6`).
 *
 * Samples are 8-bit for maxval < 256, otherwise 16-bit big-endian.
 * Header comments (`#` to end of line) are skipped.
 */

import { DecoderError } from '../core/errors';
import { toRGBA, validateImageDimensions, type DecodedImage, type ImageDecoder } from './shared';

const FORMAT = 'netpbm';
const CHAR_P = 0x50;
const CHAR_HASH = 0x23;
const CHAR_LF = 0x0a;
const CHAR_CR = 0x0d;

export interface NetpbmHeader {
  channels: 1 | 3;
  width: number;
  height: number;
  maxval: number;
  /** Offset of the first raster byte. */
  dataOffset: number;
}

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === CHAR_LF || byte === CHAR_CR || byte === 0x0b || byte === 0x0c;
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

export function isNetpbmFile(bytes: Uint8Array): boolean {
  if (bytes.length < 3) return false;
  const kind = bytes[1];
  return bytes[0] === CHAR_P && (kind === 0x35 || kind === 0x36) && isWhitespace(bytes[2] ?? 0);
}

/**
 * Parse the header of a binary PGM/PPM file.
 * @throws DecoderError on malformed headers
 */
export function parseNetpbmHeader(bytes: Uint8Array): NetpbmHeader {
  if (!isNetpbmFile(bytes)) {
    throw new DecoderError(FORMAT, 'Not a binary PGM/PPM file');
  }
  const channels = bytes[1] === 0x35 ? 1 : 3;

  let pos = 2;
  const readNumber = (label: string): number => {
    // Skip whitespace and comments
    for (;;) {
      const byte = bytes[pos];
      if (byte === undefined) throw new DecoderError(FORMAT, `Truncated header before ${label}`);
      if (isWhitespace(byte)) {
        pos++;
      } else if (byte === CHAR_HASH) {
        while (pos < bytes.length && bytes[pos] !== CHAR_LF && bytes[pos] !== CHAR_CR) pos++;
      } else {
        break;
      }
    }
    const start = pos;
    let value = 0;
    for (let byte = bytes[pos]; byte !== undefined && isDigit(byte); byte = bytes[++pos]) {
      value = value * 10 + (byte - 0x30);
    }
    if (pos === start) throw new DecoderError(FORMAT, `Invalid ${label} in header`);
    return value;
  };

  const width = readNumber('width');
  const height = readNumber('height');
  const maxval = readNumber('maxval');

  // Exactly one whitespace byte separates the header from the raster
  const separator = bytes[pos];
  if (separator === undefined || !isWhitespace(separator)) {
    throw new DecoderError(FORMAT, 'Missing whitespace after maxval');
  }

  if (maxval < 1 || maxval > 65535) {
    throw new DecoderError(FORMAT, `Unsupported maxval ${maxval}`);
  }
  validateImageDimensions(width, height, FORMAT);

  return { channels, width, height, maxval, dataOffset: pos + 1 };
}

export function decodeNetpbm(bytes: Uint8Array): DecodedImage {
  const header = parseNetpbmHeader(bytes);
  const { width, height, channels, maxval, dataOffset } = header;
  const bytesPerSample = maxval > 255 ? 2 : 1;
  const samples = width * height * channels;

  if (bytes.length - dataOffset < samples * bytesPerSample) {
    throw new DecoderError(
      FORMAT,
      `Truncated raster: expected ${samples * bytesPerSample} bytes, got ${bytes.length - dataOffset}`
    );
  }

  const data = new Float32Array(samples);
  for (let i = 0; i < samples; i++) {
    const at = dataOffset + i * bytesPerSample;
    const raw = bytesPerSample === 2 ? ((bytes[at] ?? 0) << 8) | (bytes[at + 1] ?? 0) : (bytes[at] ?? 0);
    data[i] = Math.min(raw, maxval) / maxval;
  }

  return { width, height, data: toRGBA(data, width, height, channels) };
}

export const netpbmDecoder: ImageDecoder = {
  formatName: FORMAT,
  canDecode: isNetpbmFile,
  decode: async (bytes) => decodeNetpbm(bytes),
};
