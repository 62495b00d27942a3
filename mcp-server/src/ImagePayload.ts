import { FillError, FillErrorCode } from './errors';
import { DecodedImage } from './types';

const DATA_URI_PREFIX = /^data:([\w/+.-]+)?(;[\w=-]+)*;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Decode a base64 image (plain or data URI) and read its format and pixel
 * size from the bytes themselves.
 */
export function decodeImagePayload(encoded: string, token?: string): DecodedImage {
  function fail(reason: string): never {
    throw new FillError(
      token ? `Failed to decode image ${token}: ${reason}` : `Failed to decode image: ${reason}`,
      FillErrorCode.INVALID_IMAGE_PAYLOAD,
      token ? { token } : undefined
    );
  }

  const body = encoded.replace(DATA_URI_PREFIX, '').replace(/\s+/g, '');
  if (body.length === 0) fail('payload is empty');
  if (!BASE64_BODY.test(body) || body.length % 4 === 1) fail('payload is not valid base64');

  const bytes = Buffer.from(body, 'base64');
  if (bytes.length === 0) fail('payload decodes to no data');

  const image = sniffImage(bytes);
  if (!image) fail('unsupported or unreadable image format (expected PNG, JPEG, GIF or BMP)');
  if (image.width <= 0 || image.height <= 0) fail(`image has no area (${image.width}x${image.height})`);

  return image;
}

/**
 * Identify PNG, JPEG, GIF and BMP data and read the pixel size from the
 * header. Returns null for anything else.
 */
export function sniffImage(bytes: Buffer): DecodedImage | null {
  // PNG: signature, then IHDR with width at 16-19 and height at 20-23 (big endian)
  if (bytes.length >= 24 && PNG_SIGNATURE.every((byte, i) => bytes[i] === byte)) {
    return {
      bytes,
      mimeType: 'image/png',
      extension: 'png',
      width: bytes.readUInt32BE(16),
      height: bytes.readUInt32BE(20),
    };
  }

  // JPEG: walk the markers to the first SOFn frame header
  if (bytes.length >= 4 && bytes[0] === 0xff && bytes[1] === 0xd8) {
    const size = readJpegSize(bytes);
    return size ? { bytes, mimeType: 'image/jpeg', extension: 'jpeg', ...size } : null;
  }

  // GIF87a / GIF89a: logical screen size at 6-9 (little endian)
  if (bytes.length >= 10) {
    const signature = bytes.subarray(0, 6).toString('ascii');
    if (signature === 'GIF87a' || signature === 'GIF89a') {
      return {
        bytes,
        mimeType: 'image/gif',
        extension: 'gif',
        width: bytes.readUInt16LE(6),
        height: bytes.readUInt16LE(8),
      };
    }
  }

  // BMP: width at 18-21, height at 22-25 (little endian, height may be negative)
  if (bytes.length >= 26 && bytes[0] === 0x42 && bytes[1] === 0x4d) {
    return {
      bytes,
      mimeType: 'image/bmp',
      extension: 'bmp',
      width: bytes.readInt32LE(18),
      height: Math.abs(bytes.readInt32LE(22)),
    };
  }

  return null;
}

function readJpegSize(bytes: Buffer): { width: number; height: number } | null {
  let offset = 2;
  while (offset + 9 <= bytes.length) {
    if (bytes[offset] !== 0xff) {
      offset++;
      continue;
    }

    const marker = bytes[offset + 1];

    // SOF0..SOF15 except DHT (C4), JPG (C8) and DAC (CC)
    if (marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc) {
      // Skip marker (2), length (2) and precision (1)
      return { height: bytes.readUInt16BE(offset + 5), width: bytes.readUInt16BE(offset + 7) };
    }

    if (marker === 0xff) {
      offset++;
    } else if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      // Markers without a length field
      offset += 2;
    } else {
      offset += 2 + bytes.readUInt16BE(offset + 2);
    }
  }
  return null;
}
