import { ConfigurationError } from '../engine/errors.js';

export const FRAGMENT_HEADER_BYTES = 4;

export const MAX_WIRE_SEQUENCE = 0xffff;

export interface DecodedFragment {
  classIndex: number;
  sequence: number;
  body: Uint8Array;
}

// Header layout: class index in the high 16 bits, sequence number in the low 16 bits, big-endian.
export function encodeFragment(classIndex: number, sequence: number, body: Uint8Array): Uint8Array {
  if (!Number.isInteger(classIndex) || classIndex < 0 || classIndex > 0xffff) {
    throw new ConfigurationError(`Class index ${classIndex} does not fit the fragment header`);
  }
  if (!Number.isInteger(sequence) || sequence < 0 || sequence > MAX_WIRE_SEQUENCE) {
    throw new ConfigurationError(`Sequence ${sequence} does not fit the fragment header`);
  }

  const frame = new Uint8Array(FRAGMENT_HEADER_BYTES + body.length);
  new DataView(frame.buffer).setUint32(0, ((classIndex << 16) | sequence) >>> 0, false);
  frame.set(body, FRAGMENT_HEADER_BYTES);
  return frame;
}

export function decodeFragment(frame: Uint8Array): DecodedFragment | null {
  if (frame.length < FRAGMENT_HEADER_BYTES) {
    return null;
  }

  const header = new DataView(frame.buffer, frame.byteOffset, frame.byteLength).getUint32(0, false);
  return {
    classIndex: header >>> 16,
    sequence: header & 0xffff,
    body: frame.subarray(FRAGMENT_HEADER_BYTES),
  };
}
