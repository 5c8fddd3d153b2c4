import { configure } from 'safe-stable-stringify';
import { TextDecoder } from 'util';

const stringify = configure({ bigint: true, deterministic: true });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Nested binaries are written as base64 strings. The holder is consulted, since
 * a Buffer has already been through its own toJSON when the replacer sees it.
 */
function binaryReplacer(this: unknown, key: string, value: unknown): unknown {
  const original = isRecord(this) ? this[key] : value;
  if (original instanceof Uint8Array) {
    return Buffer.from(original).toString('base64');
  }
  return value;
}

/**
 * Encodes a value as UTF-8 JSON with a deterministic key order.
 */
export function toBinary(value: unknown): Buffer {
  const json = stringify(value, binaryReplacer);
  if (json === undefined) {
    throw new Error(`Value of type ${typeof value} cannot be encoded`);
  }
  return Buffer.from(json, 'utf8');
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Parses a UTF-8 JSON payload. Invalid UTF-8 is rejected, never replaced.
 */
export function fromBinary(payload: Uint8Array): unknown {
  try {
    return JSON.parse(utf8.decode(payload));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid JSON payload: ${reason}`);
  }
}

export function toBase64(payload: Uint8Array): string {
  return Buffer.from(payload).toString('base64');
}

export function fromBase64(encoded: string): Buffer {
  return Buffer.from(encoded, 'base64');
}

/**
 * Deterministic JSON rendering, for diagnostics.
 */
export function toJsonString(value: unknown): string {
  return stringify(value, binaryReplacer) ?? String(value);
}
