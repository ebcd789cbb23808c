import { DecodeError } from '../errors/index.js';
import type { JsonObject } from '../types/common.js';

const textDecoder = new TextDecoder();

export function decodeText(body: Uint8Array): string {
  return textDecoder.decode(body);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body that must hold a JSON object
 * @throws {DecodeError} if the body is not JSON or not an object
 */
export function decodeJsonObject(body: Uint8Array): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decodeText(body));
  } catch (error) {
    throw new DecodeError(
      'Response body is not valid JSON',
      error instanceof Error ? error : undefined,
    );
  }

  if (!isJsonObject(parsed)) {
    throw new DecodeError('Response body is not a JSON object');
  }

  return parsed;
}
