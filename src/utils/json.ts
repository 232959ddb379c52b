import { JsonBodyError } from './HttpError'

export type JsonPrimitive = string | number | boolean | null
export type JsonArray = JsonValue[]
export interface JsonObject {
  [key: string]: JsonValue
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parse(text: string): JsonValue {
  const value: JsonValue = JSON.parse(text)
  return value
}

export interface DecodeOptions {
  /**
   * Heartbeat clients may post a JSON-encoded string holding the real payload.
   * When set, a decoded string whose content is itself JSON is replaced by the
   * inner value.
   */
  unwrapString?: boolean
}

/**
 * Decode a request body.
 *
 * - Empty body decodes to `null`.
 * - A failed parse is retried once on the trimmed text; if that fails too,
 *   the first error is raised as a JsonBodyError.
 */
export function decodeJsonBody(raw: string, options: DecodeOptions = {}): JsonValue {
  if (raw.length === 0) {
    return null
  }

  let value: JsonValue
  try {
    value = parse(raw)
  } catch (error: unknown) {
    try {
      value = parse(raw.trim())
    } catch {
      throw new JsonBodyError(error)
    }
  }

  if (options.unwrapString && typeof value === 'string') {
    try {
      return parse(value)
    } catch {
      return value
    }
  }
  return value
}

/**
 * Integer coercion for loosely typed version stamps.
 * Numbers are truncated, booleans map to 1/0, and strings must hold a
 * plain (optionally signed) integer. Anything else falls back to 0.
 */
export function coerceInteger(value: JsonValue | undefined): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10)
  }
  return 0
}

function isTruthy(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) return false
  if (Array.isArray(value)) return value.length > 0
  if (typeof value === 'object') return Object.keys(value).length > 0
  return Boolean(value)
}

/**
 * Read a field as a string id. Falsy values (absent, null, "", 0, false,
 * empty array or object) give "".
 */
export function coerceString(value: JsonValue | undefined): string {
  if (!isTruthy(value)) {
    return ''
  }
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return JSON.stringify(value)
}
