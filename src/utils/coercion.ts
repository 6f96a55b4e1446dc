import { RawMap } from '../types';

export function isRawMap(value: unknown): value is RawMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the value when it is a plain key-value object, otherwise an empty map
 */
export function toMap(value: unknown): RawMap {
  return isRawMap(value) ? value : {};
}

/**
 * Numbers pass through, numeric strings are parsed
 */
export function toNumber(value: unknown, fallback: number = 0): number {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return fallback;
    }
    const parsed = Number(trimmed);
    return isNaN(parsed) ? fallback : parsed;
  }

  return fallback;
}

/**
 * Same as toNumber; kept separate so call sites read as float fields
 */
export function toFloat(value: unknown, fallback: number = 0.0): number {
  return toNumber(value, fallback);
}

/**
 * Returns null for absent or unparseable values so "missing" stays
 * distinguishable from 0. Fractional numbers are truncated, fractional
 * strings are rejected.
 */
export function toOptionalInteger(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return Number.isInteger(value) ? value : Math.trunc(value);
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      return null;
    }
    return parseInt(trimmed, 10);
  }

  return null;
}

export function toBoolean(value: unknown, fallback: boolean = false): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return value !== 0;
  }

  if (typeof value === 'string') {
    const s = value.toLowerCase();
    if (s === 'true' || s === '1' || s === 'yes') return true;
    if (s === 'false' || s === '0' || s === 'no') return false;
  }

  return fallback;
}

/**
 * Strings pass through, null/undefined become '', anything else is stringified.
 * Objects that can't be converted to a primitive (a non-function `toString`
 * key, a null prototype) get their `[object Type]` tag instead.
 */
export function toStringOrEmpty(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || value === undefined) {
    return '';
  }
  try {
    return String(value);
  } catch (error) {
    return Object.prototype.toString.call(value);
  }
}

// Map-keyed wrappers

export function mapFloat(map: RawMap, key: string, fallback: number = 0.0): number {
  return toFloat(map[key], fallback);
}

export function mapInt(map: RawMap, key: string): number | null {
  return toOptionalInteger(map[key]);
}

export function mapBool(map: RawMap, key: string, fallback: boolean = false): boolean {
  return toBoolean(map[key], fallback);
}
