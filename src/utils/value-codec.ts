import { ConfigValueType } from '../entities/config-entry.entity';

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | JsonObject;

export interface JsonObject {
  [key: string]: ConfigValue;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Canonical string form of a configuration value, as it is fed to encryption.
 *
 * JSON strings are assumed to be pre-encoded and are stored unchanged.
 */
export function serializeValue(value: unknown, type: ConfigValueType): string {
  switch (type) {
    case ConfigValueType.JSON:
      if (typeof value === 'string') return value;
      return JSON.stringify(value) ?? 'null';
    case ConfigValueType.NUMBER:
    case ConfigValueType.SELECT:
    case ConfigValueType.STRING:
    default:
      return typeof value === 'string' ? value : String(value);
  }
}

/**
 * Inverse of serializeValue. Parsing is lenient: malformed NUMBER or JSON text
 * comes back as the raw string instead of raising.
 */
export function deserializeValue(text: string, type: ConfigValueType): ConfigValue {
  switch (type) {
    case ConfigValueType.JSON:
      return parseJson(text);
    case ConfigValueType.NUMBER:
      return parseNumber(text);
    case ConfigValueType.SELECT:
    case ConfigValueType.STRING:
    default:
      return text;
  }
}

function parseJson(text: string): ConfigValue {
  try {
    const parsed: ConfigValue = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function parseNumber(text: string): number | string {
  const trimmed = text.trim();
  if (trimmed.includes('.')) {
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : text;
  }
  return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : text;
}
