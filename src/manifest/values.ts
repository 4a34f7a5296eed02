/**
 * Helpers for inspecting parsed TOML values.
 *
 * @module manifest/values
 */

export type TomlTable = { [key: string]: unknown };

export function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function isInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

export function isPositiveInt(value: unknown): value is number {
  return isInt(value) && value > 0;
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isIntArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(isInt);
}

export function product(values: readonly number[]): number {
  let result = 1;
  for (const v of values) {
    result *= v;
  }
  return result;
}

export function getTable(parent: TomlTable, key: string): TomlTable | undefined {
  const value = parent[key];
  return isTable(value) ? value : undefined;
}

export function getInt(table: TomlTable | undefined, key: string): number | undefined {
  const value = table?.[key];
  return isInt(value) ? value : undefined;
}

export function getString(table: TomlTable | undefined, key: string): string | undefined {
  const value = table?.[key];
  return isString(value) ? value : undefined;
}

export function getBool(table: TomlTable | undefined, key: string): boolean | undefined {
  const value = table?.[key];
  return typeof value === 'boolean' ? value : undefined;
}

const SLUG_RE = /^[a-z0-9_-]+$/;
const SEMVER_RE = /^\d+\.\d+\.\d+$/;

export function isSlug(value: string): boolean {
  return SLUG_RE.test(value);
}

export function isSemver(value: string): boolean {
  return SEMVER_RE.test(value);
}
