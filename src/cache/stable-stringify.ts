import { isPlainObject } from '../utils.js';

const compareKeys = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

const sortObject = (value: Record<string, unknown>): Record<string, unknown> => (
  Object.keys(value)
    .sort(compareKeys)
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {})
);

/**
 * JSON serialization with object keys sorted at every depth, so two objects
 * holding the same members serialize identically whatever their insertion
 * order. Keys compare by UTF-16 code unit, not locale. Array order is kept.
 */
export const stableStringify = (value: unknown): string => {
  const replacer = (_key: string, val: unknown): unknown => (isPlainObject(val) ? sortObject(val) : val);
  return JSON.stringify(value, replacer) ?? 'null';
};
