export type DurationInput = number | string | null | undefined;

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_CACHE_TTL_MS = DAY_MS;

const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: DAY_MS,
  w: 7 * DAY_MS,
  mo: 30 * DAY_MS,
  y: 365 * DAY_MS,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(mo|ms|s|m|h|d|w|y)$/;

/**
 * Parse a duration. Bare numbers are taken in `bareUnit` (milliseconds unless
 * told otherwise); suffixed values (`30s`, `12h`, `2w`, `1mo`) carry their own
 * unit. `off` maps to 0 when `allowOff` is set. Returns undefined when the
 * value cannot be read.
 */
export const parseDurationMs = (
  value: DurationInput,
  opts?: { allowOff?: boolean; bareUnit?: 'ms' | 'd' }
): number | undefined => {
  if (value === undefined || value === null) return undefined;
  const bareMultiplier = UNIT_TO_MS[opts?.bareUnit ?? 'ms'];
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return undefined;
    return Math.trunc(value * bareMultiplier);
  }
  const lowered = value.trim().toLowerCase();
  if (lowered.length === 0) return undefined;
  if (lowered === 'off') return opts?.allowOff === true ? 0 : undefined;
  if (/^\d+(\.\d+)?$/.test(lowered)) {
    return Math.trunc(Number.parseFloat(lowered) * bareMultiplier);
  }
  const match = DURATION_PATTERN.exec(lowered);
  if (match === null) return undefined;
  const amount = Number.parseFloat(match[1]);
  const ms = amount * UNIT_TO_MS[match[2]];
  if (!Number.isFinite(ms) || ms < 0) return undefined;
  return Math.trunc(ms);
};

/**
 * Cache TTL: a bare integer counts days, `0`/`off` means every entry is
 * always stale, and an absent value falls back to one day.
 */
export const parseCacheTtlMs = (value: DurationInput): number | undefined => {
  if (value === undefined || value === null) return DEFAULT_CACHE_TTL_MS;
  if (typeof value === 'string' && value.trim().length === 0) return DEFAULT_CACHE_TTL_MS;
  return parseDurationMs(value, { allowOff: true, bareUnit: 'd' });
};
