// =============================================================================
// CASE EVALUATION — Route Helpers
// =============================================================================

import { Request } from 'express';
import { invalidArgument } from '../errors';
import { Profile, RatingFormat } from '../types/evaluation';

/** Single string query parameter; repeated or nested values are ignored. */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Integer query parameter, or undefined when absent. */
export function queryInt(req: Request, name: string): number | undefined {
  const value = queryString(req, name);
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value)) {
    throw invalidArgument(`${name} must be an integer`);
  }
  return parseInt(value, 10);
}

/** Constrain a query parameter to a fixed set of values. */
export function queryEnum<T extends string>(req: Request, name: string, allowed: readonly T[]): T | undefined {
  const value = queryString(req, name);
  if (value === undefined) return undefined;
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw invalidArgument(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

const FORMAT_BY_PATH = new Map<string, RatingFormat>([
  ['format-1', 'format_1'],
  ['format-2', 'format_2'],
  ['format-3', 'format_3'],
]);

/** `format-1` → `format_1` */
export function ratingFormatParam(value: string): RatingFormat {
  const format = FORMAT_BY_PATH.get(value);
  if (!format) {
    throw invalidArgument('format must be format-1, format-2 or format-3');
  }
  return format;
}

/**
 * Numeric path segment. Non-numeric text becomes NaN, which the
 * service rejects with INVALID_ARGUMENT.
 */
export function indexParam(value: string): number {
  return /^-?\d+(\.\d+)?$/.test(value) ? Number(value) : NaN;
}

export type PublicProfile = Omit<Profile, 'pin'> & { hasPin: boolean };

/** PINs never leave the service. */
export function publicProfile(profile: Profile): PublicProfile {
  const { pin, ...rest } = profile;
  return { ...rest, hasPin: pin !== null };
}
