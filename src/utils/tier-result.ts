import { TierResult } from '../types/index.js';
import { describeError } from './logger.js';

export function success<T>(value: T): TierResult<T> {
  return { status: 'success', value };
}

export function empty<T>(value: T): TierResult<T> {
  return { status: 'empty', value };
}

export function degraded<T>(value: T, error: unknown): TierResult<T> {
  return { status: 'degraded', value, error: describeError(error) };
}

/** `success` for a non-empty list, `empty` otherwise */
export function fromList<T>(items: T[]): TierResult<T[]> {
  return items.length > 0 ? success(items) : empty(items);
}
