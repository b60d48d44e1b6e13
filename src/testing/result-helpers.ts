/**
 * Assertion helpers for DecodeResult in tests
 */

import { stringify } from 'lossless-json';
import type { DecodeError, DecodeResult } from '../errors.js';

export function expectOk<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

export function expectErr<T>(result: DecodeResult<T>): DecodeError {
  if (result.ok) {
    throw new Error(`Expected failure, got ${stringify(result.value) ?? 'undefined'}`);
  }
  return result.error;
}
