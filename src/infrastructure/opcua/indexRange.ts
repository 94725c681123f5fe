import { NumericRange } from 'node-opcua-numeric-range';
import { isGood } from '../../domain/entities/DataValue.js';
import { describeError } from '../../domain/errors.js';
import type { IndexRangeResult } from '../../domain/ports/ISession.js';
import { toStatusCode } from './mappers.js';

/**
 * Restricts an array value to the elements an index range selects, using the
 * stack's own range parser so the range written is the range validated.
 */
export function applyIndexRange(value: unknown, indexRange: string): IndexRangeResult {
  if (!Array.isArray(value)) {
    return { ok: false, reason: 'Value is not an array' };
  }

  try {
    const range = new NumericRange(indexRange);
    if (!range.isValid()) {
      return { ok: false, reason: `Invalid index range: ${indexRange}` };
    }
    if (range.isEmpty()) {
      return { ok: false, reason: 'Empty index range' };
    }

    const extracted = range.extract_values(value);
    const status = toStatusCode(extracted.statusCode);
    if (!isGood(status) || !extracted.array) {
      return { ok: false, reason: status.name };
    }
    return { ok: true, value: extracted.array };
  } catch (error) {
    // the parser asserts on some malformed bounds instead of flagging them
    return { ok: false, reason: describeError(error) };
  }
}
