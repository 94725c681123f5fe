/**
 * Protocol status code. The two most significant bits of `code` carry the
 * severity: 00 good, 01 uncertain, 10 bad.
 */
export interface StatusCode {
  code: number;
  name: string;
}

export type StatusSeverity = 'good' | 'uncertain' | 'bad';

export const GOOD: StatusCode = { code: 0, name: 'Good' };

export function statusSeverity(status: StatusCode): StatusSeverity {
  const bits = status.code >>> 30;
  if (bits === 0) return 'good';
  if (bits === 1) return 'uncertain';
  return 'bad';
}

export function isBad(status: StatusCode): boolean {
  return statusSeverity(status) === 'bad';
}

export function isGood(status: StatusCode): boolean {
  return statusSeverity(status) === 'good';
}

/**
 * Value of a node attribute together with its quality and timestamps
 */
export interface DataValue {
  value: unknown;
  statusCode: StatusCode;
  sourceTimestamp: Date | null;
  serverTimestamp: Date | null;
}
