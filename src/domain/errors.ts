/**
 * Base class of the failures raised by the protocol adapters
 */
export class OpcLinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OpcLinkError';
  }
}

/**
 * The endpoint could not be reached or no session could be opened on it.
 */
export class TransportFault extends OpcLinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportFault';
  }
}

/**
 * A service call was answered with a bad status, or the remote side no longer
 * knows the session.
 */
export class ProtocolFault extends OpcLinkError {
  readonly statusName: string;

  constructor(message: string, statusName: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolFault';
    this.statusName = statusName;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Status name carried by a protocol fault, null for any other failure */
export function faultStatus(error: unknown): string | null {
  return error instanceof ProtocolFault ? error.statusName : null;
}
