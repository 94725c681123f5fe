import {
  GOOD,
  statusSeverity,
  type DataValue,
  type StatusCode,
} from '../../domain/entities/DataValue.js';
import { nodeClassFromBits, type NodeReference } from '../../domain/entities/NodeReference.js';

/*
 * Structural views of the node-opcua types the mappers read. The library's
 * classes satisfy them, and tests can pass plain objects.
 */

export interface StatusCodeLike {
  readonly value: number;
  readonly name: string;
}

export interface DataValueLike {
  value: { value: unknown } | null;
  statusCode: StatusCodeLike | null;
  sourceTimestamp: Date | null;
  serverTimestamp: Date | null;
}

export interface ReferenceDescriptionLike {
  displayName: { text?: string | null };
  nodeClass: number;
  nodeId: { toString(): string };
  typeDefinition: { toString(): string };
}

/** Values of the ServerState enumeration, by position */
const SERVER_STATES = [
  'Running',
  'Failed',
  'NoConfiguration',
  'Suspended',
  'Shutdown',
  'Test',
  'CommunicationFault',
  'Unknown',
] as const;

export function toStatusCode(status: StatusCodeLike | null): StatusCode {
  if (status === null) return GOOD;
  return { code: status.value, name: status.name };
}

export function toDataValue(dataValue: DataValueLike): DataValue {
  return {
    value: dataValue.value?.value ?? null,
    statusCode: toStatusCode(dataValue.statusCode),
    sourceTimestamp: dataValue.sourceTimestamp,
    serverTimestamp: dataValue.serverTimestamp,
  };
}

export function toNodeReference(description: ReferenceDescriptionLike): NodeReference {
  return {
    displayName: description.displayName.text ?? '',
    nodeClass: nodeClassFromBits(description.nodeClass),
    nodeId: description.nodeId.toString(),
    typeDefinition: description.typeDefinition.toString(),
  };
}

export function serverStateName(value: unknown): string | null {
  if (typeof value !== 'number') return null;
  return SERVER_STATES[value] ?? null;
}

/**
 * Severity class of a status, in the form the stack's generic codes use
 */
export function severityName(status: StatusCode): 'Good' | 'Uncertain' | 'Bad' {
  switch (statusSeverity(status)) {
    case 'good':
      return 'Good';
    case 'uncertain':
      return 'Uncertain';
    default:
      return 'Bad';
  }
}
