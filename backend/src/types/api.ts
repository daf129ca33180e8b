import type { TransferInfoExtended } from './transfer.js';

export type FaultId =
  | 'invalidServiceConfig'
  | 'invalidParameter'
  | 'notAuthenticated'
  | 'permissionDenied'
  | 'credentialsExpired'
  | 'transferNotFound'
  | 'fieldNotFound'
  | 'transferError'
  | 'transportError'
  | 'serviceError';

/**
 * Tagged failure produced by any dispatch stage
 */
export interface TransferFault {
  id: FaultId;
  message: string;
  status?: number; // status reported by the backend, if any
  transfer?: TransferInfoExtended;
}

export type StageResult<T> =
  | { success: true; value: T }
  | { success: false; fault: TransferFault };

export type ContextPair = [key: string, value: string];

export interface ActionError {
  id: FaultId;
  status: number;
  description?: string;
  details: ContextPair[];
  transfer?: TransferInfoExtended;
}

/**
 * JSON body of an error response
 */
export interface ErrorResponse {
  id: FaultId;
  status: number;
  description?: string;
  details: Record<string, string>;
  transfer?: TransferInfoExtended;
}

export interface GatewayResponse {
  statusCode: number;
  contentType: 'application/json' | 'text/plain';
  body: unknown;
}
