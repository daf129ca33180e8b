import axios from 'axios';
import type {
  ActionError,
  ContextPair,
  ErrorResponse,
  FaultId,
  TransferFault,
} from '../types/api.js';

/**
 * Thrown while loading configuration at cold start
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const FAULT_STATUS: Record<Exclude<FaultId, 'serviceError'>, number> = {
  invalidServiceConfig: 400,
  invalidParameter: 400,
  notAuthenticated: 401,
  permissionDenied: 403,
  transferNotFound: 404,
  fieldNotFound: 404,
  transferError: 207,
  credentialsExpired: 419,
  transportError: 500,
};

const EXPIRED_CREDENTIAL = /expired/i;

function brokerMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.length > 0) {
    return data;
  }
  if (typeof data === 'object' && data !== null && 'message' in data) {
    const { message } = data;
    if (typeof message === 'string') {
      return message;
    }
  }
  return undefined;
}

/**
 * Classifies failures and turns them into the uniform error envelope
 */
export class ErrorHandler {
  static fault(id: FaultId, message: string, status?: number): TransferFault {
    return status === undefined ? { id, message } : { id, message, status };
  }

  /**
   * Classifies an error raised by a call to a transfer service.
   * A 404 means the job is unknown unless a field was being queried.
   */
  static handleBrokerError(error: unknown, lookup: 'job' | 'field' = 'job'): TransferFault {
    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fault('serviceError', `Transfer service call failed: ${message}`, 500);
    }

    if (!error.response) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return this.fault('transportError', 'Connection to transfer service timed out');
      }
      if (error.code === 'ENOTFOUND') {
        return this.fault('transportError', 'Unable to resolve transfer service host');
      }
      if (error.code === 'ECONNREFUSED') {
        return this.fault('transportError', 'Connection refused by transfer service');
      }
      if (error.code === 'ECONNRESET') {
        return this.fault('transportError', 'Connection reset by transfer service');
      }
      return this.fault('transportError', `Transfer service unreachable: ${error.message}`);
    }

    const status = error.response.status;
    const message = brokerMessage(error.response.data) || `Transfer service returned HTTP ${status}`;

    switch (status) {
      case 400:
        return this.fault('invalidParameter', message, status);
      case 401:
        return EXPIRED_CREDENTIAL.test(message)
          ? this.fault('credentialsExpired', message, status)
          : this.fault('notAuthenticated', message, status);
      case 403:
        return this.fault('permissionDenied', message, status);
      case 404:
        return lookup === 'field'
          ? this.fault('fieldNotFound', message, status)
          : this.fault('transferNotFound', message, status);
      case 419:
        return this.fault('credentialsExpired', message, status);
      default:
        return this.fault('serviceError', message, status);
    }
  }

  static statusFor(fault: TransferFault): number {
    if (fault.id === 'serviceError') {
      return fault.status || 500;
    }
    return FAULT_STATUS[fault.id];
  }

  /**
   * Builds the error envelope from a fault and the calling operation's
   * context. Pairs with an empty value are left out.
   */
  static toActionError(fault: TransferFault, context: ContextPair[]): ActionError {
    const actionError: ActionError = {
      id: fault.id,
      status: this.statusFor(fault),
      description: fault.message,
      details: context.filter(([, value]) => value.length > 0),
    };

    if (fault.transfer) {
      actionError.transfer = fault.transfer;
    }

    return actionError;
  }

  /**
   * Formats an action error for the response body
   */
  static formatErrorResponse(actionError: ActionError): ErrorResponse {
    const body: ErrorResponse = {
      id: actionError.id,
      status: actionError.status,
      description: actionError.description,
      details: Object.fromEntries(actionError.details),
    };

    if (actionError.transfer) {
      body.transfer = actionError.transfer;
    }

    return body;
  }
}
