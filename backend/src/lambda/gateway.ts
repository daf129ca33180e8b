/**
 * Shared plumbing for the transfer Lambda handlers
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ConfigService } from '../services/ConfigService.js';
import { DestinationRegistry } from '../services/DestinationRegistry.js';
import { ServiceFactory } from '../services/ServiceFactory.js';
import { TransferDispatcher } from '../services/TransferDispatcher.js';
import type { GatewayResponse } from '../types/api.js';
import { ErrorHandler } from '../utils/errorHandler.js';

// Built on first use so that a cold start with bad configuration fails the invocation
let dispatcher: TransferDispatcher | undefined;

export function getDispatcher(): TransferDispatcher {
  if (!dispatcher) {
    const config = ConfigService.getInstance().getConfig();
    const registry = new DestinationRegistry(config);
    console.log(`Transfer destinations: ${registry.destinations().join(', ')}`);
    dispatcher = new TransferDispatcher(registry, new ServiceFactory());
  }
  return dispatcher;
}

/**
 * Replaces the shared dispatcher, or drops it when called without one
 */
export function resetDispatcher(replacement?: TransferDispatcher): void {
  dispatcher = replacement;
}

/**
 * Authorization header value; API Gateway keeps the client's header casing
 */
export function getAuthorization(event: APIGatewayProxyEvent): string | undefined {
  for (const [name, value] of Object.entries(event.headers || {})) {
    if (name.toLowerCase() === 'authorization' && value) {
      return value;
    }
  }
  return undefined;
}

export function getDestination(event: APIGatewayProxyEvent): string | undefined {
  return event.queryStringParameters?.dest;
}

export function logRequest(event: APIGatewayProxyEvent): void {
  console.log(`${event.httpMethod} ${event.path} request received`);
}

export function toProxyResult(response: GatewayResponse, methods: string): APIGatewayProxyResult {
  return {
    statusCode: response.statusCode,
    headers: {
      'Content-Type': response.contentType,
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Headers': 'Content-Type, Authorization',
      'Access-Control-Allow-Methods': methods,
    },
    body: response.contentType === 'text/plain' ? String(response.body) : JSON.stringify(response.body),
  };
}

/**
 * Last-resort response when building the dispatcher itself failed
 */
export function internalError(error: unknown, methods: string): APIGatewayProxyResult {
  console.error('Transfer gateway is not available:', error);
  const actionError = ErrorHandler.toActionError(
    ErrorHandler.fault('serviceError', 'Transfer gateway is not configured correctly', 500),
    []
  );
  return toProxyResult(
    { statusCode: actionError.status, contentType: 'application/json', body: ErrorHandler.formatErrorResponse(actionError) },
    methods
  );
}
