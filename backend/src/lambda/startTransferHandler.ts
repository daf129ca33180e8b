/**
 * Lambda handler for POST /transfers
 *
 * Starts a new transfer on the service that handles the requested
 * destination (`dest` query parameter, default destination otherwise).
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  getAuthorization,
  getDestination,
  getDispatcher,
  internalError,
  logRequest,
  toProxyResult,
} from './gateway.js';

const METHODS = 'GET, POST, OPTIONS';

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  logRequest(event);

  try {
    const response = await getDispatcher().startTransfer(
      getAuthorization(event),
      event.body,
      getDestination(event)
    );
    return toProxyResult(response, METHODS);
  } catch (error) {
    return internalError(error, METHODS);
  }
}
