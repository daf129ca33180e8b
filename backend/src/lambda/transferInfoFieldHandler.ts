/**
 * Lambda handler for GET /transfer/{jobId}/{fieldName}
 *
 * JSON values (states, dates, numbers, booleans) are returned as JSON,
 * anything else as plain text.
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

const METHODS = 'GET, OPTIONS';

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  logRequest(event);

  try {
    const response = await getDispatcher().getTransferInfoField(
      getAuthorization(event),
      event.pathParameters?.jobId || '',
      event.pathParameters?.fieldName || '',
      getDestination(event)
    );
    return toProxyResult(response, METHODS);
  } catch (error) {
    return internalError(error, METHODS);
  }
}
