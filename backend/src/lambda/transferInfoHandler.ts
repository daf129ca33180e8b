/**
 * Lambda handler for GET /transfer/{jobId}
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

const METHODS = 'GET, DELETE, OPTIONS';

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  logRequest(event);

  try {
    const response = await getDispatcher().getTransferInfo(
      getAuthorization(event),
      event.pathParameters?.jobId || '',
      getDestination(event)
    );
    return toProxyResult(response, METHODS);
  } catch (error) {
    return internalError(error, METHODS);
  }
}
