/**
 * Lambda handler for GET /transfers
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
  const query = event.queryStringParameters || {};

  try {
    const response = await getDispatcher().findTransfers(
      getAuthorization(event),
      {
        fields: query.fields,
        limit: query.limit,
        timeWindow: query.time_window,
        stateIn: query.state_in,
        sourceSE: query.source_se,
        destinationSE: query.dest_se,
        delegationId: query.dlg_id,
        voName: query.vo_name,
        userDN: query.user_dn,
      },
      getDestination(event)
    );
    return toProxyResult(response, METHODS);
  } catch (error) {
    return internalError(error, METHODS);
  }
}
