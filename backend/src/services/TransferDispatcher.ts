/**
 * Routes each transfer operation to the transfer service configured for the
 * requested destination.
 *
 * Every request passes through the same stages, strictly in order:
 * - validate the request parameters
 * - check the bearer credential
 * - resolve the destination to a service descriptor
 * - get the adapter for that descriptor
 * - invoke the operation on the adapter
 *
 * The first stage that fails ends the request; its fault is turned into an
 * ActionError exactly once, in fail(). Nothing is retried here.
 */

import type { TransferService } from '../adapters/TransferService.js';
import type { ContextPair, GatewayResponse, StageResult, TransferFault } from '../types/api.js';
import type { FindTransfersQuery } from '../types/transfer.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import type { DestinationRegistry } from './DestinationRegistry.js';
import type { ServiceFactory } from './ServiceFactory.js';
import { ValidationService } from './ValidationService.js';

const BEARER = /^Bearer\s+\S+/i;

export interface FindTransfersParams {
  fields?: string;
  limit?: string;
  timeWindow?: string;
  stateIn?: string;
  sourceSE?: string;
  destinationSE?: string;
  delegationId?: string;
  voName?: string;
  userDN?: string;
}

interface DispatchRequest {
  auth: string | undefined;
  destination: string;
  context: ContextPair[];
  failureMessage: string;
}

export class TransferDispatcher {
  constructor(
    private readonly registry: DestinationRegistry,
    private readonly factory: ServiceFactory
  ) {}

  async startTransfer(
    auth: string | undefined,
    body: string | null,
    destination?: string
  ): Promise<GatewayResponse> {
    console.log('Start new data transfer');

    const request = this.request(auth, destination, [], 'Failed to start new transfer');
    if (!body) {
      return this.fail(request, ErrorHandler.fault('invalidParameter', 'Request body is required'));
    }

    let transfer: unknown;
    try {
      transfer = JSON.parse(body);
    } catch (error) {
      return this.fail(request, ErrorHandler.fault('invalidParameter', 'Invalid JSON in request body'));
    }

    if (!ValidationService.isTransfer(transfer)) {
      const validation = ValidationService.validateTransfer(transfer);
      return this.fail(request, ErrorHandler.fault('invalidParameter', validation.error || 'Invalid transfer'));
    }

    const accepted = transfer;
    return this.dispatch(
      request,
      (service, credential) => service.startTransfer(credential, accepted),
      (transferInfo) => {
        console.log(`Started new transfer ${transferInfo.jobId}`);
        return this.json(202, transferInfo);
      }
    );
  }

  async findTransfers(
    auth: string | undefined,
    params: FindTransfersParams,
    destination?: string
  ): Promise<GatewayResponse> {
    const rawLimit = ValidationService.sanitizeInput(params.limit);
    const query = {
      fields: ValidationService.sanitizeInput(params.fields),
      timeWindow: ValidationService.sanitizeInput(params.timeWindow),
      stateIn: ValidationService.sanitizeInput(params.stateIn),
      sourceSE: ValidationService.sanitizeInput(params.sourceSE),
      destinationSE: ValidationService.sanitizeInput(params.destinationSE),
      delegationId: ValidationService.sanitizeInput(params.delegationId),
      voName: ValidationService.sanitizeInput(params.voName),
      userDN: ValidationService.sanitizeInput(params.userDN),
    };

    const limitResult = ValidationService.parseLimit(rawLimit);
    const context: ContextPair[] = [
      ['limit', limitResult.isValid ? String(limitResult.value) : rawLimit],
      ['filter:fields', query.fields],
      ['filter:time_window', query.timeWindow],
      ['filter:state_in', query.stateIn],
      ['filter:source_se', query.sourceSE],
      ['filter:dest_se', query.destinationSE],
      ['filter:dlg_id', query.delegationId],
      ['filter:vo_name', query.voName],
      ['filter:user_dn', query.userDN],
    ];

    const criteria = context
      .filter(([, value]) => value.length > 0)
      .map(([key, value]) => `${key.replace('filter:', '')} = ${value}`)
      .join(', ');
    console.log(`Find data transfers matching criteria: ${criteria}`);

    const request = this.request(auth, destination, context, 'Failed to find matching transfers');
    if (!limitResult.isValid) {
      return this.fail(request, ErrorHandler.fault('invalidParameter', limitResult.error));
    }

    if (query.timeWindow) {
      const timeWindowResult = ValidationService.validateTimeWindow(query.timeWindow);
      if (!timeWindowResult.isValid) {
        return this.fail(
          request,
          ErrorHandler.fault('invalidParameter', timeWindowResult.error || 'Invalid time window')
        );
      }
    }

    const findQuery: FindTransfersQuery = { ...query, limit: limitResult.value };
    return this.dispatch(
      request,
      (service, credential) => service.findTransfers(credential, findQuery),
      (matches) => {
        console.log(`Found ${matches.count} matching transfers`);
        return this.json(200, matches);
      }
    );
  }

  async getTransferInfo(
    auth: string | undefined,
    jobId: string,
    destination?: string
  ): Promise<GatewayResponse> {
    console.log(`Retrieve details of transfer ${jobId}`);

    const request = this.request(
      auth,
      destination,
      [['jobId', jobId]],
      `Failed to get details of transfer ${jobId}`
    );
    const validation = ValidationService.validatePathSegment('jobId', jobId);
    if (!validation.isValid) {
      return this.fail(request, ErrorHandler.fault('invalidParameter', validation.error || 'Invalid job ID'));
    }

    return this.dispatch(
      request,
      (service, credential) => service.getTransferInfo(credential, jobId),
      (transferInfo) => {
        console.log(`Transfer ${transferInfo.jobId} is ${transferInfo.jobState}`);
        return this.json(200, transferInfo);
      }
    );
  }

  async getTransferInfoField(
    auth: string | undefined,
    jobId: string,
    fieldName: string,
    destination?: string
  ): Promise<GatewayResponse> {
    console.log(`Retrieve field '${fieldName}' from details of transfer ${jobId}`);

    const segments: ContextPair[] = [
      ['jobId', jobId],
      ['fieldName', fieldName],
    ];
    const request = this.request(
      auth,
      destination,
      segments,
      `Failed to get field ${fieldName} of transfer ${jobId}`
    );
    for (const [name, value] of segments) {
      const validation = ValidationService.validatePathSegment(name, value);
      if (!validation.isValid) {
        return this.fail(request, ErrorHandler.fault('invalidParameter', validation.error || `Invalid ${name}`));
      }
    }

    return this.dispatch(
      request,
      (service, credential) => service.getTransferInfoField(credential, jobId, fieldName),
      (fieldValue) => {
        console.log(`Field ${fieldName} of transfer ${jobId} is ${String(fieldValue.value)}`);
        return fieldValue.type === 'json'
          ? this.json(200, fieldValue.value)
          : { statusCode: 200, contentType: 'text/plain', body: fieldValue.value };
      }
    );
  }

  async cancelTransfer(
    auth: string | undefined,
    jobId: string,
    destination?: string
  ): Promise<GatewayResponse> {
    console.log(`Cancel transfer ${jobId}`);

    const request = this.request(auth, destination, [['jobId', jobId]], `Failed to cancel transfer ${jobId}`);
    const validation = ValidationService.validatePathSegment('jobId', jobId);
    if (!validation.isValid) {
      return this.fail(request, ErrorHandler.fault('invalidParameter', validation.error || 'Invalid job ID'));
    }

    return this.dispatch(
      request,
      (service, credential) => service.cancelTransfer(credential, jobId),
      (transferInfo) => {
        console.log(`Transfer ${transferInfo.jobId} is ${transferInfo.jobState}`);
        return this.json(200, transferInfo);
      }
    );
  }

  private request(
    auth: string | undefined,
    destination: string | undefined,
    context: ContextPair[],
    failureMessage: string
  ): DispatchRequest {
    // Destination keys are matched exactly; only an absent key selects the default
    const dest = destination === undefined || destination === '' ? this.registry.getDefaultDestination() : destination;
    return {
      auth,
      destination: dest,
      context: [['destination', dest], ...context],
      failureMessage,
    };
  }

  private async dispatch<T>(
    request: DispatchRequest,
    invoke: (service: TransferService, credential: string) => Promise<StageResult<T>>,
    onSuccess: (value: T) => GatewayResponse
  ): Promise<GatewayResponse> {
    const credential = this.checkCredential(request.auth);
    if (!credential.success) {
      return this.fail(request, credential.fault);
    }

    const descriptor = this.registry.resolve(request.destination);
    if (!descriptor.success) {
      return this.fail(request, descriptor.fault);
    }

    const service = this.factory.getAdapter(descriptor.value);
    if (!service.success) {
      return this.fail(request, service.fault);
    }

    let result: StageResult<T>;
    try {
      result = await invoke(service.value, credential.value);
    } catch (error) {
      result = { success: false, fault: ErrorHandler.handleBrokerError(error) };
    }

    if (!result.success) {
      return this.fail(request, result.fault);
    }

    return onSuccess(result.value);
  }

  private checkCredential(auth: string | undefined): StageResult<string> {
    const credential = ValidationService.sanitizeInput(auth);
    if (!BEARER.test(credential)) {
      return {
        success: false,
        fault: ErrorHandler.fault('notAuthenticated', 'Missing or invalid bearer token'),
      };
    }
    return { success: true, value: credential };
  }

  private fail(request: DispatchRequest, fault: TransferFault): GatewayResponse {
    console.error(request.failureMessage, fault);
    const actionError = ErrorHandler.toActionError(fault, request.context);
    return this.json(actionError.status, ErrorHandler.formatErrorResponse(actionError));
  }

  private json(statusCode: number, body: unknown): GatewayResponse {
    return { statusCode, contentType: 'application/json', body };
  }
}
