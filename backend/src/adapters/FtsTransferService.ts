/**
 * Transfer service adapter for FTS3 (File Transfer Service) REST endpoints
 *
 * Calls made per operation:
 * - startTransfer: POST /jobs
 * - findTransfers: GET /jobs
 * - getTransferInfo: GET /jobs/{id}, GET /jobs/{id}/files
 * - getTransferInfoField: GET /jobs/{id}/{field}
 * - cancelTransfer: DELETE /jobs/{id}, GET /jobs/{id}/files
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { StageResult, TransferFault } from '../types/api.js';
import type { ServiceDescriptor } from '../types/config.js';
import {
  type FieldValue,
  type FindTransfersQuery,
  type Transfer,
  type TransferInfo,
  type TransferInfoExtended,
  type TransferList,
  isTerminalState,
} from '../types/transfer.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import type { TransferService } from './TransferService.js';
import {
  DEFAULT_FTS_STATE_FILTER,
  FTS_FIELDS,
  type FtsRecord,
  isFtsRecord,
  toFieldValue,
  toFtsFieldList,
  toFtsStateFilter,
  toFtsSubmission,
  toTransferInfo,
  toTransferInfoExtended,
} from './ftsMapping.js';

const MULTI_STATUS = 207;

// Not scalar job fields, cannot be queried on their own
const UNQUERYABLE_FIELDS = ['files', 'kind'];

export class FtsTransferService implements TransferService {
  readonly kind = 'fts';
  private readonly client: AxiosInstance;

  constructor(descriptor: ServiceDescriptor) {
    this.client = axios.create({
      baseURL: descriptor.url,
      timeout: descriptor.timeout,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
    });
  }

  async startTransfer(auth: string, transfer: Transfer): Promise<StageResult<TransferInfo>> {
    try {
      const response = await this.client.post('/jobs', toFtsSubmission(transfer), this.withAuth(auth));
      if (response.status === MULTI_STATUS) {
        return { success: false, fault: this.multiStatusFault(response.data) };
      }

      const data: unknown = response.data;
      if (!isFtsRecord(data) || typeof data.job_id !== 'string' || data.job_id.length === 0) {
        return {
          success: false,
          fault: ErrorHandler.fault('serviceError', 'Transfer service did not return a job ID', 502),
        };
      }

      return { success: true, value: toTransferInfo({ job_state: 'SUBMITTED', ...data }) };
    } catch (error) {
      return { success: false, fault: ErrorHandler.handleBrokerError(error) };
    }
  }

  async findTransfers(auth: string, query: FindTransfersQuery): Promise<StageResult<TransferList>> {
    const params: Record<string, string | number> = {
      limit: query.limit,
      state_in: query.stateIn ? toFtsStateFilter(query.stateIn) : DEFAULT_FTS_STATE_FILTER,
    };

    if (query.fields) params.fields = toFtsFieldList(query.fields);
    if (query.timeWindow) params.time_window = query.timeWindow;
    if (query.sourceSE) params.source_se = query.sourceSE;
    if (query.destinationSE) params.dest_se = query.destinationSE;
    if (query.delegationId) params.dlg_id = query.delegationId;
    if (query.voName) params.vo_name = query.voName;
    if (query.userDN) params.user_dn = query.userDN;

    try {
      const response = await this.client.get('/jobs', { ...this.withAuth(auth), params });
      const data: unknown = response.data;
      if (!Array.isArray(data)) {
        return {
          success: false,
          fault: ErrorHandler.fault('serviceError', 'Transfer service returned an invalid job list', 502),
        };
      }

      let transfers = data.filter(isFtsRecord).map(toTransferInfo);
      if (!query.stateIn) {
        // Keep the default query free of finished jobs even if the service ignores the filter
        transfers = transfers.filter((transfer) => !isTerminalState(transfer.jobState));
      }

      return {
        success: true,
        value: { kind: 'TransferList', count: transfers.length, transfers },
      };
    } catch (error) {
      return { success: false, fault: ErrorHandler.handleBrokerError(error) };
    }
  }

  async getTransferInfo(auth: string, jobId: string): Promise<StageResult<TransferInfoExtended>> {
    try {
      const response = await this.client.get(this.jobPath(jobId), this.withAuth(auth));
      return await this.withFiles(auth, jobId, response);
    } catch (error) {
      return { success: false, fault: ErrorHandler.handleBrokerError(error) };
    }
  }

  async getTransferInfoField(
    auth: string,
    jobId: string,
    fieldName: string
  ): Promise<StageResult<FieldValue>> {
    if (UNQUERYABLE_FIELDS.includes(fieldName)) {
      return {
        success: false,
        fault: ErrorHandler.fault('fieldNotFound', `Field '${fieldName}' cannot be queried`),
      };
    }

    const ftsName = FTS_FIELDS.get(fieldName)?.ftsName || fieldName;
    try {
      const response = await this.client.get(
        `${this.jobPath(jobId)}/${encodeURIComponent(ftsName)}`,
        this.withAuth(auth)
      );
      if (response.status === MULTI_STATUS) {
        return { success: false, fault: this.multiStatusFault(response.data) };
      }

      return { success: true, value: toFieldValue(fieldName, response.data) };
    } catch (error) {
      return { success: false, fault: ErrorHandler.handleBrokerError(error, 'field') };
    }
  }

  async cancelTransfer(auth: string, jobId: string): Promise<StageResult<TransferInfoExtended>> {
    try {
      const response = await this.client.delete(this.jobPath(jobId), this.withAuth(auth));
      return await this.withFiles(auth, jobId, response, { filesOptional: true });
    } catch (error) {
      return { success: false, fault: ErrorHandler.handleBrokerError(error) };
    }
  }

  private withAuth(auth: string): AxiosRequestConfig {
    return { headers: { Authorization: auth } };
  }

  private jobPath(jobId: string): string {
    return `/jobs/${encodeURIComponent(jobId)}`;
  }

  /**
   * Completes a job response with the job's file list.
   * With filesOptional, a failed file listing falls back to the files
   * embedded in the job, since the job itself has already been changed.
   */
  private async withFiles(
    auth: string,
    jobId: string,
    jobResponse: AxiosResponse<unknown>,
    { filesOptional = false }: { filesOptional?: boolean } = {}
  ): Promise<StageResult<TransferInfoExtended>> {
    if (jobResponse.status === MULTI_STATUS) {
      return { success: false, fault: this.multiStatusFault(jobResponse.data) };
    }

    const job = jobResponse.data;
    if (!isFtsRecord(job)) {
      return {
        success: false,
        fault: ErrorHandler.fault('serviceError', 'Transfer service returned an invalid job', 502),
      };
    }

    let files: unknown;
    try {
      const filesResponse = await this.client.get(`${this.jobPath(jobId)}/files`, this.withAuth(auth));
      files = filesResponse.data;
    } catch (error) {
      if (!filesOptional) {
        throw error;
      }
      console.warn(`Could not list files of transfer ${jobId}:`, ErrorHandler.handleBrokerError(error));
      files = this.embeddedFiles(job);
    }

    return { success: true, value: toTransferInfoExtended(job, Array.isArray(files) ? files : []) };
  }

  /**
   * The service answered with a per-job error; report it with the job attached
   */
  private multiStatusFault(data: unknown): TransferFault {
    const job: unknown = Array.isArray(data) ? data.find(isFtsRecord) : data;
    if (!isFtsRecord(job)) {
      return ErrorHandler.fault('transferError', 'Transfer service reported a transfer error', MULTI_STATUS);
    }

    const reason = typeof job.reason === 'string' && job.reason ? job.reason : 'Transfer service reported a transfer error';
    const fault = ErrorHandler.fault('transferError', reason, MULTI_STATUS);
    if (job.job_id !== undefined) {
      fault.transfer = toTransferInfoExtended(job, this.embeddedFiles(job));
    }
    return fault;
  }

  private embeddedFiles(job: FtsRecord): unknown[] {
    return Array.isArray(job.files) ? job.files : [];
  }
}
