import type { StageResult } from '../types/api.js';
import type {
  FieldValue,
  FindTransfersQuery,
  Transfer,
  TransferInfo,
  TransferInfoExtended,
  TransferList,
} from '../types/transfer.js';

/**
 * Uniform contract every transfer service adapter implements.
 *
 * Operations resolve with a fault instead of rejecting when the transfer
 * service refuses a call or cannot be reached. Implementations keep no
 * per-call state so one instance can serve concurrent requests.
 */
export interface TransferService {
  readonly kind: string;

  startTransfer(auth: string, transfer: Transfer): Promise<StageResult<TransferInfo>>;

  /**
   * Without a state filter only active transfers are returned
   */
  findTransfers(auth: string, query: FindTransfersQuery): Promise<StageResult<TransferList>>;

  getTransferInfo(auth: string, jobId: string): Promise<StageResult<TransferInfoExtended>>;

  getTransferInfoField(auth: string, jobId: string, fieldName: string): Promise<StageResult<FieldValue>>;

  /**
   * Cancelling a transfer that already finished reports its final state
   */
  cancelTransfer(auth: string, jobId: string): Promise<StageResult<TransferInfoExtended>>;
}
