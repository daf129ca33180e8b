export type JobState =
  | 'submitted'
  | 'active'
  | 'canceled'
  | 'failed'
  | 'finished'
  | 'finished-with-errors'
  | 'unknown';

export const JOB_STATES: readonly JobState[] = [
  'submitted',
  'active',
  'canceled',
  'failed',
  'finished',
  'finished-with-errors',
  'unknown',
];

export const TERMINAL_JOB_STATES: readonly JobState[] = [
  'canceled',
  'failed',
  'finished',
  'finished-with-errors',
];

export function isTerminalState(state: JobState): boolean {
  return TERMINAL_JOB_STATES.includes(state);
}

export type ChecksumMode = 'source' | 'target' | 'both' | 'none';

export type ChecksumVerification = boolean | ChecksumMode;

export interface TransferPayload {
  sources: string[];
  destinations: string[];
  checksum?: string;
  filesize?: number;
  metadata?: string;
  activity?: string;
}

export interface TransferParameters {
  verifyChecksum?: ChecksumVerification;
  overwrite?: boolean;
  priority?: number;
  retry?: number;
  retryDelay?: number;
  jobMetadata?: Record<string, unknown>;
  maxTimeInQueue?: number;
  strictCopy?: boolean;
  reuse?: boolean;
}

/**
 * Request body for a new transfer. Owned by the caller and handed to the
 * backend adapter as received.
 */
export interface Transfer {
  files: TransferPayload[];
  params?: TransferParameters;
}

export interface TransferInfo {
  kind: 'TransferInfo';
  jobId: string;
  jobState: JobState;
  submittedAt?: string; // ISO timestamp
}

export interface TransferFileInfo {
  fileId: number;
  fileState: JobState;
  source: string;
  destination: string;
  fileSize?: number;
  checksum?: string;
  startedAt?: string;
  finishedAt?: string;
  reason?: string;
}

export interface TransferInfoExtended extends Omit<TransferInfo, 'kind'> {
  kind: 'TransferInfoExtended';
  jobType?: string;
  jobMetadata?: unknown;
  priority?: number;
  overwrite?: boolean;
  verifyChecksum?: ChecksumMode;
  sourceSpaceToken?: string;
  destinationSpaceToken?: string;
  userDN?: string;
  voName?: string;
  delegationId?: string;
  sourceSE?: string;
  destinationSE?: string;
  submittedTo?: string;
  finishedAt?: string;
  reason?: string;
  files: TransferFileInfo[];
  filesTotal: number;
  filesCompleted: number;
  filesFailed: number;
  progress: number; // percentage of files in a terminal state
}

export interface TransferList {
  kind: 'TransferList';
  count: number;
  transfers: TransferInfo[];
}

export interface FindTransfersQuery {
  fields?: string;
  limit: number;
  timeWindow?: string;
  stateIn?: string;
  sourceSE?: string;
  destinationSE?: string;
  delegationId?: string;
  voName?: string;
  userDN?: string;
}

export type FieldValue =
  | { type: 'json'; value: string | number | boolean | null }
  | { type: 'text'; value: string };
