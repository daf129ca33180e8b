/**
 * Translation between FTS3 REST payloads and the uniform transfer model
 */

import {
  type ChecksumMode,
  type FieldValue,
  type JobState,
  type Transfer,
  type TransferFileInfo,
  type TransferInfo,
  type TransferInfoExtended,
  isTerminalState,
} from '../types/transfer.js';

export type FtsRecord = Record<string, unknown>;

export function isFtsRecord(value: unknown): value is FtsRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const FTS_STATE_TABLE: Record<string, JobState> = {
  SUBMITTED: 'submitted',
  READY: 'submitted',
  STAGING: 'submitted',
  ON_HOLD: 'submitted',
  ON_HOLD_STAGING: 'submitted',
  TOKEN_PREP: 'submitted',
  DELETE: 'submitted',
  ACTIVE: 'active',
  STARTED: 'active',
  ARCHIVING: 'active',
  CANCELED: 'canceled',
  NOT_USED: 'canceled',
  FAILED: 'failed',
  FINISHED: 'finished',
  FINISHEDDIRTY: 'finished-with-errors',
};

const FTS_STATES = new Map(Object.entries(FTS_STATE_TABLE));

const UNIFORM_TO_FTS_STATES = new Map<string, string[]>(Object.entries({
  submitted: ['SUBMITTED', 'READY', 'STAGING'],
  active: ['ACTIVE'],
  canceled: ['CANCELED'],
  failed: ['FAILED'],
  finished: ['FINISHED'],
  'finished-with-errors': ['FINISHEDDIRTY'],
}));

// FTS stores the mode as its first letter
const CHECKSUM_MODES = new Map<string, ChecksumMode>(Object.entries({
  b: 'both',
  s: 'source',
  t: 'target',
  n: 'none',
  both: 'both',
  source: 'source',
  target: 'target',
  none: 'none',
}));

export const DEFAULT_FTS_STATE_FILTER = 'ACTIVE';

type FieldType = 'string' | 'number' | 'boolean' | 'date' | 'state' | 'checksum' | 'opaque';

interface FieldMapping {
  ftsName: string;
  type: FieldType;
}

/**
 * Scalar fields of TransferInfoExtended and where FTS keeps them
 */
const FTS_FIELD_TABLE: Record<string, FieldMapping> = {
  jobId: { ftsName: 'job_id', type: 'string' },
  jobState: { ftsName: 'job_state', type: 'state' },
  jobType: { ftsName: 'job_type', type: 'string' },
  jobMetadata: { ftsName: 'job_metadata', type: 'opaque' },
  priority: { ftsName: 'priority', type: 'number' },
  overwrite: { ftsName: 'overwrite_flag', type: 'boolean' },
  verifyChecksum: { ftsName: 'verify_checksum', type: 'checksum' },
  sourceSpaceToken: { ftsName: 'source_space_token', type: 'string' },
  destinationSpaceToken: { ftsName: 'space_token', type: 'string' },
  userDN: { ftsName: 'user_dn', type: 'string' },
  voName: { ftsName: 'vo_name', type: 'string' },
  delegationId: { ftsName: 'cred_id', type: 'string' },
  sourceSE: { ftsName: 'source_se', type: 'string' },
  destinationSE: { ftsName: 'dest_se', type: 'string' },
  submittedAt: { ftsName: 'submit_time', type: 'date' },
  submittedTo: { ftsName: 'submit_host', type: 'string' },
  finishedAt: { ftsName: 'job_finished', type: 'date' },
  reason: { ftsName: 'reason', type: 'string' },
};

export const FTS_FIELDS = new Map(Object.entries(FTS_FIELD_TABLE));

export function toJobState(ftsState: unknown): JobState {
  if (typeof ftsState !== 'string') {
    return 'unknown';
  }
  return FTS_STATES.get(ftsState.toUpperCase()) || 'unknown';
}

/**
 * Translates a comma separated list of uniform states into FTS states.
 * Names outside the uniform vocabulary are passed on verbatim.
 */
export function toFtsStateFilter(stateIn: string): string {
  const ftsStates: string[] = [];
  for (const state of stateIn.split(',').map((s) => s.trim()).filter((s) => s.length > 0)) {
    for (const ftsState of UNIFORM_TO_FTS_STATES.get(state) || [state]) {
      if (!ftsStates.includes(ftsState)) {
        ftsStates.push(ftsState);
      }
    }
  }
  return ftsStates.join(',');
}

/**
 * Translates a comma separated list of uniform field names into FTS field
 * names, always including the ones needed to build a TransferInfo
 */
export function toFtsFieldList(fields: string): string {
  const ftsFields = ['job_id', 'job_state', 'submit_time'];
  for (const field of fields.split(',').map((f) => f.trim()).filter((f) => f.length > 0)) {
    const ftsName = FTS_FIELDS.get(field)?.ftsName || field;
    if (!ftsFields.includes(ftsName)) {
      ftsFields.push(ftsName);
    }
  }
  return ftsFields.join(',');
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  return undefined;
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0 && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.toUpperCase();
    if (normalized === 'Y' || normalized === 'TRUE') {
      return true;
    }
    if (normalized === 'N' || normalized === 'FALSE') {
      return false;
    }
  }
  return undefined;
}

/**
 * FTS reports UTC timestamps without a zone designator
 */
export function toIsoTimestamp(value: unknown): string | undefined {
  const text = optionalString(value);
  if (!text) {
    return undefined;
  }

  const zoned = /(Z|[+-]\d{2}:?\d{2})$/.test(text) ? text : `${text}Z`;
  const date = new Date(zoned);
  return Number.isNaN(date.getTime()) ? text : date.toISOString();
}

export function toVerifyChecksum(value: unknown): ChecksumMode | undefined {
  if (typeof value === 'boolean') {
    return value ? 'both' : 'none';
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  return CHECKSUM_MODES.get(value.trim().toLowerCase());
}

/**
 * Drops members whose value is undefined so they stay out of the JSON body
 */
function compact(record: FtsRecord): FtsRecord {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

export function toFtsSubmission(transfer: Transfer): FtsRecord {
  const params = transfer.params || {};
  return {
    files: transfer.files.map((file) =>
      compact({
        sources: file.sources,
        destinations: file.destinations,
        checksum: file.checksum,
        filesize: file.filesize,
        metadata: file.metadata,
        activity: file.activity,
      })
    ),
    params: compact({
      verify_checksum: params.verifyChecksum,
      overwrite: params.overwrite,
      priority: params.priority,
      retry: params.retry,
      retry_delay: params.retryDelay,
      job_metadata: params.jobMetadata,
      max_time_in_queue: params.maxTimeInQueue,
      strict_copy: params.strictCopy,
      reuse: params.reuse,
    }),
  };
}

export function toTransferInfo(job: FtsRecord): TransferInfo {
  const info: TransferInfo = {
    kind: 'TransferInfo',
    jobId: String(job.job_id ?? ''),
    jobState: toJobState(job.job_state),
  };

  const submittedAt = toIsoTimestamp(job.submit_time);
  if (submittedAt) {
    info.submittedAt = submittedAt;
  }

  return info;
}

export function toFileInfo(file: FtsRecord): TransferFileInfo {
  return {
    fileId: optionalNumber(file.file_id) ?? 0,
    fileState: toJobState(file.file_state),
    source: optionalString(file.source_surl) || '',
    destination: optionalString(file.dest_surl) || '',
    fileSize: optionalNumber(file.filesize),
    checksum: optionalString(file.checksum),
    startedAt: toIsoTimestamp(file.start_time),
    finishedAt: toIsoTimestamp(file.finish_time),
    reason: optionalString(file.reason),
  };
}

export function toTransferInfoExtended(job: FtsRecord, rawFiles: unknown[]): TransferInfoExtended {
  const files = rawFiles.filter(isFtsRecord).map(toFileInfo);
  const filesTotal = files.length;
  const filesCompleted = files.filter((f) => f.fileState === 'finished').length;
  const filesFailed = files.filter((f) => f.fileState === 'failed').length;
  const filesDone = files.filter((f) => isTerminalState(f.fileState)).length;

  return {
    ...toTransferInfo(job),
    kind: 'TransferInfoExtended',
    jobType: optionalString(job.job_type),
    jobMetadata: job.job_metadata ?? undefined,
    priority: optionalNumber(job.priority),
    overwrite: optionalBoolean(job.overwrite_flag),
    verifyChecksum: toVerifyChecksum(job.verify_checksum),
    sourceSpaceToken: optionalString(job.source_space_token),
    destinationSpaceToken: optionalString(job.space_token),
    userDN: optionalString(job.user_dn),
    voName: optionalString(job.vo_name),
    delegationId: optionalString(job.cred_id),
    sourceSE: optionalString(job.source_se),
    destinationSE: optionalString(job.dest_se),
    submittedTo: optionalString(job.submit_host),
    finishedAt: toIsoTimestamp(job.job_finished),
    reason: optionalString(job.reason),
    files,
    filesTotal,
    filesCompleted,
    filesFailed,
    progress: filesTotal > 0 ? Math.floor((filesDone / filesTotal) * 100) : 0,
  };
}

function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Converts the raw value of a job field. Known fields get their declared
 * type; anything else is returned as opaque text.
 */
export function toFieldValue(fieldName: string, value: unknown): FieldValue {
  const type = FTS_FIELDS.get(fieldName)?.type || 'opaque';
  if (type === 'opaque') {
    return { type: 'text', value: toText(value) };
  }

  if (value === null || value === undefined) {
    return { type: 'json', value: null };
  }

  switch (type) {
    case 'state':
      return { type: 'json', value: toJobState(value) };
    case 'checksum':
      return { type: 'json', value: toVerifyChecksum(value) ?? null };
    case 'date':
      return { type: 'json', value: toIsoTimestamp(value) ?? null };
    case 'number':
      return { type: 'json', value: optionalNumber(value) ?? null };
    case 'boolean':
      return { type: 'json', value: optionalBoolean(value) ?? null };
    case 'string':
      return { type: 'json', value: toText(value) };
  }
}
