import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  toFieldValue,
  toFtsFieldList,
  toFtsStateFilter,
  toFtsSubmission,
  toIsoTimestamp,
  toJobState,
  toTransferInfo,
  toTransferInfoExtended,
  toVerifyChecksum,
} from './ftsMapping.js';
import { JOB_STATES } from '../types/transfer.js';

describe('ftsMapping', () => {
  describe('State Translation', () => {
    it.each([
      ['SUBMITTED', 'submitted'],
      ['READY', 'submitted'],
      ['STAGING', 'submitted'],
      ['ACTIVE', 'active'],
      ['ARCHIVING', 'active'],
      ['CANCELED', 'canceled'],
      ['FAILED', 'failed'],
      ['FINISHED', 'finished'],
      ['FINISHEDDIRTY', 'finished-with-errors'],
      ['NOT_USED', 'canceled'],
    ])('should translate %s to %s', (ftsState, jobState) => {
      expect(toJobState(ftsState)).toBe(jobState);
    });

    it('should ignore case', () => {
      expect(toJobState('active')).toBe('active');
    });

    it('should report anything else as unknown', () => {
      expect(toJobState('EXPLODED')).toBe('unknown');
      expect(toJobState(undefined)).toBe('unknown');
      expect(toJobState('constructor')).toBe('unknown');
    });

    it('should always produce a uniform state', () => {
      fc.assert(
        fc.property(fc.string(), (ftsState) => {
          expect(JOB_STATES).toContain(toJobState(ftsState));
        })
      );
    });
  });

  describe('Query Translation', () => {
    it('should expand uniform states into FTS states', () => {
      expect(toFtsStateFilter('submitted,active')).toBe('SUBMITTED,READY,STAGING,ACTIVE');
    });

    it('should pass unknown states through and drop duplicates', () => {
      expect(toFtsStateFilter('finished, FINISHED, ,bogus')).toBe('FINISHED,bogus');
    });

    it('should map field names and keep the ones a listing needs', () => {
      expect(toFtsFieldList('jobState,voName,custom')).toBe('job_id,job_state,submit_time,vo_name,custom');
    });
  });

  describe('Submission', () => {
    it('should build the FTS job body and leave out unset members', () => {
      const body = toFtsSubmission({
        files: [{ sources: ['https://source.example.org/a'], destinations: ['https://dest.example.org/a'] }],
        params: { verifyChecksum: 'target', retryDelay: 30, jobMetadata: { run: 7 } },
      });

      expect(body).toEqual({
        files: [{ sources: ['https://source.example.org/a'], destinations: ['https://dest.example.org/a'] }],
        params: { verify_checksum: 'target', retry_delay: 30, job_metadata: { run: 7 } },
      });
    });

    it('should send empty params when none are given', () => {
      const body = toFtsSubmission({ files: [{ sources: ['a'], destinations: ['b'], filesize: 10 }] });
      expect(body).toEqual({ files: [{ sources: ['a'], destinations: ['b'], filesize: 10 }], params: {} });
    });
  });

  describe('Timestamps', () => {
    it('should read FTS timestamps as UTC', () => {
      expect(toIsoTimestamp('2026-03-01T10:00:00')).toBe('2026-03-01T10:00:00.000Z');
    });

    it('should keep explicit zones', () => {
      expect(toIsoTimestamp('2026-03-01T10:00:00+02:00')).toBe('2026-03-01T08:00:00.000Z');
    });

    it('should return unparseable text unchanged', () => {
      expect(toIsoTimestamp('yesterday')).toBe('yesterday');
      expect(toIsoTimestamp('')).toBeUndefined();
    });
  });

  describe('Job Details', () => {
    const job = {
      job_id: 'job-1',
      job_state: 'ACTIVE',
      submit_time: '2026-03-01T10:00:00',
      priority: 3,
      overwrite_flag: 'N',
      verify_checksum: 'b',
      vo_name: 'dteam',
      cred_id: 'delegation-1',
      space_token: 'DATA',
    };
    const files = [
      { file_id: 1, file_state: 'FINISHED', source_surl: 'https://s/a', dest_surl: 'https://d/a', filesize: 10 },
      { file_id: 2, file_state: 'FAILED', source_surl: 'https://s/b', dest_surl: 'https://d/b', reason: 'No such file' },
      { file_id: 3, file_state: 'ACTIVE', source_surl: 'https://s/c', dest_surl: 'https://d/c' },
      'not a file',
    ];

    it('should build a TransferInfo from a job listing entry', () => {
      expect(toTransferInfo(job)).toEqual({
        kind: 'TransferInfo',
        jobId: 'job-1',
        jobState: 'active',
        submittedAt: '2026-03-01T10:00:00.000Z',
      });
    });

    it('should map job fields and compute file metrics', () => {
      const info = toTransferInfoExtended(job, files);

      expect(info.kind).toBe('TransferInfoExtended');
      expect(info.priority).toBe(3);
      expect(info.overwrite).toBe(false);
      expect(info.verifyChecksum).toBe('both');
      expect(info.voName).toBe('dteam');
      expect(info.delegationId).toBe('delegation-1');
      expect(info.destinationSpaceToken).toBe('DATA');
      expect(info.filesTotal).toBe(3);
      expect(info.filesCompleted).toBe(1);
      expect(info.filesFailed).toBe(1);
      expect(info.progress).toBe(66);
      expect(info.files[1]).toEqual({
        fileId: 2,
        fileState: 'failed',
        source: 'https://s/b',
        destination: 'https://d/b',
        fileSize: undefined,
        checksum: undefined,
        startedAt: undefined,
        finishedAt: undefined,
        reason: 'No such file',
      });
    });

    it('should report no progress for a job without files', () => {
      const info = toTransferInfoExtended(job, []);
      expect(info.filesTotal).toBe(0);
      expect(info.progress).toBe(0);
    });
  });

  describe('Checksum Verification', () => {
    it.each([
      ['b', 'both'],
      ['s', 'source'],
      ['t', 'target'],
      ['n', 'none'],
      ['B', 'both'],
      ['target', 'target'],
    ])('should translate %s to %s', (ftsMode, mode) => {
      expect(toVerifyChecksum(ftsMode)).toBe(mode);
    });

    it('should translate the boolean form', () => {
      expect(toVerifyChecksum(true)).toBe('both');
      expect(toVerifyChecksum(false)).toBe('none');
    });

    it('should drop modes it does not know', () => {
      expect(toVerifyChecksum('x')).toBeUndefined();
      expect(toVerifyChecksum(1)).toBeUndefined();
    });
  });

  describe('Field Values', () => {
    it.each([
      ['jobState', 'FINISHEDDIRTY', { type: 'json', value: 'finished-with-errors' }],
      ['submittedAt', '2026-03-01T10:00:00', { type: 'json', value: '2026-03-01T10:00:00.000Z' }],
      ['priority', '3', { type: 'json', value: 3 }],
      ['priority', 'high', { type: 'json', value: null }],
      ['overwrite', 'Y', { type: 'json', value: true }],
      ['verifyChecksum', 't', { type: 'json', value: 'target' }],
      ['verifyChecksum', 'x', { type: 'json', value: null }],
      ['voName', 'dteam', { type: 'json', value: 'dteam' }],
      ['voName', null, { type: 'json', value: null }],
      ['jobMetadata', { run: 7 }, { type: 'text', value: '{"run":7}' }],
      ['job_custom', 42, { type: 'text', value: '42' }],
      ['job_custom', 'raw', { type: 'text', value: 'raw' }],
    ])('should convert %s = %j', (fieldName, value, expected) => {
      expect(toFieldValue(fieldName, value)).toEqual(expected);
    });
  });
});
