import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import { TransferDispatcher } from './TransferDispatcher.js';
import { DestinationRegistry } from './DestinationRegistry.js';
import { ServiceFactory } from './ServiceFactory.js';
import type { TransferService } from '../adapters/TransferService.js';
import { MOCK_TOKEN, type MockFtsServer, createTestFtsServer, seedJobs } from '../test/mockFtsServer.js';

const AUTH = `Bearer ${MOCK_TOKEN}`;

const body = JSON.stringify({
  files: [{ sources: ['https://source.example.org/a'], destinations: ['https://dest.example.org/a'] }],
});

describe('TransferDispatcher', () => {
  let server: MockFtsServer;
  let factory: ServiceFactory;
  let dispatcher: TransferDispatcher;

  beforeAll(async () => {
    server = await createTestFtsServer();
  });

  afterAll(async () => {
    await server.stop();
  });

  beforeEach(() => {
    server.reset();
    seedJobs(server);

    const registry = new DestinationRegistry({
      defaultDestination: 'dcache',
      destinations: { dcache: 'fts', storm: 'fts', tape: 'archive' },
      services: {
        fts: { name: 'Test FTS', url: server.getBaseUrl(), kind: 'fts', timeout: 2000 },
        archive: { name: 'Tape archive', url: server.getBaseUrl(), kind: 'gridftp', timeout: 2000 },
      },
    });
    factory = new ServiceFactory();
    dispatcher = new TransferDispatcher(registry, factory);
  });

  describe('startTransfer', () => {
    it('should accept a valid transfer for dcache with 202', async () => {
      const response = await dispatcher.startTransfer(AUTH, body, 'dcache');

      expect(response.statusCode).toBe(202);
      expect(response.contentType).toBe('application/json');
      expect(response.body).toMatchObject({ kind: 'TransferInfo', jobState: 'submitted' });
      expect(server.requests[0].path).toBe('/jobs');
    });

    it('should refuse requests without a bearer token before resolving anything', async () => {
      const response = await dispatcher.startTransfer(undefined, body, 'unknownkey');

      expect(response).toEqual({
        statusCode: 401,
        contentType: 'application/json',
        body: {
          id: 'notAuthenticated',
          status: 401,
          description: 'Missing or invalid bearer token',
          details: { destination: 'unknownkey' },
        },
      });
      expect(server.requests).toHaveLength(0);
    });

    it('should refuse credentials of another scheme', async () => {
      const response = await dispatcher.startTransfer('Basic dGVzdA==', body);
      expect(response.statusCode).toBe(401);
    });

    it.each([
      [null, 'Request body is required'],
      ['{ not json', 'Invalid JSON in request body'],
      ['{"files":[]}', 'Transfer must contain at least one file'],
    ])('should reject body %s', async (requestBody, description) => {
      const response = await dispatcher.startTransfer(AUTH, requestBody);

      expect(response.statusCode).toBe(400);
      expect(response.body).toEqual({
        id: 'invalidParameter',
        status: 400,
        description,
        details: { destination: 'dcache' },
      });
    });
  });

  describe('findTransfers', () => {
    it('should return active transfers for the default destination', async () => {
      const response = await dispatcher.findTransfers(AUTH, {});

      expect(response.statusCode).toBe(200);
      expect(response.body).toMatchObject({ kind: 'TransferList', count: 1 });
    });

    it('should report unknown destinations as configuration errors', async () => {
      const response = await dispatcher.findTransfers(AUTH, {}, 'unknownkey');

      expect(response).toEqual({
        statusCode: 400,
        contentType: 'application/json',
        body: {
          id: 'invalidServiceConfig',
          status: 400,
          description: "No transfer service configured for destination 'unknownkey'",
          details: { destination: 'unknownkey', limit: '100' },
        },
      });
      expect(server.requests).toHaveLength(0);
    });

    it.each([' dcache ', 'dc\u0007ache', '   '])('should not resolve %j to a configured destination', async (dest) => {
      const response = await dispatcher.findTransfers(AUTH, {}, dest);

      expect(response.statusCode).toBe(400);
      expect(response.body).toEqual({
        id: 'invalidServiceConfig',
        status: 400,
        description: `No transfer service configured for destination '${dest}'`,
        details: { destination: dest, limit: '100' },
      });
      expect(server.requests).toHaveLength(0);
    });

    it('should use the default destination for an empty key', async () => {
      const response = await dispatcher.findTransfers(AUTH, {}, '');
      expect(response.statusCode).toBe(200);
    });

    it('should report services of an unknown kind without calling them', async () => {
      const response = await dispatcher.findTransfers(AUTH, {}, 'tape');

      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({
        id: 'invalidServiceConfig',
        description: "Unknown kind 'gridftp' for transfer service 'archive'",
      });
      expect(server.requests).toHaveLength(0);
    });

    it('should echo the search criteria in error details', async () => {
      const response = await dispatcher.findTransfers(AUTH, { limit: 'abc', voName: 'dteam', stateIn: 'failed' });

      expect(response.body).toEqual({
        id: 'invalidParameter',
        status: 400,
        description: 'limit must be a positive integer',
        details: {
          destination: 'dcache',
          limit: 'abc',
          'filter:state_in': 'failed',
          'filter:vo_name': 'dteam',
        },
      });
    });

    it('should reject malformed time windows', async () => {
      const response = await dispatcher.findTransfers(AUTH, { timeWindow: 'yesterday' });

      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({ description: "time_window must have the form 'hours[:minutes]'" });
    });

    it('should pass criteria to the transfer service', async () => {
      await dispatcher.findTransfers(AUTH, { limit: '5', stateIn: 'finished', sourceSE: 'https://source.example.org' }, 'storm');

      expect(server.requests[0].query).toEqual({
        limit: '5',
        state_in: 'FINISHED',
        source_se: 'https://source.example.org',
      });
    });
  });

  describe('getTransferInfo', () => {
    it('should report unknown jobs with 404 and the job ID', async () => {
      const response = await dispatcher.getTransferInfo(AUTH, 'abc-123');

      expect(response).toEqual({
        statusCode: 404,
        contentType: 'application/json',
        body: {
          id: 'transferNotFound',
          status: 404,
          description: 'No job with the id "abc-123" has been found',
          details: { destination: 'dcache', jobId: 'abc-123' },
        },
      });
    });

    it('should return identical details for repeated queries', async () => {
      const first = await dispatcher.getTransferInfo(AUTH, 'job-active');
      const second = await dispatcher.getTransferInfo(AUTH, 'job-active');

      expect(first.statusCode).toBe(200);
      expect(second).toEqual(first);
    });

    it('should report expired credentials with 419', async () => {
      server.expireCredentials();

      const response = await dispatcher.getTransferInfo(AUTH, 'job-active', 'storm');

      expect(response.statusCode).toBe(419);
      expect(response.body).toMatchObject({
        id: 'credentialsExpired',
        details: { destination: 'storm', jobId: 'job-active' },
      });
      expect(server.requests).toHaveLength(1);
    });

    it('should report a failed job with 207 and its details', async () => {
      server.respondOnce({
        statusCode: 207,
        body: { job_id: 'job-failed', job_state: 'FAILED', reason: 'One or more files failed' },
      });

      const response = await dispatcher.getTransferInfo(AUTH, 'job-failed');

      expect(response.statusCode).toBe(207);
      expect(response.body).toMatchObject({
        id: 'transferError',
        status: 207,
        description: 'One or more files failed',
        details: { destination: 'dcache', jobId: 'job-failed' },
        transfer: { kind: 'TransferInfoExtended', jobId: 'job-failed', jobState: 'failed' },
      });
    });

    it('should normalize exceptions thrown by an adapter', async () => {
      const failing: TransferService = {
        kind: 'fts',
        startTransfer: () => Promise.reject(new Error('boom')),
        findTransfers: () => Promise.reject(new Error('boom')),
        getTransferInfo: () => Promise.reject(new Error('boom')),
        getTransferInfoField: () => Promise.reject(new Error('boom')),
        cancelTransfer: () => Promise.reject(new Error('boom')),
      };
      vi.spyOn(factory, 'getAdapter').mockReturnValue({ success: true, value: failing });

      const response = await dispatcher.getTransferInfo(AUTH, 'job-active');

      expect(response.body).toEqual({
        id: 'serviceError',
        status: 500,
        description: 'Transfer service call failed: boom',
        details: { destination: 'dcache', jobId: 'job-active' },
      });
    });
  });

  describe('getTransferInfoField', () => {
    it('should agree with the state in the transfer details', async () => {
      const field = await dispatcher.getTransferInfoField(AUTH, 'job-active', 'jobState');
      const info = await dispatcher.getTransferInfo(AUTH, 'job-active');

      expect(field).toEqual({ statusCode: 200, contentType: 'application/json', body: 'active' });
      expect(info.body).toMatchObject({ jobState: 'active' });
    });

    it('should return opaque fields as plain text', async () => {
      const response = await dispatcher.getTransferInfoField(AUTH, 'job-active', 'submit_host');
      expect(response).toEqual({ statusCode: 200, contentType: 'text/plain', body: 'fts.example.org' });
    });

    it('should report unknown fields with 404 and the field name', async () => {
      const response = await dispatcher.getTransferInfoField(AUTH, 'job-active', 'nonexistent');

      expect(response.statusCode).toBe(404);
      expect(response.body).toMatchObject({
        id: 'fieldNotFound',
        details: { destination: 'dcache', jobId: 'job-active', fieldName: 'nonexistent' },
      });
    });

    it('should require a field name', async () => {
      const response = await dispatcher.getTransferInfoField(AUTH, 'job-active', '');

      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({ description: 'fieldName is required' });
    });
  });

  describe('cancelTransfer', () => {
    it('should return the canceled job', async () => {
      const response = await dispatcher.cancelTransfer(AUTH, 'job-active');

      expect(response.statusCode).toBe(200);
      expect(response.body).toMatchObject({ jobId: 'job-active', jobState: 'canceled' });
    });

    it('should pass job IDs on unchanged', async () => {
      const response = await dispatcher.cancelTransfer(AUTH, ' job-active ');

      expect(response.statusCode).toBe(404);
      expect(response.body).toMatchObject({ details: { destination: 'dcache', jobId: ' job-active ' } });
      expect(server.getJob('job-active')?.job_state).toBe('ACTIVE');
    });

    it('should report the terminal state of a job that already ended', async () => {
      const response = await dispatcher.cancelTransfer(AUTH, 'job-failed');

      expect(response.statusCode).toBe(200);
      expect(response.body).toMatchObject({ jobState: 'failed', reason: 'One or more files failed' });
    });
  });
});
