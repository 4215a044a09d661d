// Mock mssql - must be before imports
const mockQuery = jest.fn();
const mockInput = jest.fn().mockReturnThis();
const mockRequest = jest.fn().mockReturnValue({
  input: mockInput,
  query: mockQuery,
});
const mockPool = {
  request: mockRequest,
  close: jest.fn(),
};

jest.mock('mssql', () => ({
  connect: jest.fn().mockResolvedValue(mockPool),
  NVarChar: jest.fn((size) => ({ type: 'NVarChar', size })),
  Int: 'Int',
  Bit: 'Bit',
  Float: 'Float',
  DateTime2: 'DateTime2',
  MAX: 'MAX',
}));

import sql from 'mssql';
import { DatabaseClient } from '../../../../../src/lib/clients/database/DatabaseClient';
import { DatabaseError } from '../../../../../src/lib/utils/errors';

// Mock logger
jest.mock('../../../../../src/lib/utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('DatabaseClient', () => {
  const dbConfig = {
    host: 'localhost',
    port: 1433,
    database: 'test_db',
    username: 'sa',
    password: 'test-secret',
    encrypt: true,
  };

  const targetRow = {
    id: 9,
    name: 'Docs',
    url: 'https://docs.example.test',
    method: 'post',
    expected_status: 200,
    timeout_seconds: 10,
    check_interval_seconds: 60,
    json_keys: 'status',
    headers: '{"X-Trace":1}',
    request_body: '{"q":"ping"}',
    is_active: true,
    is_up: false,
    consecutive_failures: 4,
    consecutive_successes: 0,
    incident_start_time: new Date('2026-03-01T10:00:00Z'),
    last_checked: new Date('2026-03-01T10:03:00Z'),
    last_status_code: 500,
    last_response_time_ms: 80,
    last_error: 'Expected status 200, got 500',
    anomaly_sensitivity: null,
    anomaly_m: 2,
    anomaly_n: null,
    anomaly_alerts_enabled: true,
    muted: false,
    muted_until: null,
    created_at: new Date('2026-01-01T00:00:00Z'),
  };

  let client: DatabaseClient;

  beforeEach(() => {
    jest.clearAllMocks();
    client = new DatabaseClient(dbConfig);
  });

  describe('connect', () => {
    it('should connect with the configured pool settings', async () => {
      await client.connect();

      expect(sql.connect).toHaveBeenCalledWith(
        expect.objectContaining({
          server: 'localhost',
          port: 1433,
          database: 'test_db',
          user: 'sa',
          password: 'test-secret',
          options: { encrypt: true, trustServerCertificate: false, useUTC: true },
        })
      );
    });

    it('should reject queries before connecting', async () => {
      await expect(client.ping()).rejects.toThrow('Database not connected');
    });
  });

  describe('with a connection', () => {
    beforeEach(async () => {
      await client.connect();
    });

    it('should map a target row', async () => {
      mockQuery.mockResolvedValueOnce({ recordset: [targetRow] });

      const target = await client.getTarget(9);

      expect(target).toMatchObject({
        id: 9,
        method: 'POST',
        jsonKeys: 'status',
        headers: { 'X-Trace': '1' },
        requestBody: { q: 'ping' },
        isUp: false,
        consecutiveFailures: 4,
        incidentStartTime: new Date('2026-03-01T10:00:00Z'),
        anomalyM: 2,
        anomalyN: null,
      });
      expect(mockInput).toHaveBeenCalledWith('id', 'Int', 9);
    });

    it('should return null for an unknown target', async () => {
      mockQuery.mockResolvedValueOnce({ recordset: [] });

      expect(await client.getTarget(404)).toBeNull();
    });

    it('should return recent latencies in the stored order', async () => {
      mockQuery.mockResolvedValueOnce({
        recordset: [{ response_time_ms: 120 }, { response_time_ms: 95 }, { response_time_ms: 101 }],
      });

      expect(await client.getRecentSuccessfulLatencies(9, 3)).toEqual([120, 95, 101]);
      expect(mockInput).toHaveBeenCalledWith('limit', 'Int', 3);
    });

    it('should report whether a delete matched a row', async () => {
      mockQuery.mockResolvedValueOnce({ rowsAffected: [0] });
      expect(await client.deleteTarget(9)).toBe(false);

      mockQuery.mockResolvedValueOnce({ rowsAffected: [1] });
      expect(await client.deleteTarget(9)).toBe(true);
    });

    it('should close any open incident when no start time is known', async () => {
      const end = new Date('2026-03-01T11:00:00Z');
      mockQuery.mockResolvedValueOnce({
        recordset: [{ id: 3, target_id: 9, start_time: new Date('2026-03-01T10:00:00Z'), end_time: end }],
      });

      const incident = await client.closeIncident(9, null, end);

      expect(incident).toEqual({ id: 3, targetId: 9, startTime: new Date('2026-03-01T10:00:00Z'), endTime: end });
      expect(mockInput).toHaveBeenCalledWith('startTime', 'DateTime2', null);
    });

    it('should return null when there is no incident to close', async () => {
      mockQuery.mockResolvedValueOnce({ recordset: [] });

      expect(await client.closeIncident(9, new Date(), new Date())).toBeNull();
    });

    it('should map the latest baseline', async () => {
      const computedAt = new Date('2026-03-01T09:45:00Z');
      mockQuery.mockResolvedValueOnce({
        recordset: [
          {
            target_id: 9,
            computed_at: computedAt,
            window_size: 200,
            median_ms: 110,
            mad_ms: 8,
            ewma_ms: 112,
            ucl_ms: 145.58,
            p95_ms: 160,
          },
        ],
      });

      expect(await client.getLatestBaseline(9)).toEqual({
        targetId: 9,
        computedAt,
        windowSize: 200,
        median: 110,
        mad: 8,
        ewma: 112,
        ucl: 145.58,
        p95: 160,
      });
    });

    it('should restrict digest recipients to global subscribers', async () => {
      mockQuery.mockResolvedValueOnce({ recordset: [{ chat_id: '100' }] });

      expect(await client.listRecipients(null, 'digest')).toEqual(['100']);
      const query: string = mockQuery.mock.calls[0][0];
      expect(query).toContain('s.target_id IS NULL');
      expect(query).not.toContain('anomaly_notifications = 0');
    });

    it('should apply the anomaly preference for anomaly recipients', async () => {
      mockQuery.mockResolvedValueOnce({ recordset: [] });

      await client.listRecipients(9, 'anomaly');

      const query: string = mockQuery.mock.calls[0][0];
      expect(query).toContain('(s.target_id IS NULL OR s.target_id = @targetId)');
      expect(query).toContain('p.anomaly_notifications = 0');
    });

    it('should combine period statistics', async () => {
      const since = new Date('2026-03-01T00:00:00Z');
      const now = new Date('2026-03-02T00:00:00Z');
      mockQuery
        .mockResolvedValueOnce({ recordset: [{ total_checks: 10, ok_checks: 9, avg_response_ms: 150.5 }] })
        .mockResolvedValueOnce({
          recordset: [
            {
              id: 1,
              target_id: 9,
              start_time: new Date('2026-03-01T10:00:00Z'),
              end_time: new Date('2026-03-01T10:05:00Z'),
            },
          ],
        })
        .mockResolvedValueOnce({ recordset: [{ anomaly_count: 2 }] });

      expect(await client.getStatsForPeriod(9, since, now)).toEqual({
        since,
        totalChecks: 10,
        okChecks: 9,
        uptimePercent: 90,
        avgResponseTimeMs: 150.5,
        incidentCount: 1,
        totalDowntimeMs: 5 * 60 * 1000,
        avgDowntimeMs: 5 * 60 * 1000,
        anomalyCount: 2,
      });
    });

    it('should report full uptime for a period without checks', async () => {
      mockQuery
        .mockResolvedValueOnce({ recordset: [{ total_checks: 0, ok_checks: null, avg_response_ms: null }] })
        .mockResolvedValueOnce({ recordset: [] })
        .mockResolvedValueOnce({ recordset: [{ anomaly_count: 0 }] });

      const stats = await client.getStatsForPeriod(9, new Date(), new Date());

      expect(stats.uptimePercent).toBe(100);
      expect(stats.avgResponseTimeMs).toBeNull();
    });

    it('should wrap query failures in DatabaseError', async () => {
      mockQuery.mockRejectedValueOnce(new Error('Deadlock victim'));

      const error = await client
        .appendCheckResult({
          targetId: 9,
          timestamp: new Date(),
          success: true,
          latencyMs: 100,
          statusCode: 200,
          error: null,
          failure: null,
          attempts: 1,
        })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseError);
      expect(error).toMatchObject({
        message: 'Failed to append check result',
        originalError: expect.objectContaining({ message: 'Deadlock victim' }),
      });
    });

    it('should close the pool on disconnect', async () => {
      await client.disconnect();

      expect(mockPool.close).toHaveBeenCalled();
      await expect(client.ping()).rejects.toThrow('Database not connected');
    });
  });
});
