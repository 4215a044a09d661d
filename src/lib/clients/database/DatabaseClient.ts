import sql from 'mssql';
import { DatabaseError, errorMessage, toError } from '../../utils/errors';
import logger from '../../utils/logger';
import { summarizeDowntime, uptimePercent } from '../../utils/period';
import { isHttpMethod } from '../../types/common';
import type {
  MonitoredTarget,
  TargetConfigPatch,
  TargetCreateInput,
  TargetStatusUpdate,
} from '../../types/target';
import type {
  AnomalyEvent,
  AnomalyEventInput,
  AnomalyReason,
  Baseline,
  CheckResult,
  Incident,
  PeriodStats,
  RetentionResult,
} from '../../types/monitoring';
import type { NotificationKind, Subscription, SubscriptionInput } from '../../types/subscription';
import type { DatabaseConfig, MonitoringStore } from './types';

interface TargetRow {
  id: number;
  name: string;
  url: string;
  method: string;
  expected_status: number;
  timeout_seconds: number;
  check_interval_seconds: number;
  json_keys: string | null;
  headers: string | null;
  request_body: string | null;
  is_active: boolean;
  is_up: boolean;
  consecutive_failures: number;
  consecutive_successes: number;
  incident_start_time: Date | null;
  last_checked: Date | null;
  last_status_code: number | null;
  last_response_time_ms: number | null;
  last_error: string | null;
  anomaly_sensitivity: number | null;
  anomaly_m: number | null;
  anomaly_n: number | null;
  anomaly_alerts_enabled: boolean;
  muted: boolean;
  muted_until: Date | null;
  created_at: Date;
}

interface IncidentRow {
  id: number;
  target_id: number;
  start_time: Date;
  end_time: Date | null;
}

interface BaselineRow {
  target_id: number;
  computed_at: Date;
  window_size: number;
  median_ms: number;
  mad_ms: number;
  ewma_ms: number;
  ucl_ms: number;
  p95_ms: number;
}

interface AnomalyRow {
  id: number;
  target_id: number;
  detected_at: Date;
  latency_ms: number;
  deviation_score: number;
  reason: string;
}

interface SubscriptionRow {
  id: number;
  chat_id: string;
  target_id: number | null;
  muted: boolean;
  anomaly_notifications: boolean;
  created_at: Date;
}

const TARGET_COLUMNS = `
  id, name, url, method, expected_status, timeout_seconds, check_interval_seconds,
  json_keys, headers, request_body, is_active, is_up, consecutive_failures,
  consecutive_successes, incident_start_time, last_checked, last_status_code,
  last_response_time_ms, last_error, anomaly_sensitivity, anomaly_m, anomaly_n,
  anomaly_alerts_enabled, muted, muted_until, created_at
`;

/**
 * MS SQL Server implementation of the monitoring store
 */
export class DatabaseClient implements MonitoringStore {
  private pool: sql.ConnectionPool | null = null;

  constructor(private readonly dbConfig: DatabaseConfig) {}

  /**
   * Connect to database
   */
  async connect(): Promise<void> {
    try {
      const poolConfig: sql.config = {
        server: this.dbConfig.host,
        port: this.dbConfig.port,
        database: this.dbConfig.database,
        user: this.dbConfig.username,
        password: this.dbConfig.password,
        options: {
          encrypt: this.dbConfig.encrypt,
          trustServerCertificate: !this.dbConfig.encrypt,
          useUTC: true,
        },
        pool: {
          max: 10,
          min: 2,
          idleTimeoutMillis: 30000,
        },
      };

      this.pool = await sql.connect(poolConfig);
      logger.info('Connected to database');
    } catch (error) {
      logger.error('Failed to connect to database', { error: errorMessage(error) });
      throw new DatabaseError('Failed to connect to database', toError(error));
    }
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.close();
      this.pool = null;
      logger.info('Disconnected from database');
    }
  }

  async ping(): Promise<void> {
    await this.run('ping', {}, async (pool) => {
      await pool.request().query('SELECT 1 AS ok');
    });
  }

  // ---------------------------------------------------------------------------
  // Targets
  // ---------------------------------------------------------------------------

  async createTarget(input: TargetCreateInput): Promise<MonitoredTarget> {
    return this.run('create target', { url: input.url }, async (pool) => {
      const request = pool.request();
      request.input('name', sql.NVarChar(200), input.name);
      request.input('url', sql.NVarChar(2048), input.url);
      request.input('method', sql.NVarChar(10), input.method);
      request.input('expectedStatus', sql.Int, input.expectedStatus);
      request.input('timeoutSeconds', sql.Int, input.timeoutSeconds);
      request.input('checkIntervalSeconds', sql.Int, input.checkIntervalSeconds);
      request.input('jsonKeys', sql.NVarChar(1000), input.jsonKeys);
      request.input('headers', sql.NVarChar(sql.MAX), encodeJson(input.headers));
      request.input('requestBody', sql.NVarChar(sql.MAX), encodeJson(input.requestBody));
      request.input('isActive', sql.Bit, input.isActive);
      request.input('anomalySensitivity', sql.Float, input.anomalySensitivity);
      request.input('anomalyM', sql.Int, input.anomalyM);
      request.input('anomalyN', sql.Int, input.anomalyN);
      request.input('anomalyAlertsEnabled', sql.Bit, input.anomalyAlertsEnabled);
      request.input('createdAt', sql.DateTime2, new Date());

      const result = await request.query<TargetRow>(`
        INSERT INTO MonitoredTargets (
          name, url, method, expected_status, timeout_seconds, check_interval_seconds,
          json_keys, headers, request_body, is_active, is_up, consecutive_failures,
          consecutive_successes, anomaly_sensitivity, anomaly_m, anomaly_n,
          anomaly_alerts_enabled, muted, created_at
        )
        OUTPUT ${prefixColumns('inserted')}
        VALUES (
          @name, @url, @method, @expectedStatus, @timeoutSeconds, @checkIntervalSeconds,
          @jsonKeys, @headers, @requestBody, @isActive, 1, 0,
          0, @anomalySensitivity, @anomalyM, @anomalyN,
          @anomalyAlertsEnabled, 0, @createdAt
        )
      `);

      const target = mapTargetRow(result.recordset[0]);
      logger.info('Target created', { id: target.id, url: target.url });
      return target;
    });
  }

  async getTarget(id: number): Promise<MonitoredTarget | null> {
    return this.run('get target', { id }, async (pool) => {
      const result = await pool
        .request()
        .input('id', sql.Int, id)
        .query<TargetRow>(`SELECT ${TARGET_COLUMNS} FROM MonitoredTargets WHERE id = @id`);

      return result.recordset.length > 0 ? mapTargetRow(result.recordset[0]) : null;
    });
  }

  async listTargets(): Promise<MonitoredTarget[]> {
    return this.run('list targets', {}, async (pool) => {
      const result = await pool
        .request()
        .query<TargetRow>(`SELECT ${TARGET_COLUMNS} FROM MonitoredTargets ORDER BY id`);
      return result.recordset.map(mapTargetRow);
    });
  }

  async listActiveTargets(): Promise<MonitoredTarget[]> {
    return this.run('list active targets', {}, async (pool) => {
      const result = await pool
        .request()
        .query<TargetRow>(
          `SELECT ${TARGET_COLUMNS} FROM MonitoredTargets WHERE is_active = 1 ORDER BY id`
        );
      return result.recordset.map(mapTargetRow);
    });
  }

  async updateTargetConfig(id: number, patch: TargetConfigPatch): Promise<MonitoredTarget | null> {
    return this.run('update target', { id, fields: Object.keys(patch) }, async (pool) => {
      const setClauses: string[] = [];
      const request = pool.request();
      request.input('id', sql.Int, id);

      if (patch.name !== undefined) {
        setClauses.push('name = @name');
        request.input('name', sql.NVarChar(200), patch.name);
      }
      if (patch.url !== undefined) {
        setClauses.push('url = @url');
        request.input('url', sql.NVarChar(2048), patch.url);
      }
      if (patch.method !== undefined) {
        setClauses.push('method = @method');
        request.input('method', sql.NVarChar(10), patch.method);
      }
      if (patch.expectedStatus !== undefined) {
        setClauses.push('expected_status = @expectedStatus');
        request.input('expectedStatus', sql.Int, patch.expectedStatus);
      }
      if (patch.timeoutSeconds !== undefined) {
        setClauses.push('timeout_seconds = @timeoutSeconds');
        request.input('timeoutSeconds', sql.Int, patch.timeoutSeconds);
      }
      if (patch.checkIntervalSeconds !== undefined) {
        setClauses.push('check_interval_seconds = @checkIntervalSeconds');
        request.input('checkIntervalSeconds', sql.Int, patch.checkIntervalSeconds);
      }
      if (patch.jsonKeys !== undefined) {
        setClauses.push('json_keys = @jsonKeys');
        request.input('jsonKeys', sql.NVarChar(1000), patch.jsonKeys);
      }
      if (patch.headers !== undefined) {
        setClauses.push('headers = @headers');
        request.input('headers', sql.NVarChar(sql.MAX), encodeJson(patch.headers));
      }
      if ('requestBody' in patch) {
        setClauses.push('request_body = @requestBody');
        request.input('requestBody', sql.NVarChar(sql.MAX), encodeJson(patch.requestBody));
      }
      if (patch.isActive !== undefined) {
        setClauses.push('is_active = @isActive');
        request.input('isActive', sql.Bit, patch.isActive);
      }
      if (patch.muted !== undefined) {
        setClauses.push('muted = @muted');
        request.input('muted', sql.Bit, patch.muted);
      }
      if (patch.mutedUntil !== undefined) {
        setClauses.push('muted_until = @mutedUntil');
        request.input('mutedUntil', sql.DateTime2, patch.mutedUntil);
      }
      if (patch.anomalySensitivity !== undefined) {
        setClauses.push('anomaly_sensitivity = @anomalySensitivity');
        request.input('anomalySensitivity', sql.Float, patch.anomalySensitivity);
      }
      if (patch.anomalyM !== undefined) {
        setClauses.push('anomaly_m = @anomalyM');
        request.input('anomalyM', sql.Int, patch.anomalyM);
      }
      if (patch.anomalyN !== undefined) {
        setClauses.push('anomaly_n = @anomalyN');
        request.input('anomalyN', sql.Int, patch.anomalyN);
      }
      if (patch.anomalyAlertsEnabled !== undefined) {
        setClauses.push('anomaly_alerts_enabled = @anomalyAlertsEnabled');
        request.input('anomalyAlertsEnabled', sql.Bit, patch.anomalyAlertsEnabled);
      }

      if (setClauses.length === 0) {
        return this.getTarget(id);
      }

      const result = await request.query<TargetRow>(`
        UPDATE MonitoredTargets SET ${setClauses.join(', ')}
        OUTPUT ${prefixColumns('inserted')}
        WHERE id = @id
      `);

      return result.recordset.length > 0 ? mapTargetRow(result.recordset[0]) : null;
    });
  }

  async updateTargetStatus(id: number, update: TargetStatusUpdate): Promise<void> {
    await this.run('update target status', { id }, async (pool) => {
      await pool
        .request()
        .input('id', sql.Int, id)
        .input('isUp', sql.Bit, update.isUp)
        .input('consecutiveFailures', sql.Int, update.consecutiveFailures)
        .input('consecutiveSuccesses', sql.Int, update.consecutiveSuccesses)
        .input('incidentStartTime', sql.DateTime2, update.incidentStartTime)
        .input('lastChecked', sql.DateTime2, update.lastChecked)
        .input('lastStatusCode', sql.Int, update.lastStatusCode)
        .input('lastResponseTimeMs', sql.Int, update.lastResponseTimeMs)
        .input('lastError', sql.NVarChar(sql.MAX), update.lastError).query(`
          UPDATE MonitoredTargets SET
            is_up = @isUp,
            consecutive_failures = @consecutiveFailures,
            consecutive_successes = @consecutiveSuccesses,
            incident_start_time = @incidentStartTime,
            last_checked = @lastChecked,
            last_status_code = @lastStatusCode,
            last_response_time_ms = @lastResponseTimeMs,
            last_error = @lastError
          WHERE id = @id
        `);
    });
  }

  async deleteTarget(id: number): Promise<boolean> {
    return this.run('delete target', { id }, async (pool) => {
      const result = await pool
        .request()
        .input('id', sql.Int, id)
        .query('DELETE FROM MonitoredTargets WHERE id = @id');
      const deleted = (result.rowsAffected[0] ?? 0) > 0;
      if (deleted) {
        logger.info('Target deleted', { id });
      }
      return deleted;
    });
  }

  // ---------------------------------------------------------------------------
  // Check history
  // ---------------------------------------------------------------------------

  async appendCheckResult(result: CheckResult): Promise<void> {
    await this.run('append check result', { targetId: result.targetId }, async (pool) => {
      await pool
        .request()
        .input('targetId', sql.Int, result.targetId)
        .input('checkedAt', sql.DateTime2, result.timestamp)
        .input('isOk', sql.Bit, result.success)
        .input('responseTimeMs', sql.Int, result.latencyMs)
        .input('statusCode', sql.Int, result.statusCode)
        .input('error', sql.NVarChar(sql.MAX), result.error)
        .input('failureKind', sql.NVarChar(30), result.failure?.kind ?? null)
        .input('attempts', sql.Int, result.attempts).query(`
          INSERT INTO CheckHistory (
            target_id, checked_at, is_ok, response_time_ms, status_code, error, failure_kind, attempts
          )
          VALUES (@targetId, @checkedAt, @isOk, @responseTimeMs, @statusCode, @error, @failureKind, @attempts)
        `);
    });
  }

  async getRecentSuccessfulLatencies(targetId: number, limit: number): Promise<number[]> {
    return this.run('get recent latencies', { targetId, limit }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('limit', sql.Int, limit).query<{ response_time_ms: number }>(`
          SELECT response_time_ms FROM (
            SELECT TOP (@limit) id, checked_at, response_time_ms
            FROM CheckHistory
            WHERE target_id = @targetId AND is_ok = 1 AND response_time_ms > 0
            ORDER BY checked_at DESC, id DESC
          ) recent
          ORDER BY checked_at ASC, id ASC
        `);
      return result.recordset.map((row) => row.response_time_ms);
    });
  }

  async countFailedChecksSince(targetId: number, since: Date): Promise<number> {
    return this.run('count failed checks', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('since', sql.DateTime2, since).query<{ count: number }>(`
          SELECT COUNT(*) AS count FROM CheckHistory
          WHERE target_id = @targetId AND is_ok = 0 AND checked_at >= @since
        `);
      return result.recordset[0]?.count ?? 0;
    });
  }

  // ---------------------------------------------------------------------------
  // Incidents
  // ---------------------------------------------------------------------------

  async openIncident(targetId: number, startTime: Date): Promise<Incident> {
    return this.run('open incident', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('startTime', sql.DateTime2, startTime).query<IncidentRow>(`
          IF NOT EXISTS (SELECT 1 FROM Incidents WHERE target_id = @targetId AND end_time IS NULL)
            INSERT INTO Incidents (target_id, start_time) VALUES (@targetId, @startTime);

          SELECT TOP 1 id, target_id, start_time, end_time
          FROM Incidents
          WHERE target_id = @targetId AND end_time IS NULL
          ORDER BY start_time DESC
        `);
      return mapIncidentRow(result.recordset[0]);
    });
  }

  async closeIncident(targetId: number, startTime: Date | null, endTime: Date): Promise<Incident | null> {
    return this.run('close incident', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('startTime', sql.DateTime2, startTime)
        .input('endTime', sql.DateTime2, endTime).query<IncidentRow>(`
          UPDATE Incidents SET end_time = @endTime
          OUTPUT inserted.id, inserted.target_id, inserted.start_time, inserted.end_time
          WHERE target_id = @targetId
            AND end_time IS NULL
            AND (@startTime IS NULL OR start_time = @startTime)
        `);

      if (result.recordset.length === 0) {
        logger.debug('No open incident to close', { targetId });
        return null;
      }
      return mapIncidentRow(result.recordset[0]);
    });
  }

  async getOpenIncident(targetId: number): Promise<Incident | null> {
    return this.run('get open incident', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId).query<IncidentRow>(`
          SELECT TOP 1 id, target_id, start_time, end_time FROM Incidents
          WHERE target_id = @targetId AND end_time IS NULL
          ORDER BY start_time DESC
        `);
      return result.recordset.length > 0 ? mapIncidentRow(result.recordset[0]) : null;
    });
  }

  async listIncidents(targetId: number, since: Date): Promise<Incident[]> {
    return this.run('list incidents', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('since', sql.DateTime2, since).query<IncidentRow>(`
          SELECT id, target_id, start_time, end_time FROM Incidents
          WHERE target_id = @targetId AND (start_time >= @since OR end_time IS NULL)
          ORDER BY start_time DESC
        `);
      return result.recordset.map(mapIncidentRow);
    });
  }

  // ---------------------------------------------------------------------------
  // Baselines
  // ---------------------------------------------------------------------------

  async appendBaseline(baseline: Baseline): Promise<void> {
    await this.run('append baseline', { targetId: baseline.targetId }, async (pool) => {
      await pool
        .request()
        .input('targetId', sql.Int, baseline.targetId)
        .input('computedAt', sql.DateTime2, baseline.computedAt)
        .input('windowSize', sql.Int, baseline.windowSize)
        .input('median', sql.Float, baseline.median)
        .input('mad', sql.Float, baseline.mad)
        .input('ewma', sql.Float, baseline.ewma)
        .input('ucl', sql.Float, baseline.ucl)
        .input('p95', sql.Float, baseline.p95).query(`
          INSERT INTO Baselines (target_id, computed_at, window_size, median_ms, mad_ms, ewma_ms, ucl_ms, p95_ms)
          VALUES (@targetId, @computedAt, @windowSize, @median, @mad, @ewma, @ucl, @p95)
        `);
    });
  }

  async getLatestBaseline(targetId: number): Promise<Baseline | null> {
    return this.run('get latest baseline', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId).query<BaselineRow>(`
          SELECT TOP 1 target_id, computed_at, window_size, median_ms, mad_ms, ewma_ms, ucl_ms, p95_ms
          FROM Baselines
          WHERE target_id = @targetId
          ORDER BY computed_at DESC, id DESC
        `);

      if (result.recordset.length === 0) {
        return null;
      }

      const row = result.recordset[0];
      return {
        targetId: row.target_id,
        computedAt: row.computed_at,
        windowSize: row.window_size,
        median: row.median_ms,
        mad: row.mad_ms,
        ewma: row.ewma_ms,
        ucl: row.ucl_ms,
        p95: row.p95_ms,
      };
    });
  }

  // ---------------------------------------------------------------------------
  // Anomalies
  // ---------------------------------------------------------------------------

  async appendAnomalyEvent(event: AnomalyEventInput): Promise<AnomalyEvent> {
    return this.run('append anomaly event', { targetId: event.targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, event.targetId)
        .input('detectedAt', sql.DateTime2, event.timestamp)
        .input('latencyMs', sql.Int, event.latencyMs)
        .input('deviationScore', sql.Float, event.deviationScore)
        .input('reason', sql.NVarChar(30), event.reason).query<AnomalyRow>(`
          INSERT INTO AnomalyEvents (target_id, detected_at, latency_ms, deviation_score, reason)
          OUTPUT inserted.id, inserted.target_id, inserted.detected_at, inserted.latency_ms,
                 inserted.deviation_score, inserted.reason
          VALUES (@targetId, @detectedAt, @latencyMs, @deviationScore, @reason)
        `);

      const row = result.recordset[0];
      return {
        id: row.id,
        targetId: row.target_id,
        timestamp: row.detected_at,
        latencyMs: row.latency_ms,
        deviationScore: row.deviation_score,
        reason: toAnomalyReason(row.reason),
      };
    });
  }

  async getLastAnomalyTime(targetId: number): Promise<Date | null> {
    return this.run('get last anomaly time', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId).query<{ detected_at: Date | null }>(`
          SELECT MAX(detected_at) AS detected_at FROM AnomalyEvents WHERE target_id = @targetId
        `);
      return result.recordset[0]?.detected_at ?? null;
    });
  }

  // ---------------------------------------------------------------------------
  // Reminders
  // ---------------------------------------------------------------------------

  async getLastReminderTime(targetId: number): Promise<Date | null> {
    return this.run('get last reminder time', { targetId }, async (pool) => {
      const result = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .query<{ last_reminder_at: Date | null }>(
          'SELECT last_reminder_at FROM NotificationState WHERE target_id = @targetId'
        );
      return result.recordset[0]?.last_reminder_at ?? null;
    });
  }

  async setLastReminderTime(targetId: number, at: Date): Promise<void> {
    await this.run('set last reminder time', { targetId }, async (pool) => {
      await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('at', sql.DateTime2, at).query(`
          MERGE NotificationState AS state
          USING (SELECT @targetId AS target_id) AS source
          ON state.target_id = source.target_id
          WHEN MATCHED THEN UPDATE SET last_reminder_at = @at
          WHEN NOT MATCHED THEN INSERT (target_id, last_reminder_at) VALUES (@targetId, @at);
        `);
    });
  }

  // ---------------------------------------------------------------------------
  // Subscribers
  // ---------------------------------------------------------------------------

  async listRecipients(targetId: number | null, kind: NotificationKind): Promise<string[]> {
    return this.run('list recipients', { targetId, kind }, async (pool) => {
      const request = pool.request();
      request.input('targetId', sql.Int, targetId);

      const clauses = ['s.muted = 0'];
      if (targetId === null || kind === 'digest') {
        clauses.push('s.target_id IS NULL');
      } else {
        clauses.push('(s.target_id IS NULL OR s.target_id = @targetId)');
        clauses.push(`NOT EXISTS (
          SELECT 1 FROM Subscriptions m
          WHERE m.chat_id = s.chat_id AND m.target_id = @targetId AND m.muted = 1
        )`);
      }
      if (kind === 'anomaly') {
        clauses.push(`NOT EXISTS (
          SELECT 1 FROM Subscriptions p
          WHERE p.chat_id = s.chat_id
            AND p.anomaly_notifications = 0
            AND (p.target_id IS NULL OR p.target_id = @targetId)
        )`);
      }

      const result = await request.query<{ chat_id: string }>(`
        SELECT DISTINCT s.chat_id FROM Subscriptions s
        WHERE ${clauses.join(' AND ')}
      `);
      return result.recordset.map((row) => row.chat_id);
    });
  }

  async listSubscriptions(chatId?: string): Promise<Subscription[]> {
    return this.run('list subscriptions', { chatId }, async (pool) => {
      const request = pool.request();
      let where = '';
      if (chatId !== undefined) {
        where = 'WHERE chat_id = @chatId';
        request.input('chatId', sql.NVarChar(64), chatId);
      }

      const result = await request.query<SubscriptionRow>(`
        SELECT id, chat_id, target_id, muted, anomaly_notifications, created_at
        FROM Subscriptions ${where}
        ORDER BY id
      `);
      return result.recordset.map(mapSubscriptionRow);
    });
  }

  async createSubscription(input: SubscriptionInput): Promise<Subscription> {
    return this.run('create subscription', { chatId: input.chatId }, async (pool) => {
      const result = await pool
        .request()
        .input('chatId', sql.NVarChar(64), input.chatId)
        .input('targetId', sql.Int, input.targetId)
        .input('muted', sql.Bit, input.muted)
        .input('anomalyNotifications', sql.Bit, input.anomalyNotifications)
        .input('createdAt', sql.DateTime2, new Date()).query<SubscriptionRow>(`
          INSERT INTO Subscriptions (chat_id, target_id, muted, anomaly_notifications, created_at)
          OUTPUT inserted.id, inserted.chat_id, inserted.target_id, inserted.muted,
                 inserted.anomaly_notifications, inserted.created_at
          VALUES (@chatId, @targetId, @muted, @anomalyNotifications, @createdAt)
        `);
      return mapSubscriptionRow(result.recordset[0]);
    });
  }

  async deleteSubscription(id: number): Promise<boolean> {
    return this.run('delete subscription', { id }, async (pool) => {
      const result = await pool
        .request()
        .input('id', sql.Int, id)
        .query('DELETE FROM Subscriptions WHERE id = @id');
      return (result.rowsAffected[0] ?? 0) > 0;
    });
  }

  // ---------------------------------------------------------------------------
  // Reporting and retention
  // ---------------------------------------------------------------------------

  async getStatsForPeriod(targetId: number, since: Date, now: Date): Promise<PeriodStats> {
    return this.run('get period stats', { targetId }, async (pool) => {
      const checks = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('since', sql.DateTime2, since).query<{
        total_checks: number;
        ok_checks: number | null;
        avg_response_ms: number | null;
      }>(`
          SELECT
            COUNT(*) AS total_checks,
            SUM(CASE WHEN is_ok = 1 THEN 1 ELSE 0 END) AS ok_checks,
            AVG(CASE WHEN is_ok = 1 AND response_time_ms > 0 THEN CAST(response_time_ms AS FLOAT) END) AS avg_response_ms
          FROM CheckHistory
          WHERE target_id = @targetId AND checked_at >= @since
        `);

      const incidents = await this.listIncidents(targetId, since);

      const anomalies = await pool
        .request()
        .input('targetId', sql.Int, targetId)
        .input('since', sql.DateTime2, since).query<{ anomaly_count: number }>(`
          SELECT COUNT(*) AS anomaly_count FROM AnomalyEvents
          WHERE target_id = @targetId AND detected_at >= @since
        `);

      const row = checks.recordset[0];
      const totalChecks = row?.total_checks ?? 0;
      const okChecks = row?.ok_checks ?? 0;
      const downtime = summarizeDowntime(incidents, now);

      return {
        since,
        totalChecks,
        okChecks,
        uptimePercent: uptimePercent(okChecks, totalChecks),
        avgResponseTimeMs: row?.avg_response_ms ?? null,
        incidentCount: downtime.incidentCount,
        totalDowntimeMs: downtime.totalDowntimeMs,
        avgDowntimeMs: downtime.avgDowntimeMs,
        anomalyCount: anomalies.recordset[0]?.anomaly_count ?? 0,
      };
    });
  }

  async purgeBefore(cutoff: Date): Promise<RetentionResult> {
    return this.run('purge expired rows', { cutoff: cutoff.toISOString() }, async (pool) => {
      const checks = await pool
        .request()
        .input('cutoff', sql.DateTime2, cutoff)
        .query('DELETE FROM CheckHistory WHERE checked_at < @cutoff');

      const anomalies = await pool
        .request()
        .input('cutoff', sql.DateTime2, cutoff)
        .query('DELETE FROM AnomalyEvents WHERE detected_at < @cutoff');

      // Superseded baselines only; the latest snapshot of each target stays
      const baselines = await pool
        .request()
        .input('cutoff', sql.DateTime2, cutoff).query(`
          DELETE b FROM Baselines b
          WHERE b.computed_at < @cutoff
            AND b.id <> (
              SELECT TOP 1 latest.id FROM Baselines latest
              WHERE latest.target_id = b.target_id
              ORDER BY latest.computed_at DESC, latest.id DESC
            )
        `);

      return {
        checksDeleted: checks.rowsAffected[0] ?? 0,
        anomaliesDeleted: anomalies.rowsAffected[0] ?? 0,
        baselinesDeleted: baselines.rowsAffected[0] ?? 0,
      };
    });
  }

  /**
   * Run a query against the pool, logging and wrapping failures
   */
  private async run<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: (pool: sql.ConnectionPool) => Promise<T>
  ): Promise<T> {
    if (!this.pool) {
      throw new DatabaseError('Database not connected');
    }

    try {
      return await fn(this.pool);
    } catch (error) {
      logger.error(`Failed to ${operation}`, { ...context, error: errorMessage(error) });
      throw new DatabaseError(`Failed to ${operation}`, toError(error));
    }
  }
}

function prefixColumns(prefix: string): string {
  return TARGET_COLUMNS.split(',')
    .map((column) => `${prefix}.${column.trim()}`)
    .join(', ');
}

function encodeJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

function parseJson(raw: string | null): unknown {
  if (raw === null || raw === '') {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function parseHeaders(raw: string | null): Record<string, string> | null {
  const parsed = parseJson(raw);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return null;
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    headers[key] = String(value);
  }
  return headers;
}

function toAnomalyReason(value: string): AnomalyReason {
  return value === 'p95_exceeded' ? 'p95_exceeded' : 'ucl_exceeded';
}

export function mapTargetRow(row: TargetRow): MonitoredTarget {
  const method = row.method.toUpperCase();

  return {
    id: row.id,
    name: row.name,
    url: row.url,
    method: isHttpMethod(method) ? method : 'GET',
    expectedStatus: row.expected_status,
    timeoutSeconds: row.timeout_seconds,
    checkIntervalSeconds: row.check_interval_seconds,
    jsonKeys: row.json_keys,
    headers: parseHeaders(row.headers),
    requestBody: parseJson(row.request_body),
    isActive: row.is_active,
    isUp: row.is_up,
    consecutiveFailures: row.consecutive_failures,
    consecutiveSuccesses: row.consecutive_successes,
    incidentStartTime: row.incident_start_time,
    lastChecked: row.last_checked,
    lastStatusCode: row.last_status_code,
    lastResponseTimeMs: row.last_response_time_ms,
    lastError: row.last_error,
    anomalySensitivity: row.anomaly_sensitivity,
    anomalyM: row.anomaly_m,
    anomalyN: row.anomaly_n,
    anomalyAlertsEnabled: row.anomaly_alerts_enabled,
    muted: row.muted,
    mutedUntil: row.muted_until,
    createdAt: row.created_at,
  };
}

function mapIncidentRow(row: IncidentRow): Incident {
  return {
    id: row.id,
    targetId: row.target_id,
    startTime: row.start_time,
    endTime: row.end_time,
  };
}

function mapSubscriptionRow(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    chatId: row.chat_id,
    targetId: row.target_id,
    muted: row.muted,
    anomalyNotifications: row.anomaly_notifications,
    createdAt: row.created_at,
  };
}
