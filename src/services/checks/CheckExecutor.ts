import axios, { type AxiosInstance } from 'axios';
import { ConfigurationError, toError } from '../../lib/utils/errors';
import { createChildLogger } from '../../lib/utils/logger';
import { RetryError, RetryStrategy } from '../../lib/utils/retry';
import type { CheckFailure, CheckResult } from '../../lib/types/monitoring';
import type { MonitoredTarget } from '../../lib/types/target';
import type { CheckExecutorSettings, HttpRequester, ProbeResponse } from './types';

// ERR_CANCELED comes from the overall deadline signal
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

/**
 * axios instance for probes. Redirects are not followed, so the target's own
 * status is the one compared.
 */
export function createProbeClient(): AxiosInstance {
  return axios.create({ maxRedirects: 0 });
}

/**
 * Performs one probe of one target.
 *
 * Target-side failures become a failed CheckResult; only a target that can
 * never be probed (malformed URL) throws.
 */
export class CheckExecutor {
  private readonly retry: RetryStrategy;

  constructor(
    settings: CheckExecutorSettings,
    private readonly http: HttpRequester = createProbeClient()
  ) {
    this.retry = new RetryStrategy({
      maxAttempts: settings.requestRetries,
      baseDelayMs: settings.requestBackoffSeconds * 1000,
      maxDelayMs: Number.MAX_SAFE_INTEGER,
      backoffMultiplier: 2,
      shouldRetry: isTransientError,
    });
  }

  async executeCheck(target: MonitoredTarget): Promise<CheckResult> {
    assertProbeableUrl(target.url);

    const log = createChildLogger(`target:${target.id}`);
    let lastLatencyMs = -1;

    try {
      const { value: response, attempts } = await this.retry.run(async () => {
        const startedAt = Date.now();
        try {
          const probe = await this.send(target, startedAt);
          lastLatencyMs = probe.latencyMs;
          return probe;
        } catch (error) {
          lastLatencyMs = Date.now() - startedAt;
          throw error;
        }
      }, `check:${target.id}`);

      const failure = validateResponse(target, response);
      const result: CheckResult = {
        targetId: target.id,
        timestamp: new Date(),
        success: failure === null,
        latencyMs: response.latencyMs,
        statusCode: response.status,
        error: failure === null ? null : describeFailure(failure),
        failure,
        attempts,
      };

      log.debug('Check completed', {
        success: result.success,
        statusCode: result.statusCode,
        latencyMs: result.latencyMs,
        attempts,
      });

      return result;
    } catch (error) {
      const attempts = error instanceof RetryError ? error.attempts : 1;
      const cause = error instanceof RetryError ? error.lastError : toError(error);
      const failure = classifyTransportError(cause);

      log.debug('Check failed', { reason: failure.kind, attempts, error: cause.message });

      return {
        targetId: target.id,
        timestamp: new Date(),
        success: false,
        latencyMs: lastLatencyMs,
        statusCode: null,
        error: describeFailure(failure),
        failure,
        attempts,
      };
    }
  }

  private async send(target: MonitoredTarget, startedAt: number): Promise<ProbeResponse> {
    const response = await this.http.request<string>({
      url: target.url,
      method: target.method,
      headers: target.headers ?? undefined,
      data: target.requestBody ?? undefined,
      timeout: target.timeoutSeconds * 1000,
      signal: AbortSignal.timeout(target.timeoutSeconds * 1000),
      responseType: 'text',
      transformResponse: [(data: string) => data],
      validateStatus: () => true,
    });

    return {
      status: response.status,
      body: typeof response.data === 'string' ? response.data : '',
      latencyMs: Date.now() - startedAt,
    };
  }
}

/**
 * Throws ConfigurationError unless the URL is an absolute http(s) URL
 */
export function assertProbeableUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Malformed URL: ${url}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Unsupported URL scheme: ${parsed.protocol}`);
  }
}

/**
 * Timeouts and connection-level errors; an HTTP response is never transient
 */
export function isTransientError(error: Error): boolean {
  return axios.isAxiosError(error) && error.response === undefined;
}

export function parseJsonKeys(jsonKeys: string | null): string[] {
  if (!jsonKeys) {
    return [];
  }
  return jsonKeys
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

function validateResponse(target: MonitoredTarget, response: ProbeResponse): CheckFailure | null {
  if (response.status !== target.expectedStatus) {
    return { kind: 'status_mismatch', expected: target.expectedStatus, actual: response.status };
  }

  const keys = parseJsonKeys(target.jsonKeys);
  if (keys.length === 0) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(response.body);
  } catch (error) {
    return { kind: 'invalid_json', message: toError(error).message };
  }

  const missing =
    typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? keys.filter((key) => !Object.prototype.hasOwnProperty.call(parsed, key))
      : keys;

  return missing.length > 0 ? { kind: 'missing_keys', keys: missing } : null;
}

function classifyTransportError(error: Error): CheckFailure {
  if (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
    return { kind: 'timeout', message: error.message };
  }
  return { kind: 'transport', message: error.message };
}

export function describeFailure(failure: CheckFailure): string {
  switch (failure.kind) {
    case 'timeout':
      return `Timeout: ${failure.message}`;
    case 'transport':
      return `Request failed: ${failure.message}`;
    case 'status_mismatch':
      return `Expected status ${failure.expected}, got ${failure.actual}`;
    case 'missing_keys':
      return `Missing JSON keys: ${failure.keys.join(', ')}`;
    case 'invalid_json':
      return `Invalid JSON response: ${failure.message}`;
  }
}
