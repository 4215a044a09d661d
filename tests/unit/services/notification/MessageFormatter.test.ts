import { MessageFormatter, escapeHtml, formatDuration } from '../../../../src/services/notification';
import type { PeriodStats } from '../../../../src/lib/types/monitoring';
import { buildTarget } from '../../../fixtures/targets';

describe('MessageFormatter', () => {
  const formatter = new MessageFormatter();
  const target = buildTarget({ id: 3, name: 'Payments <prod>', url: 'https://pay.example.test/health?a=1&b=2' });
  const start = new Date('2026-03-01T10:00:00Z');
  const end = new Date('2026-03-01T12:15:30Z');

  it('should format a DOWN alert with escaped fields', () => {
    const text = formatter.format({
      kind: 'down',
      target,
      incidentStart: start,
      failureCount: 3,
      error: 'Expected status 200, got 503',
    });

    expect(text.split('\n')).toEqual([
      '🔴 <b>DOWN: Payments &lt;prod&gt;</b>',
      '',
      '<b>ID:</b> <code>3</code>',
      '<b>URL:</b> <code>https://pay.example.test/health?a=1&amp;b=2</code>',
      '<b>Method:</b> GET',
      '<b>Expected status:</b> 200',
      '<b>Failed checks:</b> 3',
      '<b>Incident start:</b> <code>2026-03-01 10:00:00 UTC</code>',
      '<b>Error:</b> <pre>Expected status 200, got 503</pre>',
    ]);
  });

  it('should format a RECOVERED message with the incident duration', () => {
    const text = formatter.format({ kind: 'recovered', target, incidentStart: start, incidentEnd: end, failureCount: 7 });

    expect(text).toContain('✅ <b>RECOVERED: Payments &lt;prod&gt;</b>');
    expect(text).toContain('  - Duration: <b>2h 15m 30s</b>');
    expect(text).toContain('  - Failed checks: 7');
  });

  it('should leave out an unknown failure count', () => {
    const text = formatter.format({ kind: 'recovered', target, incidentStart: start, incidentEnd: end, failureCount: null });

    expect(text).not.toContain('Failed checks');
  });

  it('should format a reminder', () => {
    const text = formatter.format({ kind: 'reminder', target, incidentStart: start, now: end });

    expect(text.split('\n')[0]).toBe('⏰ <b>STILL DOWN: Payments &lt;prod&gt;</b>');
    expect(text).toContain('<b>Down for:</b> 2h 15m 30s');
  });

  it('should format an anomaly alert', () => {
    const text = formatter.format({
      kind: 'anomaly',
      target,
      threshold: 150.4,
      baselineMedian: 99.6,
      event: {
        id: 1,
        targetId: 3,
        timestamp: end,
        latencyMs: 400,
        deviationScore: 249.6,
        reason: 'ucl_exceeded',
      },
    });

    expect(text.split('\n')).toEqual([
      '⚠️ <b>LATENCY ANOMALY: Payments &lt;prod&gt;</b>',
      '',
      '<b>Response time:</b> 400 ms',
      '<b>Threshold:</b> 150 ms',
      '<b>Baseline median:</b> 100 ms',
      '<b>Deviation:</b> +250 ms (ucl_exceeded)',
      '<b>Detected:</b> <code>2026-03-01 12:15:30 UTC</code>',
    ]);
  });

  it('should format the daily digest', () => {
    const stats: PeriodStats = {
      since: start,
      totalChecks: 1440,
      okChecks: 1436,
      uptimePercent: (1436 / 1440) * 100,
      avgResponseTimeMs: 182.4,
      incidentCount: 1,
      totalDowntimeMs: 4 * 60 * 1000,
      avgDowntimeMs: 4 * 60 * 1000,
      anomalyCount: 2,
    };

    const text = formatter.format({
      kind: 'digest',
      generatedAt: end,
      entries: [{ target: { id: 3, name: 'API', isUp: false }, stats }],
    });

    expect(text.split('\n')).toEqual([
      '☀️ <b>Daily report for 2026-03-01</b>',
      '',
      '<b>🔴 API</b> (ID: 3)',
      '  - Uptime: 99.72%',
      '  - Incidents: 1',
      '  - Downtime: 4m',
      '  - Avg response: 182 ms',
      '  - Anomalies: 2',
    ]);
  });

  it('should split a long digest between targets', () => {
    const stats: PeriodStats = {
      since: start,
      totalChecks: 10,
      okChecks: 10,
      uptimePercent: 100,
      avgResponseTimeMs: 120,
      incidentCount: 0,
      totalDowntimeMs: 0,
      avgDowntimeMs: 0,
      anomalyCount: 0,
    };
    const event = {
      kind: 'digest' as const,
      generatedAt: end,
      entries: [1, 2, 3].map((id) => ({ target: { id, name: `Service ${id}`, isUp: true }, stats })),
    };
    const narrow = new MessageFormatter(300);

    const messages = narrow.formatMessages(event);

    expect(messages.length).toBeGreaterThan(1);
    expect(messages[0].startsWith('☀️ <b>Daily report for 2026-03-01</b>')).toBe(true);
    expect(messages[messages.length - 1].startsWith('<b>🟢 Service 3</b>')).toBe(true);
    messages.forEach((message) => expect(message.length).toBeLessThanOrEqual(300));
    expect(messages.join('\n\n')).toBe(narrow.format(event));
  });

  it('should keep other events in a single message', () => {
    const event = { kind: 'reminder' as const, target, incidentStart: start, now: end };

    expect(new MessageFormatter(300).formatMessages(event)).toEqual([formatter.format(event)]);
  });

  it('should say so when the digest has no entries', () => {
    expect(formatter.format({ kind: 'digest', generatedAt: end, entries: [] })).toBe(
      '☀️ <b>Daily report for 2026-03-01</b>\n\nNo active monitors.'
    );
  });
});

describe('formatDuration', () => {
  it('should print the non-zero units', () => {
    expect(formatDuration(((2 * 24 + 3) * 3600 + 15 * 60 + 30) * 1000)).toBe('2d 3h 15m 30s');
    expect(formatDuration(3600 * 1000)).toBe('1h');
    expect(formatDuration(59999)).toBe('59s');
  });

  it('should print 0s for no time', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(-5000)).toBe('0s');
  });
});

describe('escapeHtml', () => {
  it('should escape the characters Telegram HTML reserves', () => {
    expect(escapeHtml('a < b && c > d')).toBe('a &lt; b &amp;&amp; c &gt; d');
  });
});
