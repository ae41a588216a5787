import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSlackNotifier, formatJobSummary, postToWebhook } from '../slack.js';
import { makeReport } from '../../../tests/fixtures/report.js';

const WEBHOOK = 'https://hooks.example.test/services/T000/B000/test-secret';
const REPORT_URL = 'https://reelgrade.example.test/jobs/job-1/report';

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('formatJobSummary', () => {
  /** @test */
  it('should format a headline, cost line and report link', () => {
    expect(formatJobSummary(makeReport(), REPORT_URL)).toBe(
      '\u{1F7E2} *Acme* | ABCD 100% (Excellent) | 1/1 checks\n' +
        `\u{1FA99} 300 credits | ⏱ 30s | <${REPORT_URL}|Full report>`,
    );
  });

  /** @test */
  it('should use the score emoji for each ABCD band', () => {
    const line = (score: number) =>
      formatJobSummary(makeReport({ abcd: { score, result: 'x', passed: 0, total: 1 } }), REPORT_URL).split('\n')[0];
    expect(line(85)).toMatch(/^🟢/u);
    expect(line(70)).toMatch(/^🟡/u);
    expect(line(40)).toMatch(/^🔴/u);
  });

  /** @test */
  it('should say when there is no ABCD score', () => {
    const text = formatJobSummary(makeReport({ abcd: null, duration_s: null }), REPORT_URL);
    expect(text.split('\n')).toEqual([
      '⚪ *Acme* | No ABCD score',
      `\u{1FA99} 300 credits | <${REPORT_URL}|Full report>`,
    ]);
  });

  /** @test */
  it('should list gaps and at most two missed high-priority actions', () => {
    const report = makeReport({
      check_sets: {
        abcd: { status: 'error', error: { kind: 'timeout', message: 'Call timed out' } },
        shorts: { status: 'error', error: { kind: 'quota', message: 'Quota exhausted' } },
      },
      action_plan: [
        { check_id: 'a', name: 'Dynamic Start', detected: false, recommendation: 'Open on motion.', priority: 'high' },
        { check_id: 'b', name: 'Logo Early', detected: true, recommendation: 'Keep it.', priority: 'high' },
        { check_id: 'c', name: 'CTA Text', detected: false, recommendation: 'Add a CTA.', priority: 'high' },
        { check_id: 'd', name: 'Supers', detected: false, recommendation: 'Add supers.', priority: 'high' },
        { check_id: 'e', name: 'Voiceover', detected: false, recommendation: 'Add VO.', priority: 'medium' },
      ],
    });

    const lines = formatJobSummary(report, REPORT_URL).split('\n');

    expect(lines.slice(1, 4)).toEqual([
      '⚠️ Incomplete: abcd, shorts',
      '• Dynamic Start: Open on motion.',
      '• CTA Text: Add a CTA.',
    ]);
    expect(lines).toHaveLength(5);
  });
});

describe('postToWebhook', () => {
  /** @test */
  it('should post the text as JSON', async () => {
    const fetchMock = stubFetch(new Response('ok', { status: 200 }));

    await postToWebhook(WEBHOOK, 'hello');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(WEBHOOK);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ text: 'hello' }));
  });

  /** @test */
  it('should throw on a non-2xx response', async () => {
    stubFetch(new Response('invalid_token', { status: 403 }));

    await expect(postToWebhook(WEBHOOK, 'hello')).rejects.toThrow('Slack webhook 403: invalid_token');
  });
});

describe('createSlackNotifier', () => {
  /** @test */
  it('should be a disabled no-op without a webhook URL', async () => {
    const fetchMock = stubFetch(new Response('ok'));
    const notifier = createSlackNotifier({});

    expect(notifier.enabled).toBe(false);
    await notifier.notify(makeReport(), REPORT_URL);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  /** @test */
  it('should send the formatted summary when enabled', async () => {
    const fetchMock = stubFetch(new Response('ok'));
    const notifier = createSlackNotifier({ webhookUrl: WEBHOOK });

    expect(notifier.enabled).toBe(true);
    await notifier.notify(makeReport(), REPORT_URL);

    const body = fetchMock.mock.calls[0]?.[1]?.body;
    expect(body).toBe(JSON.stringify({ text: formatJobSummary(makeReport(), REPORT_URL) }));
  });
});
