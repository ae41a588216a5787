import type { ChatNotifier } from '../collaborators/types.js';
import { ABCD_EXCELLENT_THRESHOLD, ABCD_MIGHT_IMPROVE_THRESHOLD } from '../orchestrator/report.js';
import type { Report } from '../shared/types.js';

export interface SlackConfig {
  webhookUrl?: string;
}

const SCORE_EMOJI = {
  excellent: '\u{1F7E2}', // 🟢
  improve: '\u{1F7E1}',   // 🟡
  review: '\u{1F534}',    // 🔴
  none: '\u26AA',        // ⚪
} as const;

const MAX_ACTIONS = 2;

function scoreEmoji(score: number | undefined): string {
  if (score === undefined) return SCORE_EMOJI.none;
  if (score >= ABCD_EXCELLENT_THRESHOLD) return SCORE_EMOJI.excellent;
  if (score >= ABCD_MIGHT_IMPROVE_THRESHOLD) return SCORE_EMOJI.improve;
  return SCORE_EMOJI.review;
}

export function formatJobSummary(report: Report, reportUrl: string): string {
  const lines: string[] = [];

  // Line 1: verdict + brand
  const abcd = report.abcd;
  const headline = abcd
    ? `ABCD ${abcd.score}% (${abcd.result}) | ${abcd.passed}/${abcd.total} checks`
    : 'No ABCD score';
  lines.push(`${scoreEmoji(abcd?.score)} *${report.brand_name}* | ${headline}`);

  // Line 2: gaps
  const gaps = Object.entries(report.check_sets)
    .filter(([, section]) => section.status === 'error')
    .map(([name]) => name);
  if (gaps.length > 0) {
    lines.push(`\u26A0\uFE0F Incomplete: ${gaps.join(', ')}`);
  }

  // Top actions, already sorted by priority
  const actions = report.action_plan.filter((a) => a.priority === 'high' && !a.detected).slice(0, MAX_ACTIONS);
  for (const action of actions) {
    lines.push(`\u2022 ${action.name}: ${action.recommendation}`);
  }

  const meta: string[] = [`\u{1FA99} ${report.actual_cost} credits`];
  if (report.duration_s !== null) meta.push(`\u23F1 ${report.duration_s}s`);
  meta.push(`<${reportUrl}|Full report>`);
  lines.push(meta.join(' | '));

  return lines.join('\n');
}

export async function postToWebhook(webhookUrl: string, text: string): Promise<void> {
  const response = await fetch(webhookUrl, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ text }),
    signal: AbortSignal.timeout(10_000),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`Slack webhook ${response.status}: ${body}`);
  }
}

export function createSlackNotifier(config: SlackConfig): ChatNotifier {
  const webhookUrl = config.webhookUrl;
  if (!webhookUrl) {
    return { enabled: false, notify: async () => {} };
  }

  return {
    enabled: true,
    notify: async (report: Report, reportUrl: string): Promise<void> => {
      await postToWebhook(webhookUrl, formatJobSummary(report, reportUrl));
    },
  };
}
