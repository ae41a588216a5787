import type { HttpServiceConfig } from './http-client.js';
import type { AnalyticsRow, AnalyticsSink } from './types.js';

export class HttpAnalyticsSink implements AnalyticsSink {
  readonly enabled = true;

  constructor(private readonly config: HttpServiceConfig) {}

  async appendRows(rows: AnalyticsRow[]): Promise<void> {
    if (rows.length === 0) return;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) headers.Authorization = `Bearer ${this.config.apiKey}`;

    const response = await fetch(`${this.config.baseUrl.replace(/\/+$/, '')}/rows`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ rows }),
      signal: AbortSignal.timeout(10_000),
    });
    if (!response.ok) {
      throw new Error(`Analytics append failed: ${response.status}`);
    }
  }
}

export class DisabledAnalyticsSink implements AnalyticsSink {
  readonly enabled = false;

  async appendRows(): Promise<void> {}
}
