import type { ProgressEvent, Report } from '../shared/types.js';

export type ProgressListener = (event: ProgressEvent) => void;

interface Channel {
  listeners: Set<ProgressListener>;
  seq: number;
  pct: number;
}

/**
 * Per-job fan-out of progress events to whoever is subscribed right now.
 * Nothing is buffered: a listener that joins late sees only what follows.
 * Terminal events close the channel and drop its listeners.
 */
export class ProgressHub {
  private channels = new Map<string, Channel>();

  subscribe(jobId: string, listener: ProgressListener): () => void {
    const channel = this.channel(jobId);
    channel.listeners.add(listener);
    return () => {
      channel.listeners.delete(listener);
    };
  }

  listenerCount(jobId: string): number {
    return this.channels.get(jobId)?.listeners.size ?? 0;
  }

  /** Last percentage published for the job; never decreases. */
  currentPct(jobId: string): number {
    return this.channels.get(jobId)?.pct ?? 0;
  }

  publish(
    jobId: string,
    milestone: string,
    pct: number,
    message: string,
    partial?: Record<string, unknown>,
  ): ProgressEvent {
    const channel = this.channel(jobId);
    channel.pct = Math.max(channel.pct, Math.min(100, Math.max(0, Math.round(pct))));
    const event: ProgressEvent = {
      type: 'progress',
      job_id: jobId,
      seq: ++channel.seq,
      milestone,
      message,
      pct: channel.pct,
      ...(partial ? { partial } : {}),
    };
    this.deliver(jobId, channel, event);
    return event;
  }

  complete(jobId: string, report: Report): ProgressEvent {
    const channel = this.channel(jobId);
    channel.pct = 100;
    const event: ProgressEvent = {
      type: 'complete',
      job_id: jobId,
      seq: ++channel.seq,
      milestone: 'complete',
      pct: 100,
      report,
    };
    this.deliver(jobId, channel, event);
    this.close(jobId, channel);
    return event;
  }

  fail(jobId: string, code: string, message: string): ProgressEvent {
    const channel = this.channel(jobId);
    const event: ProgressEvent = {
      type: 'error',
      job_id: jobId,
      seq: ++channel.seq,
      milestone: 'error',
      code,
      message,
    };
    this.deliver(jobId, channel, event);
    this.close(jobId, channel);
    return event;
  }

  private channel(jobId: string): Channel {
    let channel = this.channels.get(jobId);
    if (!channel) {
      channel = { listeners: new Set(), seq: 0, pct: 0 };
      this.channels.set(jobId, channel);
    }
    return channel;
  }

  private deliver(jobId: string, channel: Channel, event: ProgressEvent): void {
    for (const listener of [...channel.listeners]) {
      try {
        listener(event);
      } catch (err) {
        channel.listeners.delete(listener);
        // eslint-disable-next-line no-console
        console.error(`[progress] Listener for job ${jobId} failed and was removed:`, err);
      }
    }
  }

  private close(jobId: string, channel: Channel): void {
    channel.listeners.clear();
    this.channels.delete(jobId);
  }
}
