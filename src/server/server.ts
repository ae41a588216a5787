import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import type express from 'express';
import { AdmissionController } from '../admission/admission-controller.js';
import { SlotTable } from '../admission/slot-table.js';
import { StripeBilling } from '../billing/checkout.js';
import { BillingSettlement } from '../billing/settlement.js';
import { FingerprintCache } from '../cache/fingerprint-cache.js';
import { DisabledAnalyticsSink, HttpAnalyticsSink } from '../collaborators/analytics-sink.js';
import { HttpAnnotationService } from '../collaborators/annotation-service.js';
import { HttpContentService } from '../collaborators/content-service.js';
import { FfmpegMediaProcessor } from '../collaborators/media-processor.js';
import { LocalObjectStorage } from '../collaborators/object-storage.js';
import { openDatabase } from '../db/schema.js';
import { JobStore } from '../jobs/job-store.js';
import { CreditLedger } from '../ledger/ledger.js';
import { packOffers, tokenPacks } from '../ledger/pricing.js';
import { createSlackNotifier } from '../notify/slack.js';
import { EvaluationOrchestrator } from '../orchestrator/orchestrator.js';
import { ProgressHub } from '../progress/progress-hub.js';
import { loadRubric } from '../rubric/rubric.js';
import { loadConfig, type AppConfig } from '../shared/config.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { createApp } from './app.js';

export const REAPER_INTERVAL_MS = 2 * 60 * 1000;

export interface Integrations {
  payments: boolean;
  notifications: boolean;
  analytics: boolean;
}

export interface Services {
  app: express.Express;
  db: Database.Database;
  orchestrator: EvaluationOrchestrator;
  integrations: Integrations;
}

function required(value: string | undefined, key: string): string {
  if (!value) throw new ConfigError(`${key} is required to run evaluations`, [key]);
  return value;
}

/** Builds every component from configuration without opening a port. */
export function createServices(config: AppConfig): Services {
  const content = new HttpContentService({
    baseUrl: required(config.CONTENT_SERVICE_URL, 'CONTENT_SERVICE_URL'),
    apiKey: config.CONTENT_SERVICE_KEY,
  });
  const annotation = new HttpAnnotationService({
    baseUrl: required(config.ANNOTATION_SERVICE_URL, 'ANNOTATION_SERVICE_URL'),
    apiKey: config.ANNOTATION_SERVICE_KEY,
  });
  const rubric = loadRubric(config.RUBRIC_PATH);

  const db = openDatabase(config.DB_PATH);
  const ledger = new CreditLedger(db);
  const jobs = new JobStore(db);
  const hub = new ProgressHub();
  const packs = tokenPacks({ price1000: config.STRIPE_PRICE_1000, price3000: config.STRIPE_PRICE_3000 });

  const analytics = config.ANALYTICS_URL
    ? new HttpAnalyticsSink({ baseUrl: config.ANALYTICS_URL })
    : new DisabledAnalyticsSink();
  const notifier = createSlackNotifier({ webhookUrl: config.SLACK_WEBHOOK_URL });

  const orchestrator = new EvaluationOrchestrator(
    {
      jobs,
      ledger,
      admission: new AdmissionController(ledger, new SlotTable(), packOffers(packs)),
      cache: new FingerprintCache({ maxEntries: config.CACHE_MAX_ENTRIES, ttlMs: config.CACHE_TTL_MS }),
      hub,
      rubric,
      content,
      annotation,
      storage: new LocalObjectStorage(config.STORAGE_ROOT),
      media: new FfmpegMediaProcessor({ ffmpegPath: config.FFMPEG_PATH, ffprobePath: config.FFPROBE_PATH }),
      analytics,
      notifier,
    },
    {
      jobTimeoutMs: config.JOB_TIMEOUT_MS,
      collaboratorTimeoutMs: config.COLLABORATOR_TIMEOUT_MS,
      collaboratorRetries: config.COLLABORATOR_RETRIES,
      staleJobThresholdMs: config.STALE_JOB_THRESHOLD_MS,
      publicBaseUrl: config.PUBLIC_BASE_URL,
    },
  );

  const billing =
    config.STRIPE_SECRET_KEY && config.STRIPE_WEBHOOK_SECRET
      ? new StripeBilling(
          {
            secretKey: config.STRIPE_SECRET_KEY,
            webhookSecret: config.STRIPE_WEBHOOK_SECRET,
            packs,
            publicBaseUrl: config.PUBLIC_BASE_URL ?? `http://localhost:${config.PORT}`,
          },
          new BillingSettlement(db, ledger),
        )
      : null;

  const app = createApp({ orchestrator, jobs, ledger, hub, packs, billing, authSecret: config.AUTH_SECRET });

  return {
    app,
    db,
    orchestrator,
    integrations: { payments: billing !== null, notifications: notifier.enabled, analytics: analytics.enabled },
  };
}

function reap(orchestrator: EvaluationOrchestrator): void {
  try {
    orchestrator.reapStaleJobs();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error('[server] Stale job check failed:', errorMessage(err));
  }
}

export function startServer(config: AppConfig = loadConfig()): Server {
  const { app, db, orchestrator, integrations } = createServices(config);

  reap(orchestrator);
  const reaper = setInterval(() => reap(orchestrator), REAPER_INTERVAL_MS);

  const server = app.listen(config.PORT, '0.0.0.0', () => {
    const enabled = Object.entries(integrations)
      .map(([name, on]) => `${name}=${on ? 'on' : 'off'}`)
      .join(' ');
    // eslint-disable-next-line no-console
    console.log(`reelgrade listening on port ${config.PORT} (${enabled})`);
  });

  server.on('close', () => {
    clearInterval(reaper);
    db.close();
  });
  return server;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer();
}
