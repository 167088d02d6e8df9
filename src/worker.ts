import 'dotenv/config';
import net from 'node:net';
import { closeDatabase, getDatabase } from './lib/db';
import {
  getChunkOverlap,
  getChunkSize,
  getDatabaseUrl,
  getEmbeddingDimensions,
  getEmbeddingProvider,
  getSourcePollIntervalMs,
  getWorkerPollMs,
  shouldAutoMigrate,
  validateKnowledgeBaseEnv,
} from './lib/env';
import { createIngestionContext, type IngestionContext } from './lib/ingestion/pipeline';
import { runMigrations } from './lib/migrate';
import { runIngestionCycle } from './lib/scheduler';
import { PostgresKnowledgeStore } from './lib/store/postgres-store';

const startupDbWaitTimeoutMs = 30_000;
const startupDbWaitPollMs = 500;
let isShuttingDown = false;
let isTickRunning = false;
let didLogDbNotReady = false;
let ingestionContext: IngestionContext | null = null;
let tickTimer: NodeJS.Timeout | null = null;

function logConfiguration(): void {
  validateKnowledgeBaseEnv();
  const timestamp = new Date().toISOString();

  console.log(
    `[worker][startup] timestamp=${timestamp} embeddingProvider=${getEmbeddingProvider()} embeddingDim=${getEmbeddingDimensions()} chunkSize=${getChunkSize()} chunkOverlap=${getChunkOverlap()} pollIntervalMs=${getSourcePollIntervalMs()}`
  );
}

async function getIngestionContext(): Promise<IngestionContext> {
  if (!ingestionContext) {
    const db = await getDatabase();
    if (shouldAutoMigrate()) {
      const applied = await runMigrations(db);
      console.log(`[worker] Migrations up to date (${applied.length} applied this start)`);
    }
    ingestionContext = createIngestionContext(new PostgresKnowledgeStore(db));
  }
  return ingestionContext;
}

async function runTick(): Promise<void> {
  if (isShuttingDown || isTickRunning) {
    return;
  }

  isTickRunning = true;
  try {
    const ctx = await getIngestionContext();
    const results = await runIngestionCycle(ctx);
    for (const result of results) {
      console.log(
        `[worker] Source ${result.sourceId} status=${result.status} created=${result.created} updated=${result.updated} failed=${result.failed} deferred=${result.deferred}`
      );
    }
    didLogDbNotReady = false;
  } catch (error) {
    if (isTransientDatabaseNotReadyError(error)) {
      if (!didLogDbNotReady) {
        console.warn('[worker] Database is not fully ready yet; retrying on next tick.');
        didLogDbNotReady = true;
      }
      return;
    }
    console.error('[worker] Tick failed:', error);
  } finally {
    isTickRunning = false;
  }
}

function getDatabaseHostAndPort(): { host: string; port: number } {
  try {
    const parsed = new URL(getDatabaseUrl());
    return {
      host: parsed.hostname || 'localhost',
      port: parsed.port ? Number(parsed.port) : 5432,
    };
  } catch {
    return { host: 'localhost', port: 5432 };
  }
}

function tryConnect(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const done = (ok: boolean): void => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(ok);
    };

    socket.once('connect', () => done(true));
    socket.once('error', () => done(false));
    socket.setTimeout(1000, () => done(false));
  });
}

async function waitForDatabasePort(): Promise<boolean> {
  const { host, port } = getDatabaseHostAndPort();
  const startedAtMs = Date.now();
  const deadlineMs = startedAtMs + startupDbWaitTimeoutMs;

  while (!isShuttingDown && Date.now() < deadlineMs) {
    const connected = await tryConnect(host, port);
    if (connected) {
      const elapsedMs = Date.now() - startedAtMs;
      if (elapsedMs > 0) {
        console.log(`[worker] Database reachable at ${host}:${port} after ${elapsedMs}ms.`);
      }
      return true;
    }

    await new Promise((resolve) => setTimeout(resolve, startupDbWaitPollMs));
  }

  return false;
}

function readErrorCode(value: unknown): string | undefined {
  if (value && typeof value === 'object' && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function isTransientDatabaseNotReadyError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }

  const code = readErrorCode(error);
  // Postgres startup race: server socket accepts, but backend still initializing.
  if (code === '57P03' || code === 'ECONNREFUSED') {
    return true;
  }

  if (error instanceof Error && error.message.includes('database system is starting up')) {
    return true;
  }

  if (!('errors' in error) || !Array.isArray(error.errors)) {
    return false;
  }

  return error.errors.some((entry: unknown) => readErrorCode(entry) === 'ECONNREFUSED');
}

async function startWorker(): Promise<void> {
  const pollIntervalMs = getWorkerPollMs();
  console.log(`[worker] Starting ingestion worker (tick every ${pollIntervalMs}ms)`);
  try {
    logConfiguration();
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown startup error';
    console.error(`[worker] Startup configuration failed: ${message}`);
    process.exitCode = 1;
    return;
  }

  const dbReady = await waitForDatabasePort();
  if (!dbReady) {
    const { host, port } = getDatabaseHostAndPort();
    console.warn(
      `[worker] Timed out waiting ${startupDbWaitTimeoutMs}ms for database at ${host}:${port}. Continuing with retries.`
    );
  }

  tickTimer = setInterval(() => {
    void runTick();
  }, pollIntervalMs);

  await runTick();
}

function shutdown(signal: string): void {
  console.log(`[worker] Received ${signal}. Shutting down...`);
  isShuttingDown = true;
  if (tickTimer) {
    clearInterval(tickTimer);
    tickTimer = null;
  }
  closeDatabase().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : 'Unknown shutdown error';
    console.error(`[worker] Closing database failed: ${message}`);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

void startWorker().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : 'Unknown startup error';
  console.error(`[worker] Startup failed: ${message}`);
  process.exitCode = 1;
});
