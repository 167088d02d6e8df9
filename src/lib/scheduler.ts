import type { Source } from '../schema';
import { getSourcePollIntervalMs } from './env';
import { ingestSource, type IngestionContext } from './ingestion/pipeline';
import type { SourceIngestResult } from './ingestion/types';
import { listDueSources } from './source-registry';
import type { SourceAdapter } from './sources/base';
import { createSourceAdapter } from './sources/factory';

export type IngestionCycleOptions = {
  pollIntervalMs?: number;
  adapterFactory?: (source: Source) => SourceAdapter;
};

/**
 * Ingests every due source once, in name order. Sources are processed
 * sequentially so one cycle never holds more than one fetch open.
 */
export async function runIngestionCycle(
  ctx: IngestionContext,
  now: Date = ctx.now(),
  options: IngestionCycleOptions = {}
): Promise<SourceIngestResult[]> {
  const pollIntervalMs = options.pollIntervalMs ?? getSourcePollIntervalMs();
  const adapterFactory = options.adapterFactory ?? createSourceAdapter;
  const dueSources = await listDueSources(ctx.store, now, pollIntervalMs);
  const results: SourceIngestResult[] = [];

  if (dueSources.length > 0) {
    console.log(`[scheduler] ${dueSources.length} source(s) due: ${dueSources.map((source) => source.id).join(', ')}`);
  }

  for (const source of dueSources) {
    let adapter: SourceAdapter;
    try {
      adapter = adapterFactory(source);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown adapter failure';
      console.error(`[scheduler] Cannot ingest source ${source.id}: ${message}`);
      await ctx.store.recordIngestionStatus(source.id, 'failed', message, now);
      results.push({
        sourceId: source.id,
        status: 'failed',
        discovered: 0,
        created: 0,
        updated: 0,
        unchanged: 0,
        skipped: 0,
        failed: 0,
        deferred: 0,
        errors: [{ externalId: '*', message }],
      });
      continue;
    }

    results.push(await ingestSource(ctx, adapter));
  }

  return results;
}
