/**
 * Batch conversion and publishing.
 *
 * Converts and publishes several documents with bounded parallelism. Each
 * document succeeds or fails on its own; results keep input order.
 *
 * @module wechat-api/batch
 */

import { convert } from '../converter.js';
import type { ConvertOptions } from '../types.js';
import { ArticlePublisher } from './publisher.js';
import type { PublishErrorCode, PublishOptions, PublishOutcome } from './publisher.js';
import type { ProgressCallback } from './types.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Default number of documents in flight at once. */
export const DEFAULT_BATCH_CONCURRENCY = 3;

export interface BatchItem {
  /** Label used in progress messages and results, e.g. the file name. */
  name: string;
  /**
   * Conversion options, or a loader for them. A loader runs inside the
   * item's own task, so a source that cannot be read fails only this item.
   */
  convert: ConvertOptions | (() => ConvertOptions | Promise<ConvertOptions>);
  /** Per-item publish options; `onProgress` is ignored. */
  publish?: Omit<PublishOptions, 'onProgress'>;
}

export type BatchErrorCode = PublishErrorCode | 'CONVERSION_ERROR';

export type BatchItemResult =
  | { name: string; success: true; mediaId: string; title: string }
  | { name: string; success: false; error: string; code: BatchErrorCode };

export interface BatchOptions {
  /** Default: {@link DEFAULT_BATCH_CONCURRENCY}. */
  concurrency?: number;
  /** Called as each document starts and finishes. */
  onProgress?: ProgressCallback;
}

export interface BatchSummary {
  results: BatchItemResult[];
  succeeded: number;
  failed: number;
}

// ---------------------------------------------------------------------------
// Concurrency
// ---------------------------------------------------------------------------

/**
 * Run `tasks` with at most `concurrency` in flight. Tasks must not reject.
 */
export async function runWithConcurrency(
  tasks: Array<() => Promise<void>>,
  concurrency: number,
): Promise<void> {
  const executing = new Set<Promise<void>>();

  for (const task of tasks) {
    const p = task().then(() => {
      executing.delete(p);
    });
    executing.add(p);

    if (executing.size >= concurrency) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);
}

// ---------------------------------------------------------------------------
// BatchPublisher
// ---------------------------------------------------------------------------

function toItemResult(name: string, outcome: PublishOutcome): BatchItemResult {
  if (outcome.success) {
    return { name, success: true, mediaId: outcome.mediaId, title: outcome.title };
  }
  return { name, success: false, error: outcome.error, code: outcome.code };
}

export class BatchPublisher {
  constructor(private readonly publisher: ArticlePublisher) {}

  async publishAll(items: readonly BatchItem[], options: BatchOptions = {}): Promise<BatchSummary> {
    const concurrency = Math.max(1, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);
    const results: BatchItemResult[] = new Array<BatchItemResult>(items.length);
    let finished = 0;

    const tasks = items.map((item, index) => async (): Promise<void> => {
      options.onProgress?.({
        phase: 'converting',
        current: finished,
        total: items.length,
        message: `Converting ${item.name}`,
      });

      let outcome: BatchItemResult;
      try {
        const convertOptions = typeof item.convert === 'function' ? await item.convert() : item.convert;
        const rendered = convert(convertOptions);
        const published = await this.publisher.publish(rendered, {
          ...item.publish,
          mode: item.publish?.mode ?? (convertOptions.mode === 'newspic' ? 'newspic' : 'news'),
        });
        outcome = toItemResult(item.name, published);
      } catch (error) {
        // publish() reports its own failures, so anything caught here came
        // from loading or converting the source.
        outcome = {
          name: item.name,
          success: false,
          error: error instanceof Error ? error.message : String(error),
          code: 'CONVERSION_ERROR',
        };
      }

      results[index] = outcome;
      finished++;
      options.onProgress?.({
        phase: outcome.success ? 'done' : 'error',
        current: finished,
        total: items.length,
        message: outcome.success ? `Published ${item.name}` : `Failed ${item.name}: ${outcome.error}`,
      });
    });

    await runWithConcurrency(tasks, concurrency);

    const succeeded = results.filter((r) => r.success).length;
    return { results, succeeded, failed: results.length - succeeded };
  }
}
