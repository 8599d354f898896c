/**
 * Retention Reaper
 *
 * Deletes samples and rollups older than the retention horizon with two
 * range DELETEs. The boundary is exclusive: a row stamped exactly at
 * now - horizon is kept.
 */

import type { MetricsStore, DeletedCounts } from '../services/metrics-store.js';
import { DAY_MS } from '../types.js';
import { AggregationSkippedError } from '../errors.js';
import { debug, log } from '../logger.js';

export interface RetentionReaperOptions {
  retentionDays: number;
  now?: () => Date;
}

export class RetentionReaper {
  private readonly now: () => Date;

  constructor(
    private readonly store: MetricsStore,
    private readonly options: RetentionReaperOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  cutoff(): Date {
    return new Date(this.now().getTime() - this.options.retentionDays * DAY_MS);
  }

  async run(): Promise<DeletedCounts> {
    const cutoff = this.cutoff();
    debug(`[Retention] Deleting data older than ${cutoff.toISOString()}`);

    let deleted: DeletedCounts;
    try {
      deleted = await this.store.deleteOlderThan(cutoff);
    } catch (err) {
      throw new AggregationSkippedError('Retention cleanup failed', { cause: err });
    }

    if (deleted.samples > 0 || deleted.rollups > 0) {
      log(
        `[Retention] Cleanup completed: ${deleted.samples} samples, ${deleted.rollups} rollups deleted ` +
        `(older than ${this.options.retentionDays} days)`,
      );
    } else {
      debug('[Retention] No expired data found');
    }

    return deleted;
  }
}
