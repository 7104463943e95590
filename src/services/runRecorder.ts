import type { MonitorRunRecord } from '../core/types.js';
import { runRecordFailuresTotal } from '../metrics/index.js';
import type { RunHistoryRepository, StoredRunRecord } from '../repositories/runHistoryRepository.js';
import { getComponentLogger } from '../utils/logging.js';

export class RunRecorder {
  constructor(private readonly repo: RunHistoryRepository) {}

  /**
   * Appends the run summary. A failed write is logged and dropped; the cycle
   * still completes and the run is never re-queued.
   */
  async record(run: MonitorRunRecord): Promise<StoredRunRecord | null> {
    try {
      return await this.repo.append(run);
    } catch (err) {
      runRecordFailuresTotal.inc();
      getComponentLogger('run-recorder').error(
        { err, runTimestamp: run.runTimestamp.toISOString() },
        'run-record-persist-failed',
      );
      return null;
    }
  }
}
