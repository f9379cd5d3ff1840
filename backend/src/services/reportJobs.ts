import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import logger from '../logger.js';
import { NotFoundError } from '../middleware/errorHandler.js';
import type { MonthKey, Preferences, StoreSnapshot } from '../types.js';
import type { PreferencesStore } from './preferences.js';
import { assertMonthKey, type RecordStore } from './records.js';
import { assembleMonthReport } from './report.js';
import { defaultRenderers, renderWithFallback, type ReportRenderer } from './reportRenderers.js';

export const DEFAULT_RETAINED_JOBS = 100;

export type ReportJobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface ReportJob {
  id: string;
  month: MonthKey;
  status: ReportJobStatus;
  submittedAt: string;
  finishedAt?: string;
  noData?: boolean;
  renderer?: string;
  files?: string[];
  error?: string;
}

export interface ReportJobQueueOptions {
  records: RecordStore;
  preferences: PreferencesStore;
  outputDir: string;
  renderers?: ReportRenderer[];
  topN?: number;
  /** Finished jobs kept for polling; the oldest are evicted beyond this */
  retainJobs?: number;
  now?: () => Date;
}

/**
 * Runs report generation off the request path.
 *
 * `submit` snapshots the stores before returning, so a job never observes
 * writes made after it was queued, and it never writes to the stores. Output
 * files are published atomically; an abandoned job leaves no partial file.
 */
export class ReportJobQueue {
  private readonly jobs = new Map<string, ReportJob>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly renderers: ReportRenderer[];
  private readonly now: () => Date;
  private readonly retainJobs: number;

  constructor(private readonly options: ReportJobQueueOptions) {
    this.renderers = options.renderers ?? defaultRenderers();
    this.now = options.now ?? (() => new Date());
    this.retainJobs = Math.max(1, options.retainJobs ?? DEFAULT_RETAINED_JOBS);
  }

  async submit(month: MonthKey): Promise<ReportJob> {
    const key = assertMonthKey(month);
    const snapshot = this.options.records.snapshot();
    const preferences = await this.options.preferences.get();

    const job: ReportJob = {
      id: randomUUID(),
      month: key,
      status: 'pending',
      submittedAt: this.now().toISOString(),
    };
    this.jobs.set(job.id, job);

    const task = new Promise<void>((resolve) => setImmediate(resolve)).then(() =>
      this.run(job, snapshot, preferences)
    );
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));

    logger.info({ jobId: job.id, month: key }, 'Report job queued');
    return { ...job };
  }

  get(id: string): ReportJob {
    const job = this.jobs.get(id);
    if (!job) {
      throw new NotFoundError(`Report job ${id} not found`, { id });
    }
    return { ...job, files: job.files ? [...job.files] : undefined };
  }

  list(): ReportJob[] {
    return [...this.jobs.keys()].map((id) => this.get(id));
  }

  /** Wait for every queued job to settle */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async run(job: ReportJob, snapshot: StoreSnapshot, preferences: Preferences): Promise<void> {
    job.status = 'running';
    try {
      const payload = assembleMonthReport(snapshot, preferences, job.month, this.options.topN, this.now());
      const outcome = await renderWithFallback(
        payload,
        join(this.options.outputDir, `expense-report-${job.month}`),
        this.renderers
      );

      job.status = 'completed';
      job.noData = payload.noData;
      job.renderer = outcome.renderer;
      job.files = outcome.files;
      logger.info({ jobId: job.id, renderer: outcome.renderer, files: outcome.files }, 'Report job completed');
    } catch (err) {
      // The failure is recorded on the job and reported to whoever polls it
      job.status = 'failed';
      job.error = err instanceof Error ? err.message : String(err);
      logger.error({ err, jobId: job.id }, 'Report job failed');
    } finally {
      job.finishedAt = this.now().toISOString();
      this.evictFinished();
    }
  }

  // Pending and running jobs are never evicted
  private evictFinished(): void {
    const finished = [...this.jobs.values()].filter((j) => j.status === 'completed' || j.status === 'failed');
    for (const job of finished.slice(0, Math.max(0, finished.length - this.retainJobs))) {
      this.jobs.delete(job.id);
    }
  }
}
