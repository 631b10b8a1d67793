import { analysisId } from '../shared/hash.js';

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export type AnalysisJob<R = unknown> = {
  id: string;
  stocks: string[];
  status: JobStatus;
  progress: number; // 0..100
  message: string;
  createdAt: string;
  updatedAt: string;
  result?: R;
  error?: string;
};

export type JobPatch<R> = Partial<Pick<AnalysisJob<R>, 'status' | 'progress' | 'message' | 'result' | 'error'>>;

type Entry<R> = { v: AnalysisJob<R>; exp: number };

/** In-memory keyed store of background analysis runs. Entries expire `ttlSec` after their last update. */
export class AnalysisJobStore<R = unknown> {
  private readonly mem = new Map<string, Entry<R>>();
  private seq = 0;

  constructor(
    private readonly ttlSec: number,
    private readonly now: () => number = Date.now,
  ) {}

  create(stocks: string[]): AnalysisJob<R> {
    const t = this.now();
    const id = analysisId(stocks, t, this.seq++);
    const at = new Date(t).toISOString();
    const job: AnalysisJob<R> = {
      id,
      stocks: [...stocks],
      status: 'queued',
      progress: 0,
      message: 'Analysis queued',
      createdAt: at,
      updatedAt: at,
    };
    this.mem.set(id, { v: job, exp: t + this.ttlSec * 1000 });
    this.sweep(t);
    return { ...job };
  }

  get(id: string): AnalysisJob<R> | null {
    const t = this.now();
    const e = this.mem.get(id);
    if (e && e.exp > t) return { ...e.v };
    if (e) this.mem.delete(id);
    return null;
  }

  update(id: string, patch: JobPatch<R>): AnalysisJob<R> | null {
    const t = this.now();
    const e = this.mem.get(id);
    if (!e || e.exp <= t) return null;
    const next: AnalysisJob<R> = { ...e.v, ...patch, updatedAt: new Date(t).toISOString() };
    this.mem.set(id, { v: next, exp: t + this.ttlSec * 1000 });
    return { ...next };
  }

  /** Runs `task` in the background, recording its progress and outcome on the job. */
  run(id: string, task: (progress: (progress: number, message: string) => void) => Promise<R>): Promise<void> {
    this.update(id, { status: 'running', progress: 0, message: 'Analysis started' });
    const progress = (p: number, message: string) => {
      this.update(id, { progress: Math.max(0, Math.min(100, p)), message });
    };
    return task(progress).then(
      result => {
        this.update(id, { status: 'completed', progress: 100, message: 'Analysis completed successfully', result });
      },
      (err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(`[jobs] analysis ${id} failed:`, msg);
        this.update(id, { status: 'failed', progress: 0, message: `Analysis failed: ${msg}`, error: msg });
      },
    );
  }

  get size(): number {
    return this.mem.size;
  }

  private sweep(t: number) {
    for (const [k, e] of this.mem) {
      if (e.exp <= t) this.mem.delete(k);
    }
  }
}
