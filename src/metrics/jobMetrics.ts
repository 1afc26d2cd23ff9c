import http from 'http';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { Job } from '../types.js';

const JOB_DURATION_BUCKETS = [1, 5, 15, 30, 60, 120, 300, 600, 1_200];

export interface JobMetricsOptions {
  readonly runId: string;
  readonly port: number;
  readonly collectDefaults?: boolean;
}

export class JobMetrics {
  readonly registry = new Registry();
  private readonly jobs: Counter<'run_id' | 'status'>;
  private readonly duration: Histogram<'run_id' | 'status'>;
  private readonly roundsCompleted: Counter<'run_id'>;
  private readonly currentRound: Gauge<'run_id'>;
  private readonly server?: http.Server;

  constructor(private readonly options: JobMetricsOptions) {
    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }
    this.jobs = new Counter({
      name: 'allpair_jobs_total',
      help: 'Pair jobs by terminal status',
      labelNames: ['run_id', 'status'],
      registers: [this.registry]
    });
    this.duration = new Histogram({
      name: 'allpair_job_duration_seconds',
      help: 'Wall time of launched pair jobs',
      labelNames: ['run_id', 'status'],
      buckets: JOB_DURATION_BUCKETS,
      registers: [this.registry]
    });
    this.roundsCompleted = new Counter({
      name: 'allpair_rounds_completed_total',
      help: 'Rounds whose barrier released',
      labelNames: ['run_id'],
      registers: [this.registry]
    });
    this.currentRound = new Gauge({
      name: 'allpair_current_round',
      help: 'Index of the round in progress',
      labelNames: ['run_id'],
      registers: [this.registry]
    });
    if (options.port > 0) {
      this.server = http.createServer((_req, res) => {
        this.registry
          .metrics()
          .then((body) => {
            res.setHeader('Content-Type', this.registry.contentType);
            res.end(body);
          })
          .catch((error: unknown) => {
            res.statusCode = 500;
            res.end(error instanceof Error ? error.message : String(error));
          });
      });
    }
  }

  async start(): Promise<void> {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve) => server.listen(this.options.port, resolve));
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server || !server.listening) return;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  recordRoundStart(roundIndex: number): void {
    this.currentRound.set({ run_id: this.options.runId }, roundIndex);
  }

  recordJob(job: Job): void {
    const labels = { run_id: this.options.runId, status: job.status };
    this.jobs.inc(labels);
    if (job.durationMs !== undefined) {
      this.duration.observe(labels, job.durationMs / 1_000);
    }
  }

  recordRoundComplete(): void {
    this.roundsCompleted.inc({ run_id: this.options.runId });
  }
}
