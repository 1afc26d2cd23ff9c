import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import { describeError } from '../errors.js';
import { resolveAlias } from '../nodes.js';
import { containsSuccessMarker, JobLogEntry, listJobLogs } from '../runner/logPaths.js';
import { ResultRecord } from '../types.js';
import { componentLogger, Logger } from '../utils/logger.js';
import { extractMetrics } from './extract.js';
import { AggregateResult, upsertRoundRecord, writeAggregateTable } from './tables.js';

export const PROCESSED_TRACKER_FILE = '.processed_logs_tracker';
const READ_CONCURRENCY = 8;

export interface ResultCollectorOptions {
  readonly logRoot: string;
  /** Where the round tables go; defaults to the log root. */
  readonly outputDir?: string;
  readonly aliases?: ReadonlyMap<string, string>;
  readonly logger?: Logger;
}

export interface ScanOptions {
  /** Also record logs without the success marker, with zero metrics. */
  readonly includeIncomplete?: boolean;
}

export interface ScanResult {
  readonly scanned: number;
  readonly recorded: readonly ResultRecord[];
  readonly pending: number;
}

/**
 * Turns job logs into per-round result tables. Logs recorded with a measurement
 * are kept in a tracker file beside the tables and never read again. A log
 * recorded without one stays out of the tracker, so a later scan replaces its
 * zero row once a rerun of the pair writes `busbw:`.
 * A collector instance is the only writer of its tracker and tables.
 */
export class ResultCollector {
  private readonly logRoot: string;
  private readonly outputDir: string;
  private readonly trackerPath: string;
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly logger: Logger;
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;

  constructor(options: ResultCollectorOptions) {
    this.logRoot = options.logRoot;
    this.outputDir = options.outputDir ?? options.logRoot;
    this.trackerPath = path.join(this.outputDir, PROCESSED_TRACKER_FILE);
    this.aliases = options.aliases ?? new Map();
    this.logger = options.logger ?? componentLogger('collector');
  }

  async scan(options: ScanOptions = {}): Promise<ScanResult> {
    const processed = await this.loadProcessed();
    const candidates = (await listJobLogs(this.logRoot)).filter((entry) => !processed.has(entry.relativePath));

    const limit = pLimit(READ_CONCURRENCY);
    const contents = await Promise.all(
      candidates.map((entry) => limit(() => fs.readFile(entry.path, 'utf8')))
    );

    const recorded: ResultRecord[] = [];
    const newlyProcessed: string[] = [];
    let pending = 0;
    // rows are appended in (round, job) order regardless of read completion order
    for (const [index, entry] of candidates.entries()) {
      const text = contents[index];
      const complete = containsSuccessMarker(text);
      if (!complete && !options.includeIncomplete) {
        pending += 1;
        continue;
      }
      const record = this.toRecord(entry, text);
      await upsertRoundRecord(this.outputDir, record);
      recorded.push(record);
      if (complete) newlyProcessed.push(entry.relativePath);
    }

    if (newlyProcessed.length > 0) {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.appendFile(this.trackerPath, newlyProcessed.map((line) => `${line}\n`).join(''), 'utf8');
    }

    this.logger.debug({ scanned: candidates.length, recorded: recorded.length, pending }, 'collector.scan');
    return { scanned: candidates.length, recorded, pending };
  }

  async aggregate(nodeCount: number): Promise<AggregateResult> {
    const result = await writeAggregateTable(this.outputDir, nodeCount);
    this.logger.info(result, `Aggregated results generated at ${result.path}`);
    return result;
  }

  /** Scans every `intervalMs`; a tick is skipped while the previous one still runs. */
  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.inFlight) return;
      this.inFlight = this.scan()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.logger.error({ detail: describeError(error) }, 'collector.scan.failed');
        })
        .finally(() => {
          this.inFlight = undefined;
        });
    }, intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  private toRecord(entry: JobLogEntry, text: string): ResultRecord {
    const metrics = extractMetrics(text);
    return {
      round: entry.name.round,
      nodeA: entry.name.hostA,
      aliasA: resolveAlias(this.aliases, entry.name.hostA),
      nodeB: entry.name.hostB,
      aliasB: resolveAlias(this.aliases, entry.name.hostB),
      avgLatency: metrics.latencyAvg,
      avgBusbw: metrics.busbwAvg
    };
  }

  private async loadProcessed(): Promise<Set<string>> {
    try {
      const contents = await fs.readFile(this.trackerPath, 'utf8');
      return new Set(contents.split(/\r?\n/).filter((line) => line.length > 0));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return new Set();
      throw error;
    }
  }
}
