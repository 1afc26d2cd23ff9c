import fs from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ResultRecord } from '../types.js';

export const ROUND_TABLE_COLUMNS = ['node_a', 'alias_a', 'node_b', 'alias_b', 'avg_latency', 'avg_busbw'] as const;
export const AGGREGATE_TABLE_COLUMNS = ['round', ...ROUND_TABLE_COLUMNS] as const;

const ROUND_TABLE_PATTERN = /^round_(\d+)_results\.csv$/;
const TABLE_ROWS_SCHEMA = z.array(z.array(z.string()));

export function roundTablePath(outputDir: string, roundIndex: number): string {
  return path.join(outputDir, `round_${roundIndex}_results.csv`);
}

export function aggregateTablePath(outputDir: string, nodeCount: number): string {
  return path.join(outputDir, `allpair_${nodeCount}_nodes.csv`);
}

export function formatMetric(value: number): string {
  return value.toFixed(8);
}

function recordCells(record: ResultRecord): string[] {
  return [
    record.nodeA,
    record.aliasA,
    record.nodeB,
    record.aliasB,
    formatMetric(record.avgLatency),
    formatMetric(record.avgBusbw)
  ];
}

async function readTableRows(tablePath: string): Promise<string[][]> {
  try {
    return parseTable(await fs.readFile(tablePath, 'utf8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw error;
  }
}

/**
 * Writes the row for a node pair, replacing the row an earlier scan wrote for
 * the same pair in place. The header is written when the table is new.
 */
export async function upsertRoundRecord(outputDir: string, record: ResultRecord): Promise<string> {
  const tablePath = roundTablePath(outputDir, record.round);
  const [header = [...ROUND_TABLE_COLUMNS], ...body] = await readTableRows(tablePath);
  const cells = recordCells(record);
  const existing = body.findIndex((row) => row[0] === record.nodeA && row[2] === record.nodeB);
  if (existing === -1) {
    body.push(cells);
  } else {
    body[existing] = cells;
  }
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(tablePath, stringify([header, ...body]), 'utf8');
  return tablePath;
}

export function parseTable(contents: string): string[][] {
  return TABLE_ROWS_SCHEMA.parse(parse(contents, { skip_empty_lines: true, relax_column_count: true }));
}

export interface RoundTableFile {
  readonly round: number;
  readonly path: string;
}

/** Per-round tables in numeric round order, so round 2 precedes round 10. */
export async function listRoundTables(outputDir: string): Promise<RoundTableFile[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(outputDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw error;
  }
  const tables: RoundTableFile[] = [];
  for (const entry of entries) {
    const match = ROUND_TABLE_PATTERN.exec(entry);
    if (!match) continue;
    tables.push({ round: Number.parseInt(match[1], 10), path: path.join(outputDir, entry) });
  }
  return tables.sort((left, right) => left.round - right.round);
}

export interface AggregateResult {
  readonly path: string;
  readonly rows: number;
}

export async function writeAggregateTable(outputDir: string, nodeCount: number): Promise<AggregateResult> {
  const tables = await listRoundTables(outputDir);
  const rows: string[][] = [];
  for (const table of tables) {
    const [, ...body] = parseTable(await fs.readFile(table.path, 'utf8'));
    for (const row of body) {
      rows.push([String(table.round), ...row]);
    }
  }
  const outputPath = aggregateTablePath(outputDir, nodeCount);
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(outputPath, stringify([[...AGGREGATE_TABLE_COLUMNS], ...rows]), 'utf8');
  return { path: outputPath, rows: rows.length };
}
