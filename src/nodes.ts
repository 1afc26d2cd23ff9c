import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { ClusterNode } from './types.js';

export const UNKNOWN_ALIAS = 'unknown';

/**
 * First whitespace-delimited token of each non-blank, non-comment line is the
 * host. Trailing tokens such as `slots=8` belong to the launcher.
 */
export function parseHostfile(contents: string, ranksPerNode: number): ClusterNode[] {
  const hosts: string[] = [];
  for (const rawLine of contents.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const [host] = line.split(/\s+/);
    hosts.push(host);
  }
  return hosts.map((hostname, index) => ({ index, hostname, ranksPerNode }));
}

export async function loadNodes(hostfile: string, ranksPerNode: number): Promise<ClusterNode[]> {
  let contents: string;
  try {
    contents = await fs.readFile(hostfile, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Hostfile not found or unreadable at: ${hostfile}`, { cause: error });
  }
  const nodes = parseHostfile(contents, ranksPerNode);
  if (nodes.length < 2) {
    throw new ConfigurationError(`Need at least 2 nodes in ${hostfile}; found ${nodes.length}`);
  }
  return nodes;
}

const ALIAS_RECORDS_SCHEMA = z.array(z.array(z.string()));

export function parseAliasMap(contents: string): Map<string, string> {
  const records = ALIAS_RECORDS_SCHEMA.parse(
    parse(contents, {
      from_line: 2,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true
    })
  );
  const aliases = new Map<string, string>();
  for (const record of records) {
    const [host, alias] = record;
    if (!host) continue;
    aliases.set(host, alias && alias.length > 0 ? alias : UNKNOWN_ALIAS);
  }
  return aliases;
}

/** Missing file means no aliases; every host then resolves to `unknown`. */
export async function loadAliasMap(aliasFile: string | undefined): Promise<Map<string, string>> {
  if (!aliasFile) return new Map();
  try {
    return parseAliasMap(await fs.readFile(aliasFile, 'utf8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return new Map();
    }
    throw error;
  }
}

export function resolveAlias(aliases: ReadonlyMap<string, string>, host: string): string {
  return aliases.get(host) ?? UNKNOWN_ALIAS;
}
