/**
 * Alias table and its file round-trip
 *
 * File format: one alias per line, "{name} {command-line}\n". Only the first
 * space separates the name; the rest of the line is the command line verbatim.
 */

import { open, type FileHandle } from 'fs/promises';
import { AliasFileError, AliasLimitError } from './errors.js';

export interface AliasEntry {
  name: string;
  command: string;
}

export interface LoadReport {
  /** Lines inserted or overwritten */
  loaded: number;
  /** Lines without a name/command split */
  skipped: number;
  /** Loading stopped because the table hit maxAliases */
  limitReached: boolean;
}

/**
 * In-memory alias table. Enumeration order is not part of its contract.
 */
export class AliasStore {
  private aliases = new Map<string, string>();

  constructor(entries: Iterable<readonly [string, string]> = []) {
    for (const [name, command] of entries) {
      this.aliases.set(name, command);
    }
  }

  get size(): number {
    return this.aliases.size;
  }

  has(name: string): boolean {
    return this.aliases.has(name);
  }

  get(name: string): string | undefined {
    return this.aliases.get(name);
  }

  /**
   * Insert or overwrite. Without a bound this never fails; with one, a new
   * key is refused once the table is full (overwrites are always allowed).
   */
  set(name: string, command: string, maxAliases?: number): void {
    if (maxAliases !== undefined && !this.aliases.has(name) && this.aliases.size >= maxAliases) {
      throw new AliasLimitError(maxAliases);
    }
    this.aliases.set(name, command);
  }

  delete(name: string): boolean {
    return this.aliases.delete(name);
  }

  entries(): AliasEntry[] {
    return [...this.aliases].map(([name, command]) => ({ name, command }));
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.aliases);
  }
}

/**
 * Split a file line on its first space.
 * Returns null when either side would be empty.
 */
export function parseAliasLine(line: string): AliasEntry | null {
  const idx = line.indexOf(' ');
  if (idx <= 0 || idx === line.length - 1) {
    return null;
  }
  return { name: line.slice(0, idx), command: line.slice(idx + 1) };
}

export function formatAliasLine(entry: AliasEntry): string {
  return `${entry.name} ${entry.command}\n`;
}

/**
 * Load aliases from a file into the store (additive, overwriting).
 * Stops as soon as the store holds maxAliases entries; later lines are not read.
 */
export async function loadAliases(
  path: string,
  store: AliasStore,
  maxAliases: number
): Promise<LoadReport> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new AliasFileError(`Cannot open alias file '${path}'`, path, error);
  }

  const report: LoadReport = { loaded: 0, skipped: 0, limitReached: false };

  try {
    for await (const line of handle.readLines()) {
      const entry = parseAliasLine(line);
      if (!entry) {
        report.skipped++;
        continue;
      }

      if (!store.has(entry.name) && store.size >= maxAliases) {
        report.limitReached = true;
        break;
      }

      store.set(entry.name, entry.command);
      report.loaded++;

      if (store.size >= maxAliases) {
        report.limitReached = true;
        break;
      }
    }
  } catch (error) {
    throw new AliasFileError(`Failed to read alias file '${path}'`, path, error);
  } finally {
    await handle.close();
  }

  return report;
}

/**
 * Write every alias to a file, truncating it first.
 * The first failed write aborts; lines already written stay on disk.
 * @returns number of lines written
 */
export async function saveAliases(path: string, store: AliasStore): Promise<number> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'w');
  } catch (error) {
    throw new AliasFileError(`Cannot create alias file '${path}'`, path, error);
  }

  let written = 0;
  try {
    for (const entry of store.entries()) {
      try {
        await handle.write(formatAliasLine(entry));
      } catch (error) {
        throw new AliasFileError(`Failed to write alias file '${path}' after ${written} line(s)`, path, error);
      }
      written++;
    }
  } finally {
    await handle.close();
  }

  return written;
}
