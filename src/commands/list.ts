/**
 * List command - show recent captures from the store
 */

import { resolve } from 'path';
import chalk from 'chalk';
import { DEFAULTS, loadConfig } from '../config.js';
import { ApisiftError, ConfigError } from '../errors.js';
import { CaptureStore } from '../store.js';
import type { CapturedRecord } from '../types.js';
import { outputJSON, renderRecordDetail, renderRecordsTable } from '../ui/render.js';

export interface ListCommandOptions {
  db?: string;
  limit?: string;
  after?: string;
  id?: string;
  json?: boolean;
}

function parseCount(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`--${name} expects a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export async function listCommand(options: ListCommandOptions, configPath?: string): Promise<void> {
  const fileConfig = await loadConfig(configPath);
  const dbPath = options.db ? resolve(options.db) : fileConfig?.dbPath ?? resolve(DEFAULTS.dbPath);

  const store = new CaptureStore(dbPath, { readonly: true, timeoutMs: fileConfig?.storeTimeoutMs });
  try {
    if (options.id !== undefined) {
      const id = parseCount('id', options.id, 0);
      const record = store.getRecord(id);
      if (!record) {
        throw new ApisiftError(`No capture with id ${id} in ${dbPath}`);
      }
      if (options.json) {
        outputJSON(record);
      } else {
        console.log(renderRecordDetail(record));
      }
      return;
    }

    const limit = parseCount('limit', options.limit, 20);
    const records: CapturedRecord[] = options.after !== undefined
      ? store.listAfter(parseCount('after', options.after, 0), limit)
      : store.listRecent(limit);

    if (options.json) {
      outputJSON({ dbPath, total: store.count(), records });
      return;
    }

    console.log(chalk.bold(`Captures in ${dbPath}`) + chalk.gray(` (${store.count()} total)`));
    console.log(renderRecordsTable(records));
  } finally {
    store.close();
  }
}
