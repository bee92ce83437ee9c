/**
 * Rendering utilities for terminal output
 * Handles tables, capture stats, welcome banners
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import boxen from 'boxen';
import type { OutcomeStatus, CapturedRecord } from '../types.js';
import { formatBytes, formatDuration, formatNumber, formatRelativeTime, truncate } from './format.js';

export interface OutputMode {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

/**
 * Render welcome banner when no args provided
 */
export function renderWelcomeBanner(): string {
  const banner = chalk.cyan.bold(`
   __ _ _ __ (_)___(_)/ _| |_
  / _\` | '_ \\| / __| | |_| __|
 | (_| | |_) | \\__ \\ |  _| |_
  \\__,_| .__/|_|___/_|_|  \\__|
       |_|
`);
  const tagline = chalk.gray('Capture proxy that keeps one copy of every API call');

  const examples = [
    chalk.white('Examples:'),
    '  ' + chalk.cyan('apisift run') + '                  ' + chalk.gray('# Proxy on :8080, store in ./api_data.db'),
    '  ' + chalk.cyan('apisift run') + ' --filter "~d api.example.com & ~m POST"',
    '  ' + chalk.cyan('apisift list') + ' --limit 20',
    '  ' + chalk.cyan('apisift init') + '                 ' + chalk.gray('# Create .apisift.yaml'),
    '  ' + chalk.cyan('apisift mcp') + '                  ' + chalk.gray('# Serve captures to MCP clients'),
  ];

  const help = chalk.gray('\nRun') + ' ' + chalk.cyan('apisift --help') + ' ' + chalk.gray('for all options');

  return boxen(
    `${banner}\n${tagline}\n\n${examples.join('\n')}${help}`,
    {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
    }
  );
}

/**
 * Render run summary header
 */
export function renderRunHeader(info: {
  proxyUrl: string;
  dbPath: string;
  caCertPath: string;
  filter: string;
}): string {
  const lines = [
    chalk.bold('Capture Proxy Started'),
    '  Proxy: ' + chalk.cyan(info.proxyUrl),
    '  Store: ' + chalk.gray(info.dbPath),
    '  CA certificate: ' + chalk.gray(info.caCertPath),
  ];
  if (info.filter) {
    lines.push('  Filter: ' + chalk.yellow(info.filter));
  }
  lines.push(chalk.gray('  Press Ctrl+C to stop'));
  return lines.join('\n');
}

const OUTCOME_ROWS: Array<[OutcomeStatus, string, (text: string) => string]> = [
  ['captured', 'Captured', chalk.green],
  ['duplicate', 'Exact Duplicates', chalk.yellow],
  ['similar', 'Similar Duplicates', chalk.yellow],
  ['static', 'Static Resources', chalk.gray],
  ['filtered', 'Filtered Out', chalk.gray],
  ['error', 'Errors', chalk.red],
  ['closed', 'After Shutdown', chalk.gray],
];

/**
 * Render pipeline outcome counts
 */
export function renderOutcomeStats(stats: Record<OutcomeStatus, number>): string {
  const table = new Table({
    head: [chalk.bold('Outcome'), chalk.bold('Count')],
    style: { head: [], border: ['gray'] },
  });

  let total = 0;
  for (const [status, label, color] of OUTCOME_ROWS) {
    total += stats[status];
    table.push([color(label), formatNumber(stats[status])]);
  }
  table.push([chalk.bold('Total Exchanges'), chalk.bold(formatNumber(total))]);

  return table.toString();
}

function statusColor(status: number | null): (text: string) => string {
  if (status === null) return chalk.gray;
  if (status >= 500) return chalk.red;
  if (status >= 400) return chalk.yellow;
  return chalk.green;
}

/**
 * Render recent captures table
 */
export function renderRecordsTable(records: CapturedRecord[], nowSeconds?: number): string {
  if (records.length === 0) {
    return chalk.yellow('No captures yet');
  }

  const table = new Table({
    head: [
      chalk.bold('ID'),
      chalk.bold('Method'),
      chalk.bold('Host'),
      chalk.bold('Path'),
      chalk.bold('Status'),
      chalk.bold('Time'),
      chalk.bold('Size'),
      chalk.bold('Seen'),
    ],
    style: { head: [], border: ['gray'] },
    colWidths: [7, 8, 28, 40, 8, 9, 10, 10],
  });

  for (const record of records) {
    table.push([
      chalk.gray(String(record.id)),
      chalk.cyan(record.method),
      truncate(record.host, 26),
      truncate(record.path, 38),
      statusColor(record.responseStatus)(record.responseStatus === null ? '-' : String(record.responseStatus)),
      formatDuration(record.responseTime),
      formatBytes(Buffer.byteLength(record.responseBody, 'utf8')),
      chalk.gray(formatRelativeTime(record.timestamp, nowSeconds)),
    ]);
  }

  return table.toString();
}

/**
 * Render a single capture
 */
export function renderRecordDetail(record: CapturedRecord): string {
  const lines = [
    chalk.bold.cyan(`${record.method} ${record.url}`),
    '',
    `  ID: ${record.id}`,
    `  Hash: ${chalk.gray(record.requestHash)}`,
    `  Status: ${statusColor(record.responseStatus)(record.responseStatus === null ? 'no response' : String(record.responseStatus))}`,
    `  Response Time: ${formatDuration(record.responseTime)}`,
    `  Client: ${record.clientIp || '-'}`,
    `  Captured: ${new Date(record.timestamp * 1000).toLocaleString()}`,
  ];

  if (record.requestBody) {
    lines.push('', chalk.bold('Request Body'), truncate(record.requestBody, 2000));
  }
  if (record.responseBody) {
    lines.push('', chalk.bold('Response Body'), truncate(record.responseBody, 2000));
  }

  return lines.join('\n');
}

/**
 * Output as JSON (for --json mode)
 */
export function outputJSON(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
