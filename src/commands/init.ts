/**
 * Init command - create a starter config file
 */

import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import chalk from 'chalk';
import { DEFAULTS, type ApisiftFileConfig } from '../config.js';

export interface InitCommandOptions {
  format?: string;
  force?: boolean;
  dir?: string;
}

export const STARTER_CONFIG: ApisiftFileConfig = {
  dbPath: DEFAULTS.dbPath,
  port: DEFAULTS.port,
  caDir: DEFAULTS.caDir,
  filter: '',
  enableDeduplication: DEFAULTS.enableDeduplication,
  enableSimilarityDedup: DEFAULTS.enableSimilarityDedup,
  similarityThreshold: DEFAULTS.similarityThreshold,
  similarityWindowSeconds: DEFAULTS.similarityWindowSeconds,
  storeTimeoutMs: DEFAULTS.storeTimeoutMs,
  maxConcurrentExchanges: DEFAULTS.maxConcurrentExchanges,
};

const GITIGNORE_MARKER = '# apisift captures';

const GITIGNORE_ENTRY = `
${GITIGNORE_MARKER}
*.db
*.db-wal
*.db-shm
.apisift/
`;

/**
 * Serialize the starter config in the requested format
 */
export async function renderStarterConfig(format: 'json' | 'yaml'): Promise<string> {
  if (format === 'yaml') {
    const yaml = (await import('js-yaml')).default;
    return yaml.dump(STARTER_CONFIG, { indent: 2 });
  }
  return JSON.stringify(STARTER_CONFIG, null, 2) + '\n';
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export async function initCommand(options: InitCommandOptions): Promise<void> {
  const cwd = options.dir ?? process.cwd();
  const format = options.format === 'json' ? 'json' : 'yaml';
  const configFileName = format === 'yaml' ? '.apisift.yaml' : '.apisift.json';
  const configPath = join(cwd, configFileName);
  const gitignorePath = join(cwd, '.gitignore');

  console.log(chalk.cyan.bold('Initializing apisift...\n'));

  try {
    await writeFile(configPath, await renderStarterConfig(format), { flag: options.force ? 'w' : 'wx' });
    console.log(chalk.green('✓') + ' Created ' + chalk.cyan(configFileName));
  } catch (error) {
    if (!isAlreadyExists(error)) throw error;
    console.log(chalk.yellow('⚠') + ' ' + configFileName + ' already exists (use --force to overwrite)');
  }

  let gitignoreContent = '';
  try {
    gitignoreContent = await readFile(gitignorePath, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }

  if (gitignoreContent.includes(GITIGNORE_MARKER)) {
    console.log(chalk.gray('  .gitignore already contains apisift entries'));
  } else {
    await writeFile(gitignorePath, gitignoreContent + GITIGNORE_ENTRY, 'utf-8');
    console.log(chalk.green('✓') + ' Updated ' + chalk.cyan('.gitignore'));
  }

  console.log(chalk.bold('\nNext Steps:\n'));
  console.log('1. Review and customize ' + chalk.cyan(configFileName));
  console.log('2. Start the proxy: ' + chalk.cyan('apisift run'));
  console.log('3. Point your client at it and trust ' + chalk.cyan(join(DEFAULTS.caDir, 'ca.pem')) + ' for HTTPS');
  console.log('\nTip: send SIGHUP to a running proxy to reload ' + chalk.cyan(configFileName));
}
