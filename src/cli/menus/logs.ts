import { statSync } from 'node:fs';
import { join } from 'node:path';
import { splitArguments } from '../../shared/argv.js';
import { directorySize, findFiles, formatBytes, isDirectory, isFile } from '../../shared/fs-utils.js';
import type { CliContext } from '../cli-shared.js';
import { requireTool } from '../cli-shared.js';
import { entryLabel, RETURN_TO_MAIN, type Menu } from './menu.js';

export const DEFAULT_EVENT_COUNT = 50;
const REPLAY_LISTING_LIMIT = 20;

export function ioLogDir(ctx: CliContext): string {
  return join(ctx.config.varDir, 'iolog');
}

/** Parse the "number of entries" answer; empty means the default. */
export function parseEntryCount(raw: string): number | null {
  if (raw === '') return DEFAULT_EVENT_COUNT;
  if (!/^\d+$/.test(raw)) return null;
  const count = Number(raw);
  return count > 0 ? count : null;
}

export async function viewEventLogs(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, 'pmlog')) return;
  const raw = await ctx.prompter.input(
    `Enter number of log entries to display (default: ${DEFAULT_EVENT_COUNT})`,
    { allowEmpty: true, allowCancel: true },
  );
  if (raw === null) {
    ctx.reporter.warning('Operation cancelled');
    return;
  }
  const count = parseEntryCount(raw);
  if (count === null) {
    ctx.reporter.error(`Invalid number of entries: ${raw}`);
    return;
  }
  ctx.reporter.info(`Displaying last ${count} event log entries...`);
  ctx.runner.run('pmlog', ['-n', String(count)]);
}

export async function searchLogsByUser(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, 'pmlogsearch')) return;
  const user = await ctx.prompter.input('Enter username to search for', { allowCancel: true });
  if (user === null) {
    ctx.reporter.warning('Search cancelled');
    return;
  }
  ctx.reporter.info('Optional: Filter by date');
  const after = await ctx.prompter.input('Enter start date (YYYY/MM/DD) or press ENTER to skip', {
    allowEmpty: true,
    allowCancel: true,
  });
  if (after === null) {
    ctx.reporter.warning('Search cancelled');
    return;
  }

  ctx.reporter.info(`Searching logs for user: ${user}`);
  const args = ['--user', user];
  if (after) args.push('--after', `${after} 00:00:00`);
  ctx.runner.run('pmlogsearch', args);
}

export async function searchLogsByDate(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, 'pmlogsearch')) return;
  const after = await ctx.prompter.input('Enter start date (YYYY/MM/DD)', { allowCancel: true });
  if (after === null) {
    ctx.reporter.warning('Search cancelled');
    return;
  }
  const before = await ctx.prompter.input('Enter end date (YYYY/MM/DD) or press ENTER for today', {
    allowEmpty: true,
    allowCancel: true,
  });
  if (before === null) {
    ctx.reporter.warning('Search cancelled');
    return;
  }

  ctx.reporter.info('Searching logs...');
  const args = ['--after', `${after} 00:00:00`];
  if (before) args.push('--before', `${before} 23:59:59`);
  ctx.runner.run('pmlogsearch', args);
}

export async function searchLogsCustom(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, 'pmlogsearch')) return;
  ctx.reporter.info('Enter custom pmlogsearch parameters');
  ctx.reporter.info('Examples:');
  ctx.reporter.info('  --user username --command sudo');
  ctx.reporter.info('  --host hostname --after "2024/01/01 00:00:00"');
  ctx.reporter.info('  --event accept --user root');
  ctx.reporter.info('');

  const params = await ctx.prompter.input('Enter pmlogsearch parameters', { allowCancel: true });
  if (params === null) {
    ctx.reporter.warning('Search cancelled');
    return;
  }
  const args = splitArguments(params);
  ctx.reporter.info(`Searching logs with: ${params}`);
  ctx.runner.run('pmlogsearch', args);
}

export async function replayKeystrokeLog(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, 'pmreplay')) return;
  const dir = ioLogDir(ctx);
  if (!isDirectory(dir)) {
    ctx.reporter.warning(`I/O log directory not found: ${dir}`);
    return;
  }
  ctx.reporter.info(`Available I/O logs in ${dir}:`);
  ctx.reporter.info('');
  for (const file of findFiles(dir, 'log', REPLAY_LISTING_LIMIT)) ctx.reporter.info(file);
  ctx.reporter.info('');

  const logPath = await ctx.prompter.input('Enter full path to I/O log file', { allowCancel: true });
  if (logPath === null) {
    ctx.reporter.warning('Replay cancelled');
    return;
  }
  if (!isFile(logPath)) {
    ctx.reporter.error(`Log file not found: ${logPath}`);
    return;
  }

  ctx.reporter.info(`Replaying keystroke log: ${logPath}`);
  ctx.reporter.info("Use arrow keys to navigate, 'q' to quit");
  await ctx.sleep(2000);
  ctx.runner.run('pmreplay', [logPath]);
}

export function viewLogStatistics(ctx: CliContext): void {
  if (!requireTool(ctx, 'pmlog')) return;
  ctx.reporter.info('Log Statistics and Summary');
  ctx.reporter.info('===========================================');
  ctx.reporter.info('');

  const eventDb = join(ctx.config.varDir, 'pmevents.db');
  if (isFile(eventDb)) {
    ctx.reporter.info(`Event Log Database: ${eventDb}`);
    ctx.reporter.info(`Database Size: ${formatBytes(statSync(eventDb).size)}`);
  }
  ctx.reporter.info('');

  const dir = ioLogDir(ctx);
  if (isDirectory(dir)) {
    ctx.reporter.info(`I/O Log Directory: ${dir}`);
    ctx.reporter.info(`Number of I/O Logs: ${findFiles(dir, 'log').length}`);
    ctx.reporter.info(`Total I/O Log Size: ${formatBytes(directorySize(dir))}`);
  }
  ctx.reporter.info('');

  ctx.reporter.info('Recent Event Log Entries (last 10):');
  ctx.reporter.info('===========================================');
  ctx.runner.run('pmlog', ['-n', '10'], { unlogged: true });
}

export const logMenu: Menu = {
  title: 'Log Management & Search',
  exit: RETURN_TO_MAIN,
  items: [
    { key: '1', label: entryLabel('View Event Logs', 'Display recent event logs'), run: viewEventLogs },
    { key: '2', label: entryLabel('Search Logs by User', 'Search for specific user'), run: searchLogsByUser },
    { key: '3', label: entryLabel('Search Logs by Date Range', 'Search with date filter'), run: searchLogsByDate },
    { key: '4', label: entryLabel('Search Logs (Custom)', 'Custom pmlogsearch query'), run: searchLogsCustom },
    {
      key: '5',
      label: entryLabel('List I/O Logs', 'Show available keystroke logs'),
      run: (ctx) => {
        if (!requireTool(ctx, 'pmlog')) return;
        ctx.reporter.info('Listing available I/O (keystroke) logs...');
        ctx.runner.run('pmlog', ['-i']);
      },
    },
    { key: '6', label: entryLabel('Replay Keystroke Log', 'Replay an I/O log session'), run: replayKeystrokeLog },
    { key: '7', label: entryLabel('View Log Statistics', 'Display log summary'), run: viewLogStatistics },
  ],
};
