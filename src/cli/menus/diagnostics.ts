import { join } from 'node:path';
import {
  VALIDATOR_TOOL,
  authorizationArgs,
  verdictForExitCode,
  type AuthorizationQuery,
} from '../../product/validator.js';
import { splitArguments } from '../../shared/argv.js';
import { isFile, tailLines } from '../../shared/fs-utils.js';
import type { CliContext } from '../cli-shared.js';
import { confirmAction, reportStatus, requireTool } from '../cli-shared.js';
import { entryLabel, pickIndex, RETURN_TO_MAIN, type Menu } from './menu.js';

export const DAEMON_LOGS = [
  { file: 'pmmasterd.log', label: 'Policy server daemon' },
  { file: 'pmserviced.log', label: 'Service daemon' },
  { file: 'pmlocald.log', label: 'Local daemon' },
  { file: 'pmrun.log', label: 'Client log' },
] as const;

export async function verifyHostnameResolution(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, 'pmresolvehost')) return;
  const host = await ctx.prompter.input('Enter hostname or IP to verify (or ENTER for local host)', {
    allowEmpty: true,
    allowCancel: true,
  });
  if (host === null) {
    ctx.reporter.warning('Operation cancelled');
    return;
  }
  ctx.reporter.info(host ? `Verifying hostname: ${host}` : 'Verifying local host resolution...');
  ctx.runner.run('pmresolvehost', host ? [host] : []);
}

export async function testPolicySyntax(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, VALIDATOR_TOOL)) return;
  const defaultFile = join(ctx.config.configDir, 'policy', 'sudoers');
  ctx.reporter.info(`Default policy file: ${defaultFile}`);
  const answer = await ctx.prompter.input('Enter policy file path or ENTER for default', {
    allowEmpty: true,
    allowCancel: true,
  });
  if (answer === null) {
    ctx.reporter.warning('Operation cancelled');
    return;
  }
  const file = answer || defaultFile;
  if (!isFile(file)) {
    ctx.reporter.error(`Policy file not found: ${file}`);
    return;
  }
  ctx.reporter.info(`Testing policy syntax: ${file}`);
  if (ctx.validator.check(file)) {
    ctx.reporter.success('Policy syntax is valid');
  } else {
    ctx.reporter.error('Policy syntax errors detected');
  }
}

export async function testCommandAuthorization(ctx: CliContext): Promise<void> {
  if (!requireTool(ctx, VALIDATOR_TOOL)) return;
  ctx.reporter.info('Test Command Authorization');
  ctx.reporter.info('===========================================');

  const answers: string[] = [];
  for (const prompt of ['Enter username', 'Enter group name', 'Enter hostname', 'Enter command to test']) {
    const value = await ctx.prompter.input(prompt, { allowCancel: true });
    if (value === null) {
      ctx.reporter.warning('Test cancelled');
      return;
    }
    answers.push(value);
  }
  const [user = '', group = '', host = '', command = ''] = answers;
  const query: AuthorizationQuery = { user, group, host, command: splitArguments(command) };

  ctx.reporter.info('Testing authorization for:');
  ctx.reporter.info(`  User: ${user}`);
  ctx.reporter.info(`  Group: ${group}`);
  ctx.reporter.info(`  Host: ${host}`);
  ctx.reporter.info(`  Command: ${command}`);
  ctx.reporter.info('');

  const { status } = ctx.runner.run(VALIDATOR_TOOL, authorizationArgs(query));
  switch (verdictForExitCode(status)) {
    case 'accepted':
      ctx.reporter.success('Command would be ACCEPTED');
      break;
    case 'authentication_required':
      ctx.reporter.warning('Command requires authentication (password prompt)');
      break;
    case 'rejected':
      ctx.reporter.error('Command would be REJECTED');
      break;
    case 'syntax_error':
      ctx.reporter.error('Syntax error encountered');
      break;
    case 'unknown':
      ctx.reporter.error(`Unknown exit code: ${status}`);
      break;
  }
}

export async function setDebugLogging(ctx: CliContext, enabled: boolean): Promise<void> {
  if (!requireTool(ctx, VALIDATOR_TOOL)) return;
  const word = enabled ? 'enable' : 'disable';
  if (!(await confirmAction(ctx, `${word} debug logging`))) return;

  ctx.reporter.info(enabled ? 'Enabling debug logging...' : 'Disabling debug logging...');
  const ok = reportStatus(
    ctx,
    ctx.runner.run(VALIDATOR_TOOL, ['-z', enabled ? 'on' : 'off']).status,
    enabled ? 'Debug logging enabled' : 'Debug logging disabled',
    `Failed to ${word} debug logging`,
  );
  if (ok && enabled) {
    ctx.reporter.info('Note: Debug logs will be written to system logs');
    ctx.reporter.info('Remember to disable debug logging when troubleshooting is complete');
  }
}

function printTail(ctx: CliContext, file: string, lines: number): void {
  ctx.reporter.info(`=== ${file} (last ${lines} lines) ===`);
  for (const line of tailLines(file, lines)) ctx.reporter.info(line);
}

export async function viewErrorLogs(ctx: CliContext): Promise<void> {
  ctx.reporter.info('Safeguard Daemon Error Logs');
  ctx.reporter.info('===========================================');
  const picked = await pickIndex(ctx, 'Select log to view', [
    ...DAEMON_LOGS.map(({ file, label }) => entryLabel(file, label, 15)),
    entryLabel('All logs', 'View all available logs', 15),
  ]);
  if (picked === null) return;

  const single = DAEMON_LOGS[picked];
  if (single) {
    const file = join(ctx.config.daemonLogDir, single.file);
    if (!isFile(file)) {
      ctx.reporter.error(`Log file not found: ${file}`);
      return;
    }
    printTail(ctx, file, 50);
    return;
  }

  for (const { file } of DAEMON_LOGS) {
    const path = join(ctx.config.daemonLogDir, file);
    if (!isFile(path)) continue;
    printTail(ctx, path, 20);
    ctx.reporter.info('');
  }
}

export function checkAuditServer(ctx: CliContext): void {
  if (!requireTool(ctx, 'pmauditsrv')) return;
  ctx.reporter.info('Checking audit server connectivity...');
  reportStatus(
    ctx,
    ctx.runner.run('pmauditsrv', ['check']).status,
    'Audit server is accessible',
    'Audit server check failed',
  );
}

export const diagnosticsMenu: Menu = {
  title: 'Diagnostics & Troubleshooting',
  exit: RETURN_TO_MAIN,
  items: [
    { key: '1', label: entryLabel('Verify Hostname Resolution', 'Check hostname/IP resolution'), run: verifyHostnameResolution },
    {
      key: '2',
      label: entryLabel('Display System ID', 'Show Safeguard system ID'),
      run: (ctx) => {
        ctx.runner.run('pmsysid', []);
      },
    },
    { key: '3', label: entryLabel('Test Policy Syntax', 'Validate policy file'), run: testPolicySyntax },
    { key: '4', label: entryLabel('Test Command Authorization', 'Simulate sudo command'), run: testCommandAuthorization },
    { key: '5', label: entryLabel('Enable Debug Logging', 'Enable debug mode'), run: (ctx) => setDebugLogging(ctx, true) },
    { key: '6', label: entryLabel('Disable Debug Logging', 'Disable debug mode'), run: (ctx) => setDebugLogging(ctx, false) },
    { key: '7', label: entryLabel('View Error Logs', 'Display daemon error logs'), run: viewErrorLogs },
    { key: '8', label: entryLabel('Check Audit Server', 'Verify audit server connectivity'), run: checkAuditServer },
  ],
};
