import type { CliContext } from '../cli-shared.js';
import { confirmAction, reportStatus } from '../cli-shared.js';
import { entryLabel, RETURN_TO_MAIN, type Menu } from './menu.js';

export async function joinPluginToServer(ctx: CliContext): Promise<void> {
  const server = await ctx.prompter.input('Enter policy server hostname or IP', { allowCancel: true });
  if (server === null) {
    ctx.reporter.warning('Join operation cancelled');
    return;
  }
  if (!(await confirmAction(ctx, `join this host to policy server ${server}`))) return;

  ctx.reporter.info('Joining plugin to policy server...');
  reportStatus(
    ctx,
    ctx.runner.run('pmjoin_plugin', ['-a', server]).status,
    'Successfully joined to policy server',
    'Failed to join policy server',
  );
}

export async function unjoinPluginFromServer(ctx: CliContext): Promise<void> {
  if (!(await confirmAction(ctx, 'unjoin this host from the policy server'))) return;

  ctx.reporter.info('Unjoining plugin from policy server...');
  reportStatus(
    ctx,
    ctx.runner.run('pmjoin_plugin', ['-u']).status,
    'Successfully unjoined from policy server',
    'Failed to unjoin from policy server',
  );
}

export async function runPreflightCheck(ctx: CliContext): Promise<void> {
  const server = await ctx.prompter.input('Enter policy server hostname or IP', {
    allowEmpty: true,
    allowCancel: true,
  });
  if (server === null) {
    ctx.reporter.warning('Preflight check cancelled');
    return;
  }

  ctx.reporter.info('Running pre-flight check...');
  const args = [ctx.runner.toolPath('pmpreflight.sh'), '--sudo'];
  if (server) args.push('--policyserver', server);
  ctx.runner.runSystem('sh', args);
}

export const pluginMenu: Menu = {
  title: 'Plugin Host Management',
  exit: RETURN_TO_MAIN,
  items: [
    {
      key: '1',
      label: entryLabel('View Plugin Configuration', 'Display pmplugininfo'),
      run: (ctx) => {
        ctx.runner.run('pmplugininfo', []);
      },
    },
    {
      key: '2',
      label: entryLabel('Check Server Availability', 'Check policy server status'),
      run: (ctx) => {
        ctx.runner.run('pmpluginloadcheck', ['-r']);
      },
    },
    { key: '3', label: entryLabel('Join Plugin to Server', 'Join this host to policy server'), run: joinPluginToServer },
    { key: '4', label: entryLabel('Unjoin Plugin from Server', 'Remove from policy group'), run: unjoinPluginFromServer },
    {
      key: '5',
      label: entryLabel('Check Plugin Policy Status', 'View cached policy status'),
      run: (ctx) => {
        ctx.runner.run('pmpolicyplugin', []);
      },
    },
    { key: '6', label: entryLabel('Run Pre-flight Check', 'Verify installation readiness'), run: runPreflightCheck },
  ],
};
