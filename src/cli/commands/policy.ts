import type { Command } from 'commander';
import { PolicyWorkspaceError } from '../../workspace/errors.js';
import { DEFAULT_POLICY_NAME } from '../../workspace/types.js';
import {
  confirmAction,
  createCliContext,
  reportStatus,
  type CliContext,
  type ContextFactory,
} from '../cli-shared.js';
import { listPolicies } from '../menus/policy.js';

interface PolicyGlobals {
  config?: string;
  yes?: boolean;
}

type Outcome = Promise<boolean | void> | boolean | void;

/**
 * Run one subcommand against a fresh context. Workspace errors were already
 * printed by the workspace, so they only set the exit status; `false` from
 * `fn` does the same.
 */
async function withContext(
  factory: ContextFactory,
  cmd: Command,
  fn: (ctx: CliContext) => Outcome,
): Promise<void> {
  const globals = cmd.optsWithGlobals<PolicyGlobals>();
  const ctx = factory({ configPath: globals.config, assumeYes: globals.yes === true });
  try {
    if ((await fn(ctx)) === false) process.exitCode = 1;
  } catch (err) {
    if (err instanceof PolicyWorkspaceError) {
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

export function registerPolicyCommand(program: Command, factory: ContextFactory = createCliContext): void {
  const policy = program
    .command('policy')
    .description('Check out, edit, validate and commit sudo policies')
    .option('-y, --yes', 'Answer yes to every confirmation');

  policy
    .command('checkout')
    .description('Check out the policy into the temporary workspace')
    .action((_opts: unknown, cmd: Command) =>
      withContext(factory, cmd, async (ctx) => (await ctx.workspace.checkout()) === 'completed'),
    );

  policy
    .command('list')
    .description('List the default and custom policies in the checkout')
    .action((_opts: unknown, cmd: Command) => withContext(factory, cmd, (ctx) => listPolicies(ctx)));

  policy
    .command('create')
    .description('Create a custom policy')
    .argument('<name>', 'Policy name (letters, numbers, underscores, hyphens)')
    .action((name: string, _opts: unknown, cmd: Command) =>
      withContext(factory, cmd, (ctx) => {
        ctx.workspace.createPolicy(name);
      }),
    );

  policy
    .command('edit')
    .description('Open a policy in the editor')
    .argument('[name]', 'Policy name', DEFAULT_POLICY_NAME)
    .action((name: string, _opts: unknown, cmd: Command) =>
      withContext(factory, cmd, async (ctx) => (await ctx.workspace.editPolicy(name)) === 'completed'),
    );

  policy
    .command('validate')
    .description('Check policy syntax with pmcheck')
    .argument('[name]', 'Policy name', DEFAULT_POLICY_NAME)
    .action((name: string, _opts: unknown, cmd: Command) =>
      withContext(factory, cmd, (ctx) => ctx.workspace.validatePolicy(name).valid),
    );

  policy
    .command('add')
    .description('Stage a custom policy in the server repository')
    .argument('<name>', 'Custom policy name')
    .requiredOption('-l, --description <text>', 'Revision description')
    .action((name: string, opts: { description: string }, cmd: Command) =>
      withContext(
        factory,
        cmd,
        async (ctx) => (await ctx.workspace.addPolicyToServer(name, opts.description)) === 'completed',
      ),
    );

  policy
    .command('commit')
    .description('Validate and commit the checkout to the repository')
    .action((_opts: unknown, cmd: Command) =>
      withContext(factory, cmd, async (ctx) => (await ctx.workspace.commit()) === 'completed'),
    );

  policy
    .command('clean')
    .description('Delete the temporary workspace')
    .action((_opts: unknown, cmd: Command) =>
      withContext(factory, cmd, async (ctx) => {
        await ctx.workspace.clean();
      }),
    );

  policy
    .command('log')
    .description('Show the policy revision history')
    .action((_opts: unknown, cmd: Command) =>
      withContext(factory, cmd, (ctx) => ctx.repository.log() === 0),
    );

  policy
    .command('diff')
    .description('Compare two policy revisions')
    .argument('<first>', 'First revision')
    .argument('<second>', 'Second revision')
    .action((first: string, second: string, _opts: unknown, cmd: Command) =>
      withContext(factory, cmd, (ctx) => ctx.repository.diff(first, second) === 0),
    );

  policy
    .command('status')
    .description('Check whether production matches the master policy')
    .action((_opts: unknown, cmd: Command) =>
      withContext(factory, cmd, (ctx) => ctx.repository.masterStatus() === 0),
    );

  policy
    .command('sync')
    .description('Update the production policy from the master repository')
    .action((_opts: unknown, cmd: Command) =>
      withContext(factory, cmd, async (ctx) => {
        if (!(await confirmAction(ctx, 'sync production policy from master repository'))) return;
        return reportStatus(
          ctx,
          ctx.repository.sync(),
          'Policy synchronized successfully',
          'Failed to synchronize policy',
        );
      }),
    );
}
