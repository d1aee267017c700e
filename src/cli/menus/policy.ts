import { DEFAULT_POLICY_NAME } from '../../workspace/types.js';
import type { CliContext } from '../cli-shared.js';
import { confirmAction, printHeader, reportStatus } from '../cli-shared.js';
import { entryLabel, pickFromList, RETURN_TO_MAIN, type Menu } from './menu.js';

/** Pick a custom policy from the checkout; `null` when there is none or the operator cancels. */
async function pickCustomPolicy(ctx: CliContext, message: string): Promise<string | null> {
  const { custom } = ctx.workspace.discoverPolicies();
  if (custom.length === 0) {
    ctx.reporter.warning('No custom policies found.');
    ctx.reporter.info('Create a new custom policy first.');
    return null;
  }
  printHeader(message);
  return pickFromList(
    ctx,
    message,
    custom.map((policy) => policy.name),
  );
}

export async function checkoutPolicy(ctx: CliContext): Promise<void> {
  const status = await ctx.workspace.checkout();
  if (status === 'completed') {
    ctx.reporter.info('You can now create and edit policies from the Policy Management menu.');
  }
}

export async function editDefaultPolicy(ctx: CliContext): Promise<void> {
  if ((await ctx.workspace.editPolicy(DEFAULT_POLICY_NAME)) === 'completed') {
    ctx.reporter.info('Remember to validate and commit your changes.');
  }
}

export async function editCustomPolicy(ctx: CliContext): Promise<void> {
  const name = await pickCustomPolicy(ctx, 'Select Custom Policy to Edit');
  if (name === null) return;
  if ((await ctx.workspace.editPolicy(name)) === 'completed') {
    ctx.reporter.info('Remember to validate and commit your changes.');
  }
}

export async function createCustomPolicy(ctx: CliContext): Promise<void> {
  ctx.workspace.ensureCheckedOut();
  printHeader('Create New Custom Policy');
  const name = await ctx.prompter.input('Enter new policy name (e.g., webservers, dbservers)', {
    allowCancel: true,
  });
  if (name === null) {
    ctx.reporter.warning('Policy creation cancelled');
    return;
  }

  const { policy } = ctx.workspace.createPolicy(name);
  if (await confirmAction(ctx, 'edit the new policy now')) {
    await ctx.workspace.editPolicy(policy.name);
  }

  ctx.reporter.info('');
  ctx.reporter.info('Next steps:');
  ctx.reporter.info('  1. Edit the policy if you haven\'t (Edit Custom Policies)');
  ctx.reporter.info('  2. Validate the policy (Validate Policy Syntax)');
  ctx.reporter.info('  3. Add policy to server (Add Policy to Server)');
  ctx.reporter.info('  4. Commit changes (Commit Policy Changes)');
}

export function listPolicies(ctx: CliContext): void {
  const inventory = ctx.workspace.discoverPolicies();
  printHeader('Available Policies');
  ctx.reporter.info('');
  ctx.reporter.info('Default Policy:');
  ctx.reporter.info(`  - ${DEFAULT_POLICY_NAME} (main default policy)`);
  ctx.reporter.info('');
  ctx.reporter.info('Custom Policies:');
  if (inventory.custom.length === 0) {
    ctx.reporter.info('  (none found)');
  }
  for (const policy of inventory.custom) {
    ctx.reporter.info(`  - ${policy.name}`);
    if (policy.hasRulesFile) ctx.reporter.info('    (has sudoers file)');
  }
  ctx.reporter.info('');
  ctx.reporter.info(`Total policies: ${1 + inventory.custom.length}`);
}

export async function addPolicyToServer(ctx: CliContext): Promise<void> {
  const name = await pickCustomPolicy(ctx, 'Add Policy to Server');
  if (name === null) return;

  const policy = ctx.workspace.entry(name);
  if (!policy.hasRulesFile) {
    ctx.reporter.error(`Policy file not found: ${policy.rulesFile}`);
    return;
  }

  const description = await ctx.prompter.input('Enter description for this policy', {
    allowCancel: true,
  });
  if (description === null) {
    ctx.reporter.warning('Add cancelled');
    return;
  }
  await ctx.workspace.addPolicyToServer(name, description);
}

export async function validatePolicy(ctx: CliContext): Promise<void> {
  const { custom } = ctx.workspace.discoverPolicies();
  let name = DEFAULT_POLICY_NAME;
  if (custom.length > 0) {
    const picked = await pickFromList(ctx, 'Select policy to validate', [
      DEFAULT_POLICY_NAME,
      ...custom.map((policy) => policy.name),
    ]);
    if (picked === null) return;
    name = picked;
  }
  ctx.workspace.validatePolicy(name);
}

export async function commitPolicy(ctx: CliContext): Promise<void> {
  await ctx.workspace.commit();
}

export async function comparePolicyVersions(ctx: CliContext): Promise<void> {
  ctx.reporter.info("First, let's view the policy revision history:");
  ctx.reporter.info('');
  ctx.repository.log();
  ctx.reporter.info('');

  const first = await ctx.prompter.input('Enter first revision number', { allowCancel: true });
  if (first === null) {
    ctx.reporter.warning('Comparison cancelled');
    return;
  }
  const second = await ctx.prompter.input('Enter second revision number', { allowCancel: true });
  if (second === null) {
    ctx.reporter.warning('Comparison cancelled');
    return;
  }

  ctx.reporter.info(`Comparing revision ${first} to revision ${second}...`);
  ctx.repository.diff(first, second);
}

export async function syncPolicy(ctx: CliContext): Promise<void> {
  if (!(await confirmAction(ctx, 'sync production policy from master repository'))) return;
  ctx.reporter.info('Synchronizing policy...');
  reportStatus(
    ctx,
    ctx.repository.sync(),
    'Policy synchronized successfully',
    'Failed to synchronize policy',
  );
}

export async function cleanWorkspace(ctx: CliContext): Promise<void> {
  await ctx.workspace.clean();
}

export const policyMenu: Menu = {
  title: 'Policy Management',
  exit: RETURN_TO_MAIN,
  items: [
    { key: '1', label: entryLabel('Checkout Policy', 'Checkout policy to temp directory'), run: checkoutPolicy },
    { key: '2', label: entryLabel('Edit Default Policy', 'Edit main sudoers policy'), run: editDefaultPolicy },
    { key: '3', label: entryLabel('Edit Custom Policies', 'Select and edit custom policies'), run: editCustomPolicy },
    { key: '4', label: entryLabel('Create New Custom Policy', 'Create a new custom policy'), run: createCustomPolicy },
    { key: '5', label: entryLabel('List All Policies', 'Show all available policies'), run: listPolicies },
    { key: '6', label: entryLabel('Add Policy to Server', 'Add custom policy to repository'), run: addPolicyToServer },
    { key: '7', label: entryLabel('Validate Policy Syntax', 'Run pmcheck on policy'), run: validatePolicy },
    { key: '8', label: entryLabel('Commit Policy Changes', 'Commit changes to repository'), run: commitPolicy },
    {
      key: '9',
      label: entryLabel('View Policy Log', 'Display policy revision history'),
      run: (ctx) => {
        ctx.repository.log();
      },
    },
    { key: '10', label: entryLabel('Compare Policy Versions', 'Show differences between revisions'), run: comparePolicyVersions },
    {
      key: '11',
      label: entryLabel('Check Policy Status', 'Check if production matches master'),
      run: (ctx) => {
        ctx.repository.masterStatus();
      },
    },
    { key: '12', label: entryLabel('Sync Policy', 'Update production from master'), run: syncPolicy },
    { key: '13', label: entryLabel('Clean Temp Directory', 'Remove the policy checkout'), run: cleanWorkspace },
  ],
};
