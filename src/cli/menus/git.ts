import type { CliContext } from '../cli-shared.js';
import { confirmAction } from '../cli-shared.js';
import { entryLabel, RETURN_TO_MAIN, type Menu, type MenuItem } from './menu.js';

const GIT_TOOL = 'pmgit';

function pmgit(subcommand: string, confirm?: string): MenuItem['run'] {
  return async (ctx: CliContext) => {
    if (confirm && !(await confirmAction(ctx, confirm))) return;
    ctx.runner.run(GIT_TOOL, [subcommand]);
  };
}

const GIT_COMMANDS: Array<[subcommand: string, hint: string, confirm?: string]> = [
  ['status', 'Show Git integration status'],
  ['enable', 'Enable Git policy management', 'enable Git policy management'],
  ['disable', 'Disable Git policy management', 'disable Git policy management'],
  ['update', 'Update policy from Git repository'],
  ['set', 'Configure Git settings'],
  ['export', 'Export policy to Git'],
  ['import', 'Import policy from Git'],
  ['help', 'Display Git integration help'],
];

export const gitMenu: Menu = {
  title: 'Git Policy Management',
  exit: RETURN_TO_MAIN,
  items: GIT_COMMANDS.map(([subcommand, hint, confirm], i) => ({
    key: String(i + 1),
    label: entryLabel(`${GIT_TOOL} ${subcommand}`, hint, 16),
    run: pmgit(subcommand, confirm),
  })),
};
