import { PolicyWorkspaceError } from '../../workspace/errors.js';
import type { CliContext } from '../cli-shared.js';
import { printHeader } from '../cli-shared.js';
import type { MenuChoice } from '../helpers/prompter.js';

export interface MenuItem {
  key: string;
  label: string;
  run: (ctx: CliContext) => Promise<void> | void;
  /** Wait for ENTER after the action; off for sub-menus. Defaults to true. */
  pause?: boolean;
}

export interface Menu {
  title: string;
  items: MenuItem[];
  exit: MenuChoice;
}

export const RETURN_TO_MAIN: MenuChoice = { key: '0', label: 'Return to Main Menu' };

/** Pad labels into the "Title   - hint" column layout of the menus. */
export function entryLabel(title: string, hint: string, width = 28): string {
  return `${title.padEnd(width)} - ${hint}`;
}

/**
 * Run one menu action. Failures are reported and swallowed so the operator
 * is back at the menu; workspace errors were reported where they were raised.
 */
export async function runAction(ctx: CliContext, action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (!(err instanceof PolicyWorkspaceError)) {
      ctx.reporter.error((err as Error).message);
    }
  }
}

/**
 * Show `menu` until the operator picks its exit entry.
 */
export async function runMenu(ctx: CliContext, menu: Menu): Promise<void> {
  const choices: MenuChoice[] = [
    ...menu.items.map(({ key, label }) => ({ key, label })),
    menu.exit,
  ];

  while (true) {
    console.clear();
    printHeader(menu.title);
    const selection = await ctx.prompter.select('Enter your selection', choices);
    if (selection === menu.exit.key) return;

    const item = menu.items.find((candidate) => candidate.key === selection);
    if (!item) {
      ctx.reporter.error('Invalid selection');
      continue;
    }

    console.clear();
    await runAction(ctx, () => item.run(ctx));
    if (item.pause ?? true) await ctx.prompter.pause();
  }
}

/**
 * Let the operator pick one entry of a numbered list. Resolves to the
 * zero-based index, or `null` when cancelled.
 */
export async function pickIndex(
  ctx: CliContext,
  message: string,
  labels: string[],
): Promise<number | null> {
  const choices: MenuChoice[] = labels.map((label, i) => ({ key: String(i + 1), label }));
  choices.push({ key: '0', label: 'Cancel' });
  const selection = await ctx.prompter.select(message, choices);
  if (selection === '0') return null;
  const index = Number(selection) - 1;
  if (!Number.isInteger(index) || index < 0 || index >= labels.length) {
    throw new Error('Invalid selection');
  }
  return index;
}

export async function pickFromList(
  ctx: CliContext,
  message: string,
  entries: string[],
): Promise<string | null> {
  const index = await pickIndex(ctx, message, entries);
  return index === null ? null : (entries[index] ?? null);
}
