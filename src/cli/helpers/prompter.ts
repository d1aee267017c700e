/** Typed at any free-text prompt that allows cancelling. */
export const CANCEL_SENTINEL = '0';

export interface MenuChoice {
  key: string;
  label: string;
}

export interface InputOptions {
  allowEmpty?: boolean;
  allowCancel?: boolean;
}

/**
 * Interactive operator input. Every call blocks until the operator answers.
 */
export interface Prompter {
  select(message: string, choices: MenuChoice[]): Promise<string>;
  /** Resolves to `null` when the operator typed the cancel sentinel. */
  input(message: string, opts?: InputOptions): Promise<string | null>;
  confirm(action: string): Promise<boolean>;
  pause(): Promise<void>;
}

/** Same prompter, but every confirmation is answered yes without asking. */
export function withAssumedYes(base: Prompter): Prompter {
  return {
    select: (message, choices) => base.select(message, choices),
    input: (message, opts) => base.input(message, opts),
    confirm: async () => true,
    pause: () => base.pause(),
  };
}

export function formatChoice(choice: MenuChoice): string {
  return `${`${choice.key})`.padEnd(4)} ${choice.label}`;
}

export class InquirerPrompter implements Prompter {
  async select(message: string, choices: MenuChoice[]): Promise<string> {
    const { default: inquirer } = await import('inquirer');
    const { selection } = await inquirer.prompt<{ selection: string }>([
      {
        type: 'list',
        name: 'selection',
        message,
        pageSize: Math.max(choices.length, 7),
        loop: false,
        choices: choices.map((choice) => ({ name: formatChoice(choice), value: choice.key })),
      },
    ]);
    return selection;
  }

  async input(message: string, opts: InputOptions = {}): Promise<string | null> {
    const { default: inquirer } = await import('inquirer');
    const suffix = opts.allowCancel ? ` (or '${CANCEL_SENTINEL}' to cancel)` : '';
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message: `${message}${suffix}`,
        validate: (raw: string) => {
          if (opts.allowEmpty || raw.trim().length > 0) return true;
          return 'Input cannot be empty. Please try again.';
        },
      },
    ]);
    const trimmed = value.trim();
    if (opts.allowCancel && trimmed === CANCEL_SENTINEL) return null;
    return trimmed;
  }

  async confirm(action: string): Promise<boolean> {
    const { default: inquirer } = await import('inquirer');
    const { ok } = await inquirer.prompt<{ ok: boolean }>([
      {
        type: 'confirm',
        name: 'ok',
        message: `Are you sure you want to ${action}?`,
        default: false,
      },
    ]);
    return ok;
  }

  async pause(): Promise<void> {
    const { default: inquirer } = await import('inquirer');
    await inquirer.prompt([{ type: 'input', name: 'continue', message: 'Press [ENTER] to continue...' }]);
  }
}
