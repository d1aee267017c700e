import { setTimeout as delay } from 'node:timers/promises';
import { FileOperationLog, type OperationLog } from '../audit/operation-log.js';
import { readMenuConfig, resolveConfigPath } from '../config/config.js';
import { PmPolicyRepository, type PolicyRepository } from '../product/policy-repo.js';
import { PmCheckValidator, type PolicyValidator } from '../product/validator.js';
import { TerminalEditor, resolveEditorCommand, type Editor } from '../runtime/editor.js';
import { SpawnToolRunner, type ToolRunner } from '../runtime/tool-runner.js';
import { ConsoleReporter, type Reporter } from '../shared/reporter.js';
import type { MenuConfig } from '../shared/schemas.js';
import { systemClock, type Clock } from '../shared/time.js';
import { PolicyWorkspace } from '../workspace/manager.js';
import { InquirerPrompter, withAssumedYes, type Prompter } from './helpers/prompter.js';

/**
 * Everything a command or menu screen needs. Built once per process; tests
 * assemble one from fakes.
 */
export interface CliContext {
  config: MenuConfig;
  log: OperationLog;
  reporter: Reporter;
  runner: ToolRunner;
  prompter: Prompter;
  editor: Editor;
  repository: PolicyRepository;
  validator: PolicyValidator;
  workspace: PolicyWorkspace;
  clock: Clock;
  sleep: (ms: number) => Promise<void>;
}

export interface ContextOptions {
  configPath?: string;
  /** Answer every confirmation with yes, for scripted use. */
  assumeYes?: boolean;
}

export type ContextFactory = (opts: ContextOptions) => CliContext;

export const createCliContext: ContextFactory = (opts) => {
  const config = readMenuConfig(resolveConfigPath(opts.configPath));
  const log = new FileOperationLog(config.operationLog);
  const reporter = new ConsoleReporter(log);
  const runner = new SpawnToolRunner({ binDir: config.binDir, log });
  const interactive = new InquirerPrompter();
  const prompter = opts.assumeYes ? withAssumedYes(interactive) : interactive;
  const editor = new TerminalEditor(resolveEditorCommand(config.editor));
  const repository = new PmPolicyRepository(runner);
  const validator = new PmCheckValidator(runner);
  const workspace = new PolicyWorkspace({
    root: config.workspaceDir,
    repository,
    validator,
    editor,
    confirm: (action) => prompter.confirm(action),
    reporter,
  });
  return {
    config,
    log,
    reporter,
    runner,
    prompter,
    editor,
    repository,
    validator,
    workspace,
    clock: systemClock,
    sleep: async (ms) => {
      await delay(ms);
    },
  };
};

/**
 * Ask for confirmation the way workspace operations do, logging a decline.
 */
export async function confirmAction(ctx: CliContext, action: string): Promise<boolean> {
  const ok = await ctx.prompter.confirm(action);
  if (!ok) ctx.reporter.warning('Action cancelled by user');
  return ok;
}

/**
 * Check a product binary is installed before using it. Plugin-only hosts
 * lack the server tools.
 */
export function requireTool(ctx: CliContext, tool: string): boolean {
  if (ctx.runner.hasTool(tool)) return true;
  ctx.reporter.error(`${tool} command not found. This may be a plugin-only installation.`);
  return false;
}

export function reportStatus(
  ctx: CliContext,
  status: number,
  success: string,
  failure: string,
): boolean {
  if (status === 0) {
    ctx.reporter.success(success);
    return true;
  }
  ctx.reporter.error(failure);
  return false;
}

export function printHeader(title: string): void {
  console.log('');
  console.log('===========================================');
  console.log(`  ${title}`);
  console.log('===========================================');
}
