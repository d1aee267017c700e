import type { ToolRunner } from '../runtime/tool-runner.js';

export const REPOSITORY_TOOL = 'pmpolicy';

/**
 * The product's policy repository tool. Every method maps to one invocation
 * and reports the tool's exit status; output goes to the operator's terminal.
 */
export interface PolicyRepository {
  checkout(destination: string): number;
  /** Stage `policyRelPath` (relative to the policy container) as a new entry. */
  add(workspace: string, policyRelPath: string, description: string): number;
  commit(workspace: string): number;
  log(): number;
  diff(revA: string, revB: string): number;
  sync(): number;
  masterStatus(): number;
}

export class PmPolicyRepository implements PolicyRepository {
  constructor(private readonly runner: ToolRunner) {}

  private pmpolicy(args: string[]): number {
    return this.runner.run(REPOSITORY_TOOL, args).status;
  }

  checkout(destination: string): number {
    return this.pmpolicy(['checkout', '-d', destination]);
  }

  add(workspace: string, policyRelPath: string, description: string): number {
    // -n: register as a new policy; duplicates are left for the server to judge.
    return this.pmpolicy(['add', '-d', workspace, '-p', policyRelPath, '-l', description, '-n']);
  }

  commit(workspace: string): number {
    return this.pmpolicy(['commit', '-d', workspace]);
  }

  log(): number {
    return this.pmpolicy(['log']);
  }

  diff(revA: string, revB: string): number {
    return this.pmpolicy(['diff', `-r:${revA}:${revB}`]);
  }

  sync(): number {
    return this.pmpolicy(['sync']);
  }

  masterStatus(): number {
    return this.pmpolicy(['masterstatus']);
  }
}
