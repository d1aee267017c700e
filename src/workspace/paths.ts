import { join } from 'node:path';
import { DEFAULT_POLICY_NAME, POLICY_CONTAINER, RULES_FILE_NAME, type WorkspacePaths } from './types.js';

export function getWorkspacePaths(root: string): WorkspacePaths {
  const policyBase = join(root, POLICY_CONTAINER);
  return {
    root,
    policyBase,
    defaultRules: join(policyBase, DEFAULT_POLICY_NAME),
  };
}

export function customPolicyDir(paths: WorkspacePaths, name: string): string {
  return join(paths.policyBase, name);
}

export function customPolicyRelPath(name: string): string {
  return `${name}/${RULES_FILE_NAME}`;
}
