/** Reserved name of the default policy; also the rule file name inside every policy. */
export const DEFAULT_POLICY_NAME = 'sudoers';
export const RULES_FILE_NAME = 'sudoers';
export const POLICY_CONTAINER = 'policy_sudo';
/** Entries starting with this are version-control or hidden artifacts. */
export const HIDDEN_ENTRY_MARKER = '.';
export const POLICY_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface WorkspacePaths {
  root: string;         // /tmp/policydir
  policyBase: string;   // /tmp/policydir/policy_sudo/
  defaultRules: string; // /tmp/policydir/policy_sudo/sudoers
}

export type PolicyKind = 'default' | 'custom';

export interface PolicyEntry {
  name: string;
  kind: PolicyKind;
  /** Directory holding the rule file. */
  dir: string;
  rulesFile: string;
  /** Rule file path relative to the policy container, as the repository tool expects. */
  relPath: string;
  hasRulesFile: boolean;
}

export interface PolicyInventory {
  defaultPolicy: PolicyEntry;
  custom: PolicyEntry[];
}

export type OperationStatus = 'completed' | 'cancelled';

export type TemplateSource = 'default' | 'boilerplate';

export interface CreatedPolicy {
  policy: PolicyEntry;
  template: TemplateSource;
}

export interface ValidationResult {
  policy: PolicyEntry;
  valid: boolean;
}
