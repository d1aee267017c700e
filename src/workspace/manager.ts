import { copyFileSync, existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { Editor } from '../runtime/editor.js';
import type { PolicyRepository } from '../product/policy-repo.js';
import type { PolicyValidator } from '../product/validator.js';
import { isDirectory, isFile } from '../shared/fs-utils.js';
import type { Reporter } from '../shared/reporter.js';
import { systemClock, type Clock } from '../shared/time.js';
import { PolicyWorkspaceError, type WorkspaceErrorCode } from './errors.js';
import { customPolicyDir, customPolicyRelPath, getWorkspacePaths } from './paths.js';
import { renderPolicyTemplate } from './template.js';
import {
  DEFAULT_POLICY_NAME,
  HIDDEN_ENTRY_MARKER,
  POLICY_NAME_PATTERN,
  RULES_FILE_NAME,
  type CreatedPolicy,
  type OperationStatus,
  type PolicyEntry,
  type PolicyInventory,
  type ValidationResult,
  type WorkspacePaths,
} from './types.js';

export type Confirm = (action: string) => Promise<boolean>;

export interface PolicyWorkspaceOptions {
  /** Single workspace root; only one checkout exists here at a time. */
  root: string;
  repository: PolicyRepository;
  validator: PolicyValidator;
  editor: Editor;
  confirm: Confirm;
  reporter: Reporter;
  clock?: Clock;
}

/**
 * Lifecycle of the on-disk policy checkout:
 * checkout → discover → create/edit → validate → add → commit → clean.
 *
 * Mutating remote actions (add, commit) re-run the validator themselves and
 * never reach the repository tool when it fails. Every outcome is reported
 * to the operator and the operation log; failures throw
 * {@link PolicyWorkspaceError} after being reported.
 */
export class PolicyWorkspace {
  readonly paths: WorkspacePaths;
  private readonly repository: PolicyRepository;
  private readonly validator: PolicyValidator;
  private readonly editor: Editor;
  private readonly confirm: Confirm;
  private readonly reporter: Reporter;
  private readonly clock: Clock;

  constructor(opts: PolicyWorkspaceOptions) {
    this.paths = getWorkspacePaths(opts.root);
    this.repository = opts.repository;
    this.validator = opts.validator;
    this.editor = opts.editor;
    this.confirm = opts.confirm;
    this.reporter = opts.reporter;
    this.clock = opts.clock ?? systemClock;
  }

  get root(): string {
    return this.paths.root;
  }

  exists(): boolean {
    return isDirectory(this.paths.root);
  }

  // ── Checkout / clean ─────────────────────────────────────────────────────

  async checkout(): Promise<OperationStatus> {
    if (this.exists()) {
      this.reporter.warning(`Temporary policy directory already exists: ${this.root}`);
      if (!(await this.confirmed('overwrite existing directory'))) return 'cancelled';
      this.remove('Failed to remove existing policy directory');
    }

    this.reporter.info(`Checking out policy to ${this.root}...`);
    const status = this.repository.checkout(this.root);
    if (status !== 0) {
      this.fail('tool_failed', 'Failed to checkout policy', status);
    }
    this.reporter.success('Policy checked out successfully');
    return 'completed';
  }

  async clean(): Promise<OperationStatus | 'absent'> {
    if (!this.exists()) {
      this.reporter.warning(`Temporary directory does not exist: ${this.root}`);
      return 'absent';
    }
    if (!(await this.confirmed(`delete temporary policy directory ${this.root}`))) {
      return 'cancelled';
    }
    this.remove('Failed to delete temporary directory');
    this.reporter.success(`Temporary directory deleted: ${this.root}`);
    return 'completed';
  }

  // ── Discovery ────────────────────────────────────────────────────────────

  /**
   * Read-only, one level deep. Custom policies are the sub-directories of the
   * policy container other than the default policy and hidden entries,
   * sorted by name for display.
   */
  discoverPolicies(): PolicyInventory {
    this.ensureCheckedOut();
    if (!isDirectory(this.paths.policyBase)) {
      this.fail('policy_dir_missing', `Policy directory not found: ${this.paths.policyBase}`);
    }

    const names = readdirSync(this.paths.policyBase, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .filter((name) => name !== DEFAULT_POLICY_NAME && !name.startsWith(HIDDEN_ENTRY_MARKER))
      .sort();

    return {
      defaultPolicy: this.entry(DEFAULT_POLICY_NAME),
      custom: names.map((name) => this.entry(name)),
    };
  }

  /** Describe a policy by name; the reserved name designates the default policy. */
  entry(name: string): PolicyEntry {
    if (name === DEFAULT_POLICY_NAME) {
      return {
        name,
        kind: 'default',
        dir: this.paths.policyBase,
        rulesFile: this.paths.defaultRules,
        relPath: RULES_FILE_NAME,
        hasRulesFile: isFile(this.paths.defaultRules),
      };
    }
    const dir = customPolicyDir(this.paths, name);
    const rulesFile = join(dir, RULES_FILE_NAME);
    return {
      name,
      kind: 'custom',
      dir,
      rulesFile,
      relPath: customPolicyRelPath(name),
      hasRulesFile: isFile(rulesFile),
    };
  }

  // ── Create / edit ────────────────────────────────────────────────────────

  createPolicy(name: string): CreatedPolicy {
    this.ensureCheckedOut();
    this.requireValidName(name);
    if (name === DEFAULT_POLICY_NAME) {
      this.fail('reserved_name', `Policy name is reserved for the default policy: ${name}`);
    }

    const policy = this.entry(name);
    if (existsSync(policy.dir)) {
      this.fail('already_exists', `Policy already exists: ${name}. Edit the existing policy instead.`);
    }

    try {
      mkdirSync(policy.dir, { recursive: true });
    } catch (err) {
      this.fail('io_failed', `Failed to create policy directory: ${(err as Error).message}`);
    }

    let template: CreatedPolicy['template'];
    try {
      if (isFile(this.paths.defaultRules)) {
        this.reporter.info('Copying template from default sudoers...');
        copyFileSync(this.paths.defaultRules, policy.rulesFile);
        template = 'default';
      } else {
        this.reporter.info('Creating sudoers file from template...');
        writeFileSync(policy.rulesFile, renderPolicyTemplate(name, this.clock()), 'utf8');
        template = 'boilerplate';
      }
    } catch (err) {
      rmSync(policy.dir, { recursive: true, force: true });
      this.fail('io_failed', `Failed to write policy file: ${(err as Error).message}`);
    }

    this.reporter.success(`Policy created: ${name}`);
    return { policy: { ...policy, hasRulesFile: true }, template };
  }

  /**
   * Open a policy's rule file in the editor, offering to create an empty one
   * when it is missing. Blocks until the editor exits.
   */
  async editPolicy(name: string = DEFAULT_POLICY_NAME): Promise<OperationStatus> {
    this.ensureCheckedOut();
    const policy = this.existingPolicy(name);

    if (!policy.hasRulesFile) {
      this.reporter.warning(`Policy file does not exist: ${policy.rulesFile}`);
      const action =
        policy.kind === 'default' ? 'create new policy file' : `create sudoers file for policy ${name}`;
      if (!(await this.confirmed(action))) return 'cancelled';
      try {
        mkdirSync(dirname(policy.rulesFile), { recursive: true });
        writeFileSync(policy.rulesFile, '', { flag: 'a' });
      } catch (err) {
        this.fail('io_failed', `Failed to create policy file: ${(err as Error).message}`);
      }
    }

    this.reporter.info(`Editing: ${policy.rulesFile}`);
    try {
      this.editor.edit(policy.rulesFile);
    } catch (err) {
      this.fail('tool_failed', (err as Error).message);
    }
    this.reporter.success(
      policy.kind === 'default' ? 'Policy editing completed' : `Policy editing completed for: ${name}`,
    );
    return 'completed';
  }

  // ── Validate / add / commit ──────────────────────────────────────────────

  validatePolicy(name: string = DEFAULT_POLICY_NAME): ValidationResult {
    this.ensureCheckedOut();
    const policy = this.existingPolicy(name);
    if (!policy.hasRulesFile) {
      this.fail('rules_file_missing', `Sudoers file not found: ${policy.rulesFile}`);
    }

    this.reporter.info('Validating policy syntax...');
    const valid = this.validator.check(policy.rulesFile);
    if (valid) {
      this.reporter.success('Policy syntax is valid');
    } else {
      this.reporter.error('Policy syntax validation failed. Please review and fix errors.');
    }
    return { policy, valid };
  }

  /**
   * Stage a custom policy as a new repository entry. Staging does not make
   * it live; a commit is still required.
   */
  async addPolicyToServer(name: string, description: string): Promise<OperationStatus> {
    this.ensureCheckedOut();
    if (name === DEFAULT_POLICY_NAME) {
      this.fail('reserved_name', 'The default policy is always present; only custom policies can be added.');
    }
    const policy = this.existingPolicy(name);
    if (!policy.hasRulesFile) {
      this.fail('rules_file_missing', `Policy file not found: ${policy.rulesFile}`);
    }
    const label = description.trim();
    if (!label) {
      this.fail('invalid_description', 'Policy description cannot be empty.');
    }

    this.reporter.info('Validating policy before adding...');
    if (!this.validator.check(policy.rulesFile, { quiet: true })) {
      this.fail(
        'invalid_policy',
        'Policy validation failed. Cannot add invalid policy. Edit and fix the syntax errors first.',
      );
    }
    this.reporter.success('Policy validation passed');

    if (!(await this.confirmed(`add policy '${name}' to server repository`))) return 'cancelled';

    this.reporter.info('Adding policy to server...');
    const status = this.repository.add(this.root, policy.relPath, label);
    if (status !== 0) {
      this.fail('tool_failed', 'Failed to add policy to server', status);
    }
    this.reporter.success(`Policy added to repository: ${name}`);
    this.reporter.info('Next step: commit the changes to make the policy active.');
    return 'completed';
  }

  async commit(): Promise<OperationStatus> {
    if (!this.exists()) {
      this.fail('not_checked_out', 'Policy not checked out. Nothing to commit.');
    }

    if (isFile(this.paths.defaultRules)) {
      this.reporter.info('Validating policy before commit...');
      if (!this.validator.check(this.paths.defaultRules, { quiet: true })) {
        this.fail(
          'invalid_policy',
          'Policy validation failed. Cannot commit invalid policy. Fix the syntax errors before committing.',
        );
      }
    }

    if (!(await this.confirmed('commit policy changes to repository'))) return 'cancelled';

    this.reporter.info('Committing policy changes...');
    const status = this.repository.commit(this.root);
    if (status !== 0) {
      this.fail('tool_failed', 'Failed to commit policy', status);
    }
    this.reporter.success('Policy committed successfully');
    return 'completed';
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private async confirmed(action: string): Promise<boolean> {
    const ok = await this.confirm(action);
    if (!ok) this.reporter.warning('Action cancelled by user');
    return ok;
  }

  private fail(code: WorkspaceErrorCode, message: string, exitCode?: number): never {
    this.reporter.error(message);
    throw new PolicyWorkspaceError(code, message, exitCode);
  }

  /** Fails with `not_checked_out` when there is no checkout at the root. */
  ensureCheckedOut(): void {
    if (!this.exists()) {
      this.fail('not_checked_out', 'Policy not checked out. Checkout the policy first.');
    }
  }

  private requireValidName(name: string): void {
    if (!POLICY_NAME_PATTERN.test(name)) {
      this.fail(
        'invalid_name',
        'Invalid policy name. Use only letters, numbers, underscores, and hyphens.',
      );
    }
  }

  /**
   * The default policy, or a custom policy whose directory exists. Names a
   * checkout already holds may use any characters, but must stay a single
   * visible entry of the policy container.
   */
  private existingPolicy(name: string): PolicyEntry {
    if (name === DEFAULT_POLICY_NAME) return this.entry(name);
    if (name === '' || basename(name) !== name || name.startsWith(HIDDEN_ENTRY_MARKER)) {
      this.fail('invalid_name', `Invalid policy name: ${name}`);
    }
    const policy = this.entry(name);
    if (!isDirectory(policy.dir)) {
      this.fail('policy_not_found', `Policy not found: ${name}`);
    }
    return policy;
  }

  private remove(failureMessage: string): void {
    try {
      rmSync(this.root, { recursive: true, force: true });
    } catch (err) {
      this.fail('io_failed', `${failureMessage}: ${(err as Error).message}`);
    }
  }
}
