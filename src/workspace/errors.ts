export type WorkspaceErrorCode =
  | 'not_checked_out'
  | 'policy_dir_missing'
  | 'invalid_name'
  | 'reserved_name'
  | 'already_exists'
  | 'policy_not_found'
  | 'rules_file_missing'
  | 'invalid_description'
  | 'invalid_policy'
  | 'tool_failed'
  | 'io_failed';

/**
 * A workspace operation that did not happen. The message has already been
 * shown to the operator and written to the operation log when this is thrown.
 */
export class PolicyWorkspaceError extends Error {
  override readonly name = 'PolicyWorkspaceError';

  constructor(
    readonly code: WorkspaceErrorCode,
    message: string,
    /** Exit status of the external tool, for `tool_failed`. */
    readonly exitCode?: number,
  ) {
    super(message);
  }
}
