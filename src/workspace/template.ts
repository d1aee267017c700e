import { formatTimestamp } from '../shared/time.js';

const POLICY_TEMPLATE = `# Custom Policy: POLICY_NAME
# Created: DATE
#
# This is a custom sudo policy for Safeguard for Sudo.
# Edit this file according to sudoers syntax.
#
# Example:
# %admins ALL=(ALL) ALL
# user1 ALL=/usr/bin/systemctl restart httpd

Defaults secure_path="/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin"

# Add your custom rules below:

`;

/** Starter rule file for a policy when the checkout has no default rules to copy. */
export function renderPolicyTemplate(name: string, createdAt: Date): string {
  const stamp = formatTimestamp(createdAt);
  // One pass, so a name like "UPDATE" is not rewritten by the date placeholder.
  return POLICY_TEMPLATE.replace(/POLICY_NAME|DATE/g, (placeholder) =>
    placeholder === 'DATE' ? stamp : name,
  );
}
