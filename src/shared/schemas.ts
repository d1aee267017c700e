import { z } from 'zod';

const absolutePath = z.string().min(1).refine((p) => p.startsWith('/'), {
  message: 'must be an absolute path',
});

export const MenuConfigSchema = z
  .object({
    binDir: absolutePath.default('/opt/quest/sbin'),
    configDir: absolutePath.default('/etc/opt/quest/qpm4u'),
    varDir: absolutePath.default('/var/opt/quest/qpm4u'),
    licenseDir: absolutePath.default('/opt/quest/qpm4u'),
    workspaceDir: absolutePath.default('/tmp/policydir'),
    operationLog: absolutePath.default('/var/log/sudo-menu.log'),
    daemonLogDir: absolutePath.default('/var/log'),
    backupDir: absolutePath.default('/var/backups/safeguard'),
    editor: z.string().min(1).optional(),
  })
  .strict();

export type MenuConfig = z.infer<typeof MenuConfigSchema>;
