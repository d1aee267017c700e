import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { hostname } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { directorySize, formatBytes, isDirectory, isFile } from '../../shared/fs-utils.js';
import { formatFileStamp } from '../../shared/time.js';
import type { CliContext } from '../cli-shared.js';
import { confirmAction, printHeader, reportStatus, requireTool } from '../cli-shared.js';
import { readPackageInfo } from '../package-info.js';
import { entryLabel, RETURN_TO_MAIN, type Menu } from './menu.js';

export const VAR_ARCHIVE = 'var_qpm4u.tar.gz';
export const ETC_ARCHIVE = 'etc_qpm4u.tar.gz';
export const BACKUP_MANIFEST = 'BACKUP_INFO.txt';
const LICENSE_PREFIXES = ['.license', 'license'];

export function serverStatusCheck(ctx: CliContext): void {
  if (!requireTool(ctx, 'pmsrvcheck')) return;
  ctx.reporter.info('Checking policy server status...');
  reportStatus(
    ctx,
    ctx.runner.run('pmsrvcheck', []).status,
    'Policy server is running properly',
    'Policy server check failed',
  );
}

export async function installLicense(ctx: CliContext): Promise<void> {
  const licenseFile = await ctx.prompter.input('Enter full path to license file (.dlv)', {
    allowCancel: true,
  });
  if (licenseFile === null) {
    ctx.reporter.warning('License installation cancelled');
    return;
  }
  if (!isFile(licenseFile)) {
    ctx.reporter.error(`License file not found: ${licenseFile}`);
    return;
  }
  if (!(await confirmAction(ctx, `install license from ${licenseFile}`))) return;

  reportStatus(
    ctx,
    ctx.runner.run('pmlicense', ['-l', licenseFile]).status,
    'License installed successfully',
    'Failed to install license',
  );
}

export async function fixPermissions(ctx: CliContext): Promise<void> {
  if (!(await confirmAction(ctx, 'fix file permissions for Safeguard directories'))) return;
  ctx.reporter.info('Fixing file permissions...');
  reportStatus(
    ctx,
    ctx.runner.run('pmcheckperms', ['-f']).status,
    'File permissions fixed successfully',
    'Failed to fix file permissions',
  );
}

export async function editSettings(ctx: CliContext): Promise<void> {
  const settingsFile = join(ctx.config.configDir, 'pm.settings');
  if (!isFile(settingsFile)) {
    ctx.reporter.error(`Configuration file not found: ${settingsFile}`);
    return;
  }

  printHeader('Edit pm.settings Configuration');
  ctx.reporter.info(`Configuration file: ${settingsFile}`);
  ctx.reporter.warning('Incorrect settings can break Safeguard functionality!');
  ctx.reporter.info('A backup will be created before editing.');
  if (!(await confirmAction(ctx, 'edit pm.settings configuration file'))) return;

  const backupFile = `${settingsFile}.backup.${formatFileStamp(ctx.clock())}`;
  ctx.reporter.info(`Creating backup: ${backupFile}`);
  try {
    copyFileSync(settingsFile, backupFile);
  } catch (err) {
    ctx.reporter.error(`Failed to create backup: ${(err as Error).message}`);
    return;
  }
  ctx.reporter.success('Backup created successfully');

  ctx.editor.edit(settingsFile);

  ctx.reporter.warning('Changes to pm.settings require a service restart to take effect.');
  if (await confirmAction(ctx, 'restart Safeguard services now')) {
    ctx.reporter.info('Restarting services...');
    const restarted = reportStatus(
      ctx,
      ctx.runner.run('pmserviced', ['restart']).status,
      'Services restarted successfully',
      'Failed to restart services',
    );
    if (!restarted) ctx.reporter.info('You may need to restart manually.');
  } else {
    ctx.reporter.info('Remember to restart services with: pmserviced restart');
  }
}

function licenseFiles(dir: string): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && LICENSE_PREFIXES.some((p) => entry.name.startsWith(p)))
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}

export function backupManifest(ctx: CliContext, backupPath: string, createdAt: Date): string {
  const { version } = readPackageInfo();
  return [
    'Safeguard for Sudo Backup',
    '=========================',
    `Backup Date: ${createdAt.toString()}`,
    `Hostname: ${hostname()}`,
    `Menu Version: ${version}`,
    '',
    'Backup Contents:',
    `- ${VAR_ARCHIVE}: ${ctx.config.varDir}`,
    `- ${ETC_ARCHIVE}: ${ctx.config.configDir}`,
    '- licenses/: License files',
    '',
    'Restore Instructions:',
    '1. Stop Safeguard services: pmserviced stop',
    '2. Extract backups:',
    `   cd ${dirname(ctx.config.varDir)} && tar -xzf ${join(backupPath, VAR_ARCHIVE)}`,
    `   cd ${dirname(ctx.config.configDir)} && tar -xzf ${join(backupPath, ETC_ARCHIVE)}`,
    `3. Restore licenses: cp ${join(backupPath, 'licenses')}/* ${ctx.config.licenseDir}/`,
    '4. Start services: pmserviced start',
    '',
  ].join('\n');
}

/** `tar -czf <archive> -C <parent> <name>` for one product directory. */
function archiveDirectory(ctx: CliContext, archive: string, dir: string): number {
  return ctx.runner.runSystem('tar', ['-czf', archive, '-C', dirname(dir), basename(dir)]).status;
}

export async function backupConfiguration(ctx: CliContext): Promise<void> {
  printHeader('Backup Safeguard Configuration');
  const answer = await ctx.prompter.input(
    `Enter backup directory path (default: ${ctx.config.backupDir})`,
    { allowEmpty: true, allowCancel: true },
  );
  if (answer === null) {
    ctx.reporter.warning('Backup cancelled');
    return;
  }

  const createdAt = ctx.clock();
  const backupPath = join(answer || ctx.config.backupDir, `safeguard_backup_${formatFileStamp(createdAt)}`);
  ctx.reporter.info(`Backup will be created at: ${backupPath}`);
  ctx.reporter.info('');
  ctx.reporter.info('Directories to backup:');
  ctx.reporter.info(`  - ${ctx.config.varDir} (logs, repository, SSH keys)`);
  ctx.reporter.info(`  - ${ctx.config.configDir} (settings, production policy)`);
  ctx.reporter.info(`  - ${ctx.config.licenseDir}/.license* (licenses)`);
  if (!(await confirmAction(ctx, 'create backup'))) return;

  const licenseBackup = join(backupPath, 'licenses');
  try {
    mkdirSync(licenseBackup, { recursive: true });
  } catch (err) {
    ctx.reporter.error(`Failed to create backup directory: ${(err as Error).message}`);
    return;
  }

  ctx.reporter.info(`Backing up ${ctx.config.varDir}...`);
  const varStatus = archiveDirectory(ctx, join(backupPath, VAR_ARCHIVE), ctx.config.varDir);
  ctx.reporter.info(`Backing up ${ctx.config.configDir}...`);
  const etcStatus = archiveDirectory(ctx, join(backupPath, ETC_ARCHIVE), ctx.config.configDir);

  ctx.reporter.info('Backing up licenses...');
  for (const name of licenseFiles(ctx.config.licenseDir)) {
    copyFileSync(join(ctx.config.licenseDir, name), join(licenseBackup, name));
  }

  writeFileSync(join(backupPath, BACKUP_MANIFEST), backupManifest(ctx, backupPath, createdAt), 'utf8');

  if (varStatus !== 0 || etcStatus !== 0) {
    ctx.reporter.warning('Backup completed with archive errors; review the tar output above');
  } else {
    ctx.reporter.success('Backup completed successfully');
  }
  ctx.reporter.info(`Backup location: ${backupPath}`);
  ctx.reporter.info(`Backup size: ${formatBytes(directorySize(backupPath))}`);
  ctx.reporter.info(`Backup manifest: ${join(backupPath, BACKUP_MANIFEST)}`);
}

export async function restoreConfiguration(ctx: CliContext): Promise<void> {
  printHeader('Restore Safeguard Configuration');
  ctx.reporter.warning('This will overwrite current configuration!');
  ctx.reporter.info('Make sure you have a recent backup before proceeding.');

  const backupPath = await ctx.prompter.input('Enter full path to backup directory', {
    allowCancel: true,
  });
  if (backupPath === null) {
    ctx.reporter.warning('Restore cancelled');
    return;
  }
  if (!isDirectory(backupPath)) {
    ctx.reporter.error(`Backup directory not found: ${backupPath}`);
    return;
  }
  const varArchive = join(backupPath, VAR_ARCHIVE);
  const etcArchive = join(backupPath, ETC_ARCHIVE);
  if (!isFile(varArchive) || !isFile(etcArchive)) {
    ctx.reporter.error('Backup files not found in directory');
    ctx.reporter.info(`Expected files: ${VAR_ARCHIVE}, ${ETC_ARCHIVE}`);
    return;
  }

  const manifest = join(backupPath, BACKUP_MANIFEST);
  if (isFile(manifest)) {
    ctx.reporter.info('Backup Information:');
    ctx.reporter.info(readFileSync(manifest, 'utf8'));
  }

  if (!(await confirmAction(ctx, 'restore from backup (this will overwrite current configuration)'))) {
    return;
  }

  ctx.reporter.info('Stopping Safeguard services...');
  ctx.runner.run('pmserviced', ['stop']);
  await ctx.sleep(2000);

  ctx.reporter.info(`Restoring ${ctx.config.varDir}...`);
  ctx.runner.runSystem('tar', ['-xzf', varArchive, '-C', dirname(ctx.config.varDir)]);
  ctx.reporter.info(`Restoring ${ctx.config.configDir}...`);
  ctx.runner.runSystem('tar', ['-xzf', etcArchive, '-C', dirname(ctx.config.configDir)]);

  const licenseBackup = join(backupPath, 'licenses');
  if (existsSync(licenseBackup)) {
    ctx.reporter.info('Restoring licenses...');
    for (const name of licenseFiles(licenseBackup)) {
      copyFileSync(join(licenseBackup, name), join(ctx.config.licenseDir, name));
    }
  }

  ctx.reporter.info('Fixing file permissions...');
  ctx.runner.run('pmcheckperms', ['-f'], { output: 'quiet' });

  ctx.reporter.info('Starting Safeguard services...');
  ctx.runner.run('pmserviced', ['start']);
  await ctx.sleep(2000);

  if (ctx.runner.run('pmsrvcheck', [], { output: 'quiet' }).status === 0) {
    ctx.reporter.success('Configuration restored successfully');
    ctx.reporter.info('Services are running.');
  } else {
    ctx.reporter.warning('Configuration restored, but services may need attention');
    ctx.reporter.info(`Check logs: ${join(ctx.config.daemonLogDir, 'pmmasterd.log')}`);
  }
}

export const serverMenu: Menu = {
  title: 'Server Management',
  exit: RETURN_TO_MAIN,
  items: [
    {
      key: '1',
      label: entryLabel('View Server Configuration', 'Display pmsrvinfo', 30),
      run: (ctx) => {
        ctx.runner.run('pmsrvinfo', []);
      },
    },
    {
      key: '2',
      label: entryLabel('List Policy Assignments', 'Show which policies clients use', 30),
      run: (ctx) => {
        ctx.runner.run('pmsrvinfo', ['-l']);
      },
    },
    { key: '3', label: entryLabel('Check Server Status', 'Verify server is running', 30), run: serverStatusCheck },
    {
      key: '4',
      label: entryLabel('View License Information', 'Display license status', 30),
      run: (ctx) => {
        ctx.runner.run('pmlicense', []);
      },
    },
    { key: '5', label: entryLabel('Install License', 'Install new license file', 30), run: installLicense },
    {
      key: '6',
      label: entryLabel('License Usage Report', 'Detailed usage report', 30),
      run: (ctx) => {
        ctx.runner.run('pmlicense', ['-uf']);
      },
    },
    {
      key: '7',
      label: entryLabel('Check File Permissions', 'Verify Safeguard file permissions', 30),
      run: (ctx) => {
        ctx.runner.run('pmcheckperms', ['-v']);
      },
    },
    { key: '8', label: entryLabel('Fix File Permissions', 'Repair permission issues', 30), run: fixPermissions },
    { key: '9', label: entryLabel('Edit pm.settings', 'Edit main configuration file', 30), run: editSettings },
    { key: '10', label: entryLabel('Backup Configuration', 'Backup critical Safeguard directories', 30), run: backupConfiguration },
    { key: '11', label: entryLabel('Restore Configuration', 'Restore from backup', 30), run: restoreConfiguration },
  ],
};
