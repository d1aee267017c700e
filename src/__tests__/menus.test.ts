import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { hostname } from 'node:os';
import { dirname, join } from 'node:path';
import { diagnosticsMenu, setDebugLogging, testCommandAuthorization, viewErrorLogs } from '../cli/menus/diagnostics.js';
import { showChangelog, showVersion } from '../cli/menus/info.js';
import { logMenu, parseEntryCount, replayKeystrokeLog, searchLogsByUser, searchLogsCustom, viewEventLogs } from '../cli/menus/logs.js';
import { buildMainMenu } from '../cli/menus/main.js';
import { pickFromList, runMenu } from '../cli/menus/menu.js';
import { runPreflightCheck } from '../cli/menus/plugin.js';
import { addPolicyToServer, comparePolicyVersions, createCustomPolicy, policyMenu } from '../cli/menus/policy.js';
import { backupConfiguration, editSettings, installLicense, restoreConfiguration } from '../cli/menus/server.js';
import { ScriptedPrompter, createContextHarness, seedCheckout, type ContextHarness } from './test-helpers.js';

function harness(
  selections: string[] = [],
  inputs: Array<string | null> = [],
  confirmations: boolean[] = [],
): ContextHarness {
  return createContextHarness(new ScriptedPrompter(selections, inputs, confirmations));
}

describe('interactive menus', () => {
  let h: ContextHarness;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'clear').mockImplementation(() => undefined);
  });

  afterEach(() => {
    h.cleanup();
    jest.restoreAllMocks();
  });

  describe('menu loop', () => {
    it('runs the chosen action, reports unknown keys and returns on exit', async () => {
      h = harness(['5', 'x', '0']);
      seedCheckout(h.ctx.config.workspaceDir, { defaultRules: 'x', custom: { web: 'rules' } });

      await runMenu(h.ctx, policyMenu);

      expect(h.reporter.of('info')).toContain('Total policies: 2');
      expect(h.reporter.of('error')).toEqual(['Invalid selection']);
      expect(h.prompter.pauses).toBe(1);
    });

    it('enters sub-menus from the main menu without pausing on return', async () => {
      h = harness(['1', '2', '0', 'q'], [], [true]);

      await runMenu(h.ctx, buildMainMenu('2.1.0'));

      expect(h.runner.commands()).toEqual(['pmgit enable']);
      expect(h.prompter.asked).toContain('enable Git policy management');
      expect(h.prompter.pauses).toBe(1);
    });

    it('reports workspace failures once and stays in the menu', async () => {
      h = harness(['8', '0']);

      await runMenu(h.ctx, policyMenu);

      expect(h.reporter.of('error')).toEqual(['Policy not checked out. Nothing to commit.']);
      expect(h.repository.calls).toEqual([]);
    });

    it('reports unexpected errors from an action', async () => {
      h = harness(['4', '0'], ['--user "alice']);

      await runMenu(h.ctx, logMenu);

      expect(h.reporter.of('error')).toEqual(['Unterminated double quote in: --user "alice']);
      expect(h.runner.calls).toEqual([]);
    });

    it('picks entries by number and cancels with 0', async () => {
      h = harness(['2', '0']);
      expect(await pickFromList(h.ctx, 'Select', ['a', 'b'])).toBe('b');
      expect(await pickFromList(h.ctx, 'Select', ['a', 'b'])).toBeNull();
    });

    it('has the documented number of entries per menu', () => {
      h = harness();
      expect(buildMainMenu('2.1.0').items.map((i) => i.key)).toEqual(['1', '2', '3', '4', '5', '6', 'v', 'c', 'a']);
      expect(policyMenu.items).toHaveLength(13);
      expect(diagnosticsMenu.items).toHaveLength(8);
    });
  });

  describe('policy screens', () => {
    it('creates a custom policy and skips the editor when declined', async () => {
      h = harness([], ['webservers'], [false]);
      seedCheckout(h.ctx.config.workspaceDir);

      await createCustomPolicy(h.ctx);

      expect(existsSync(join(h.ctx.config.workspaceDir, 'policy_sudo', 'webservers', 'sudoers'))).toBe(true);
      expect(h.editor.edited).toEqual([]);
      expect(h.prompter.asked).toEqual([
        'Enter new policy name (e.g., webservers, dbservers)',
        'edit the new policy now',
      ]);
      expect(h.reporter.of('warning')).toEqual(['Action cancelled by user']);
    });

    it('cancels creation on the sentinel', async () => {
      h = harness([], [null]);
      seedCheckout(h.ctx.config.workspaceDir);

      await createCustomPolicy(h.ctx);

      expect(h.reporter.of('warning')).toEqual(['Policy creation cancelled']);
    });

    it('adds the picked policy with the typed description', async () => {
      h = harness(['1'], ['web tier'], [true]);
      seedCheckout(h.ctx.config.workspaceDir, { custom: { web: 'rules' } });

      await addPolicyToServer(h.ctx);

      expect(h.repository.calls).toEqual([
        { method: 'add', args: [h.ctx.config.workspaceDir, 'web/sudoers', 'web tier'] },
      ]);
    });

    it('warns when there is no custom policy to add', async () => {
      h = harness();
      seedCheckout(h.ctx.config.workspaceDir);

      await addPolicyToServer(h.ctx);

      expect(h.reporter.of('warning')).toEqual(['No custom policies found.']);
      expect(h.repository.calls).toEqual([]);
    });

    it('shows the log before comparing two revisions', async () => {
      h = harness([], ['3', '5']);

      await comparePolicyVersions(h.ctx);

      expect(h.repository.calls).toEqual([
        { method: 'log', args: [] },
        { method: 'diff', args: ['3', '5'] },
      ]);
    });
  });

  describe('log screens', () => {
    it('parses the entry count', () => {
      h = harness();
      expect(parseEntryCount('')).toBe(50);
      expect(parseEntryCount('25')).toBe(25);
      expect(parseEntryCount('0')).toBeNull();
      expect(parseEntryCount('ten')).toBeNull();
    });

    it('shows the default number of events', async () => {
      h = harness([], ['']);
      await viewEventLogs(h.ctx);
      expect(h.runner.commands()).toEqual(['pmlog -n 50']);
    });

    it('refuses a tool that is not installed', async () => {
      h = harness();
      h.runner.installed = new Set();
      await viewEventLogs(h.ctx);
      expect(h.reporter.of('error')).toEqual(['pmlog command not found. This may be a plugin-only installation.']);
    });

    it('searches by user from a start date', async () => {
      h = harness([], ['alice', '2026/03/01']);
      await searchLogsByUser(h.ctx);
      expect(h.runner.calls[0]?.args).toEqual(['--user', 'alice', '--after', '2026/03/01 00:00:00']);
    });

    it('passes custom search parameters as separate words', async () => {
      h = harness([], ['--user root --command "systemctl restart"; reboot']);
      await searchLogsCustom(h.ctx);
      expect(h.runner.calls[0]?.args).toEqual(['--user', 'root', '--command', 'systemctl restart;', 'reboot']);
    });

    it('replays a keystroke log after a short pause', async () => {
      h = harness();
      const logFile = join(h.ctx.config.varDir, 'iolog', 'web01', 'session1', 'log');
      mkdirSync(dirname(logFile), { recursive: true });
      writeFileSync(logFile, '');
      h.prompter.inputs.push(logFile);

      await replayKeystrokeLog(h.ctx);

      expect(h.reporter.of('info')).toContain(logFile);
      expect(h.slept).toEqual([2000]);
      expect(h.runner.calls).toEqual([{ command: 'pmreplay', args: [logFile], opts: {} }]);
    });
  });

  describe('diagnostics screens', () => {
    it('tests command authorization and explains the verdict', async () => {
      h = harness([], ['alice', 'staff', 'web01', 'systemctl restart httpd']);
      h.runner.statuses['pmcheck'] = 12;

      await testCommandAuthorization(h.ctx);

      expect(h.runner.calls[0]?.args).toEqual([
        '-u', 'alice', '-g', 'staff', '-h', 'web01', 'systemctl', 'restart', 'httpd',
      ]);
      expect(h.reporter.of('error')).toEqual(['Command would be REJECTED']);
    });

    it('toggles debug logging after confirmation', async () => {
      h = harness([], [], [true]);
      await setDebugLogging(h.ctx, true);
      expect(h.runner.commands()).toEqual(['pmcheck -z on']);
      expect(h.reporter.of('success')).toEqual(['Debug logging enabled']);
    });

    it('shows the last 50 lines of one daemon log', async () => {
      h = harness(['1']);
      mkdirSync(h.ctx.config.daemonLogDir, { recursive: true });
      const file = join(h.ctx.config.daemonLogDir, 'pmmasterd.log');
      writeFileSync(file, Array.from({ length: 60 }, (_, i) => `line ${i + 1}`).join('\n') + '\n');

      await viewErrorLogs(h.ctx);

      const info = h.reporter.of('info');
      expect(info.slice(2, 4)).toEqual([`=== ${file} (last 50 lines) ===`, 'line 11']);
      expect(info[info.length - 1]).toBe('line 60');
      expect(info).toHaveLength(53);
    });

    it('shows the last 20 lines of every present log', async () => {
      h = harness(['5']);
      mkdirSync(h.ctx.config.daemonLogDir, { recursive: true });
      const file = join(h.ctx.config.daemonLogDir, 'pmrun.log');
      writeFileSync(file, Array.from({ length: 30 }, (_, i) => `run ${i + 1}`).join('\n'));

      await viewErrorLogs(h.ctx);

      const info = h.reporter.of('info');
      expect(info.slice(2, 4)).toEqual([`=== ${file} (last 20 lines) ===`, 'run 11']);
      expect(info).toHaveLength(2 + 1 + 20 + 1);
    });
  });

  describe('plugin screens', () => {
    it('runs the pre-flight script against a policy server', async () => {
      h = harness([], ['ps1.example.com']);
      await runPreflightCheck(h.ctx);
      expect(h.runner.calls[0]).toEqual({
        command: 'sh',
        args: [join(h.ctx.config.binDir, 'pmpreflight.sh'), '--sudo', '--policyserver', 'ps1.example.com'],
        opts: {},
      });
    });
  });

  describe('server screens', () => {
    const stamp = '20260305_090702';

    it('backs up the product directories and licenses', async () => {
      h = harness([], [''], [true]);
      const { varDir, configDir, licenseDir, backupDir } = h.ctx.config;
      mkdirSync(licenseDir, { recursive: true });
      writeFileSync(join(licenseDir, '.license.abc'), 'license');
      writeFileSync(join(licenseDir, 'notes.txt'), 'not a license');

      await backupConfiguration(h.ctx);

      const backupPath = join(backupDir, `safeguard_backup_${stamp}`);
      expect(h.runner.calls.map((c) => [c.command, ...c.args])).toEqual([
        ['tar', '-czf', join(backupPath, 'var_qpm4u.tar.gz'), '-C', dirname(varDir), 'qpm4u'],
        ['tar', '-czf', join(backupPath, 'etc_qpm4u.tar.gz'), '-C', dirname(configDir), 'qpm4u'],
      ]);
      expect(readFileSync(join(backupPath, 'licenses', '.license.abc'), 'utf8')).toBe('license');
      expect(existsSync(join(backupPath, 'licenses', 'notes.txt'))).toBe(false);
      const manifest = readFileSync(join(backupPath, 'BACKUP_INFO.txt'), 'utf8').split('\n');
      expect(manifest).toContain(`Hostname: ${hostname()}`);
      expect(h.reporter.of('success')).toEqual(['Backup completed successfully']);
    });

    it('restores archives with the services stopped', async () => {
      h = harness();
      const { varDir, configDir, licenseDir } = h.ctx.config;
      const backupPath = join(h.dir, 'restore-from');
      mkdirSync(join(backupPath, 'licenses'), { recursive: true });
      writeFileSync(join(backupPath, 'var_qpm4u.tar.gz'), '');
      writeFileSync(join(backupPath, 'etc_qpm4u.tar.gz'), '');
      writeFileSync(join(backupPath, 'licenses', '.license.abc'), 'license');
      mkdirSync(licenseDir, { recursive: true });
      h.prompter.inputs.push(backupPath);
      h.prompter.confirmations.push(true);

      await restoreConfiguration(h.ctx);

      expect(h.runner.calls.map((c) => [c.command, ...c.args])).toEqual([
        ['pmserviced', 'stop'],
        ['tar', '-xzf', join(backupPath, 'var_qpm4u.tar.gz'), '-C', dirname(varDir)],
        ['tar', '-xzf', join(backupPath, 'etc_qpm4u.tar.gz'), '-C', dirname(configDir)],
        ['pmcheckperms', '-f'],
        ['pmserviced', 'start'],
        ['pmsrvcheck'],
      ]);
      expect(h.slept).toEqual([2000, 2000]);
      expect(readFileSync(join(licenseDir, '.license.abc'), 'utf8')).toBe('license');
      expect(h.reporter.of('success')).toEqual(['Configuration restored successfully']);
    });

    it('flags services that do not come back after a restore', async () => {
      h = harness();
      const backupPath = join(h.dir, 'restore-from');
      mkdirSync(backupPath, { recursive: true });
      writeFileSync(join(backupPath, 'var_qpm4u.tar.gz'), '');
      writeFileSync(join(backupPath, 'etc_qpm4u.tar.gz'), '');
      h.prompter.inputs.push(backupPath);
      h.prompter.confirmations.push(true);
      h.runner.statuses['pmsrvcheck'] = 1;

      await restoreConfiguration(h.ctx);

      expect(h.reporter.of('warning')).toEqual([
        'This will overwrite current configuration!',
        'Configuration restored, but services may need attention',
      ]);
      expect(h.reporter.of('info')).toContain(`Check logs: ${join(h.ctx.config.daemonLogDir, 'pmmasterd.log')}`);
    });

    it('refuses a directory without both archives', async () => {
      h = harness();
      h.prompter.inputs.push(h.dir);
      await restoreConfiguration(h.ctx);
      expect(h.reporter.of('error')).toEqual(['Backup files not found in directory']);
      expect(h.runner.calls).toEqual([]);
    });

    it('backs up pm.settings before editing it', async () => {
      h = harness([], [], [true, false]);
      mkdirSync(h.ctx.config.configDir, { recursive: true });
      const settings = join(h.ctx.config.configDir, 'pm.settings');
      writeFileSync(settings, 'masterport 12345\n');

      await editSettings(h.ctx);

      expect(readFileSync(`${settings}.backup.${stamp}`, 'utf8')).toBe('masterport 12345\n');
      expect(h.editor.edited).toEqual([settings]);
      expect(h.runner.calls).toEqual([]);
      expect(h.reporter.of('info')).toContain('Remember to restart services with: pmserviced restart');
      expect(h.reporter.of('warning')).toEqual([
        'Incorrect settings can break Safeguard functionality!',
        'Changes to pm.settings require a service restart to take effect.',
        'Action cancelled by user',
      ]);
    });

    it('checks the license file exists before installing it', async () => {
      h = harness([], ['/nonexistent/license.dlv']);
      await installLicense(h.ctx);
      expect(h.reporter.of('error')).toEqual(['License file not found: /nonexistent/license.dlv']);
      expect(h.runner.calls).toEqual([]);
    });
  });

  describe('information screens', () => {
    it('shows version details', () => {
      h = harness();
      showVersion(h.ctx, {
        name: 'sudo-menu',
        version: '9.9.9',
        description: '',
        releaseDate: '2026-10-19',
        root: '/usr/lib/sudo-menu',
      });
      expect(h.reporter.of('info').slice(0, 3)).toEqual([
        'Version: 9.9.9',
        'Date: 2026-10-19',
        'Install Location: /usr/lib/sudo-menu',
      ]);
    });

    it('prints the changelog or reports it missing', () => {
      h = harness();
      const path = join(h.dir, 'CHANGELOG.md');
      showChangelog(h.ctx, path);
      expect(h.reporter.of('error')).toEqual([`Changelog file not found: ${path}`]);

      writeFileSync(path, '# Changelog\n');
      showChangelog(h.ctx, path);
      expect(h.reporter.of('info')).toEqual(['# Changelog\n']);
    });
  });
});
