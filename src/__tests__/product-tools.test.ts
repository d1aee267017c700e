import { describe, it, expect } from '@jest/globals';
import { PmPolicyRepository } from '../product/policy-repo.js';
import { PmCheckValidator, authorizationArgs, verdictForExitCode } from '../product/validator.js';
import { FakeToolRunner } from './test-helpers.js';

describe('PmPolicyRepository', () => {
  it('maps each operation to one pmpolicy invocation', () => {
    const runner = new FakeToolRunner();
    const repo = new PmPolicyRepository(runner);

    repo.checkout('/tmp/policydir');
    repo.add('/tmp/policydir', 'web/sudoers', 'web tier; echo pwned');
    repo.commit('/tmp/policydir');
    repo.log();
    repo.diff('3', '5');
    repo.sync();
    repo.masterStatus();

    expect(runner.calls.map((c) => [c.command, c.args])).toEqual([
      ['pmpolicy', ['checkout', '-d', '/tmp/policydir']],
      ['pmpolicy', ['add', '-d', '/tmp/policydir', '-p', 'web/sudoers', '-l', 'web tier; echo pwned', '-n']],
      ['pmpolicy', ['commit', '-d', '/tmp/policydir']],
      ['pmpolicy', ['log']],
      ['pmpolicy', ['diff', '-r:3:5']],
      ['pmpolicy', ['sync']],
      ['pmpolicy', ['masterstatus']],
    ]);
  });

  it('returns the tool exit status', () => {
    const runner = new FakeToolRunner();
    runner.statuses['pmpolicy'] = 4;
    expect(new PmPolicyRepository(runner).commit('/tmp/policydir')).toBe(4);
  });
});

describe('PmCheckValidator', () => {
  it('checks a file in sudo mode', () => {
    const runner = new FakeToolRunner();
    expect(new PmCheckValidator(runner).check('/tmp/policydir/policy_sudo/sudoers')).toBe(true);
    expect(runner.calls).toEqual([
      { command: 'pmcheck', args: ['-f', '/tmp/policydir/policy_sudo/sudoers', '-o', 'sudo'], opts: {} },
    ]);
  });

  it('runs quiet pre-checks without output or log lines', () => {
    const runner = new FakeToolRunner();
    runner.statuses['pmcheck'] = 13;
    expect(new PmCheckValidator(runner).check('/x', { quiet: true })).toBe(false);
    expect(runner.calls[0]?.opts).toEqual({ output: 'quiet', unlogged: true });
  });
});

describe('command authorization', () => {
  it('builds pmcheck arguments with the command words last', () => {
    expect(
      authorizationArgs({ user: 'alice', group: 'staff', host: 'web01', command: ['systemctl', 'restart', 'httpd'] }),
    ).toEqual(['-u', 'alice', '-g', 'staff', '-h', 'web01', 'systemctl', 'restart', 'httpd']);
  });

  it('maps exit codes to verdicts', () => {
    expect([0, 11, 12, 13, 1].map(verdictForExitCode)).toEqual([
      'accepted',
      'authentication_required',
      'rejected',
      'syntax_error',
      'unknown',
    ]);
  });
});
