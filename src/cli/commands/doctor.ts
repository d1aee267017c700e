import type { Command } from 'commander';
import { runDoctorChecks, type DoctorReport } from '../../runtime/doctor.js';
import { createCliContext, type ContextFactory } from '../cli-shared.js';

const RESET = '\x1b[0m';
const COLORS = { pass: '\x1b[32m', warn: '\x1b[33m', fail: '\x1b[31m' } as const;
const ICONS = { pass: '✓', warn: '⚠', fail: '✗' } as const;

export function printDoctorReport(report: DoctorReport): void {
  for (const check of report.checks) {
    console.log(`${COLORS[check.status]}${ICONS[check.status]} ${check.name}${RESET}`);
    console.log(`  ${check.message}`);
    if (check.fix) console.log(`  Fix: ${check.fix}`);
    console.log();
  }
  console.log(`${COLORS[report.overall]}Overall: ${report.overall.toUpperCase()} – ${report.summary}${RESET}`);
}

export function registerDoctorCommand(program: Command, factory: ContextFactory = createCliContext): void {
  program
    .command('doctor')
    .description('Check privileges and the Safeguard for Sudo installation')
    .action((_opts: unknown, cmd: Command) => {
      const ctx = factory({ configPath: cmd.optsWithGlobals<{ config?: string }>().config });
      console.log('Running environment checks...\n');

      const report = runDoctorChecks(ctx.config, ctx.runner);
      printDoctorReport(report);

      if (report.overall === 'fail') process.exitCode = 1;
    });
}
