#!/usr/bin/env node
import { Command } from 'commander';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerMenuCommand } from './commands/menu.js';
import { registerPolicyCommand } from './commands/policy.js';
import { readPackageInfo } from './package-info.js';

const program = new Command();

program
  .name('sudo-menu')
  .description('Administration menu for Safeguard for Sudo policy servers and plugin hosts')
  .version(readPackageInfo().version)
  .option('-c, --config <file>', 'Menu configuration file (YAML)');

registerMenuCommand(program);
registerDoctorCommand(program);
registerPolicyCommand(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
