import { readFileSync } from 'node:fs';
import { isFile } from '../../shared/fs-utils.js';
import type { CliContext } from '../cli-shared.js';
import { printHeader } from '../cli-shared.js';
import { CHANGELOG_PATH, readPackageInfo, type PackageInfo } from '../package-info.js';

export const PRODUCT_NAME = 'Safeguard for Sudo';
export const MENU_TITLE = 'Sudo Administration Menu';

export function showVersion(ctx: CliContext, info: PackageInfo = readPackageInfo()): void {
  printHeader(MENU_TITLE);
  ctx.reporter.info(`Version: ${info.version}`);
  ctx.reporter.info(`Date: ${info.releaseDate ?? 'unreleased'}`);
  ctx.reporter.info(`Install Location: ${info.root}`);
  ctx.reporter.info('');
  ctx.reporter.info(`Product: ${PRODUCT_NAME}`);
  ctx.reporter.info('Supported Platforms: Linux, Unix, macOS');
}

export function showChangelog(ctx: CliContext, changelogPath: string = CHANGELOG_PATH): void {
  if (!isFile(changelogPath)) {
    ctx.reporter.error(`Changelog file not found: ${changelogPath}`);
    return;
  }
  printHeader('Recent Changes');
  ctx.reporter.info(readFileSync(changelogPath, 'utf8'));
}

export function showAbout(ctx: CliContext, info: PackageInfo = readPackageInfo()): void {
  printHeader('About This Menu');
  ctx.reporter.info(`Name: ${info.name}`);
  ctx.reporter.info(`Version: ${info.version}`);
  ctx.reporter.info(`Release Date: ${info.releaseDate ?? 'unreleased'}`);
  ctx.reporter.info('');
  ctx.reporter.info(`Product: ${PRODUCT_NAME}`);
  ctx.reporter.info('');
  ctx.reporter.info('Features:');
  for (const feature of [
    'Repository-based policy management',
    'Centralized sudo policy control',
    'Server and plugin administration',
    'Event and keystroke log search',
    'Policy validation and testing',
    'Diagnostic and troubleshooting tools',
  ]) {
    ctx.reporter.info(`  - ${feature}`);
  }
  ctx.reporter.info('');
  ctx.reporter.info('Requirements:');
  ctx.reporter.info('  - Root privileges');
  ctx.reporter.info(`  - ${PRODUCT_NAME} installed in ${ctx.config.binDir}`);
  ctx.reporter.info('  - Policy server or plugin configuration');
  ctx.reporter.info('');
  ctx.reporter.info('Support:');
  ctx.reporter.info(`  - Operation Log: ${ctx.config.operationLog}`);
  ctx.reporter.info(`  - Changelog: ${CHANGELOG_PATH}`);
}
