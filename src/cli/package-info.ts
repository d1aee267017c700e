import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

/** Install location: the directory holding package.json and CHANGELOG.md. */
export const PACKAGE_ROOT = join(__dirname, '..', '..');
export const CHANGELOG_PATH = join(PACKAGE_ROOT, 'CHANGELOG.md');

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
  releaseDate: string | null;
  root: string;
}

/**
 * Pull the date of `version` from a Keep-a-Changelog heading such as
 * `## [1.2.0] - 2026-10-19`.
 */
export function releaseDateFromChangelog(changelog: string, version: string): string | null {
  for (const line of changelog.split(/\r?\n/)) {
    const match = /^##\s+\[([^\]]+)\]\s+-\s+(\S+)/.exec(line);
    if (match && match[1] === version) return match[2] ?? null;
  }
  return null;
}

export function readPackageInfo(root: string = PACKAGE_ROOT): PackageInfo {
  const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(join(root, 'package.json'), 'utf8')));
  let releaseDate: string | null = null;
  try {
    releaseDate = releaseDateFromChangelog(readFileSync(join(root, 'CHANGELOG.md'), 'utf8'), pkg.version);
  } catch {
    releaseDate = null;
  }
  return {
    name: pkg.name,
    version: pkg.version,
    description: pkg.description ?? '',
    releaseDate,
    root,
  };
}
