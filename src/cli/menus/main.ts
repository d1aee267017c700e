import type { CliContext } from '../cli-shared.js';
import { diagnosticsMenu } from './diagnostics.js';
import { gitMenu } from './git.js';
import { MENU_TITLE, PRODUCT_NAME, showAbout, showChangelog, showVersion } from './info.js';
import { logMenu } from './logs.js';
import { runMenu, type Menu } from './menu.js';
import { pluginMenu } from './plugin.js';
import { policyMenu } from './policy.js';
import { serverMenu } from './server.js';

export const SUB_MENUS: ReadonlyArray<{ key: string; menu: Menu; label: string }> = [
  { key: '1', menu: gitMenu, label: 'Git Policy Management' },
  { key: '2', menu: policyMenu, label: 'Policy Management' },
  { key: '3', menu: serverMenu, label: 'Server Management' },
  { key: '4', menu: pluginMenu, label: 'Plugin Host Management' },
  { key: '5', menu: logMenu, label: 'Log Management & Search' },
  { key: '6', menu: diagnosticsMenu, label: 'Diagnostics & Troubleshooting' },
];

export function buildMainMenu(version: string): Menu {
  return {
    title: `${PRODUCT_NAME} - ${MENU_TITLE} v${version}`,
    exit: { key: 'q', label: 'Exit' },
    items: [
      ...SUB_MENUS.map(({ key, menu, label }) => ({
        key,
        label,
        run: (ctx: CliContext) => runMenu(ctx, menu),
        pause: false,
      })),
      { key: 'v', label: 'Version Information', run: (ctx) => showVersion(ctx) },
      { key: 'c', label: 'View Changelog', run: (ctx) => showChangelog(ctx) },
      { key: 'a', label: 'About This Menu', run: (ctx) => showAbout(ctx) },
    ],
  };
}
