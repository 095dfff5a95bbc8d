/**
 * Scrape Targets
 *
 * Which bookmark list to paginate, and how its page URLs are built.
 */

import type { CredentialPrompter } from './auth/types.js';
import { ConfigError } from './errors.js';
import type { ExportConfig, FolderEntry, ScrapeTarget } from './types.js';

const BUILT_IN_TARGETS = new Map<string, ScrapeTarget>([
  ['home', { kind: 'home' }],
  ['unread', { kind: 'home' }],
  ['archive', { kind: 'archive' }],
  ['liked', { kind: 'liked' }],
]);

/**
 * URL of one page of a target.
 * - home:    /u/<n>
 * - archive: /archive, /archive/<n>
 * - liked:   /liked, /liked/<n>
 * - folder:  /u/folder/<id>/<slug>/<n>
 */
export function getPageUrl(baseUrl: string, target: ScrapeTarget, page: number): string {
  switch (target.kind) {
    case 'home':
      return `${baseUrl}/u/${page}`;
    case 'archive':
    case 'liked':
      return page === 1 ? `${baseUrl}/${target.kind}` : `${baseUrl}/${target.kind}/${page}`;
    case 'folder':
      return `${baseUrl}/u/folder/${target.idAndSlug}/${page}`;
  }
}

/**
 * Target from the folder-mode settings (ENABLE_FOLDER_MODE / FOLDER_ID_AND_SLUG).
 * An explicit target wins; folder mode without an id falls back to home.
 */
export function resolveTarget(config: Pick<ExportConfig, 'target' | 'folderModeEnabled' | 'folderIdAndSlug'>): ScrapeTarget {
  if (config.target) return config.target;
  const idAndSlug = config.folderIdAndSlug?.trim();
  if (config.folderModeEnabled && idAndSlug) {
    return { kind: 'folder', idAndSlug: trimSlashes(idAndSlug) };
  }
  return { kind: 'home' };
}

/**
 * Parse a --folder value: a built-in name, a configured folder key,
 * or a raw "id/slug" string.
 */
export function parseTargetArg(value: string, folders: readonly FolderEntry[] = []): ScrapeTarget {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigError('--folder requires a value', { hint: 'Use home, archive, liked, or <id>/<slug>.' });
  }

  const builtIn = BUILT_IN_TARGETS.get(trimmed.toLowerCase());
  if (builtIn) return builtIn;

  const configured = folders.find((folder) => folder.key === trimmed);
  if (configured) {
    return { kind: 'folder', idAndSlug: `${configured.id}/${configured.slug}` };
  }

  if (trimmed.includes('/')) {
    return { kind: 'folder', idAndSlug: trimSlashes(trimmed) };
  }

  const known = folders.map((folder) => folder.key);
  throw new ConfigError(`Unknown folder "${trimmed}"`, {
    hint: `Use home, archive, liked, <id>/<slug>${known.length > 0 ? `, or one of: ${known.join(', ')}` : ''}.`,
  });
}

interface TargetChoice {
  label: string;
  target: ScrapeTarget;
}

/**
 * Ask which list to export: 1 = liked, 2 = archive, then each configured
 * folder in order. A blank answer keeps the home list.
 */
export async function promptForTarget(
  folders: readonly FolderEntry[],
  prompter: CredentialPrompter
): Promise<ScrapeTarget> {
  const choices: TargetChoice[] = [
    { label: 'Liked', target: { kind: 'liked' } },
    { label: 'Archive', target: { kind: 'archive' } },
    ...folders.map(
      (folder): TargetChoice => ({
        label: `${folder.key} (${folder.id}/${folder.slug})`,
        target: { kind: 'folder', idAndSlug: `${folder.id}/${folder.slug}` },
      })
    ),
  ];

  const menu = [
    'Select a bookmark list to export:',
    ...choices.map((choice, index) => `  ${index + 1}. ${choice.label}`),
    'Number (blank for home): ',
  ].join('\n');

  const answer = (await prompter.ask(menu)).trim();
  if (answer === '') return { kind: 'home' };

  const choice = /^\d+$/.test(answer) ? choices[Number(answer) - 1] : undefined;
  if (!choice) {
    throw new ConfigError(`Invalid selection "${answer}"`, {
      hint: `Enter a number from 1 to ${choices.length}, or pass --folder.`,
    });
  }
  return choice.target;
}

export function describeTarget(target: ScrapeTarget): string {
  return target.kind === 'folder' ? `folder ${target.idAndSlug}` : target.kind;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}
