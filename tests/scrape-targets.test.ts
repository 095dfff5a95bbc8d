import { describe, expect, it } from 'vitest';

import { ConfigError } from '../src/errors.js';
import type { CredentialPrompter } from '../src/auth/types.js';
import { describeTarget, getPageUrl, parseTargetArg, promptForTarget, resolveTarget } from '../src/scrape-targets.js';

const BASE = 'https://www.instapaper.com';

describe('getPageUrl', () => {
  it('builds home pages', () => {
    expect(getPageUrl(BASE, { kind: 'home' }, 1)).toBe(`${BASE}/u/1`);
    expect(getPageUrl(BASE, { kind: 'home' }, 4)).toBe(`${BASE}/u/4`);
  });

  it('omits the page number on the first archive and liked pages', () => {
    expect(getPageUrl(BASE, { kind: 'archive' }, 1)).toBe(`${BASE}/archive`);
    expect(getPageUrl(BASE, { kind: 'liked' }, 3)).toBe(`${BASE}/liked/3`);
  });

  it('builds folder pages', () => {
    expect(getPageUrl(BASE, { kind: 'folder', idAndSlug: '123/reading' }, 1)).toBe(`${BASE}/u/folder/123/reading/1`);
  });
});

describe('resolveTarget', () => {
  it('defaults to home', () => {
    expect(resolveTarget({ folderModeEnabled: false })).toEqual({ kind: 'home' });
  });

  it('uses the folder when folder mode has an id', () => {
    expect(resolveTarget({ folderModeEnabled: true, folderIdAndSlug: '/123/reading/' })).toEqual({
      kind: 'folder',
      idAndSlug: '123/reading',
    });
  });

  it('ignores a folder id while folder mode is off', () => {
    expect(resolveTarget({ folderModeEnabled: false, folderIdAndSlug: '123/reading' })).toEqual({ kind: 'home' });
  });

  it('falls back to home when folder mode has no id', () => {
    expect(resolveTarget({ folderModeEnabled: true, folderIdAndSlug: '  ' })).toEqual({ kind: 'home' });
  });

  it('lets an explicit target win', () => {
    expect(resolveTarget({ target: { kind: 'liked' }, folderModeEnabled: true, folderIdAndSlug: '1/x' })).toEqual({
      kind: 'liked',
    });
  });
});

describe('parseTargetArg', () => {
  const folders = [{ key: 'work', id: '555', slug: 'work-stuff' }];

  it('accepts built-in lists', () => {
    expect(parseTargetArg('Archive')).toEqual({ kind: 'archive' });
    expect(parseTargetArg('unread')).toEqual({ kind: 'home' });
  });

  it('resolves configured folder keys', () => {
    expect(parseTargetArg('work', folders)).toEqual({ kind: 'folder', idAndSlug: '555/work-stuff' });
  });

  it('accepts raw id/slug values', () => {
    expect(parseTargetArg('42/misc')).toEqual({ kind: 'folder', idAndSlug: '42/misc' });
  });

  it('rejects unknown names', () => {
    expect(() => parseTargetArg('nope', folders)).toThrow(ConfigError);
    expect(() => parseTargetArg('  ')).toThrow('--folder requires a value');
  });

  it('treats Object.prototype names as folder keys, not built-ins', () => {
    const target = parseTargetArg('constructor', [{ key: 'constructor', id: '1', slug: 's' }]);

    expect(target).toEqual({ kind: 'folder', idAndSlug: '1/s' });
    expect(getPageUrl('https://www.instapaper.com', target, 2)).toBe('https://www.instapaper.com/u/folder/1/s/2');
    expect(() => parseTargetArg('constructor')).toThrow('Unknown folder "constructor"');
  });
});

describe('describeTarget', () => {
  it('names the target', () => {
    expect(describeTarget({ kind: 'folder', idAndSlug: '1/x' })).toBe('folder 1/x');
    expect(describeTarget({ kind: 'home' })).toBe('home');
  });
});

describe('promptForTarget', () => {
  const folders = [{ key: 'work', id: '555', slug: 'work-stuff' }];
  const answer = (text: string): CredentialPrompter => ({ ask: async () => text });

  it('maps numbers to liked, archive and then each folder', async () => {
    await expect(promptForTarget(folders, answer('1'))).resolves.toEqual({ kind: 'liked' });
    await expect(promptForTarget(folders, answer('2'))).resolves.toEqual({ kind: 'archive' });
    await expect(promptForTarget(folders, answer(' 3 '))).resolves.toEqual({ kind: 'folder', idAndSlug: '555/work-stuff' });
  });

  it('keeps the home list on a blank answer', async () => {
    await expect(promptForTarget(folders, answer(''))).resolves.toEqual({ kind: 'home' });
  });

  it('rejects numbers outside the menu and other text', async () => {
    for (const text of ['0', '4', 'work', '1.5']) {
      const error = await promptForTarget(folders, answer(text)).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ message: `Invalid selection "${text}"` });
    }
  });
});
