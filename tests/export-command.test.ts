import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { USAGE } from '../src/cli-args.js';
import type { CredentialPrompter } from '../src/auth/types.js';
import { runExportCommand, type CommandRuntime } from '../src/export-command.js';
import { createMemoryLogger } from '../src/utils/logger.js';
import { recordingSleep } from './helpers/fake-fetch.js';
import { createFakeInstapaper, type FakeInstapaperOptions } from './helpers/fake-instapaper.js';
import { listPage } from './helpers/html.js';
import { createWorkspace, type Workspace } from './helpers/workspace.js';

const PAGES = {
  1: listPage([{ id: '100', title: 'First', url: 'https://example.com/first', preview: 'Opening lines' }]),
  2: listPage([{ id: '101', title: 'Second, part two', url: 'https://example.com/second' }]),
};

const LISTS = {
  liked: { 1: listPage([{ id: '200', title: 'Liked one', url: 'https://example.com/liked' }]) },
  archive: { 1: listPage([{ id: '300', title: 'Archived one', url: 'https://example.com/archived' }]) },
};

const FOLDERS_YAML = 'folders:\n  - key: work\n    id: "555"\n    slug: work-stuff\n';

function answering(answer: string): CredentialPrompter & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    ask: async (question) => {
      questions.push(question);
      return answer;
    },
  };
}

const argv = (...args: string[]) => ['node', 'instapaper-export', ...args];

describe('runExportCommand', () => {
  let workspace: Workspace;
  let dir: string;

  beforeEach(async () => {
    workspace = await createWorkspace('export-command');
    dir = workspace.dir;
    vi.stubEnv('INSTAPAPER_USERNAME', 'reader');
    vi.stubEnv('INSTAPAPER_PASSWORD', 'test-secret');
    vi.stubEnv('MAX_RETRIES', '');
    vi.stubEnv('BACKOFF_FACTOR', '');
    vi.stubEnv('ENABLE_FOLDER_MODE', '');
    vi.stubEnv('FOLDER_ID_AND_SLUG', '');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await workspace.remove();
  });

  function runtime(extra: Partial<CommandRuntime> = {}, site: Partial<FakeInstapaperOptions> = {}) {
    const logger = createMemoryLogger();
    const printed: string[] = [];
    const fake = createFakeInstapaper({ username: 'reader', password: 'test-secret', pages: PAGES, ...site });
    const options: CommandRuntime = {
      paths: workspace.paths,
      logger,
      fetch: fake.fetch,
      sleep: recordingSleep().sleep,
      prompter: null,
      interactive: false,
      print: (text) => printed.push(text),
      ...extra,
    };
    return { options, logger, printed, fake };
  }

  it('exports CSV to the default location', async () => {
    const { options } = runtime();

    expect(await runExportCommand(argv(), options)).toBe(0);

    expect(await readFile(path.join(dir, 'output', 'bookmarks.csv'), 'utf-8')).toBe(
      'id,title,url\r\n100,First,https://example.com/first\r\n101,"Second, part two",https://example.com/second\r\n'
    );
  });

  it('stores the session under the user config directory', async () => {
    const { options } = runtime();

    await runExportCommand(argv(), options);

    const configDir = path.join(dir, 'home', '.config', 'instapaper-export');
    expect((await readFile(path.join(configDir, '.session_key'))).length).toBe(32);
    expect((await readFile(path.join(configDir, '.instapaper_session'))).subarray(0, 4).toString()).toBe('IPS1');
  });

  it('exports JSON with the reader URL to a chosen file', async () => {
    const { options } = runtime();

    expect(await runExportCommand(argv('--format', 'json', '-o', 'mine.json', '--read-url'), options)).toBe(0);

    expect(JSON.parse(await readFile(path.join(dir, 'mine.json'), 'utf-8'))).toEqual([
      {
        id: '100',
        title: 'First',
        url: 'https://example.com/first',
        readUrl: 'https://www.instapaper.com/read/100',
      },
      {
        id: '101',
        title: 'Second, part two',
        url: 'https://example.com/second',
        readUrl: 'https://www.instapaper.com/read/101',
      },
    ]);
  });

  it('reads field options from the config file in the working directory', async () => {
    await writeFile(path.join(dir, 'config.yaml'), 'fields:\n  article_preview: true\n');
    const { options } = runtime();

    expect(await runExportCommand(argv(), options)).toBe(0);

    const csv = await readFile(path.join(dir, 'output', 'bookmarks.csv'), 'utf-8');
    expect(csv.split('\r\n').slice(0, 2)).toEqual([
      'id,title,url,article_preview',
      '100,First,https://example.com/first,Opening lines',
    ]);
  });

  it('lets a flag turn off a field the config file enables', async () => {
    const configDir = path.join(dir, 'home', '.config', 'instapaper-export');
    await mkdir(configDir, { recursive: true });
    await writeFile(path.join(configDir, 'config.yaml'), 'fields:\n  article_preview: true\n');
    const { options } = runtime();

    await runExportCommand(argv('--no-add-article-preview'), options);

    const csv = await readFile(path.join(dir, 'output', 'bookmarks.csv'), 'utf-8');
    expect(csv.split('\r\n')[0]).toBe('id,title,url');
  });

  it('prints the version', async () => {
    const { options, printed } = runtime();

    expect(await runExportCommand(argv('--version'), options)).toBe(0);

    expect(printed).toEqual(['0.1.0']);
  });

  it('prints usage', async () => {
    const { options, printed } = runtime();

    expect(await runExportCommand(argv('-h'), options)).toBe(0);

    expect(printed).toEqual([USAGE]);
  });

  it('exits with the configuration code and a next step on a bad flag', async () => {
    const { options, logger } = runtime();

    expect(await runExportCommand(argv('--bogus'), options)).toBe(1);

    expect(logger.lines).toEqual([
      { level: 'error', tag: null, message: 'Unknown option "--bogus"' },
      { level: 'info', tag: null, message: 'Next steps: Run with --help to list the options.' },
    ]);
  });

  it('exits with the credential code when nothing can authenticate', async () => {
    vi.stubEnv('INSTAPAPER_USERNAME', '');
    vi.stubEnv('INSTAPAPER_PASSWORD', '');
    const { options } = runtime();

    expect(await runExportCommand(argv(), options)).toBe(2);
  });

  it('exits with the authentication code on rejected credentials', async () => {
    vi.stubEnv('INSTAPAPER_PASSWORD', 'wrong');
    const { options } = runtime();

    expect(await runExportCommand(argv(), options)).toBe(3);
  });

  it('fails when an explicit config file is missing', async () => {
    const { options } = runtime();

    expect(await runExportCommand(argv('--config', 'absent.yaml'), options)).toBe(1);
  });

  it('asks which list to export when folders are configured', async () => {
    await writeFile(path.join(dir, 'config.yaml'), FOLDERS_YAML);
    const prompter = answering('1');
    const { options, logger } = runtime({ prompter }, { lists: LISTS });

    expect(await runExportCommand(argv('--format', 'json'), options)).toBe(0);

    expect(prompter.questions).toEqual([
      [
        'Select a bookmark list to export:',
        '  1. Liked',
        '  2. Archive',
        '  3. work (555/work-stuff)',
        'Number (blank for home): ',
      ].join('\n'),
    ]);
    expect(logger.lines).toContainEqual({ level: 'info', tag: null, message: 'Exporting liked.' });
    expect(JSON.parse(await readFile(path.join(dir, 'output', 'bookmarks.json'), 'utf-8'))).toEqual([
      { id: '200', title: 'Liked one', url: 'https://example.com/liked' },
    ]);
  });

  it('exits with the configuration code on an invalid selection', async () => {
    await writeFile(path.join(dir, 'config.yaml'), FOLDERS_YAML);
    const { options, logger } = runtime({ prompter: answering('9') }, { lists: LISTS });

    expect(await runExportCommand(argv(), options)).toBe(1);

    expect(logger.lines.filter((line) => line.level !== 'debug')).toEqual([
      { level: 'error', tag: null, message: 'Invalid selection "9"' },
      { level: 'info', tag: null, message: 'Next steps: Enter a number from 1 to 3, or pass --folder.' },
    ]);
  });

  it('does not ask when a list is chosen on the command line', async () => {
    await writeFile(path.join(dir, 'config.yaml'), `${FOLDERS_YAML}archive_output_filename: my-archive.json\n`);
    const prompter = answering('1');
    const { options } = runtime({ prompter }, { lists: LISTS });

    expect(await runExportCommand(argv('--folder', 'archive', '--format', 'json'), options)).toBe(0);

    expect(prompter.questions).toEqual([]);
    expect(JSON.parse(await readFile(path.join(dir, 'my-archive.json'), 'utf-8'))).toEqual([
      { id: '300', title: 'Archived one', url: 'https://example.com/archived' },
    ]);
  });

  it('writes the liked list to its configured file unless -o is given', async () => {
    await writeFile(path.join(dir, 'config.yaml'), 'liked_output_filename: liked.csv\n');
    const { options } = runtime({}, { lists: LISTS });

    expect(await runExportCommand(argv('--folder', 'liked'), options)).toBe(0);
    expect(await runExportCommand(argv('--folder', 'liked', '-o', 'other.csv'), options)).toBe(0);

    const expected = 'id,title,url\r\n200,Liked one,https://example.com/liked\r\n';
    expect(await readFile(path.join(dir, 'liked.csv'), 'utf-8')).toBe(expected);
    expect(await readFile(path.join(dir, 'other.csv'), 'utf-8')).toBe(expected);
  });
});
