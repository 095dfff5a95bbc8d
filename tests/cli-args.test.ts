import { describe, expect, it } from 'vitest';

import { parseCliArgs } from '../src/cli-args.js';
import { ConfigError } from '../src/errors.js';

const argv = (...args: string[]) => ['node', 'instapaper-export', ...args];

describe('parseCliArgs', () => {
  it('has defaults for every option', () => {
    expect(parseCliArgs(argv())).toEqual({ format: 'csv', verbose: false, version: false, help: false });
  });

  it('reads values given as separate or inline arguments', () => {
    expect(
      parseCliArgs(argv('--format', 'JSON', '-o', 'out.json', '--folder=archive', '--max-pages', '3', '--config', 'c.yaml'))
    ).toMatchObject({ format: 'json', output: 'out.json', folder: 'archive', maxPages: 3, config: 'c.yaml' });
  });

  it('reads session file locations', () => {
    expect(parseCliArgs(argv('--session-file', 's.bin', '--key-file', 'k.bin'))).toMatchObject({
      sessionFile: 's.bin',
      keyFile: 'k.bin',
    });
  });

  it('reads field toggles and their aliases, last one winning', () => {
    expect(parseCliArgs(argv('--read-url', '--no-article-preview'))).toMatchObject({
      readUrl: true,
      articlePreview: false,
    });
    expect(parseCliArgs(argv('--add-instapaper-url', '--add-article-preview', '--no-add-instapaper-url'))).toMatchObject({
      readUrl: false,
      articlePreview: true,
    });
  });

  it('leaves toggles undefined when not given', () => {
    const options = parseCliArgs(argv('--verbose'));
    expect(options.readUrl).toBeUndefined();
    expect(options.articlePreview).toBeUndefined();
    expect(options.verbose).toBe(true);
  });

  it('recognises version and help flags', () => {
    expect(parseCliArgs(argv('-v')).version).toBe(true);
    expect(parseCliArgs(argv('--help')).help).toBe(true);
  });

  it('rejects invalid input', () => {
    expect(() => parseCliArgs(argv('--format', 'xml'))).toThrow('Unsupported format "xml"');
    expect(() => parseCliArgs(argv('--max-pages', '0'))).toThrow('--max-pages must be a positive integer (got "0")');
    expect(() => parseCliArgs(argv('--max-pages', 'two'))).toThrow(ConfigError);
    expect(() => parseCliArgs(argv('--output'))).toThrow('--output requires a value');
    expect(() => parseCliArgs(argv('--bogus'))).toThrow('Unknown option "--bogus"');
  });

  it('rejects names inherited from Object.prototype', () => {
    expect(() => parseCliArgs(argv('constructor'))).toThrow('Unknown option "constructor"');
    expect(() => parseCliArgs(argv('toString'))).toThrow(ConfigError);
  });

  it('accepts sqlite as a format', () => {
    expect(parseCliArgs(argv('--format', 'SQLite')).format).toBe('sqlite');
  });
});
