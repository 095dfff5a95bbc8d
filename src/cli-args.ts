/**
 * Command-line flags for the export command
 */

import { ConfigError } from './errors.js';
import type { OutputFormat } from './types.js';

export interface CliOptions {
  format: OutputFormat;
  output?: string;
  /** Built-in list name, configured folder key, or "<id>/<slug>" */
  folder?: string;
  maxPages?: number;
  config?: string;
  sessionFile?: string;
  keyFile?: string;
  /** undefined means "not given on the command line" */
  readUrl?: boolean;
  articlePreview?: boolean;
  verbose: boolean;
  version: boolean;
  help: boolean;
}

const FORMATS: readonly OutputFormat[] = ['csv', 'json', 'sqlite'];

// The add-* spellings are kept as aliases
const TOGGLES = new Map<string, { key: 'readUrl' | 'articlePreview'; value: boolean }>([
  ['--read-url', { key: 'readUrl', value: true }],
  ['--no-read-url', { key: 'readUrl', value: false }],
  ['--add-instapaper-url', { key: 'readUrl', value: true }],
  ['--no-add-instapaper-url', { key: 'readUrl', value: false }],
  ['--article-preview', { key: 'articlePreview', value: true }],
  ['--no-article-preview', { key: 'articlePreview', value: false }],
  ['--add-article-preview', { key: 'articlePreview', value: true }],
  ['--no-add-article-preview', { key: 'articlePreview', value: false }],
]);

export const USAGE = `Usage: instapaper-export [options]

Options:
  --format <csv|json|sqlite> Output format (default: csv)
  -o, --output <file>        Output file (default: output/bookmarks.<csv|json|db>)
  --folder <name>            home, archive, liked, a configured folder key, or <id>/<slug>
  --max-pages <n>            Stop after n pages
  --config <file>            YAML config file
  --session-file <file>      Encrypted session file
  --key-file <file>          Session encryption key
  --[no-]read-url            Include the instapaper.com reader URL
  --[no-]article-preview     Include the article preview text
  --verbose                  Debug logging
  -v, --version              Print the version
  -h, --help                 Show this help`;

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { format: 'csv', verbose: false, version: false, help: false };

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i] ?? '';
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new ConfigError(`${arg} requires a value`);
      }
      i += 1;
      return value;
    };

    const toggle = TOGGLES.get(arg);
    if (toggle) {
      options[toggle.key] = toggle.value;
      continue;
    }

    switch (arg) {
      case '--format': {
        const value = takeValue().toLowerCase();
        if (!isOutputFormat(value)) {
          throw new ConfigError(`Unsupported format "${value}"`, { hint: 'Use --format csv, json or sqlite.' });
        }
        options.format = value;
        break;
      }
      case '-o':
      case '--output':
        options.output = takeValue();
        break;
      case '--folder':
        options.folder = takeValue();
        break;
      case '--max-pages': {
        const value = takeValue();
        const pages = Number(value);
        if (!/^\d+$/.test(value) || pages < 1) {
          throw new ConfigError(`--max-pages must be a positive integer (got "${value}")`);
        }
        options.maxPages = pages;
        break;
      }
      case '--config':
        options.config = takeValue();
        break;
      case '--session-file':
        options.sessionFile = takeValue();
        break;
      case '--key-file':
        options.keyFile = takeValue();
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option "${raw}"`, { hint: 'Run with --help to list the options.' });
    }
  }

  return options;
}
