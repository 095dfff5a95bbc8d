/**
 * Export Command
 *
 * Flags, config file and environment in; an output file and an exit code out.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { resolvePrompter } from './auth/prompt.js';
import type { CredentialPrompter } from './auth/types.js';
import { parseCliArgs, USAGE } from './cli-args.js';
import { buildExportConfig, EMPTY_CONFIG_FILE, loadConfigFile, outputFileForTarget } from './config.js';
import { env } from './env.js';
import { describeError, getExitCode, isExportError } from './errors.js';
import type { FetchLike } from './http/transport.js';
import { saveArticles } from './output.js';
import {
  defaultPathContext,
  getDefaultOutputFile,
  PACKAGE_JSON_FILE,
  resolveConfigFile,
  resolveSessionFiles,
  type PathContext,
} from './paths.js';
import { runExport } from './pipeline-runner.js';
import { describeTarget, promptForTarget, resolveTarget } from './scrape-targets.js';
import { createConsoleLogger, type Logger } from './utils/logger.js';
import type { Sleep } from './utils/retry.js';

export interface CommandRuntime {
  paths?: PathContext;
  logger?: Logger;
  fetch?: FetchLike;
  sleep?: Sleep;
  prompter?: CredentialPrompter | null;
  interactive?: boolean;
  /** Where help and version text go */
  print?: (text: string) => void;
}

export async function readPackageVersion(file = PACKAGE_JSON_FILE): Promise<string> {
  const pkg: unknown = JSON.parse(await readFile(file, 'utf-8'));
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

/**
 * Run the export command and return the process exit code
 */
export async function runExportCommand(argv: string[], runtime: CommandRuntime = {}): Promise<number> {
  const print = runtime.print ?? ((text: string) => console.log(text));
  let log: Logger = runtime.logger ?? createConsoleLogger({ verbose: env.DEBUG });

  try {
    const options = parseCliArgs(argv);
    if (!runtime.logger && options.verbose) {
      log = createConsoleLogger({ verbose: true });
    }

    if (options.help) {
      print(USAGE);
      return 0;
    }
    if (options.version) {
      print(await readPackageVersion());
      return 0;
    }

    const ctx = runtime.paths ?? defaultPathContext();
    const configFile = resolveConfigFile(options.config, ctx);
    const file = configFile
      ? await loadConfigFile(configFile, { required: options.config !== undefined })
      : EMPTY_CONFIG_FILE;
    if (configFile) {
      log.debug(`Using config file ${configFile}.`);
    }

    const exportConfig = buildExportConfig({
      cli: options,
      env,
      file,
      sessionFiles: resolveSessionFiles({ sessionFile: options.sessionFile, keyFile: options.keyFile }, ctx),
      interactive: runtime.interactive ?? Boolean(process.stdin.isTTY),
    });

    const prompter = resolvePrompter(runtime.prompter, exportConfig.interactive);
    let target = resolveTarget(exportConfig);
    // With folders configured and no target chosen, ask which list to export
    if (!exportConfig.target && target.kind === 'home' && file.folders.length > 0 && prompter) {
      target = await promptForTarget(file.folders, prompter);
      log.info(`Exporting ${describeTarget(target)}.`);
    }

    const records = await runExport(
      { ...exportConfig, target },
      { fetch: runtime.fetch, sleep: runtime.sleep, prompter, logger: log }
    );

    const outputFile = options.output ?? outputFileForTarget(target, file);
    const output = outputFile ? path.resolve(ctx.cwd, outputFile) : getDefaultOutputFile(options.format, ctx);
    await saveArticles(records, options.format, output, exportConfig.fields, log.child('Output'));
    return 0;
  } catch (e) {
    log.error(describeError(e));
    if (isExportError(e) && e.hint) {
      log.info(`Next steps: ${e.hint}`);
    }
    return getExitCode(e);
  }
}
