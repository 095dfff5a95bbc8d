#!/usr/bin/env node
/**
 * Instapaper Export CLI
 *
 * Usage: instapaper-export [--format csv|json|sqlite] [-o file] [--folder name] ...
 * Run with --help for every option.
 */

import { loadEnvFile } from './env.js';
import { runExportCommand } from './export-command.js';

loadEnvFile();

runExportCommand(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', error);
    process.exitCode = 1;
  });
