/**
 * Command-line entry point.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand } from './commands/check.js';
import { createRulesCommand } from './commands/rules.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = readVersion(resolve(__dirname, '../../package.json'));

function readVersion(packageJsonPath: string): string {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('propcheck')
    .description('Declarative validation of Java-properties configuration files')
    .version(VERSION);
  [createCheckCommand, createRulesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
