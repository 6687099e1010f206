/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createPromoteCommand } from './commands/promote.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. `promote` runs when no command is named. */
export function createCli(): Command {
  const program = new Command()
    .name('promote-branch')
    .description('Merge a development branch into main and push it, restoring the starting branch on failure')
    .version(VERSION);
  program.addCommand(createPromoteCommand(), { isDefault: true });
  return program;
}
