import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createScanCommand } from './commands/scan.js';
import { createExtractCommand } from './commands/extract.js';
import { createQueryCommand } from './commands/query.js';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
const VERSION =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    ? String(packageJson.version)
    : '0.0.0';

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('setting-extractor')
    .description('Extract configuration setting declarations from Java syntax trees')
    .version(VERSION)
    .option('--verbose', 'Show debug logging')
    .option('--quiet', 'Only log errors')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      if (options.verbose) logger.setLevel('debug');
      else if (options.quiet) logger.setLevel('error');
    });

  [createScanCommand, createExtractCommand, createQueryCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
