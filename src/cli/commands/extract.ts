/**
 * CLI command that extracts settings from trees parsed ahead of time.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { JsonTreeSource } from '../../core/parser/json-source.js';
import { runScan } from '../../core/scan/driver.js';
import { serializeRecords, writeRecords } from '../../core/scan/output.js';
import { logger } from '../../utils/logger.js';
import { parseFormatOption } from './options.js';

interface ExtractCommandOptions {
  root?: string;
  config?: string;
  out?: string;
  format?: string;
  settingType?: string;
  propertyAnchor?: string;
}

/**
 * Create the extract command.
 *
 * Usage: setting-extractor extract <trees...>
 */
export function createExtractCommand(): Command {
  return new Command('extract')
    .description('Extract settings from syntax tree JSON files')
    .argument('<trees...>', 'Tree files (native or UAST JSON)')
    .option('--root <dir>', 'Directory recorded paths are relative to', '.')
    .option('-c, --config <path>', 'Config file (default: setting-extractor.yaml)')
    .option('-o, --out <path>', 'Write records to a file instead of stdout')
    .option('--format <format>', 'Output format (json, yaml)')
    .option('--setting-type <name>', 'Base type of setting fields')
    .option('--property-anchor <name>', 'Qualifier of property flag constants')
    .action(async (trees: string[], options: ExtractCommandOptions) => {
      let failed: boolean;
      try {
        failed = await runExtract(trees, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
      if (failed) {
        process.exit(1);
      }
    });
}

async function runExtract(trees: string[], options: ExtractCommandOptions): Promise<boolean> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const format = parseFormatOption(options.format) ?? config.output.format;

  const result = await runScan({
    root: path.resolve(projectRoot, options.root ?? '.'),
    source: new JsonTreeSource(),
    files: trees.map((tree) => path.resolve(projectRoot, tree)),
    match: {
      settingTypeName: options.settingType ?? config.match.setting_type,
      propertyAnchorName: options.propertyAnchor ?? config.match.property_anchor,
    },
  });

  if (options.out) {
    await writeRecords(path.resolve(projectRoot, options.out), result.records, format);
    logger.success(`Wrote ${result.records.length} setting(s) to ${options.out}`);
  } else {
    process.stdout.write(serializeRecords(result.records, format));
  }

  return result.failures.length > 0;
}
