/**
 * CLI command for a full extraction run: discover files, parse each through
 * the parse service, extract settings, write the result file.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadConfig, applyOverrides } from '../../core/config/loader.js';
import { ParseServiceClient } from '../../core/parser/service-client.js';
import { runScan, type ScanResult } from '../../core/scan/driver.js';
import { writeRecords } from '../../core/scan/output.js';
import { logger } from '../../utils/logger.js';
import { parseFormatOption } from './options.js';

interface ScanCommandOptions {
  config?: string;
  endpoint?: string;
  ext?: string;
  out?: string;
  format?: string;
  settingType?: string;
  propertyAnchor?: string;
  failFast?: boolean;
  json?: boolean;
}

interface ScanSummary {
  output: string;
  filesScanned: number;
  records: number;
  diagnostics: ScanResult['diagnostics'];
  failures: ScanResult['failures'];
}

/**
 * Create the scan command.
 */
export function createScanCommand(): Command {
  return new Command('scan')
    .description('Extract setting declarations from a Java source tree')
    .argument('[root]', 'Directory to scan (default: scan.root from config)')
    .option('-c, --config <path>', 'Config file (default: setting-extractor.yaml)')
    .option('--endpoint <url>', 'Parse service base URL')
    .option('--ext <extension>', 'Extension of files to scan, e.g. .java')
    .option('-o, --out <path>', 'Output file')
    .option('--format <format>', 'Output format (json, yaml)')
    .option('--setting-type <name>', 'Base type of setting fields')
    .option('--property-anchor <name>', 'Qualifier of property flag constants')
    .option('--fail-fast', 'Stop at the first file that cannot be parsed')
    .option('--json', 'Print the run summary as JSON')
    .action(async (root: string | undefined, options: ScanCommandOptions) => {
      let summary: ScanSummary;
      try {
        summary = await runScanCommand(root, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        printSummary(summary);
      }

      if (summary.failures.length > 0) {
        process.exit(1);
      }
    });
}

async function runScanCommand(
  root: string | undefined,
  options: ScanCommandOptions
): Promise<ScanSummary> {
  const projectRoot = process.cwd();
  const loaded = await loadConfig(projectRoot, options.config);
  const config = applyOverrides(loaded, {
    service: { endpoint: options.endpoint },
    scan: {
      root,
      extension: options.ext,
      on_parse_error: options.failFast ? 'abort' : undefined,
    },
    output: { path: options.out, format: parseFormatOption(options.format) },
    match: {
      setting_type: options.settingType,
      property_anchor: options.propertyAnchor,
    },
  });

  const source = new ParseServiceClient({
    endpoint: config.service.endpoint,
    timeoutMs: config.service.timeout_ms,
    retries: config.service.retries,
    retryDelayMs: config.service.retry_delay_ms,
  });

  const result = await runScan({
    root: path.resolve(projectRoot, config.scan.root),
    source,
    extension: config.scan.extension,
    exclude: config.scan.exclude,
    onParseError: config.scan.on_parse_error,
    match: {
      settingTypeName: config.match.setting_type,
      propertyAnchorName: config.match.property_anchor,
    },
  });

  const outputPath = path.resolve(projectRoot, config.output.path);
  await writeRecords(outputPath, result.records, config.output.format);

  return {
    output: outputPath,
    filesScanned: result.filesScanned,
    records: result.records.length,
    diagnostics: result.diagnostics,
    failures: result.failures,
  };
}

function printSummary(summary: ScanSummary): void {
  console.log();
  console.log(chalk.bold(`Settings: ${summary.records}`) + chalk.dim(` from ${summary.filesScanned} file(s)`));
  console.log(chalk.dim(`Written to ${summary.output}`));

  if (summary.diagnostics.length > 0) {
    console.log();
    console.log(chalk.yellow(`Skipped declarations (${summary.diagnostics.length})`));
    for (const diagnostic of summary.diagnostics) {
      console.log(`  ${chalk.cyan(`${diagnostic.sourceFile}:${diagnostic.sourceLine}`)} ${diagnostic.message}`);
    }
  }

  if (summary.failures.length > 0) {
    console.log();
    console.log(chalk.red(`Files not parsed (${summary.failures.length})`));
    for (const failure of summary.failures) {
      console.log(`  ${chalk.cyan(failure.file)} ${chalk.dim(`[${failure.code}]`)} ${failure.message}`);
    }
  }
  console.log();
}
