/**
 * Validate properties files against the rule catalogue.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { ValidationEngine } from '../../core/validation/engine.js';
import { getExitCode } from '../../core/validation/validator.js';
import { logger } from '../../utils/logger.js';
import {
  createFormatter,
  normalizeProfiles,
  parseOutputFormat,
  resolveCatalogue,
  resolveFilePatterns,
} from './check-helpers.js';

export interface CheckOptions {
  config?: string;
  rules?: string;
  profile?: string[];
  allProfiles?: boolean;
  format?: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  concurrency?: string;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate properties files against the rule catalogue')
    .argument('[files...]', 'Properties files or glob patterns (default: properties.paths from config)')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --rules <path>', 'Path to a rule catalogue (YAML)')
    .option('-p, --profile <names...>', "Profiles to validate under ('base' for the unprefixed profile)")
    .option('-a, --all-profiles', 'Also validate every profile found in each file')
    .option('-f, --format <format>', 'Output format: human, json, compact')
    .option('--json', 'Shorthand for --format json')
    .option('--concurrency <n>', 'Number of files validated in parallel')
    .option('-q, --quiet', 'Only print the report')
    .option('-v, --verbose', 'Show passing reports, skipped rules and debug logs')
    .action(async (files: string[], options: CheckOptions) => {
      try {
        const exitCode = await runCheck(files, options);
        process.exit(exitCode);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Run a check and print the report. Resolves to the process exit code.
 */
export async function runCheck(
  filePatterns: string[],
  options: CheckOptions,
  projectRoot: string = process.cwd()
): Promise<number> {
  if (options.quiet) {
    logger.setLevel('error');
  } else if (options.verbose) {
    logger.setLevel('debug');
  }

  const config = await loadConfig(projectRoot, options.config);
  const catalogue = await resolveCatalogue(projectRoot, config, options.rules);

  const patterns = filePatterns.length > 0 ? filePatterns : config.properties.paths;
  const files = await resolveFilePatterns(patterns, projectRoot);
  if (files.length === 0) {
    logger.warn('No properties files matched');
    return config.validation.exit_codes.success;
  }

  const concurrency = options.concurrency !== undefined
    ? parseConcurrency(options.concurrency)
    : config.validation.concurrency;

  const engine = new ValidationEngine(catalogue, {
    profiles: normalizeProfiles(options.profile ?? config.validation.profiles),
    allProfiles: options.allProfiles ?? config.validation.all_profiles,
    concurrency,
    projectRoot,
  });

  logger.debug(`Checking ${files.length} file(s) against ${catalogue.size} rule(s)`);
  const batch = await engine.validateFiles(files);

  const format = options.json ? 'json' : parseOutputFormat(options.format ?? config.output.format);
  const formatter = createFormatter(format, options);
  console.log(formatter.formatBatch(batch));

  return getExitCode(batch.reports, config.validation.exit_codes);
}

function parseConcurrency(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid --concurrency value '${value}' (expected a positive integer)`);
  }
  return n;
}
