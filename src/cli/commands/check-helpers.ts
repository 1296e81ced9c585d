/**
 * Helper functions shared by the check and rules commands.
 */
import * as path from 'node:path';
import type { Config, OutputFormat } from '../../core/config/schema.js';
import { loadCatalogue, loadDefaultCatalogue } from '../../core/rules/loader.js';
import type { RuleCatalogue } from '../../core/rules/catalogue.js';
import { BASE_PROFILE } from '../../core/properties/types.js';
import { fileExists, globFiles, isGlobPattern } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { CompactFormatter, HumanFormatter, JsonFormatter, type IFormatter } from '../formatters/index.js';

/** Accepted on the command line for the unnamed base profile. */
export const BASE_PROFILE_ALIAS = 'base';

/**
 * Load the catalogue named on the command line, the project catalogue from
 * config, or the bundled default, in that order.
 */
export async function resolveCatalogue(
  projectRoot: string,
  config: Config,
  rulesPath?: string
): Promise<RuleCatalogue> {
  const options = { defaultExcludedProfiles: config.catalogue.excluded_profiles };

  if (rulesPath) {
    const fullPath = path.resolve(projectRoot, rulesPath);
    logger.debug(`Loading rule catalogue from ${fullPath}`);
    return loadCatalogue(fullPath, options);
  }

  const projectCatalogue = path.resolve(projectRoot, config.catalogue.path);
  if (await fileExists(projectCatalogue)) {
    logger.debug(`Loading rule catalogue from ${projectCatalogue}`);
    return loadCatalogue(projectCatalogue, options);
  }

  logger.debug('No project rule catalogue found, using the bundled default');
  return loadDefaultCatalogue(options);
}

/**
 * Expand glob patterns; plain paths are kept even when missing so that the
 * engine reports them as unreadable.
 */
export async function resolveFilePatterns(patterns: string[], projectRoot: string): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    if (isGlobPattern(pattern)) {
      files.push(...(await globFiles(pattern, { cwd: projectRoot, absolute: false })));
    } else {
      files.push(path.isAbsolute(pattern) ? path.relative(projectRoot, pattern) : pattern);
    }
  }
  return [...new Set(files)];
}

export function normalizeProfiles(profiles: readonly string[]): string[] {
  return [...new Set(profiles.map((p) => (p === BASE_PROFILE_ALIAS ? BASE_PROFILE : p)))];
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'human' || value === 'json' || value === 'compact') {
    return value;
  }
  throw new Error(`Unknown output format '${value}' (expected human, json, or compact)`);
}

/** Create formatter based on output format. */
export function createFormatter(
  format: OutputFormat,
  options: { quiet?: boolean; verbose?: boolean }
): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'compact':
      return new CompactFormatter();
    case 'human':
      return new HumanFormatter({
        colors: !options.quiet,
        verbose: options.verbose ?? false,
        showPassing: options.verbose ?? false,
      });
  }
}
