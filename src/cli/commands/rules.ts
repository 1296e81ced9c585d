/**
 * List the rules of the active catalogue.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { describeRule } from '../../core/rules/registry.js';
import type { RuleCatalogue } from '../../core/rules/catalogue.js';
import { ruleKeys } from '../../core/rules/catalogue.js';
import type { Rule } from '../../core/rules/schema.js';
import { formatList } from '../../utils/format.js';
import { logger as log } from '../../utils/logger.js';
import { resolveCatalogue } from './check-helpers.js';

interface RulesOptions {
  config?: string;
  rules?: string;
  json?: boolean;
}

export interface RuleSummary {
  id: string;
  type: string;
  keys: string[];
  expected: string;
  scope: string;
  why?: string;
}

/**
 * Create the rules command.
 */
export function createRulesCommand(): Command {
  return new Command('rules')
    .description('List the rules in the active catalogue')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --rules <path>', 'Path to a rule catalogue (YAML)')
    .option('--json', 'Output as JSON')
    .action(async (options: RulesOptions) => {
      try {
        await runRules(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export async function runRules(options: RulesOptions, projectRoot: string = process.cwd()): Promise<void> {
  const config = await loadConfig(projectRoot, options.config);
  const catalogue = await resolveCatalogue(projectRoot, config, options.rules);
  const summaries = summarizeCatalogue(catalogue);

  if (options.json) {
    console.log(JSON.stringify(summaries, null, 2));
    return;
  }

  if (summaries.length === 0) {
    console.log(chalk.yellow('The catalogue has no rules.'));
    return;
  }

  console.log(chalk.bold(`${summaries.length} rule(s):`));
  for (const summary of summaries) {
    console.log('');
    console.log(`  ${chalk.cyan(summary.id)} ${chalk.dim(`(${summary.type})`)}`);
    console.log(`    Keys:     ${summary.keys.join(', ')}`);
    console.log(`    Expected: ${summary.expected}`);
    console.log(`    Scope:    ${summary.scope}`);
    if (summary.why) {
      console.log(`    Why:      ${summary.why}`);
    }
  }
}

export function summarizeCatalogue(catalogue: RuleCatalogue): RuleSummary[] {
  return catalogue.entries().map(({ rule }) => ({
    id: rule.id,
    type: rule.type,
    keys: ruleKeys(rule),
    expected: describeRule(rule),
    scope: describeScope(rule, catalogue.defaultExcludedProfiles),
    ...(rule.why ? { why: rule.why } : {}),
  }));
}

/**
 * Human-readable profile scope, e.g. "all profiles except 'dev', 'test'".
 */
export function describeScope(rule: Rule, defaultExcluded: readonly string[]): string {
  const include = rule.profiles?.include;
  const exclude = rule.profiles?.exclude ?? defaultExcluded;
  const excluded = include ? exclude.filter((p) => include.includes(p)) : exclude;
  const base = include ? `only ${formatList(include.map(profileLabel))}` : 'all profiles';
  return excluded.length > 0 ? `${base} except ${formatList(excluded.map(profileLabel))}` : base;
}

function profileLabel(profile: string): string {
  return profile === '' ? 'base' : profile;
}
