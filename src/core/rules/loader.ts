/**
 * Loads rule catalogues from YAML.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { CatalogueFileSchema } from './schema.js';
import { RuleCatalogue, type RuleCatalogueOptions } from './catalogue.js';
import { parseYamlWithSchema, loadYamlWithSchema } from '../../utils/yaml.js';
import { CatalogueError, ErrorCodes, PropCheckError } from '../../utils/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Catalogue shipped with the package, used when a project defines none. */
export const DEFAULT_CATALOGUE_PATH = path.resolve(__dirname, '../../../rules/default.yaml');

/**
 * Build a catalogue from YAML text with a top-level `rules:` list.
 */
export function parseCatalogue(content: string, options: RuleCatalogueOptions = {}): RuleCatalogue {
  try {
    const file = parseYamlWithSchema(content, CatalogueFileSchema, ErrorCodes.INVALID_CATALOGUE);
    return new RuleCatalogue(options).registerAll(file.rules);
  } catch (error) {
    throw toCatalogueError(error);
  }
}

/**
 * Load a catalogue from a YAML file.
 */
export async function loadCatalogue(filePath: string, options: RuleCatalogueOptions = {}): Promise<RuleCatalogue> {
  try {
    const file = await loadYamlWithSchema(filePath, CatalogueFileSchema, ErrorCodes.INVALID_CATALOGUE);
    return new RuleCatalogue(options).registerAll(file.rules);
  } catch (error) {
    throw toCatalogueError(error, filePath);
  }
}

export async function loadDefaultCatalogue(options: RuleCatalogueOptions = {}): Promise<RuleCatalogue> {
  return loadCatalogue(DEFAULT_CATALOGUE_PATH, options);
}

function toCatalogueError(error: unknown, filePath?: string): Error {
  if (error instanceof CatalogueError) {
    if (!filePath) return error;
    return new CatalogueError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
  }
  if (error instanceof PropCheckError) {
    return new CatalogueError(error.code, error.message, { ...error.details, filePath });
  }
  return error instanceof Error ? error : new Error(String(error));
}
