/**
 * Profile-aware, immutable view of a parsed properties file.
 */
import { readFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { parseProperties } from './parser.js';
import { BASE_PROFILE, type PropertyEntry, type PropertyParseError } from './types.js';

/**
 * Key/value store indexed by (profile, key).
 *
 * Lookups under a profile fall back to the base profile. Within one
 * (profile, key) pair the last entry in file order is authoritative.
 */
export class PropertyStore {
  readonly source: string | undefined;
  readonly parseErrors: readonly PropertyParseError[];
  private readonly entries: readonly PropertyEntry[];
  private readonly index: ReadonlyMap<string, ReadonlyMap<string, PropertyEntry>>;

  private constructor(
    entries: PropertyEntry[],
    parseErrors: PropertyParseError[],
    source?: string
  ) {
    this.source = source;
    this.entries = Object.freeze(entries.map((e) => Object.freeze({ ...e })));
    this.parseErrors = Object.freeze(parseErrors.map((e) => Object.freeze({ ...e })));

    const index = new Map<string, Map<string, PropertyEntry>>();
    for (const entry of this.entries) {
      let byKey = index.get(entry.profile);
      if (!byKey) {
        byKey = new Map();
        index.set(entry.profile, byKey);
      }
      byKey.set(entry.key, entry);
    }
    this.index = index;
  }

  /**
   * Parse properties text. Malformed lines end up in `parseErrors`.
   */
  static load(text: string, source?: string): PropertyStore {
    const { entries, errors } = parseProperties(text);
    return new PropertyStore(entries, errors, source);
  }

  /**
   * The authoritative entry for `key` under `profile`, falling back to base.
   */
  lookup(profile: string, key: string): PropertyEntry | undefined {
    if (profile !== BASE_PROFILE) {
      const override = this.index.get(profile)?.get(key);
      if (override) return override;
    }
    return this.index.get(BASE_PROFILE)?.get(key);
  }

  /**
   * Resolved value, or `undefined` when the key is absent.
   */
  resolve(profile: string, key: string): string | undefined {
    return this.lookup(profile, key)?.rawValue;
  }

  has(profile: string, key: string): boolean {
    return this.lookup(profile, key) !== undefined;
  }

  /**
   * The entry for `suffix` itself, or else the first key visible under
   * `profile` (in `keys(profile)` order) that ends with `.<suffix>`.
   */
  findBySuffix(profile: string, suffix: string): PropertyEntry | undefined {
    const exact = this.lookup(profile, suffix);
    if (exact) return exact;
    const match = this.keys(profile).find((key) => key.endsWith(`.${suffix}`));
    return match === undefined ? undefined : this.lookup(profile, match);
  }

  /**
   * Every parsed entry in file order, duplicates included.
   * Each iteration starts from the first entry.
   */
  rawEntries(): Iterable<PropertyEntry> {
    const entries = this.entries;
    return {
      *[Symbol.iterator]() {
        yield* entries;
      },
    };
  }

  /**
   * Non-base profiles in order of first appearance.
   */
  profiles(): string[] {
    const seen = new Set<string>();
    for (const entry of this.entries) {
      if (entry.profile !== BASE_PROFILE) seen.add(entry.profile);
    }
    return [...seen];
  }

  /**
   * Keys visible under `profile`: base keys plus that profile's overrides.
   */
  keys(profile: string): string[] {
    const keys = new Set(this.index.get(BASE_PROFILE)?.keys() ?? []);
    if (profile !== BASE_PROFILE) {
      for (const key of this.index.get(profile)?.keys() ?? []) keys.add(key);
    }
    return [...keys];
  }
}

/**
 * Read a UTF-8 properties file into a store. `source` is the name reports
 * and errors use for it.
 */
export async function loadPropertyFile(filePath: string, source: string = filePath): Promise<PropertyStore> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_NOT_READABLE,
      `Cannot read properties file: ${source}`,
      { filePath, originalError: error instanceof Error ? error.message : String(error) }
    );
  }
  return PropertyStore.load(content, source);
}
