/**
 * Property file type definitions.
 */

/** Profile name of unprefixed keys. */
export const BASE_PROFILE = '';

/**
 * One logical line of a properties file.
 */
export interface PropertyEntry {
  /** Profile from a `%profile.` key prefix, BASE_PROFILE when unprefixed */
  profile: string;
  /** Key with the profile prefix stripped */
  key: string;
  /** Trimmed value with continuation lines joined */
  rawValue: string;
  /** 1-based line where the logical line starts */
  lineNumber: number;
}

/**
 * A structural problem with one line. Parsing continues past it.
 */
export interface PropertyParseError {
  code: string;
  lineNumber: number;
  /** The offending logical line as written */
  line: string;
  message: string;
}

export interface ParsedProperties {
  entries: PropertyEntry[];
  errors: PropertyParseError[];
}
