/**
 * Formatting helpers shared by formatters and rule descriptions.
 */

export const ABSENT_LABEL = 'absent';

/**
 * Render an observed value; `null` stands for a key that is not set.
 */
export function formatActual(actual: string | null): string {
  return actual === null ? ABSENT_LABEL : `'${actual}'`;
}

/**
 * Render a profile name for display; the base profile has no name.
 */
export function formatProfile(profile: string): string {
  return profile === '' ? '(base)' : profile;
}

export function formatList(values: readonly string[], separator: string = ', '): string {
  return values.map((v) => `'${v}'`).join(separator);
}

/**
 * Render numeric bounds as interval notation, e.g. `[0, 2]` or `(0, +inf)`.
 */
export function formatRange(
  min: number | undefined,
  max: number | undefined,
  inclusive: boolean
): string {
  const open = inclusive && min !== undefined ? '[' : '(';
  const close = inclusive && max !== undefined ? ']' : ')';
  const lower = min === undefined ? '-inf' : String(min);
  const upper = max === undefined ? '+inf' : String(max);
  return `${open}${lower}, ${upper}${close}`;
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
