const IDENTIFIER_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Table and column names are interpolated into SQL, so only plain
 * identifiers are accepted.
 */
export function assertIdentifier(
  value: string,
  kind: 'table' | 'column' = 'table',
): void {
  if (!IDENTIFIER_REGEX.test(value)) {
    throw new Error(
      `Invalid ${kind} name "${value}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}
