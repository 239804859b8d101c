/**
 * Identifier sanitizing for table and column names embedded in SQL text.
 *
 * Characters outside `[A-Za-z0-9_]` are dropped rather than escaped or
 * rejected, so `users; DROP TABLE x` becomes `usersDROPTABLEx`. Values never go
 * through here: they are always bound as positional parameters.
 */

const NON_IDENTIFIER_CHARS = /[^A-Za-z0-9_]/g;

/**
 * Removes every character that is not an ASCII letter, digit or underscore.
 * @param identifier Table or column name
 * @returns The sanitized identifier, possibly empty
 */
export function sanitizeIdentifier(identifier: string): string
{
	return identifier.replace(NON_IDENTIFIER_CHARS, '');
}

export function sanitizeIdentifiers(identifiers: readonly string[]): string[]
{
	return identifiers.map(sanitizeIdentifier);
}
