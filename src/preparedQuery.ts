/**
 * PreparedQuery - a rendered statement ready for the statement cache.
 *
 * @module preparedQuery
 */

export type StatementType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

/**
 * SQL text with PostgreSQL `$n` placeholders and the values bound to them, in
 * placeholder order.
 */
export interface PreparedQuery
{
	type: StatementType;

	/** Rendered SQL text; also the statement cache key */
	sql: string;

	/** Positional parameters, `params[0]` binds `$1` */
	params: unknown[];
}
