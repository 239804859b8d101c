import { InvalidOperatorError } from './errors';

/**
 * Operators accepted by `where`/`orWhere`. The set is closed: anything else is
 * rejected before it reaches SQL text.
 */
export const WHERE_OPERATORS = [
	'=', '<>', '>', '<', '>=', '<=',
	'LIKE', 'NOT LIKE', 'IN', 'NOT IN',
	'IS NULL', 'IS NOT NULL'
] as const;

export type WhereOperator = typeof WHERE_OPERATORS[number];

const operatorSet: ReadonlySet<string> = new Set(WHERE_OPERATORS);

function isWhereOperator(operator: string): operator is WhereOperator
{
	return operatorSet.has(operator);
}

/**
 * Upper-cases an operator and checks it against the allow-list.
 * @throws InvalidOperatorError when the operator is not allowed
 */
export function normalizeOperator(operator: string): WhereOperator
{
	const upper = operator.toUpperCase();
	if (!isWhereOperator(upper))
	{
		throw new InvalidOperatorError(operator);
	}
	return upper;
}

/**
 * One predicate of the AND-group or the OR-group of a WHERE clause.
 */
export interface WhereClause
{
	/** Sanitized column name */
	column: string;
	operator: WhereOperator;
	/** Bound positionally, never embedded in SQL text */
	value: unknown;
}

export type JoinType = 'INNER JOIN' | 'LEFT JOIN' | 'RIGHT JOIN' | 'CROSS JOIN';

/**
 * JOIN description. The condition is embedded verbatim; its placeholders are
 * the caller's to number.
 */
export interface JoinClause
{
	type: JoinType;
	/** Sanitized table name */
	table: string;
	/** Empty for CROSS JOIN */
	condition: string;
	args: unknown[];
}

/**
 * HAVING predicate, embedded verbatim and AND-ed with the others.
 */
export interface HavingClause
{
	condition: string;
	args: unknown[];
}

export type OrderDirection = 'ASC' | 'DESC';

/**
 * The accumulated, not-yet-rendered shape of one query.
 */
export interface QueryDescriptor
{
	/** Sanitized target table */
	table: string;
	/** Sanitized columns; `<table>.*` until `select` replaces it */
	selections: string[];
	wheres: WhereClause[];
	orWheres: WhereClause[];
	joins: JoinClause[];
	groupBy: string[];
	having: HavingClause[];
	orderBy?: { column: string; direction: OrderDirection };
	limit?: number;
	offset?: number;
}

/**
 * Creates the descriptor a fresh builder starts from.
 * @param table Already sanitized table name
 */
export function createDescriptor(table: string): QueryDescriptor
{
	return {
		table,
		selections: [`${table}.*`],
		wheres: [],
		orWheres: [],
		joins: [],
		groupBy: [],
		having: []
	};
}

/**
 * One result row: column name to driver-decoded value.
 */
export type RecordMapping = Record<string, unknown>;
