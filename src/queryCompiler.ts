/**
 * QueryCompiler - Renders a QueryDescriptor into parameterized PostgreSQL.
 *
 * Identifiers in the descriptor are already sanitized; values are never
 * embedded and always go to `params`. Placeholders are numbered globally across
 * the statement: join args first, then WHERE, then HAVING for a SELECT, and SET
 * before WHERE for an UPDATE.
 *
 * @module queryCompiler
 */

import type { QueryDescriptor, WhereClause, RecordMapping } from './queryObject';
import type { PreparedQuery } from './preparedQuery';
import { InvalidArgumentError } from './errors';
import { sanitizeIdentifier } from './sanitizer';
import { getLogger } from './logger';

/**
 * A rendered SQL fragment together with the values it binds.
 */
export interface CompiledFragment
{
	sql: string;
	params: unknown[];
}

export class QueryCompiler
{
	private readonly logger = getLogger('QueryCompiler');

	/**
	 * Renders the WHERE clause, including its leading space, or an empty
	 * fragment when neither group has a predicate.
	 * @param startIndex Number of the first placeholder to emit
	 */
	compileWhere(descriptor: QueryDescriptor, startIndex: number): CompiledFragment
	{
		const { wheres, orWheres } = descriptor;
		if (wheres.length === 0 && orWheres.length === 0)
		{
			return { sql: '', params: [] };
		}

		const params: unknown[] = [];
		let sql = ' WHERE ';
		let paramIndex = startIndex;

		const emit = (clause: WhereClause): string =>
		{
			const rendered = this.compilePredicate(clause, paramIndex);
			if (rendered.bound)
			{
				params.push(clause.value);
				paramIndex++;
			}
			return rendered.sql;
		};

		wheres.forEach((clause, i) =>
		{
			if (i > 0) sql += ' AND ';
			sql += emit(clause);
		});

		orWheres.forEach((clause, i) =>
		{
			if (wheres.length > 0 || i > 0) sql += ' OR ';
			sql += emit(clause);
		});

		return { sql, params };
	}

	compileSelect(descriptor: QueryDescriptor): PreparedQuery
	{
		this.logger.debug('Compiling SELECT', { table: descriptor.table });

		const params: unknown[] = [];
		let sql = `SELECT ${descriptor.selections.join(', ')} FROM ${descriptor.table}`;

		for (const join of descriptor.joins)
		{
			if (join.condition !== '')
			{
				sql += ` ${join.type} ${join.table} ON ${join.condition}`;
				params.push(...join.args);
			}
			else
			{
				sql += ` ${join.type} ${join.table}`;
			}
		}

		const where = this.compileWhere(descriptor, params.length + 1);
		sql += where.sql;
		params.push(...where.params);

		if (descriptor.groupBy.length > 0)
		{
			sql += ` GROUP BY ${descriptor.groupBy.join(', ')}`;
		}

		if (descriptor.having.length > 0)
		{
			sql += ` HAVING ${descriptor.having.map(h => h.condition).join(' AND ')}`;
			for (const having of descriptor.having)
			{
				params.push(...having.args);
			}
		}

		if (descriptor.orderBy)
		{
			sql += ` ORDER BY ${descriptor.orderBy.column} ${descriptor.orderBy.direction}`;
		}

		if (descriptor.limit !== undefined && descriptor.limit > 0)
		{
			sql += ` LIMIT ${descriptor.limit}`;
		}

		if (descriptor.offset !== undefined && descriptor.offset > 0)
		{
			sql += ` OFFSET ${descriptor.offset}`;
		}

		return { type: 'SELECT', sql, params };
	}

	/**
	 * Renders `INSERT ... RETURNING *`. Columns follow the key order of `values`.
	 * @throws InvalidArgumentError when `values` is empty
	 */
	compileInsert(descriptor: QueryDescriptor, values: RecordMapping): PreparedQuery
	{
		const entries = this.requireValues(values, 'insert');
		this.logger.debug('Compiling INSERT', { table: descriptor.table, columns: entries.length });

		const columns = entries.map(([column]) => sanitizeIdentifier(column));
		const placeholders = entries.map((_, i) => `$${i + 1}`);
		const sql = `INSERT INTO ${descriptor.table} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`;

		return { type: 'INSERT', sql, params: entries.map(([, value]) => value) };
	}

	/**
	 * Renders `UPDATE ... SET ...` followed by the WHERE clause, whose
	 * placeholders continue after the SET ones.
	 * @throws InvalidArgumentError when `values` is empty
	 */
	compileUpdate(descriptor: QueryDescriptor, values: RecordMapping): PreparedQuery
	{
		const entries = this.requireValues(values, 'update');
		this.logger.debug('Compiling UPDATE', { table: descriptor.table, columns: entries.length });

		const sets = entries.map(([column], i) => `${sanitizeIdentifier(column)} = $${i + 1}`);
		const params = entries.map(([, value]) => value);

		const where = this.compileWhere(descriptor, params.length + 1);
		params.push(...where.params);

		return { type: 'UPDATE', sql: `UPDATE ${descriptor.table} SET ${sets.join(', ')}${where.sql}`, params };
	}

	compileDelete(descriptor: QueryDescriptor): PreparedQuery
	{
		this.logger.debug('Compiling DELETE', { table: descriptor.table });

		const where = this.compileWhere(descriptor, 1);
		return { type: 'DELETE', sql: `DELETE FROM ${descriptor.table}${where.sql}`, params: where.params };
	}

	/**
	 * Renders one predicate. `IS [NOT] NULL` binds nothing; `IN`/`NOT IN`
	 * bind the whole array to a single placeholder through `ANY`/`ALL`.
	 */
	private compilePredicate(clause: WhereClause, paramIndex: number): { sql: string; bound: boolean }
	{
		switch (clause.operator)
		{
			case 'IS NULL':
			case 'IS NOT NULL':
				return { sql: `${clause.column} ${clause.operator}`, bound: false };
			case 'IN':
				return { sql: `${clause.column} = ANY($${paramIndex})`, bound: true };
			case 'NOT IN':
				return { sql: `${clause.column} <> ALL($${paramIndex})`, bound: true };
			default:
				return { sql: `${clause.column} ${clause.operator} $${paramIndex}`, bound: true };
		}
	}

	private requireValues(values: RecordMapping, operation: string): [string, unknown][]
	{
		const entries = Object.entries(values);
		if (entries.length === 0)
		{
			throw new InvalidArgumentError(`Cannot ${operation} without fields`, 'fields');
		}
		return entries;
	}
}
