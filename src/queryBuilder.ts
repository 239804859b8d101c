import type { JoinType, OrderDirection, QueryDescriptor, RecordMapping } from './queryObject';
import { createDescriptor, normalizeOperator } from './queryObject';
import type { PreparedQuery } from './preparedQuery';
import type { StatementCache } from './statementCache';
import type { QueryExecutor } from './executor';
import { QueryCompiler } from './queryCompiler';
import { InvalidArgumentError, NotFoundError, QueryExecutionError } from './errors';
import { NEVER_ABORTED, throwIfAborted } from './cancellation';
import { sanitizeIdentifier, sanitizeIdentifiers } from './sanitizer';

/**
 * What a builder needs from the ORM that created it.
 */
export interface QueryContext
{
	readonly cache: StatementCache;
	readonly executor: QueryExecutor;

	/** Current time, stamped into `created_at` and `updated_at` */
	now(): Date;

	/** @throws PoolStateError unless the pool is open */
	assertOpen(operation: string): void;
}

/**
 * Fluent builder for one query against one table.
 *
 * Configuration methods mutate the builder and return it; terminal methods
 * render the SQL, fetch the cached statement and run it. A builder belongs to
 * a single caller.
 *
 * @example
 * ```typescript
 * const user = await orm.table('users')
 *   .withSignal(AbortSignal.timeout(5000))
 *   .select('id', 'username')
 *   .where('id', '=', 42)
 *   .first();
 * ```
 */
export class QueryBuilder
{
	private readonly descriptor: QueryDescriptor;

	private readonly compiler = new QueryCompiler();

	private signal: AbortSignal = NEVER_ABORTED;

	/**
	 * @param table - Table name, sanitized before use
	 */
	constructor(private readonly context: QueryContext, table: string)
	{
		this.descriptor = createDescriptor(sanitizeIdentifier(table));
	}

	/**
	 * Attaches the signal that cancels the terminal operation.
	 */
	withSignal(signal: AbortSignal): this
	{
		this.signal = signal;
		return this;
	}

	/**
	 * Replaces the selected columns. With no columns, selects `<table>.*` again.
	 */
	select(...columns: string[]): this
	{
		this.descriptor.selections = columns.length > 0
			? sanitizeIdentifiers(columns)
			: [`${this.descriptor.table}.*`];
		return this;
	}

	/**
	 * Adds a predicate to the AND-group.
	 * @throws InvalidOperatorError when the operator is not allowed
	 */
	where(column: string, operator: string, value?: unknown): this
	{
		this.descriptor.wheres.push({
			column: sanitizeIdentifier(column),
			operator: normalizeOperator(operator),
			value
		});
		return this;
	}

	/**
	 * Adds a predicate to the OR-group.
	 * @throws InvalidOperatorError when the operator is not allowed
	 */
	orWhere(column: string, operator: string, value?: unknown): this
	{
		this.descriptor.orWheres.push({
			column: sanitizeIdentifier(column),
			operator: normalizeOperator(operator),
			value
		});
		return this;
	}

	/**
	 * Adds an INNER JOIN. `condition` is embedded as written; number its
	 * placeholders from `$1` in join order.
	 */
	join(table: string, condition: string, ...args: unknown[]): this
	{
		return this.addJoin('INNER JOIN', table, condition, args);
	}

	leftJoin(table: string, condition: string, ...args: unknown[]): this
	{
		return this.addJoin('LEFT JOIN', table, condition, args);
	}

	rightJoin(table: string, condition: string, ...args: unknown[]): this
	{
		return this.addJoin('RIGHT JOIN', table, condition, args);
	}

	crossJoin(table: string): this
	{
		return this.addJoin('CROSS JOIN', table, '', []);
	}

	groupBy(...columns: string[]): this
	{
		this.descriptor.groupBy.push(...sanitizeIdentifiers(columns));
		return this;
	}

	/**
	 * Adds a HAVING predicate, AND-ed with the others and embedded as written.
	 */
	having(condition: string, ...args: unknown[]): this
	{
		this.descriptor.having.push({ condition, args });
		return this;
	}

	orderBy(column: string, direction: OrderDirection | Lowercase<OrderDirection> = 'ASC'): this
	{
		this.descriptor.orderBy = {
			column: sanitizeIdentifier(column),
			direction: direction.toUpperCase() === 'DESC' ? 'DESC' : 'ASC'
		};
		return this;
	}

	/**
	 * Sets LIMIT. Zero or less renders no LIMIT clause.
	 */
	limit(limit: number): this
	{
		this.descriptor.limit = limit;
		return this;
	}

	/**
	 * Sets OFFSET. Zero or less renders no OFFSET clause.
	 */
	offset(offset: number): this
	{
		this.descriptor.offset = offset;
		return this;
	}

	toSelectQuery(): PreparedQuery
	{
		return this.compiler.compileSelect(this.descriptor);
	}

	toInsertQuery(fields: RecordMapping): PreparedQuery
	{
		return this.compiler.compileInsert(this.descriptor, fields);
	}

	toUpdateQuery(fields: RecordMapping): PreparedQuery
	{
		return this.compiler.compileUpdate(this.descriptor, fields);
	}

	toDeleteQuery(): PreparedQuery
	{
		return this.compiler.compileDelete(this.descriptor);
	}

	/**
	 * Runs the SELECT and returns every matching row; no match is an empty array.
	 */
	async get(): Promise<RecordMapping[]>
	{
		const { sql, params } = this.toSelectQuery();
		return this.runQuery('get', sql, params);
	}

	/**
	 * Runs the SELECT with LIMIT 1.
	 * @throws NotFoundError when nothing matches
	 */
	async first(): Promise<RecordMapping>
	{
		this.descriptor.limit = 1;
		const rows = await this.get();
		const row = rows[0];
		if (row === undefined)
		{
			throw new NotFoundError(this.descriptor.table);
		}
		return row;
	}

	/**
	 * Inserts one row and returns it as stored. `created_at` and `updated_at`
	 * are set to the current time unless `fields` has them.
	 * @throws InvalidArgumentError when `fields` is empty
	 */
	async create(fields: RecordMapping): Promise<RecordMapping>
	{
		if (Object.keys(fields).length === 0)
		{
			throw new InvalidArgumentError('Cannot insert without fields', 'fields');
		}

		const values: RecordMapping = { ...fields };
		const now = this.context.now();
		if (!Object.hasOwn(values, 'created_at'))
		{
			values.created_at = now;
		}
		if (!Object.hasOwn(values, 'updated_at'))
		{
			values.updated_at = now;
		}

		const { sql, params } = this.toInsertQuery(values);
		const rows = await this.runQuery('create', sql, params);
		const row = rows[0];
		if (row === undefined)
		{
			throw new QueryExecutionError('No data returned after insert', sql, params);
		}
		return row;
	}

	/**
	 * Updates the matching rows.
	 * @returns Number of rows affected
	 * @throws InvalidArgumentError when `fields` is empty
	 */
	async update(fields: RecordMapping): Promise<number>
	{
		const { sql, params } = this.toUpdateQuery(fields);
		return this.runExecute('update', sql, params);
	}

	/**
	 * Deletes the matching rows; without a WHERE clause that is every row.
	 * @returns Number of rows affected
	 */
	async delete(): Promise<number>
	{
		const { sql, params } = this.toDeleteQuery();
		return this.runExecute('delete', sql, params);
	}

	private addJoin(type: JoinType, table: string, condition: string, args: unknown[]): this
	{
		this.descriptor.joins.push({ type, table: sanitizeIdentifier(table), condition, args });
		return this;
	}

	private async runQuery(operation: string, sql: string, params: unknown[]): Promise<RecordMapping[]>
	{
		this.context.assertOpen(operation);
		throwIfAborted(this.signal);
		const statement = await this.context.cache.compile(sql, this.signal);
		return this.context.executor.query(statement, params, this.signal);
	}

	private async runExecute(operation: string, sql: string, params: unknown[]): Promise<number>
	{
		this.context.assertOpen(operation);
		throwIfAborted(this.signal);
		const statement = await this.context.cache.compile(sql, this.signal);
		return this.context.executor.execute(statement, params, this.signal);
	}
}
