import type { PreparedStatement, ResultSet } from './dataProvider';
import type { RecordMapping } from './queryObject';
import { OrmError, QueryExecutionError, ScanError, toError } from './errors';
import { abortError, throwIfAborted } from './cancellation';
import { getLogger, logQuery } from './logger';

export interface ExecutorOptions
{
	/** Log every statement with its arguments and duration */
	queryLog: boolean;
}

/**
 * Runs prepared statements and turns their rows into record mappings.
 */
export class QueryExecutor
{
	private readonly queryLogger = getLogger('QueryLog');

	constructor(private readonly options: ExecutorOptions)
	{
	}

	/**
	 * Runs a statement that returns rows.
	 * @returns One fresh mapping per row, in result order; empty when nothing matched
	 */
	async query(statement: PreparedStatement, params: readonly unknown[], signal: AbortSignal): Promise<RecordMapping[]>
	{
		const result = await this.run(statement, params, signal, () => statement.query(params, signal));
		return this.scan(statement.sql, result);
	}

	/**
	 * Runs a statement and returns the number of affected rows.
	 */
	async execute(statement: PreparedStatement, params: readonly unknown[], signal: AbortSignal): Promise<number>
	{
		return this.run(statement, params, signal, () => statement.execute(params, signal));
	}

	/**
	 * Builds one mapping per row. When a column name repeats, the last value wins.
	 * @throws ScanError when a row and the column list differ in width
	 */
	scan(sql: string, result: ResultSet): RecordMapping[]
	{
		const { columns, rows } = result;
		return rows.map((row, index) =>
		{
			if (row.length !== columns.length)
			{
				throw new ScanError(`Row ${index} has ${row.length} values for ${columns.length} columns`, sql);
			}

			const record: RecordMapping = {};
			columns.forEach((column, i) =>
			{
				record[column] = row[i];
			});
			return record;
		});
	}

	private async run<T>(
		statement: PreparedStatement,
		params: readonly unknown[],
		signal: AbortSignal,
		operation: () => Promise<T>
	): Promise<T>
	{
		const startedAt = performance.now();
		let failure: OrmError | undefined;
		try
		{
			throwIfAborted(signal);
			return await operation();
		}
		catch (error)
		{
			failure = this.classify(error, statement.sql, params, signal);
			throw failure;
		}
		finally
		{
			if (this.options.queryLog)
			{
				logQuery(this.queryLogger, {
					sql: statement.sql,
					args: params,
					elapsedMs: performance.now() - startedAt,
					error: failure
				});
			}
		}
	}

	private classify(error: unknown, sql: string, params: readonly unknown[], signal: AbortSignal): OrmError
	{
		if (error instanceof OrmError)
		{
			return error;
		}
		if (signal.aborted)
		{
			return abortError(signal);
		}
		const cause = toError(error);
		return new QueryExecutionError(`Query failed: ${cause.message}`, sql, params, cause);
	}
}
