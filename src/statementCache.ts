/**
 * StatementCache - one prepared statement per distinct SQL text.
 *
 * Lookups read the map without waiting. A miss takes the write lock, looks
 * again and only then prepares, so concurrent first uses of the same text end
 * up sharing a single statement.
 *
 * @module statementCache
 */

import type { DataProvider, PreparedStatement } from './dataProvider';
import { CleanupError, OrmError, PrepareError, toError } from './errors';
import { abortError, NEVER_ABORTED, raceAbort, throwIfAborted } from './cancellation';
import { getLogger } from './logger';

export class StatementCache
{
	private readonly statements = new Map<string, PreparedStatement>();

	private lock: Promise<void> = Promise.resolve();

	private readonly logger = getLogger('StatementCache');

	constructor(private readonly provider: DataProvider)
	{
	}

	/**
	 * Number of cached statements.
	 */
	get size(): number
	{
		return this.statements.size;
	}

	/**
	 * Returns the cached statement for `sql`, preparing it on first use.
	 * @param signal Aborts waiting for the write lock and the prepare call
	 * @throws PrepareError when the provider cannot prepare the statement
	 */
	async compile(sql: string, signal: AbortSignal): Promise<PreparedStatement>
	{
		const cached = this.statements.get(sql);
		if (cached)
		{
			return cached;
		}

		const release = await this.acquireLock(signal);
		try
		{
			// Another caller may have prepared it while we waited
			const existing = this.statements.get(sql);
			if (existing)
			{
				return existing;
			}

			const statement = await this.prepare(sql, signal);
			this.statements.set(sql, statement);
			this.logger.debug('Statement cached', { sql, size: this.statements.size });
			return statement;
		}
		finally
		{
			release();
		}
	}

	/**
	 * Closes every cached statement and empties the cache, even when some of
	 * them fail to close.
	 * @throws CleanupError listing each close failure
	 */
	async cleanup(): Promise<void>
	{
		const release = await this.acquireLock(NEVER_ABORTED);
		try
		{
			const statements = [...this.statements.entries()];
			this.statements.clear();

			const results = await Promise.allSettled(statements.map(([, statement]) => statement.close()));
			const errors: Error[] = [];
			results.forEach((result, i) =>
			{
				if (result.status === 'rejected')
				{
					const cause = toError(result.reason);
					errors.push(new Error(`Failed to close statement for query "${statements[i][0]}": ${cause.message}`, { cause }));
				}
			});

			this.logger.debug('Statement cache cleared', { closed: statements.length - errors.length, failed: errors.length });

			if (errors.length > 0)
			{
				throw new CleanupError(errors);
			}
		}
		finally
		{
			release();
		}
	}

	private async prepare(sql: string, signal: AbortSignal): Promise<PreparedStatement>
	{
		try
		{
			return await this.provider.prepare(sql, signal);
		}
		catch (error)
		{
			if (error instanceof OrmError)
			{
				throw error;
			}
			if (signal.aborted)
			{
				throw abortError(signal);
			}
			const cause = toError(error);
			this.logger.error('Failed to prepare statement', { sql, error: cause.message });
			throw new PrepareError(`Failed to prepare statement: ${cause.message}`, sql, cause);
		}
	}

	/**
	 * Waits for the write lock and returns its release function. Each caller
	 * queues behind the previous holder; a caller whose signal aborts hands its
	 * turn on as soon as the previous holder finishes.
	 */
	private async acquireLock(signal: AbortSignal): Promise<() => void>
	{
		throwIfAborted(signal);

		const previous = this.lock;
		let release: () => void = () => undefined;
		this.lock = new Promise<void>(resolve =>
		{
			release = resolve;
		});

		try
		{
			await raceAbort(previous, signal);
		}
		catch (error)
		{
			void previous.then(release);
			throw error;
		}

		return release;
	}
}
