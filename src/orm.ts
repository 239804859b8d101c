/**
 * @file The `Orm` class: owns the provider's pool, the statement cache and the
 * executor, and hands out query builders bound to them.
 */
import type { ConnectionPoolStatus, DataProvider } from './dataProvider';
import type { OrmConfig } from './config';
import { resolveOrmConfig } from './config';
import type { EntityFieldMapper } from './entityFieldMapper';
import { CleanupError, PoolStateError, toError } from './errors';
import type { PoolState } from './errors';
import { QueryExecutor } from './executor';
import type { QueryContext } from './queryBuilder';
import { QueryBuilder } from './queryBuilder';
import type { RepositoryOptions } from './repository';
import { Repository } from './repository';
import { StatementCache } from './statementCache';
import { getLogger } from './logger';

export interface OrmOptions
{
	/** Clock used for `created_at`/`updated_at` (default: `new Date()`) */
	now?: () => Date;
}

/**
 * Entry point of the query builder.
 *
 * @example
 * ```typescript
 * const orm = await Orm.connect(new PostgreSQLProvider(loadDatabaseConfig()), loadOrmConfig());
 * const users = await orm.table('users').where('active', '=', true).get();
 * await orm.close();
 * ```
 */
export class Orm
{
	private state: PoolState = 'uninitialized';

	private readonly config: OrmConfig;

	private readonly cache: StatementCache;

	private readonly context: QueryContext;

	private readonly logger = getLogger('Orm');

	/**
	 * @throws InvalidArgumentError when `config` holds an invalid limit
	 */
	constructor(
		private readonly provider: DataProvider,
		config: Partial<OrmConfig> = {},
		options: OrmOptions = {}
	)
	{
		this.config = resolveOrmConfig(config);
		this.cache = new StatementCache(provider);
		this.context = {
			cache: this.cache,
			executor: new QueryExecutor({ queryLog: this.config.queryLog }),
			now: options.now ?? (() => new Date()),
			assertOpen: operation => this.assertOpen(operation)
		};
	}

	/**
	 * Creates an `Orm` and opens its pool.
	 */
	static async connect(provider: DataProvider, config: Partial<OrmConfig> = {}, options: OrmOptions = {}): Promise<Orm>
	{
		const orm = new Orm(provider, config, options);
		await orm.open();
		return orm;
	}

	/**
	 * Connects the provider with the configured limits. Allowed once; a
	 * concurrent call made while the first is connecting is rejected.
	 * @throws PoolStateError when the pool is opening, open or closed
	 */
	async open(): Promise<void>
	{
		if (this.state !== 'uninitialized')
		{
			throw new PoolStateError(this.state, 'open');
		}

		this.state = 'opening';
		try
		{
			await this.provider.connect({
				maxOpenConnections: this.config.maxOpenConnections,
				maxIdleConnections: this.config.maxIdleConnections,
				connectionMaxLifetimeMs: this.config.connectionMaxLifetimeMs
			});
		}
		catch (error)
		{
			if (this.state === 'opening')
			{
				this.state = 'uninitialized';
			}
			throw error;
		}

		// close() ran while connecting
		if (this.state !== 'opening')
		{
			throw new PoolStateError(this.state, 'open');
		}
		this.state = 'open';
		this.logger.info('Pool opened', {
			maxOpenConnections: this.config.maxOpenConnections,
			maxIdleConnections: this.config.maxIdleConnections
		});
	}

	/**
	 * Starts a query against `table`.
	 */
	table(table: string): QueryBuilder
	{
		return new QueryBuilder(this.context, table);
	}

	/**
	 * Creates a repository that decodes rows of `table` through `mapper`.
	 */
	repository<T extends object>(table: string, mapper?: EntityFieldMapper<T>, options?: RepositoryOptions): Repository<T>
	{
		return new Repository<T>(this, table, mapper, options);
	}

	/**
	 * Closes every cached statement. Call only when no query is in flight.
	 *
	 * With `PostgreSQLProvider` this drops the statements from the cache only.
	 * The named statements node-postgres parsed on each pooled connection stay
	 * there until that connection is closed by `close()`, the idle timeout or
	 * the connection lifetime.
	 * @throws CleanupError listing each statement that failed to close
	 */
	async cleanup(): Promise<void>
	{
		await this.cache.cleanup();
	}

	/**
	 * Releases the cached statements, then the pool. The ORM is closed
	 * afterwards even when either step fails.
	 * @throws CleanupError listing every failure of both steps
	 */
	async close(): Promise<void>
	{
		if (this.state === 'closed')
		{
			return;
		}

		const errors: Error[] = [];
		try
		{
			await this.cache.cleanup();
		}
		catch (error)
		{
			errors.push(...(error instanceof CleanupError ? error.errors : [toError(error)]));
		}

		this.state = 'closed';

		try
		{
			await this.provider.disconnect();
		}
		catch (error)
		{
			errors.push(toError(error));
		}

		if (errors.length > 0)
		{
			this.logger.error('Pool closed with errors', { errors: errors.map(e => e.message) });
			throw new CleanupError(errors);
		}
		this.logger.info('Pool closed');
	}

	getState(): PoolState
	{
		return this.state;
	}

	getConfig(): Readonly<OrmConfig>
	{
		return this.config;
	}

	/**
	 * Number of statements currently cached.
	 */
	getCachedStatementCount(): number
	{
		return this.cache.size;
	}

	/**
	 * Gets the connection pool status, or undefined while the pool is not open.
	 */
	getPoolStatus(): ConnectionPoolStatus | undefined
	{
		return this.provider.getPoolStatus();
	}

	private assertOpen(operation: string): void
	{
		if (this.state !== 'open')
		{
			throw new PoolStateError(this.state, operation);
		}
	}
}
