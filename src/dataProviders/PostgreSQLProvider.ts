import { Pool } from 'pg';
import type { ClientConfig, PoolClient, PoolConfig, QueryArrayConfig, QueryArrayResult } from 'pg';
import type { ConnectionPoolStatus, DataProvider, PoolLimits, PreparedStatement, ResultSet } from '../dataProvider';
import { PoolStateError } from '../errors';
import type { PoolState } from '../errors';
import { raceAbort } from '../cancellation';
import { getLogger } from '../logger';

/**
 * Connection pool options for PostgreSQL that are not part of `PoolLimits`.
 */
export interface PostgreSQLConnectionPoolConfig
{
	/** Milliseconds a client may sit idle before being closed (default: 10000) */
	idleTimeoutMillis?: number;
	/** Milliseconds to wait for a new connection to be established (default: 30000) */
	connectionTimeoutMillis?: number;
}

/**
 * PostgreSQL connection options, extending `ClientConfig` from `pg` with pool configuration.
 */
export interface PostgreSQLProviderOptions extends ClientConfig
{
	pool?: PostgreSQLConnectionPoolConfig;
}

type RunQuery = (config: QueryArrayConfig, signal: AbortSignal) => Promise<QueryArrayResult>;

/**
 * A statement validated by the server and bound to a unique name.
 * node-postgres parses a named query once per connection and reuses it after.
 */
export class PgPreparedStatement implements PreparedStatement
{
	private closed = false;

	constructor(
		readonly sql: string,
		readonly name: string,
		private readonly run: RunQuery
	)
	{
	}

	async query(params: readonly unknown[], signal: AbortSignal): Promise<ResultSet>
	{
		const result = await this.runNamed(params, signal);
		return {
			columns: result.fields.map(field => field.name),
			rows: result.rows
		};
	}

	async execute(params: readonly unknown[], signal: AbortSignal): Promise<number>
	{
		const result = await this.runNamed(params, signal);
		return result.rowCount ?? 0;
	}

	/**
	 * Marks the statement closed without a round trip. node-postgres keeps the
	 * parsed statement on every connection that ran it, so those copies go
	 * away only when their connections are closed.
	 */
	async close(): Promise<void>
	{
		this.closed = true;
	}

	isClosed(): boolean
	{
		return this.closed;
	}

	private runNamed(params: readonly unknown[], signal: AbortSignal): Promise<QueryArrayResult>
	{
		if (this.closed)
		{
			return Promise.reject(new Error(`Prepared statement ${this.name} has been closed`));
		}
		return this.run({ name: this.name, text: this.sql, values: [...params], rowMode: 'array' }, signal);
	}
}

/**
 * The `pg` connection pool behind the ORM.
 */
export class PostgreSQLProvider implements DataProvider
{
	private pool?: Pool;

	private state: PoolState = 'uninitialized';

	private limits?: PoolLimits;

	private statementCounter = 0;

	private readonly logger = getLogger('PostgreSQLProvider');

	constructor(private readonly options: PostgreSQLProviderOptions)
	{
		this.logger.debug('PostgreSQLProvider initialized', {
			host: options.host,
			database: options.database
		});
	}

	/**
	 * Creates the pool with the given limits and checks it with `SELECT 1`.
	 * A provider is opened at most once, and a second call made while the
	 * first is still connecting is rejected.
	 */
	async connect(limits: PoolLimits): Promise<void>
	{
		if (this.state !== 'uninitialized')
		{
			throw new PoolStateError(this.state, 'connect');
		}

		this.state = 'opening';
		const { pool: poolConfig = {}, ...clientOptions } = this.options;
		const poolOptions: PoolConfig = {
			...clientOptions,
			max: limits.maxOpenConnections,
			maxLifetimeSeconds: Math.ceil(limits.connectionMaxLifetimeMs / 1000),
			idleTimeoutMillis: poolConfig.idleTimeoutMillis ?? 10000,
			connectionTimeoutMillis: poolConfig.connectionTimeoutMillis ?? 30000
		};

		this.logger.debug('Creating PostgreSQL connection pool', {
			max: poolOptions.max,
			maxIdle: limits.maxIdleConnections,
			maxLifetimeSeconds: poolOptions.maxLifetimeSeconds
		});

		const pool = new Pool(poolOptions);
		pool.on('error', (error) =>
		{
			this.logger.error('Unexpected error on idle PostgreSQL client', { error: error.message });
		});

		try
		{
			const testClient = await pool.connect();
			try
			{
				await testClient.query('SELECT 1');
			}
			finally
			{
				testClient.release();
			}
		}
		catch (error)
		{
			this.logger.error('Connection pool test failed', { error: error instanceof Error ? error.message : String(error) });
			await pool.end();
			if (this.state === 'opening')
			{
				this.state = 'uninitialized';
			}
			throw error;
		}

		// disconnect() ran while the pool was being tested
		if (this.state !== 'opening')
		{
			await pool.end();
			throw new PoolStateError(this.state, 'connect');
		}

		this.pool = pool;
		this.limits = limits;
		this.state = 'open';
		this.logger.info('PostgreSQL connection pool created successfully');
	}

	async disconnect(): Promise<void>
	{
		const pool = this.pool;
		this.pool = undefined;
		this.state = 'closed';

		if (pool)
		{
			this.logger.debug('Ending connection pool');
			await pool.end();
			this.logger.info('PostgreSQL connection pool ended');
		}
	}

	getPoolStatus(): ConnectionPoolStatus | undefined
	{
		if (!this.pool || !this.limits) return undefined;

		return {
			totalConnections: this.pool.totalCount,
			idleConnections: this.pool.idleCount,
			activeConnections: this.pool.totalCount - this.pool.idleCount,
			waitingClients: this.pool.waitingCount,
			maxConnections: this.limits.maxOpenConnections
		};
	}

	/**
	 * Validates `sql` on the server with PREPARE/DEALLOCATE and returns a
	 * named statement for it.
	 */
	async prepare(sql: string, signal: AbortSignal): Promise<PreparedStatement>
	{
		const name = `orm_stmt_${++this.statementCounter}`;
		this.logger.debug('Preparing statement', { name, sql });

		const client = await this.acquire(signal, 'prepare');
		let aborted = false;
		try
		{
			await raceAbort(client.query(`PREPARE ${name} AS ${sql}`), signal);
			await client.query(`DEALLOCATE ${name}`);
		}
		catch (error)
		{
			aborted = signal.aborted;
			throw error;
		}
		finally
		{
			this.release(client, aborted);
		}

		return new PgPreparedStatement(sql, name, (config, querySignal) => this.run(config, querySignal));
	}

	private async run(config: QueryArrayConfig, signal: AbortSignal): Promise<QueryArrayResult>
	{
		const client = await this.acquire(signal, 'query');
		let aborted = false;
		try
		{
			return await raceAbort(client.query(config), signal);
		}
		catch (error)
		{
			aborted = signal.aborted;
			throw error;
		}
		finally
		{
			this.release(client, aborted);
		}
	}

	/**
	 * Checks out a client. Waiting for a free one is abandoned when `signal`
	 * aborts; a client handed over after that goes straight back.
	 */
	private acquire(signal: AbortSignal, operation: string): Promise<PoolClient>
	{
		const pool = this.pool;
		if (this.state !== 'open' || !pool)
		{
			return Promise.reject(new PoolStateError(this.state, operation));
		}
		return raceAbort(pool.connect(), signal, client => client.release());
	}

	/**
	 * Returns a client to the pool. It is destroyed instead when its query was
	 * aborted mid-flight, or when nobody waits and the idle limit is reached.
	 */
	private release(client: PoolClient, aborted: boolean): void
	{
		const pool = this.pool;
		const maxIdle = this.limits?.maxIdleConnections ?? 0;
		const overIdleLimit = pool !== undefined && pool.waitingCount === 0 && pool.idleCount >= maxIdle;
		client.release(aborted || overIdleLimit);
	}
}
