/**
 * Connection pool status information.
 */
export interface ConnectionPoolStatus
{
	/** Total number of connections in the pool */
	totalConnections: number;
	/** Number of idle connections */
	idleConnections: number;
	/** Number of active connections */
	activeConnections: number;
	/** Number of callers waiting for a connection */
	waitingClients: number;
	/** Maximum allowed connections */
	maxConnections: number;
}

/**
 * Connection limits applied once, when the pool is opened.
 */
export interface PoolLimits
{
	/** Maximum number of open connections; callers beyond it wait */
	maxOpenConnections: number;
	/** Maximum number of idle connections kept for reuse */
	maxIdleConnections: number;
	/** Maximum lifetime of one connection in milliseconds */
	connectionMaxLifetimeMs: number;
}

/**
 * Rows as the driver returns them: column names in select order plus one
 * value array per row.
 */
export interface ResultSet
{
	columns: string[];
	rows: unknown[][];
}

/**
 * A statement compiled once by the storage engine and reused across
 * executions. Safe to use from concurrent callers.
 */
export interface PreparedStatement
{
	/** SQL text the statement was prepared from */
	readonly sql: string;

	/**
	 * Runs the statement and returns its rows.
	 * @param signal Aborts the wait for a connection and the query itself
	 */
	query(params: readonly unknown[], signal: AbortSignal): Promise<ResultSet>;

	/**
	 * Runs the statement and returns the number of affected rows.
	 */
	execute(params: readonly unknown[], signal: AbortSignal): Promise<number>;

	/**
	 * Releases the statement. Executing a closed statement fails.
	 */
	close(): Promise<void>;
}

/**
 * Abstract interface for the connection pool the ORM runs on.
 */
export interface DataProvider
{
	/**
	 * Opens the pool with the given limits.
	 */
	connect(limits: PoolLimits): Promise<void>;

	/**
	 * Closes the pool and every connection in it.
	 */
	disconnect(): Promise<void>;

	/**
	 * Compiles `sql` against the storage engine.
	 * @throws the driver's error when the statement does not compile
	 */
	prepare(sql: string, signal: AbortSignal): Promise<PreparedStatement>;

	/**
	 * Gets the connection pool status, or undefined while not connected.
	 */
	getPoolStatus(): ConnectionPoolStatus | undefined;
}
