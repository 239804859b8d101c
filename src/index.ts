/**
 * @file Main entry point of the library. Exports the `Orm`, the query builder,
 * the PostgreSQL provider and every public type.
 */
export { Orm } from './orm';
export type { OrmOptions } from './orm';
export { QueryBuilder } from './queryBuilder';
export type { QueryContext } from './queryBuilder';
export { StatementCache } from './statementCache';
export { QueryExecutor } from './executor';
export type { ExecutorOptions } from './executor';
export { QueryCompiler } from './queryCompiler';
export type { CompiledFragment } from './queryCompiler';
export type { PreparedQuery, StatementType } from './preparedQuery';
export { WHERE_OPERATORS, normalizeOperator, createDescriptor } from './queryObject';
export type {
	WhereOperator, WhereClause, JoinType, JoinClause, HavingClause,
	OrderDirection, QueryDescriptor, RecordMapping
} from './queryObject';
export { sanitizeIdentifier, sanitizeIdentifiers } from './sanitizer';
export type { DataProvider, PreparedStatement, ResultSet, PoolLimits, ConnectionPoolStatus } from './dataProvider';
export { PostgreSQLProvider, PgPreparedStatement } from './dataProviders/PostgreSQLProvider';
export type { PostgreSQLProviderOptions, PostgreSQLConnectionPoolConfig } from './dataProviders/PostgreSQLProvider';
export { DefaultFieldMapper, MappingFieldMapper } from './entityFieldMapper';
export type { EntityFieldMapper } from './entityFieldMapper';
export { Repository } from './repository';
export type { RepositoryOptions, FindOptions } from './repository';
export { DEFAULT_ORM_CONFIG, resolveOrmConfig, loadOrmConfig, loadDatabaseConfig, loadLogLevel } from './config';
export type { OrmConfig, Environment } from './config';
export {
	OrmError, InvalidOperatorError, InvalidArgumentError, NotFoundError, PrepareError,
	QueryExecutionError, ScanError, CleanupError, CanceledError, DeadlineExceededError,
	PoolStateError, isOrmError, toError
} from './errors';
export type { OrmErrorCode, PoolState } from './errors';
export { NEVER_ABORTED, abortError, raceAbort, throwIfAborted } from './cancellation';
export { Logger, LogLevel, globalLogger, getLogger, logQuery } from './logger';
export type { LoggerConfig, LogEntry, ContextLogger, QueryLogEntry } from './logger';
