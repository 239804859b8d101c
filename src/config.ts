/**
 * @file Pool limits, connection settings and log level, with environment loading.
 */
import type { PostgreSQLProviderOptions } from './dataProviders/PostgreSQLProvider';
import { InvalidArgumentError } from './errors';
import { LogLevel } from './logger';

/**
 * ORM configuration.
 */
export interface OrmConfig
{
	/** Maximum number of open connections (default: 20) */
	maxOpenConnections: number;
	/** Maximum number of idle connections kept in the pool (default: 5) */
	maxIdleConnections: number;
	/** Maximum lifetime of a connection in milliseconds, 0 for none (default: one hour) */
	connectionMaxLifetimeMs: number;
	/** Log every statement with its arguments and duration (default: true) */
	queryLog: boolean;
}

export const DEFAULT_ORM_CONFIG: Readonly<OrmConfig> = {
	maxOpenConnections: 20,
	maxIdleConnections: 5,
	connectionMaxLifetimeMs: 60 * 60 * 1000,
	queryLog: true
};

export type Environment = Record<string, string | undefined>;

/**
 * Fills in defaults and checks the limits.
 * @throws InvalidArgumentError when a limit is out of range
 */
export function resolveOrmConfig(config: Partial<OrmConfig> = {}): OrmConfig
{
	const resolved: OrmConfig = {
		maxOpenConnections: config.maxOpenConnections ?? DEFAULT_ORM_CONFIG.maxOpenConnections,
		maxIdleConnections: config.maxIdleConnections ?? DEFAULT_ORM_CONFIG.maxIdleConnections,
		connectionMaxLifetimeMs: config.connectionMaxLifetimeMs ?? DEFAULT_ORM_CONFIG.connectionMaxLifetimeMs,
		queryLog: config.queryLog ?? DEFAULT_ORM_CONFIG.queryLog
	};

	if (!Number.isInteger(resolved.maxOpenConnections) || resolved.maxOpenConnections <= 0)
	{
		throw new InvalidArgumentError('maxOpenConnections must be a positive integer', 'maxOpenConnections');
	}
	if (!Number.isInteger(resolved.maxIdleConnections) || resolved.maxIdleConnections < 0)
	{
		throw new InvalidArgumentError('maxIdleConnections must be a non-negative integer', 'maxIdleConnections');
	}
	if (resolved.maxIdleConnections > resolved.maxOpenConnections)
	{
		throw new InvalidArgumentError('maxIdleConnections cannot exceed maxOpenConnections', 'maxIdleConnections');
	}
	if (!Number.isInteger(resolved.connectionMaxLifetimeMs) || resolved.connectionMaxLifetimeMs < 0)
	{
		throw new InvalidArgumentError('connectionMaxLifetimeMs must be a non-negative integer', 'connectionMaxLifetimeMs');
	}

	return resolved;
}

function readString(env: Environment, key: string): string | undefined
{
	const value = env[key]?.trim();
	return value === undefined || value === '' ? undefined : value;
}

function readInteger(env: Environment, key: string): number | undefined
{
	const value = readString(env, key);
	if (value === undefined) return undefined;
	if (!/^-?\d+$/.test(value))
	{
		throw new InvalidArgumentError(`${key} must be an integer, got "${value}"`, key);
	}
	return Number(value);
}

function readBoolean(env: Environment, key: string): boolean | undefined
{
	const value = readString(env, key)?.toLowerCase();
	if (value === undefined) return undefined;
	if (value === 'true' || value === '1' || value === 'yes') return true;
	if (value === 'false' || value === '0' || value === 'no') return false;
	throw new InvalidArgumentError(`${key} must be a boolean, got "${value}"`, key);
}

/**
 * Reads `ORM_MAX_OPEN_CONNS`, `ORM_MAX_IDLE_CONNS`, `ORM_CONN_MAX_LIFETIME_MS`
 * and `ORM_QUERY_LOG`; unset variables keep their defaults.
 */
export function loadOrmConfig(env: Environment = process.env): OrmConfig
{
	return resolveOrmConfig({
		maxOpenConnections: readInteger(env, 'ORM_MAX_OPEN_CONNS'),
		maxIdleConnections: readInteger(env, 'ORM_MAX_IDLE_CONNS'),
		connectionMaxLifetimeMs: readInteger(env, 'ORM_CONN_MAX_LIFETIME_MS'),
		queryLog: readBoolean(env, 'ORM_QUERY_LOG')
	});
}

/**
 * Maps a libpq `sslmode` to the `ssl` option of `pg`.
 */
function sslOption(mode: string | undefined): PostgreSQLProviderOptions['ssl']
{
	switch (mode)
	{
		case undefined:
			return undefined;
		case 'disable':
			return false;
		case 'allow':
		case 'prefer':
		case 'require':
			return { rejectUnauthorized: false };
		case 'verify-ca':
		case 'verify-full':
			return { rejectUnauthorized: true };
		default:
			throw new InvalidArgumentError(`DB_SSLMODE "${mode}" is not supported`, 'DB_SSLMODE');
	}
}

/**
 * Reads `DB_HOST`, `DB_PORT`, `DB_USERNAME`, `DB_PASSWORD`, `DB_NAME` and
 * `DB_SSLMODE` into PostgreSQL provider options.
 */
export function loadDatabaseConfig(env: Environment = process.env): PostgreSQLProviderOptions
{
	return {
		host: readString(env, 'DB_HOST'),
		port: readInteger(env, 'DB_PORT'),
		user: readString(env, 'DB_USERNAME'),
		password: readString(env, 'DB_PASSWORD'),
		database: readString(env, 'DB_NAME'),
		ssl: sslOption(readString(env, 'DB_SSLMODE')?.toLowerCase())
	};
}

const LOG_LEVELS: Record<string, LogLevel> = {
	all: LogLevel.ALL,
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	off: LogLevel.OFF
};

/**
 * Reads `LOGGER_LEVEL` (`all`, `debug`, `info`, `warn`, `error` or `off`).
 * @returns undefined when unset
 */
export function loadLogLevel(env: Environment = process.env): LogLevel | undefined
{
	const value = readString(env, 'LOGGER_LEVEL')?.toLowerCase();
	if (value === undefined) return undefined;

	if (!Object.hasOwn(LOG_LEVELS, value))
	{
		throw new InvalidArgumentError(`LOGGER_LEVEL "${value}" is not a log level`, 'LOGGER_LEVEL');
	}
	return LOG_LEVELS[value];
}
