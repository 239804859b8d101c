/**
 * @file Error classes raised by the ORM.
 *
 * Every failure that leaves a public operation is an `OrmError` carrying a
 * stable `code` and, where one exists, the underlying `cause`.
 */

export type OrmErrorCode =
	| 'INVALID_OPERATOR'
	| 'INVALID_ARGUMENT'
	| 'NOT_FOUND'
	| 'PREPARE_ERROR'
	| 'EXECUTION_ERROR'
	| 'SCAN_ERROR'
	| 'CLEANUP_ERROR'
	| 'CANCELED'
	| 'DEADLINE_EXCEEDED'
	| 'POOL_STATE_ERROR';

export class OrmError extends Error
{
	constructor(message: string, public readonly code: OrmErrorCode, cause?: unknown)
	{
		super(message, cause === undefined ? undefined : { cause });
		this.name = 'OrmError';
		Error.captureStackTrace(this, this.constructor);
	}
}

/**
 * Raised by `where`/`orWhere` when the operator is not in the allow-list.
 */
export class InvalidOperatorError extends OrmError
{
	constructor(public readonly operator: string)
	{
		super(`Invalid operator: ${operator}`, 'INVALID_OPERATOR');
		this.name = 'InvalidOperatorError';
	}
}

export class InvalidArgumentError extends OrmError
{
	constructor(message: string, public readonly argument?: string)
	{
		super(message, 'INVALID_ARGUMENT');
		this.name = 'InvalidArgumentError';
	}
}

export class NotFoundError extends OrmError
{
	constructor(public readonly table: string)
	{
		super(`No rows found in ${table}`, 'NOT_FOUND');
		this.name = 'NotFoundError';
	}
}

export class PrepareError extends OrmError
{
	constructor(message: string, public readonly sql: string, cause?: unknown)
	{
		super(message, 'PREPARE_ERROR', cause);
		this.name = 'PrepareError';
	}
}

export class QueryExecutionError extends OrmError
{
	constructor(
		message: string,
		public readonly sql: string,
		public readonly params: readonly unknown[],
		cause?: unknown,
	)
	{
		super(message, 'EXECUTION_ERROR', cause);
		this.name = 'QueryExecutionError';
	}
}

export class ScanError extends OrmError
{
	constructor(message: string, public readonly sql: string, cause?: unknown)
	{
		super(message, 'SCAN_ERROR', cause);
		this.name = 'ScanError';
	}
}

/**
 * Aggregates every failure met while releasing cached statements or the pool.
 */
export class CleanupError extends OrmError
{
	constructor(public readonly errors: readonly Error[])
	{
		super(`Cleanup errors: ${errors.map(e => e.message).join('; ')}`, 'CLEANUP_ERROR', errors[0]);
		this.name = 'CleanupError';
	}
}

export class CanceledError extends OrmError
{
	constructor(message = 'Operation canceled', cause?: unknown)
	{
		super(message, 'CANCELED', cause);
		this.name = 'CanceledError';
	}
}

export class DeadlineExceededError extends OrmError
{
	constructor(message = 'Deadline exceeded', cause?: unknown)
	{
		super(message, 'DEADLINE_EXCEEDED', cause);
		this.name = 'DeadlineExceededError';
	}
}

export type PoolState = 'uninitialized' | 'opening' | 'open' | 'closed';

export class PoolStateError extends OrmError
{
	constructor(public readonly state: PoolState, operation: string)
	{
		super(`Cannot ${operation}: pool is ${state}`, 'POOL_STATE_ERROR');
		this.name = 'PoolStateError';
	}
}

/**
 * Type guard for `OrmError`, optionally narrowed to one code.
 */
export function isOrmError(error: unknown, code?: OrmErrorCode): error is OrmError
{
	return error instanceof OrmError && (code === undefined || error.code === code);
}

/**
 * Converts any thrown value to an `Error`.
 */
export function toError(error: unknown): Error
{
	return error instanceof Error ? error : new Error(String(error));
}
