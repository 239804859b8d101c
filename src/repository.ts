import type { Orm } from './orm';
import type { EntityFieldMapper } from './entityFieldMapper';
import { DefaultFieldMapper } from './entityFieldMapper';
import type { OrderDirection } from './queryObject';
import type { QueryBuilder } from './queryBuilder';
import { NotFoundError } from './errors';
import { getLogger } from './logger';

export interface RepositoryOptions
{
	/** Entity field holding the primary key (default: 'id') */
	idField?: string;
}

/**
 * Options of `Repository.findAll`.
 */
export interface FindOptions<T>
{
	/** Equality filters on entity fields, AND-ed together */
	where?: Partial<T>;
	orderBy?: { field: Extract<keyof T, string>; direction?: OrderDirection };
	limit?: number;
	offset?: number;
}

/**
 * Generic Repository: typed access to one table, decoding rows through an
 * EntityFieldMapper.
 */
export class Repository<T extends object>
{
	private readonly logger = getLogger('Repository');

	private readonly idColumn: string;

	/**
	 * @param orm ORM whose pool runs the queries
	 * @param table Table name
	 * @param mapper EntityFieldMapper instance, defaults to DefaultFieldMapper
	 */
	constructor(
		private readonly orm: Orm,
		private readonly table: string,
		private readonly mapper: EntityFieldMapper<T> = new DefaultFieldMapper<T>(),
		options: RepositoryOptions = {}
	)
	{
		this.idColumn = mapper.toDbField(options.idField ?? 'id');
		this.logger.debug('Repository initialized', { table: this.table });
	}

	getTable(): string
	{
		return this.table;
	}

	getMapper(): EntityFieldMapper<T>
	{
		return this.mapper;
	}

	/**
	 * Starts a raw query against this repository's table.
	 */
	query(signal?: AbortSignal): QueryBuilder
	{
		const builder = this.orm.table(this.table);
		return signal ? builder.withSignal(signal) : builder;
	}

	/**
	 * Inserts an entity and returns it as stored.
	 */
	async create(entity: Partial<T>, signal?: AbortSignal): Promise<T>
	{
		this.logger.debug('Inserting entity', { table: this.table });
		const row = await this.run('create', async () =>
		{
			const values = await this.mapper.toDb(entity);
			return this.query(signal).create(values);
		});
		return this.mapper.fromDb(row);
	}

	/**
	 * @returns The entity, or null when no row has this id
	 */
	async findById(id: unknown, signal?: AbortSignal): Promise<T | null>
	{
		try
		{
			const row = await this.query(signal).where(this.idColumn, '=', id).first();
			return await this.mapper.fromDb(row);
		}
		catch (error)
		{
			if (error instanceof NotFoundError)
			{
				return null;
			}
			this.logFailure('findById', error);
			throw error;
		}
	}

	async findAll(options: FindOptions<T> = {}, signal?: AbortSignal): Promise<T[]>
	{
		const rows = await this.run('findAll', async () =>
		{
			const builder = this.query(signal);
			if (options.where)
			{
				const filters = await this.mapper.toDb(options.where);
				for (const [column, value] of Object.entries(filters))
				{
					if (value === null)
					{
						builder.where(column, 'IS NULL');
					}
					else
					{
						builder.where(column, '=', value);
					}
				}
			}
			if (options.orderBy)
			{
				builder.orderBy(this.mapper.toDbField(options.orderBy.field), options.orderBy.direction);
			}
			if (options.limit !== undefined)
			{
				builder.limit(options.limit);
			}
			if (options.offset !== undefined)
			{
				builder.offset(options.offset);
			}
			return builder.get();
		});
		return Promise.all(rows.map(row => this.mapper.fromDb(row)));
	}

	/**
	 * @returns Number of rows updated
	 */
	async updateById(id: unknown, changes: Partial<T>, signal?: AbortSignal): Promise<number>
	{
		return this.run('updateById', async () =>
		{
			const values = await this.mapper.toDb(changes);
			return this.query(signal).where(this.idColumn, '=', id).update(values);
		});
	}

	/**
	 * @returns Number of rows deleted
	 */
	async deleteById(id: unknown, signal?: AbortSignal): Promise<number>
	{
		return this.run('deleteById', () => this.query(signal).where(this.idColumn, '=', id).delete());
	}

	private async run<R>(method: string, operation: () => Promise<R>): Promise<R>
	{
		try
		{
			return await operation();
		}
		catch (error)
		{
			this.logFailure(method, error);
			throw error;
		}
	}

	private logFailure(method: string, error: unknown): void
	{
		this.logger.error(`[Repository.${method}] ${error instanceof Error ? error.message : String(error)}`, { table: this.table });
	}
}
