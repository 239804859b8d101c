import type { RecordMapping } from './queryObject';

/**
 * Data converter interface, responsible for converting between record mappings and object entities.
 */
export interface EntityFieldMapper<T extends object>
{
	/**
	 * Convert an entity field name to a database column name.
	 */
	toDbField(field: string): string;

	/**
	 * Convert a database column name to an entity field name.
	 */
	fromDbField(column: string): string;

	/**
	 * Convert one result row to an entity.
	 */
	fromDb(row: RecordMapping): Promise<T>;

	/**
	 * Convert an entity to column values.
	 * @param entity Object entity, supports partial updates
	 */
	toDb(entity: Partial<T>): Promise<RecordMapping>;
}

/**
 * Default EntityFieldMapper: column names are field names and rows are taken
 * as entities without checking.
 */
export class DefaultFieldMapper<T extends object> implements EntityFieldMapper<T>
{
	toDbField(field: string): string
	{
		return field;
	}

	fromDbField(column: string): string
	{
		return column;
	}

	async fromDb(row: RecordMapping): Promise<T>
	{
		return row as T;
	}

	async toDb(entity: Partial<T>): Promise<RecordMapping>
	{
		return Object.fromEntries(Object.entries(entity));
	}
}

/**
 * An EntityFieldMapper that renames between entity fields and database
 * columns; names missing from the mapping pass through unchanged.
 *
 * @example
 * ```typescript
 * const mapper = new MappingFieldMapper<User>({ createdAt: 'created_at', updatedAt: 'updated_at' });
 * mapper.toDbField('createdAt'); // 'created_at'
 * ```
 */
export class MappingFieldMapper<T extends object> implements EntityFieldMapper<T>
{
	private readonly fieldToColumn: ReadonlyMap<string, string>;
	private readonly columnToField: ReadonlyMap<string, string>;

	/**
	 * @param mapping Keys are entity field names, values are database column names.
	 */
	constructor(mapping: Record<string, string>)
	{
		this.fieldToColumn = new Map(Object.entries(mapping));
		this.columnToField = new Map(Object.entries(mapping).map(([field, column]) => [column, field]));
	}

	toDbField(field: string): string
	{
		return this.fieldToColumn.get(field) ?? field;
	}

	fromDbField(column: string): string
	{
		return this.columnToField.get(column) ?? column;
	}

	async fromDb(row: RecordMapping): Promise<T>
	{
		const entity: RecordMapping = {};
		for (const [column, value] of Object.entries(row))
		{
			entity[this.fromDbField(column)] = value;
		}
		return entity as T;
	}

	async toDb(entity: Partial<T>): Promise<RecordMapping>
	{
		const row: RecordMapping = {};
		for (const [field, value] of Object.entries(entity))
		{
			row[this.toDbField(field)] = value;
		}
		return row;
	}
}
