import { describe, it, expect } from 'vitest';
import * as library from './index';

describe('Package exports', () =>
{
	it('should expose the public API', () =>
	{
		expect(library.Orm).toBeTypeOf('function');
		expect(library.QueryBuilder).toBeTypeOf('function');
		expect(library.PostgreSQLProvider).toBeTypeOf('function');
		expect(library.Repository).toBeTypeOf('function');
		expect(library.loadOrmConfig).toBeTypeOf('function');
		expect(library.WHERE_OPERATORS).toContain('NOT IN');
		expect(library.LogLevel.INFO).toBe(20);
	});

	it('should build queries through the exported ORM without a database', async () =>
	{
		const provider = new library.PostgreSQLProvider({ host: 'localhost', password: 'test-secret' });
		const orm = new library.Orm(provider, { queryLog: false });

		expect(orm.table('users').where('id', '=', 1).toSelectQuery().sql).toBe('SELECT users.* FROM users WHERE id = $1');
		await expect(orm.table('users').get()).rejects.toBeInstanceOf(library.PoolStateError);
	});
});
