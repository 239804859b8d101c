import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PostgreSQLProvider } from './PostgreSQLProvider';
import { NEVER_ABORTED } from '../cancellation';
import { CanceledError, PoolStateError } from '../errors';
import type { PoolLimits } from '../dataProvider';
import { flushPromises } from '../__tests__/fakeProvider';

interface FakeResult
{
	fields: { name: string }[];
	rows: unknown[][];
	rowCount: number | null;
}

const pg = vi.hoisted(() =>
{
	class FakeClient
	{
		readonly query = vi.fn(async (_query: unknown): Promise<FakeResult> => ({ fields: [], rows: [], rowCount: 0 }));
		readonly release = vi.fn();
	}

	class FakePool
	{
		static instances: FakePool[] = [];
		static connectError: Error | undefined;

		readonly clients: FakeClient[] = [];
		totalCount = 0;
		idleCount = 0;
		waitingCount = 0;

		readonly on = vi.fn();
		readonly end = vi.fn(async () => undefined);
		readonly connect = vi.fn(async (): Promise<FakeClient> =>
		{
			if (FakePool.connectError) throw FakePool.connectError;
			const client = new FakeClient();
			this.clients.push(client);
			return client;
		});

		constructor(readonly options: unknown)
		{
			FakePool.instances.push(this);
		}
	}

	return { FakeClient, FakePool };
});

vi.mock('pg', () => ({ Pool: pg.FakePool }));

const LIMITS: PoolLimits = { maxOpenConnections: 20, maxIdleConnections: 5, connectionMaxLifetimeMs: 3_600_000 };

function currentPool(): InstanceType<typeof pg.FakePool>
{
	const pool = pg.FakePool.instances[pg.FakePool.instances.length - 1];
	if (!pool) throw new Error('No pool was created');
	return pool;
}

function lastClient(): InstanceType<typeof pg.FakeClient>
{
	const { clients } = currentPool();
	const client = clients[clients.length - 1];
	if (!client) throw new Error('No client was checked out');
	return client;
}

describe('PostgreSQLProvider', () =>
{
	let provider: PostgreSQLProvider;

	beforeEach(() =>
	{
		pg.FakePool.instances = [];
		pg.FakePool.connectError = undefined;
		provider = new PostgreSQLProvider({
			host: 'localhost',
			database: 'app_test',
			user: 'app',
			password: 'test-secret',
			pool: { idleTimeoutMillis: 5000 }
		});
	});

	describe('connect', () =>
	{
		it('should create the pool with the given limits and test it', async () =>
		{
			await provider.connect(LIMITS);

			const pool = currentPool();
			expect(pool.options).toEqual({
				host: 'localhost',
				database: 'app_test',
				user: 'app',
				password: 'test-secret',
				max: 20,
				maxLifetimeSeconds: 3600,
				idleTimeoutMillis: 5000,
				connectionTimeoutMillis: 30000
			});
			expect(pool.clients[0].query).toHaveBeenCalledWith('SELECT 1');
			expect(pool.clients[0].release).toHaveBeenCalledTimes(1);
			expect(pool.on).toHaveBeenCalledWith('error', expect.any(Function));
		});

		it('should end the pool when the test connection fails', async () =>
		{
			vi.spyOn(console, 'error').mockImplementation(() => undefined);
			const failure = new Error('password authentication failed');
			pg.FakePool.connectError = failure;

			await expect(provider.connect(LIMITS)).rejects.toBe(failure);

			expect(currentPool().end).toHaveBeenCalledTimes(1);
			expect(provider.getPoolStatus()).toBeUndefined();
			vi.restoreAllMocks();
		});

		it('should connect only once', async () =>
		{
			await provider.connect(LIMITS);

			await expect(provider.connect(LIMITS)).rejects.toThrow('Cannot connect: pool is open');
		});

		it('should create one pool when connect is called concurrently', async () =>
		{
			const first = provider.connect(LIMITS);

			await expect(provider.connect(LIMITS)).rejects.toThrow('Cannot connect: pool is opening');
			await first;

			expect(pg.FakePool.instances).toHaveLength(1);
			expect(provider.getPoolStatus()?.maxConnections).toBe(20);
		});

		it('should allow a retry after a failed connection test', async () =>
		{
			vi.spyOn(console, 'error').mockImplementation(() => undefined);
			pg.FakePool.connectError = new Error('ECONNREFUSED');
			await expect(provider.connect(LIMITS)).rejects.toThrow('ECONNREFUSED');

			pg.FakePool.connectError = undefined;
			await provider.connect(LIMITS);

			expect(pg.FakePool.instances).toHaveLength(2);
			expect(provider.getPoolStatus()).toBeDefined();
			vi.restoreAllMocks();
		});

		it('should end a pool whose test finishes after disconnect', async () =>
		{
			const connecting = provider.connect(LIMITS);
			await provider.disconnect();

			await expect(connecting).rejects.toThrow('Cannot connect: pool is closed');
			expect(currentPool().end).toHaveBeenCalledTimes(1);
			expect(provider.getPoolStatus()).toBeUndefined();
		});
	});

	describe('prepare', () =>
	{
		beforeEach(async () =>
		{
			await provider.connect(LIMITS);
		});

		it('should validate the statement on the server under a unique name', async () =>
		{
			const first = await provider.prepare('SELECT users.* FROM users WHERE id = $1', NEVER_ABORTED);
			const firstClient = lastClient();
			await provider.prepare('DELETE FROM users WHERE id = $1', NEVER_ABORTED);
			const secondClient = lastClient();

			expect(first.sql).toBe('SELECT users.* FROM users WHERE id = $1');
			expect(firstClient.query.mock.calls).toEqual([
				['PREPARE orm_stmt_1 AS SELECT users.* FROM users WHERE id = $1'],
				['DEALLOCATE orm_stmt_1']
			]);
			expect(firstClient.release).toHaveBeenCalledWith(false);
			expect(secondClient.query).toHaveBeenCalledWith('PREPARE orm_stmt_2 AS DELETE FROM users WHERE id = $1');
		});

		it('should reject with the server error and return the client', async () =>
		{
			const failure = new Error('syntax error at or near "FORM"');
			const client = new pg.FakeClient();
			client.query.mockRejectedValueOnce(failure);
			currentPool().connect.mockResolvedValueOnce(client);

			await expect(provider.prepare('SELECT * FORM users', NEVER_ABORTED)).rejects.toBe(failure);
			expect(client.query).toHaveBeenCalledTimes(1);
			expect(client.release).toHaveBeenCalledWith(false);
		});
	});

	describe('statements', () =>
	{
		beforeEach(async () =>
		{
			await provider.connect(LIMITS);
		});

		it('should run a named query in array row mode', async () =>
		{
			const statement = await provider.prepare('SELECT id, username FROM users WHERE id = $1', NEVER_ABORTED);
			const client = new pg.FakeClient();
			client.query.mockResolvedValueOnce({ fields: [{ name: 'id' }, { name: 'username' }], rows: [[1, 'alice']], rowCount: 1 });
			currentPool().connect.mockResolvedValueOnce(client);

			const result = await statement.query([1], NEVER_ABORTED);

			expect(result).toEqual({ columns: ['id', 'username'], rows: [[1, 'alice']] });
			expect(client.query).toHaveBeenCalledWith({
				name: 'orm_stmt_1',
				text: 'SELECT id, username FROM users WHERE id = $1',
				values: [1],
				rowMode: 'array'
			});
			expect(client.release).toHaveBeenCalledWith(false);
		});

		it('should return the affected row count', async () =>
		{
			const statement = await provider.prepare('DELETE FROM users', NEVER_ABORTED);
			const client = new pg.FakeClient();
			client.query
				.mockResolvedValueOnce({ fields: [], rows: [], rowCount: 4 })
				.mockResolvedValueOnce({ fields: [], rows: [], rowCount: null });
			currentPool().connect.mockResolvedValueOnce(client).mockResolvedValueOnce(client);

			await expect(statement.execute([], NEVER_ABORTED)).resolves.toBe(4);
			await expect(statement.execute([], NEVER_ABORTED)).resolves.toBe(0);
		});

		it('should destroy released clients beyond the idle limit', async () =>
		{
			const statement = await provider.prepare('SELECT 1', NEVER_ABORTED);
			const pool = currentPool();

			pool.idleCount = 5;
			await statement.query([], NEVER_ABORTED);
			expect(lastClient().release).toHaveBeenCalledWith(true);

			pool.waitingCount = 1;
			await statement.query([], NEVER_ABORTED);
			expect(lastClient().release).toHaveBeenCalledWith(false);
		});

		it('should destroy the client when the query is aborted', async () =>
		{
			const statement = await provider.prepare('SELECT pg_sleep(60)', NEVER_ABORTED);
			const client = new pg.FakeClient();
			client.query.mockReturnValueOnce(new Promise<FakeResult>(() => undefined));
			currentPool().connect.mockResolvedValueOnce(client);
			const controller = new AbortController();

			const pending = statement.query([], controller.signal);
			await flushPromises();
			controller.abort();

			await expect(pending).rejects.toBeInstanceOf(CanceledError);
			expect(client.release).toHaveBeenCalledWith(true);
		});

		it('should stop waiting for a connection when aborted and return a late one', async () =>
		{
			const statement = await provider.prepare('SELECT 1', NEVER_ABORTED);
			let handOver: (client: InstanceType<typeof pg.FakeClient>) => void = () => undefined;
			currentPool().connect.mockReturnValueOnce(new Promise<InstanceType<typeof pg.FakeClient>>(resolve =>
			{
				handOver = resolve;
			}));
			const controller = new AbortController();

			const pending = statement.query([], controller.signal);
			controller.abort();
			await expect(pending).rejects.toBeInstanceOf(CanceledError);

			const late = new pg.FakeClient();
			handOver(late);
			await flushPromises();

			expect(late.query).not.toHaveBeenCalled();
			expect(late.release).toHaveBeenCalledWith();
		});

		it('should refuse to run a closed statement', async () =>
		{
			const statement = await provider.prepare('SELECT 1', NEVER_ABORTED);

			await statement.close();

			await expect(statement.query([], NEVER_ABORTED)).rejects.toThrow('Prepared statement orm_stmt_1 has been closed');
		});

		it('should close a statement without touching a connection', async () =>
		{
			const statement = await provider.prepare('SELECT 1', NEVER_ABORTED);
			const pool = currentPool();
			const checkouts = pool.connect.mock.calls.length;

			await statement.close();

			expect(pool.connect.mock.calls.length).toBe(checkouts);
		});
	});

	describe('disconnect', () =>
	{
		it('should end the pool and refuse further work', async () =>
		{
			await provider.connect(LIMITS);
			const statement = await provider.prepare('SELECT 1', NEVER_ABORTED);

			await provider.disconnect();

			expect(currentPool().end).toHaveBeenCalledTimes(1);
			expect(provider.getPoolStatus()).toBeUndefined();
			await expect(statement.query([], NEVER_ABORTED)).rejects.toBeInstanceOf(PoolStateError);
			await expect(provider.connect(LIMITS)).rejects.toThrow('Cannot connect: pool is closed');
		});

		it('should do nothing for a pool that never opened', async () =>
		{
			await expect(provider.disconnect()).resolves.toBeUndefined();
			expect(pg.FakePool.instances).toEqual([]);
		});
	});

	describe('getPoolStatus', () =>
	{
		it('should report pool counts', async () =>
		{
			await provider.connect(LIMITS);
			const pool = currentPool();
			pool.totalCount = 3;
			pool.idleCount = 1;
			pool.waitingCount = 2;

			expect(provider.getPoolStatus()).toEqual({
				totalConnections: 3,
				idleConnections: 1,
				activeConnections: 2,
				waitingClients: 2,
				maxConnections: 20
			});
		});
	});
});
