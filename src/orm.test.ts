import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Orm } from './orm';
import { Repository } from './repository';
import { CleanupError, InvalidArgumentError, PoolStateError } from './errors';
import { FakeProvider } from './__tests__/fakeProvider';

describe('Orm', () =>
{
	let provider: FakeProvider;

	beforeEach(() =>
	{
		provider = new FakeProvider();
	});

	describe('open', () =>
	{
		it('should connect the provider with the default limits', async () =>
		{
			const orm = new Orm(provider);
			expect(orm.getState()).toBe('uninitialized');

			await orm.open();

			expect(orm.getState()).toBe('open');
			expect(provider.limits).toEqual({
				maxOpenConnections: 20,
				maxIdleConnections: 5,
				connectionMaxLifetimeMs: 3_600_000
			});
			expect(orm.getConfig().queryLog).toBe(true);
		});

		it('should pass configured limits to the provider', async () =>
		{
			await Orm.connect(provider, { maxOpenConnections: 4, maxIdleConnections: 2, connectionMaxLifetimeMs: 60_000 });

			expect(provider.limits).toEqual({
				maxOpenConnections: 4,
				maxIdleConnections: 2,
				connectionMaxLifetimeMs: 60_000
			});
		});

		it('should open only once', async () =>
		{
			const orm = await Orm.connect(provider, { queryLog: false });
			const connect = vi.spyOn(provider, 'connect');

			await expect(orm.open()).rejects.toThrow('Cannot open: pool is open');
			expect(connect).not.toHaveBeenCalled();
		});

		it('should not reopen a closed pool', async () =>
		{
			const orm = await Orm.connect(provider, { queryLog: false });
			await orm.close();

			await expect(orm.open()).rejects.toBeInstanceOf(PoolStateError);
		});

		it('should stay uninitialized when the provider fails to connect', async () =>
		{
			const failure = new Error('ECONNREFUSED');
			vi.spyOn(provider, 'connect').mockRejectedValueOnce(failure);
			const orm = new Orm(provider, { queryLog: false });

			await expect(orm.open()).rejects.toBe(failure);
			expect(orm.getState()).toBe('uninitialized');
		});

		it('should connect once when opened concurrently', async () =>
		{
			let finishConnect: () => void = () => undefined;
			provider.connectGate = new Promise<void>(resolve =>
			{
				finishConnect = resolve;
			});
			const orm = new Orm(provider, { queryLog: false });

			const first = orm.open();
			const second = orm.open();
			expect(orm.getState()).toBe('opening');
			finishConnect();

			await expect(first).resolves.toBeUndefined();
			await expect(second).rejects.toThrow('Cannot open: pool is opening');
			expect(provider.connectCalls).toBe(1);
			expect(orm.getState()).toBe('open');
		});

		it('should not finish opening a pool closed while connecting', async () =>
		{
			let finishConnect: () => void = () => undefined;
			provider.connectGate = new Promise<void>(resolve =>
			{
				finishConnect = resolve;
			});
			const orm = new Orm(provider, { queryLog: false });

			const opening = orm.open();
			await orm.close();
			finishConnect();

			await expect(opening).rejects.toThrow('Cannot open: pool is closed');
			expect(orm.getState()).toBe('closed');
		});

		it('should reject invalid limits', () =>
		{
			expect(() => new Orm(provider, { maxOpenConnections: 0 })).toThrow(InvalidArgumentError);
			expect(() => new Orm(provider, { maxOpenConnections: 2, maxIdleConnections: 3 })).toThrow(InvalidArgumentError);
		});
	});

	it('should reject queries before the pool is open', async () =>
	{
		const orm = new Orm(provider, { queryLog: false });

		await expect(orm.table('users').get()).rejects.toThrow('Cannot get: pool is uninitialized');
		expect(provider.prepared).toEqual([]);
	});

	it('should report pool status from the provider', async () =>
	{
		const orm = new Orm(provider, { maxOpenConnections: 8, maxIdleConnections: 2, queryLog: false });
		expect(orm.getPoolStatus()).toBeUndefined();

		await orm.open();

		expect(orm.getPoolStatus()).toEqual({
			totalConnections: 0,
			idleConnections: 0,
			activeConnections: 0,
			waitingClients: 0,
			maxConnections: 8
		});
	});

	it('should create repositories bound to a table', async () =>
	{
		const orm = await Orm.connect(provider, { queryLog: false });

		const repository = orm.repository<{ id: number }>('users');

		expect(repository).toBeInstanceOf(Repository);
		expect(repository.getTable()).toBe('users');
	});

	describe('cleanup', () =>
	{
		it('should release cached statements and keep the pool open', async () =>
		{
			const orm = await Orm.connect(provider, { queryLog: false });
			await orm.table('users').get();

			await orm.cleanup();

			expect(orm.getCachedStatementCount()).toBe(0);
			expect(provider.statements[0].closed).toBe(true);
			expect(orm.getState()).toBe('open');
			await expect(orm.table('users').get()).resolves.toEqual([]);
		});
	});

	describe('close', () =>
	{
		it('should release statements, disconnect and end closed', async () =>
		{
			const orm = await Orm.connect(provider, { queryLog: false });
			await orm.table('users').get();

			await orm.close();

			expect(provider.statements[0].closed).toBe(true);
			expect(provider.disconnectCalls).toBe(1);
			expect(orm.getState()).toBe('closed');
			expect(orm.getCachedStatementCount()).toBe(0);
		});

		it('should do nothing when already closed', async () =>
		{
			const orm = await Orm.connect(provider, { queryLog: false });

			await orm.close();
			await orm.close();

			expect(provider.disconnectCalls).toBe(1);
		});

		it('should report every failure together and still close', async () =>
		{
			vi.spyOn(console, 'error').mockImplementation(() => undefined);
			const orm = await Orm.connect(provider, { queryLog: false });
			await orm.table('users').get();
			provider.statements[0].closeError = new Error('broken pipe');
			provider.disconnectError = new Error('connection terminated');

			const error = await orm.close().catch((e: unknown) => e);

			expect(error).toBeInstanceOf(CleanupError);
			if (!(error instanceof CleanupError)) return;
			expect(error.errors.map(e => e.message)).toEqual([
				'Failed to close statement for query "SELECT users.* FROM users": broken pipe',
				'connection terminated'
			]);
			expect(provider.disconnectCalls).toBe(1);
			expect(orm.getState()).toBe('closed');
			vi.restoreAllMocks();
		});
	});
});
