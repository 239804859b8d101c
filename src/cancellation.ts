import { CanceledError, DeadlineExceededError, OrmError } from './errors';

/**
 * Signal used when the caller supplies none. It never aborts.
 */
export const NEVER_ABORTED: AbortSignal = new AbortController().signal;

function isTimeoutReason(reason: unknown): boolean
{
	return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';
}

/**
 * Maps the reason of an aborted signal to `DeadlineExceededError` (timeouts,
 * e.g. `AbortSignal.timeout`) or `CanceledError` (everything else).
 */
export function abortError(signal: AbortSignal): OrmError
{
	const reason: unknown = signal.reason;
	if (reason instanceof CanceledError || reason instanceof DeadlineExceededError)
	{
		return reason;
	}
	if (isTimeoutReason(reason))
	{
		return new DeadlineExceededError('Deadline exceeded', reason);
	}
	return new CanceledError('Operation canceled', reason);
}

export function throwIfAborted(signal: AbortSignal): void
{
	if (signal.aborted)
	{
		throw abortError(signal);
	}
}

/**
 * Settles with `promise`, or rejects with the abort error as soon as `signal`
 * aborts. A value that arrives after the abort is handed to `onAbandoned` so
 * resources such as checked-out clients are not leaked; a late rejection is
 * dropped since the caller has already been answered.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, onAbandoned?: (value: T) => void): Promise<T>
{
	// Shared by every builder without a signal; a listener on it would never fire.
	if (signal === NEVER_ABORTED)
	{
		return promise;
	}

	return new Promise<T>((resolve, reject) =>
	{
		let settled = false;

		const onAbort = () =>
		{
			if (settled) return;
			settled = true;
			reject(abortError(signal));
		};

		void promise.then(
			value =>
			{
				signal.removeEventListener('abort', onAbort);
				if (settled)
				{
					onAbandoned?.(value);
					return;
				}
				settled = true;
				resolve(value);
			},
			(error: unknown) =>
			{
				signal.removeEventListener('abort', onAbort);
				if (settled) return;
				settled = true;
				reject(error);
			},
		);

		if (signal.aborted)
		{
			onAbort();
		}
		else
		{
			signal.addEventListener('abort', onAbort, { once: true });
		}
	});
}
