import { NetworkError } from "ccxt";
import { sleep as defaultSleep, type Sleep } from "@rotator/core";

export interface RetryOptions {
	/** Additional attempts after the first one. */
	maxRetries: number;
	baseDelayMs: number;
	maxDelayMs?: number;
	sleep?: Sleep;
	isRetryable?: (error: unknown) => boolean;
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const isTransientExchangeError = (error: unknown): boolean =>
	error instanceof NetworkError;

export const backoffDelay = (
	attempt: number,
	baseDelayMs: number,
	maxDelayMs = 30_000
): number => Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);

/**
 * Run `task`, retrying transient failures with exponential backoff.
 * Non-retryable errors and the last failure are rethrown unchanged.
 */
export const withRetry = async <T>(
	task: () => Promise<T>,
	options: RetryOptions
): Promise<T> => {
	const sleep = options.sleep ?? defaultSleep;
	const isRetryable = options.isRetryable ?? isTransientExchangeError;
	let attempt = 0;
	for (;;) {
		try {
			return await task();
		} catch (error) {
			if (attempt >= options.maxRetries || !isRetryable(error)) {
				throw error;
			}
			const delayMs = backoffDelay(
				attempt,
				options.baseDelayMs,
				options.maxDelayMs
			);
			attempt += 1;
			options.onRetry?.(error, attempt, delayMs);
			await sleep(delayMs);
		}
	}
};
