import timers = require('timers/promises');
import { logger, LogContext } from './logger';

export interface RetryConfig {
    // Infinity 表示无限重试
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    jitterMs?: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
    jitterMs: 100
};

export interface RetryOptions {
    signal?: AbortSignal;
    // 每次可重试的失败后回调，attempt 从 1 开始
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export class RetryableError extends Error {
    constructor(message: string, public readonly cause?: Error) {
        super(message);
        this.name = 'RetryableError';
    }
}

export class RetryAbortedError extends Error {
    constructor(message: string, public readonly cause?: Error) {
        super(message);
        this.name = 'RetryAbortedError';
    }
}

export function computeBackoffDelay(config: RetryConfig, attempt: number): number {
    const delay = Math.min(
        config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt),
        config.maxDelayMs
    );
    const jitter = config.jitterMs ? Math.random() * config.jitterMs : 0;
    return delay + jitter;
}

export async function withRetry<T>(
    operation: () => Promise<T>,
    config: Partial<RetryConfig> = {},
    context?: LogContext,
    options: RetryOptions = {}
): Promise<T> {
    const finalConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
    const { signal, onRetry } = options;

    for (let attempt = 0; ; attempt++) {
        if (signal?.aborted) {
            throw new RetryAbortedError('操作已取消');
        }

        try {
            if (attempt > 0) {
                logger.debug(`重试操作，第 ${attempt} 次尝试`, context);
            }

            return await operation();
        } catch (error) {
            const lastError = error instanceof Error ? error : new Error(String(error));

            // 如果不是可重试错误，直接抛出
            if (!(error instanceof RetryableError)) {
                logger.error(`操作失败，不可重试`, lastError, context);
                throw error;
            }

            // 如果已经达到最大重试次数，抛出错误
            if (attempt >= finalConfig.maxRetries) {
                logger.error(`操作失败，已达到最大重试次数 ${finalConfig.maxRetries}`, lastError, context);
                throw lastError;
            }

            const finalDelay = computeBackoffDelay(finalConfig, attempt);
            // 提供 onRetry 时由调用方记录失败
            if (onRetry) {
                onRetry(attempt + 1, lastError, finalDelay);
            } else {
                logger.warn(`操作失败，${finalDelay}ms 后重试`, { ...context, attempt, delay: finalDelay, error: lastError.message });
            }

            try {
                await timers.setTimeout(finalDelay, undefined, { signal });
            } catch (sleepError) {
                throw new RetryAbortedError('重试等待期间操作被取消', lastError);
            }
        }
    }
}
