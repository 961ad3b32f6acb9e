import { RetryConfig } from "./retry";

export interface TxConfigOptions {
    // ACTIVE 事务的存活时长，超过后可被单方面回滚，单位毫秒
    timeout: number;
    // 单个参与者 prepare 的超时时长
    prepareTimeout: number;
    // commit 调用方等待第二阶段确认的时长，0 表示一直等待
    commitWaitTimeout: number;
    // 并发事务上限
    maxConcurrent: number;
    // 轮询监控任务间隔时长
    monitorInterval: number;
    // 是否启用轮询监控任务
    enableMonitor: boolean;
    // PHASE2_COMPLETE 落盘后是否删除该事务的日志
    compactLog: boolean;
    // 第二阶段重试策略，maxRetries 通常为 Infinity
    phase2Retry: RetryConfig;
    // 第二阶段连续失败多少次后升级告警，0 表示不升级
    escalateAfterAttempts: number;
}

export const DEFAULT_PHASE2_RETRY: RetryConfig = {
    maxRetries: Infinity,
    baseDelayMs: 500,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
    jitterMs: 100
};

export class TxConfig implements TxConfigOptions {
    timeout: number;
    prepareTimeout: number;
    commitWaitTimeout: number;
    maxConcurrent: number;
    monitorInterval: number;
    enableMonitor: boolean;
    compactLog: boolean;
    phase2Retry: RetryConfig;
    escalateAfterAttempts: number;

    constructor(options: Partial<TxConfigOptions> = {}) {
        this.timeout = options.timeout && options.timeout > 0 ? options.timeout : 30000;
        this.prepareTimeout = options.prepareTimeout && options.prepareTimeout > 0 ? options.prepareTimeout : 5000;
        this.commitWaitTimeout = options.commitWaitTimeout && options.commitWaitTimeout > 0 ? options.commitWaitTimeout : 0;
        this.maxConcurrent = options.maxConcurrent && options.maxConcurrent > 0 ? options.maxConcurrent : 1000;
        this.monitorInterval = options.monitorInterval && options.monitorInterval > 0 ? options.monitorInterval : 1000;
        this.enableMonitor = options.enableMonitor ?? true;
        this.compactLog = options.compactLog ?? true;
        this.phase2Retry = { ...DEFAULT_PHASE2_RETRY, ...options.phase2Retry };
        this.escalateAfterAttempts = options.escalateAfterAttempts !== undefined && options.escalateAfterAttempts >= 0
            ? options.escalateAfterAttempts
            : 10;
    }
}
