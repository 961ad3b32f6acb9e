import { randomUUID } from 'crypto';
import { TxLog } from "./tx_log";
import { TxConfig } from "./tx_config";
import { ResourceManagerClient } from "./resourceManager";
import { ResourceRegistry } from "./resource_registry";
import { TransactionCoordinator } from "./coordinator";
import { RecoveryManager, RecoveryResult } from "./recovery";
import { TXState, isTerminal } from "./enums";
import { CommitResult, TransactionSnapshot } from "./model";
import { logger } from "./logger";
import { metricsCollector, CoordinatorMetrics } from "./metrics";
import {
    InvalidTransactionStateError,
    ResourceExhaustedError,
    TransactionNotFoundError,
    wrapError
} from "./errors";
import timers = require('timers/promises');

// 对应用不透明的事务句柄
export interface TransactionHandle {
    readonly id: string;
}

export type TransactionListener = (snapshot: TransactionSnapshot) => void;

export interface HealthStatus {
    healthy: boolean;
    instanceId: string;
    activeTransactions: number;
    inDoubtTransactions: number;
    resourcesCount: number;
    monitorEnabled: boolean;
    metrics: CoordinatorMetrics;
}

export class TxManager {
    // 事务日志存储模块，需要由使用方实现并完成注入
    txLog: TxLog;
    registry: ResourceRegistry;
    config: TxConfig;
    stopFlag: boolean;
    // 进行中的事务表，按事务 id 索引；每个条目只由自己的协调者修改
    private transactions = new Map<string, TransactionCoordinator>();
    // 最近结束的事务快照，供状态查询
    private finished = new Map<string, TransactionSnapshot>();
    private readonly maxFinished = 1000;
    private listeners = new Set<TransactionListener>();
    private monitorPromise: Promise<void> | null = null;
    // 停止时中断监控任务与第二阶段的重试
    private readonly lifecycle = new AbortController();
    private readonly instanceId: string;

    constructor(txLog: TxLog, config: TxConfig, registry: ResourceRegistry = new ResourceRegistry()) {
        this.txLog = txLog;
        this.config = config;
        this.registry = registry;
        this.stopFlag = false;
        this.instanceId = `txmgr_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;

        logger.info('TxManager 初始化', {
            instanceId: this.instanceId,
            enableMonitor: this.config.enableMonitor,
            timeout: this.config.timeout,
            prepareTimeout: this.config.prepareTimeout,
            maxConcurrent: this.config.maxConcurrent,
            monitorInterval: this.config.monitorInterval
        });

        if (this.config.enableMonitor) {
            this.monitorPromise = this.run();
        }
    }

    // 轮询监控任务：回滚超过存活时长仍处于 ACTIVE 的事务
    async run(): Promise<void> {
        logger.info('监控任务启动', { instanceId: this.instanceId });

        while (!this.stopFlag) {
            try {
                await timers.setTimeout(this.config.monitorInterval, undefined, { signal: this.lifecycle.signal });
            } catch (error) {
                // 停止时等待被中断
                break;
            }

            try {
                await this.abortExpired();
                metricsCollector.recordInDoubtTransactionCount(this.countInDoubt());
            } catch (error) {
                logger.error('监控任务执行异常', wrapError(error, '监控循环'), {
                    instanceId: this.instanceId
                });
            }
        }

        logger.info('监控任务停止', { instanceId: this.instanceId });
    }

    // 单方面回滚已超时的 ACTIVE 事务，返回回滚的数量
    async abortExpired(now: number = Date.now()): Promise<number> {
        const expired = Array.from(this.transactions.values()).filter(c => c.isExpired(now));
        if (expired.length === 0) {
            return 0;
        }

        logger.info('发现超时事务，开始回滚', {
            instanceId: this.instanceId,
            count: expired.length
        });

        const results = await Promise.allSettled(expired.map(async coordinator => {
            await coordinator.rollback();
            metricsCollector.recordTransactionTimedOut();
        }));

        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                logger.error('超时事务回滚失败', wrapError(result.reason, 'abortExpired'), {
                    instanceId: this.instanceId,
                    txId: expired[index].id
                });
            }
        });

        return results.filter(r => r.status === 'fulfilled').length;
    }

    // 资源管理器不能以同一 id 重复注册
    register(resource: ResourceManagerClient): void {
        this.registry.register(resource);
    }

    begin(): TransactionHandle {
        if (this.stopFlag) {
            throw new Error('TxManager 已停止，无法开启事务');
        }
        if (this.transactions.size >= this.config.maxConcurrent) {
            throw new ResourceExhaustedError(this.config.maxConcurrent);
        }

        const id = randomUUID();
        const coordinator = new TransactionCoordinator(id, {
            txLog: this.txLog,
            config: this.config,
            signal: this.lifecycle.signal,
            onStateChange: c => this.handleStateChange(c)
        }, Date.now() + this.config.timeout);

        this.transactions.set(id, coordinator);
        metricsCollector.recordTransactionBegun();

        logger.info('事务开启', {
            instanceId: this.instanceId,
            txId: id,
            activeTransactions: this.transactions.size
        });
        this.notify(coordinator);

        return { id };
    }

    enlist(handle: TransactionHandle | string, resource: ResourceManagerClient): void {
        const coordinator = this.lookup(handle);
        // 恢复流程按 id 找回参与者，因此先登记到注册表
        this.registry.register(resource);
        coordinator.enlist(resource);
        this.notify(coordinator);
    }

    async commit(handle: TransactionHandle | string): Promise<CommitResult> {
        const coordinator = this.lookup(handle);
        const result = await coordinator.commit();

        logger.info(result.success ? '事务完成（提交）' : '事务完成（回滚）', {
            instanceId: this.instanceId,
            txId: result.txId,
            state: result.state,
            pending: result.pending,
            duration: result.duration
        });

        return result;
    }

    async rollback(handle: TransactionHandle | string): Promise<void> {
        // 已回滚结束的事务再次回滚视为无操作
        if (this.finished.get(this.idOf(handle))?.state === TXState.Aborted) {
            return;
        }

        const coordinator = this.lookup(handle);
        await coordinator.rollback();
        logger.info('事务回滚', { instanceId: this.instanceId, txId: coordinator.id, state: coordinator.state });
    }

    getTransaction(txId: string): TransactionSnapshot | undefined {
        return this.transactions.get(txId)?.snapshot() ?? this.finished.get(txId);
    }

    listTransactions(): TransactionSnapshot[] {
        return Array.from(this.transactions.values()).map(c => c.snapshot());
    }

    subscribe(listener: TransactionListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // 回放事务日志，处理上一次崩溃遗留的待决事务
    async recover(): Promise<RecoveryResult> {
        const recovery = new RecoveryManager(this.txLog, this.registry, this.config, this.lifecycle.signal, {
            isActive: txId => this.transactions.has(txId),
            createDeps: () => ({
                txLog: this.txLog,
                config: this.config,
                signal: this.lifecycle.signal,
                onStateChange: c => this.handleStateChange(c)
            }),
            onRestored: coordinator => {
                this.transactions.set(coordinator.id, coordinator);
            }
        });

        return recovery.recover();
    }

    async stop(): Promise<void> {
        logger.info('开始停止 TxManager', { instanceId: this.instanceId });

        this.stopFlag = true;
        this.lifecycle.abort();

        // 等待监控任务完成
        if (this.monitorPromise) {
            try {
                await this.monitorPromise;
                logger.info('监控任务已停止', { instanceId: this.instanceId });
            } catch (error) {
                logger.error('监控任务停止异常', wrapError(error, '停止监控任务'), {
                    instanceId: this.instanceId
                });
            }
        }

        // 第二阶段的重试已被中断，未确认的事务留给下次恢复
        await Promise.all(Array.from(this.transactions.values()).map(c => c.settled()));
        metricsCollector.recordInDoubtTransactionCount(this.countInDoubt());

        // 打印最终指标
        metricsCollector.logMetricsSummary();

        logger.info('TxManager 已停止', { instanceId: this.instanceId });
    }

    // 获取健康状态
    async getHealthStatus(): Promise<HealthStatus> {
        return {
            healthy: !this.stopFlag,
            instanceId: this.instanceId,
            activeTransactions: this.transactions.size,
            inDoubtTransactions: this.countInDoubt(),
            resourcesCount: this.registry.size,
            monitorEnabled: this.config.enableMonitor,
            metrics: metricsCollector.getMetrics()
        };
    }

    private idOf(handle: TransactionHandle | string): string {
        return typeof handle === 'string' ? handle : handle.id;
    }

    private lookup(handle: TransactionHandle | string): TransactionCoordinator {
        const txId = this.idOf(handle);
        const coordinator = this.transactions.get(txId);
        if (coordinator) {
            return coordinator;
        }

        const finished = this.finished.get(txId);
        if (finished) {
            throw new InvalidTransactionStateError(txId, finished.state, TXState.Active);
        }
        throw new TransactionNotFoundError(txId);
    }

    private countInDoubt(): number {
        return Array.from(this.transactions.values()).filter(c => c.state === TXState.InDoubt).length;
    }

    private handleStateChange(coordinator: TransactionCoordinator): void {
        if (isTerminal(coordinator.state)) {
            this.transactions.delete(coordinator.id);
            this.finished.set(coordinator.id, coordinator.snapshot());
            if (this.finished.size > this.maxFinished) {
                const oldest = this.finished.keys().next();
                if (!oldest.done) {
                    this.finished.delete(oldest.value);
                }
            }
        }
        this.notify(coordinator);
    }

    private notify(coordinator: TransactionCoordinator): void {
        if (this.listeners.size === 0) {
            return;
        }
        const snapshot = coordinator.snapshot();
        for (const listener of this.listeners) {
            try {
                listener(snapshot);
            } catch (error) {
                logger.error('事务监听器异常', wrapError(error, 'listener'), { txId: coordinator.id });
            }
        }
    }
}
