import { TxLog, LogAnalysis, analyzeLog, groupByTransaction } from './tx_log';
import { TxConfig } from './tx_config';
import { ResourceRegistry } from './resource_registry';
import { ResourceManagerClient } from './resourceManager';
import { TransactionCoordinator, CoordinatorDeps } from './coordinator';
import { Decision, LogPhase } from './enums';
import { logger } from './logger';
import { metricsCollector } from './metrics';
import { RecoveryAmbiguityError, wrapError } from './errors';

export interface RecoveryResult {
    committed: string[];
    aborted: string[];
    // 仍未解决的事务：参与者未注册，或第二阶段被中断
    pending: string[];
    // 日志中已完整结束的事务
    completed: string[];
}

export interface RecoveryHooks {
    // 本进程中仍由协调者持有的事务不参与恢复
    isActive?: (txId: string) => boolean;
    createDeps?: () => CoordinatorDeps;
    onRestored?: (coordinator: TransactionCoordinator) => void;
}

interface RecoveryPlan {
    txId: string;
    decision: Decision;
    coordinator: TransactionCoordinator;
}

interface RecoveryJob {
    txId: string;
    decision: Decision;
    finished: boolean;
}

export class RecoveryManager {
    private txLog: TxLog;
    private registry: ResourceRegistry;
    private config: TxConfig;
    private signal: AbortSignal;
    private hooks: RecoveryHooks;

    constructor(txLog: TxLog, registry: ResourceRegistry, config: TxConfig, signal: AbortSignal, hooks: RecoveryHooks = {}) {
        this.txLog = txLog;
        this.registry = registry;
        this.config = config;
        this.signal = signal;
        this.hooks = hooks;
    }

    async recover(): Promise<RecoveryResult> {
        const result: RecoveryResult = { committed: [], aborted: [], pending: [], completed: [] };

        await this.txLog.lock(this.config.timeout);
        try {
            const records = await this.txLog.readAll();
            // 先校验全部日志，任何一笔无法解释都终止恢复
            const analyses = Array.from(groupByTransaction(records)).map(([txId, txRecords]) => analyzeLog(txId, txRecords));

            logger.info('开始恢复', { transactions: analyses.length, records: records.length });

            // 决议按顺序落盘，第二阶段各事务并发进行，互不阻塞
            const jobs: Array<Promise<RecoveryJob>> = [];
            for (const analysis of analyses) {
                const plan = await this.plan(analysis, result);
                if (plan) {
                    jobs.push(this.run(plan));
                }
            }

            for (const job of await Promise.all(jobs)) {
                if (!job.finished) {
                    result.pending.push(job.txId);
                } else if (job.decision === Decision.Commit) {
                    result.committed.push(job.txId);
                    metricsCollector.recordRecovered(true);
                } else {
                    result.aborted.push(job.txId);
                    metricsCollector.recordRecovered(false);
                }
            }

            metricsCollector.recordInDoubtTransactionCount(result.pending.length);
            logger.info('恢复完成', {
                committed: result.committed.length,
                aborted: result.aborted.length,
                pending: result.pending.length,
                completed: result.completed.length
            });

            return result;

        } catch (error) {
            if (error instanceof RecoveryAmbiguityError) {
                logger.error('事务日志无法解释，需要人工介入', error, { txId: error.txId });
            }
            throw error;
        } finally {
            try {
                await this.txLog.unlock();
            } catch (unlockError) {
                logger.error('释放锁失败', wrapError(unlockError, 'recover'));
            }
        }
    }

    private async plan(analysis: LogAnalysis, result: RecoveryResult): Promise<RecoveryPlan | null> {
        const txId = analysis.transactionId;

        if (this.hooks.isActive?.(txId)) {
            logger.debug('事务仍由协调者处理，跳过', { txId });
            return null;
        }

        if (analysis.complete) {
            result.completed.push(txId);
            if (this.config.compactLog) {
                await this.txLog.compact(txId);
            }
            return null;
        }

        const resources: ResourceManagerClient[] = [];
        const missing: string[] = [];
        for (const resourceId of analysis.participants) {
            const resource = this.registry.get(resourceId);
            if (resource) {
                resources.push(resource);
            } else {
                missing.push(resourceId);
            }
        }

        if (missing.length > 0) {
            logger.error('待决事务的参与者未注册，暂无法恢复', undefined, { txId, missing });
            result.pending.push(txId);
            return null;
        }

        // 没有决议记录说明崩溃发生在第一阶段，一律回滚；绝不重新询问投票
        let decision = analysis.decision;
        if (!decision) {
            await this.append(txId, LogPhase.AbortDecision, analysis.participants);
            decision = Decision.Abort;
        } else if (!analysis.loggedDecision) {
            await this.append(txId, LogPhase.CommitDecision, analysis.participants);
        }

        logger.info('恢复待决事务', { txId, decision, participants: analysis.participants });

        const coordinator = TransactionCoordinator.restore(txId, resources, decision, this.createDeps());
        this.hooks.onRestored?.(coordinator);

        return { txId, decision, coordinator };
    }

    private async run(plan: RecoveryPlan): Promise<RecoveryJob> {
        const finished = await plan.coordinator.resume();
        return { txId: plan.txId, decision: plan.decision, finished };
    }

    private async append(txId: string, phase: LogPhase, participants: string[]): Promise<void> {
        await this.txLog.append({ transactionId: txId, phase, timestamp: Date.now(), participants });
    }

    private createDeps(): CoordinatorDeps {
        return this.hooks.createDeps?.() ?? {
            txLog: this.txLog,
            config: this.config,
            signal: this.signal
        };
    }
}
