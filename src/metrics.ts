import { logger } from './logger';

export interface CoordinatorMetrics {
    transactionBegun: number;
    transactionCommitted: number;
    transactionAborted: number;
    transactionTimedOut: number;
    voteYes: number;
    voteNo: number;
    prepareTimeout: number;
    phase2Ack: number;
    phase2Retry: number;
    phase2Escalation: number;
    recoveredCommitted: number;
    recoveredAborted: number;
    averageTransactionDuration: number;
    inDoubtTransactionCount: number;
}

export interface MetricsCollector {
    recordTransactionBegun(): void;
    recordTransactionCommitted(durationMs: number): void;
    recordTransactionAborted(durationMs: number): void;
    recordTransactionTimedOut(): void;
    recordVote(resourceId: string, yes: boolean): void;
    recordPrepareTimeout(resourceId: string): void;
    recordPhase2Ack(resourceId: string): void;
    recordPhase2Retry(resourceId: string): void;
    recordPhase2Escalation(resourceId: string): void;
    recordRecovered(committed: boolean): void;
    recordInDoubtTransactionCount(count: number): void;
    getMetrics(): CoordinatorMetrics;
    reset(): void;
}

function emptyMetrics(): CoordinatorMetrics {
    return {
        transactionBegun: 0,
        transactionCommitted: 0,
        transactionAborted: 0,
        transactionTimedOut: 0,
        voteYes: 0,
        voteNo: 0,
        prepareTimeout: 0,
        phase2Ack: 0,
        phase2Retry: 0,
        phase2Escalation: 0,
        recoveredCommitted: 0,
        recoveredAborted: 0,
        averageTransactionDuration: 0,
        inDoubtTransactionCount: 0
    };
}

export class InMemoryMetricsCollector implements MetricsCollector {
    private metrics: CoordinatorMetrics = emptyMetrics();
    private transactionDurations: number[] = [];
    private readonly maxDurationSamples = 1000; // 保留最近1000个样本

    reset(): void {
        this.metrics = emptyMetrics();
        this.transactionDurations = [];
    }

    recordTransactionBegun(): void {
        this.metrics.transactionBegun++;
    }

    recordTransactionCommitted(durationMs: number): void {
        this.metrics.transactionCommitted++;
        this.recordDuration(durationMs);
    }

    recordTransactionAborted(durationMs: number): void {
        this.metrics.transactionAborted++;
        this.recordDuration(durationMs);
    }

    recordTransactionTimedOut(): void {
        this.metrics.transactionTimedOut++;
    }

    recordVote(resourceId: string, yes: boolean): void {
        if (yes) {
            this.metrics.voteYes++;
        } else {
            this.metrics.voteNo++;
        }
    }

    recordPrepareTimeout(resourceId: string): void {
        this.metrics.prepareTimeout++;
    }

    recordPhase2Ack(resourceId: string): void {
        this.metrics.phase2Ack++;
    }

    recordPhase2Retry(resourceId: string): void {
        this.metrics.phase2Retry++;
        logger.debug('第二阶段重试记录', { resourceId });
    }

    recordPhase2Escalation(resourceId: string): void {
        this.metrics.phase2Escalation++;
    }

    recordRecovered(committed: boolean): void {
        if (committed) {
            this.metrics.recoveredCommitted++;
        } else {
            this.metrics.recoveredAborted++;
        }
    }

    recordInDoubtTransactionCount(count: number): void {
        this.metrics.inDoubtTransactionCount = count;
    }

    private recordDuration(durationMs: number): void {
        this.transactionDurations.push(durationMs);

        // 保持样本数量在限制内
        if (this.transactionDurations.length > this.maxDurationSamples) {
            this.transactionDurations.shift();
        }

        this.metrics.averageTransactionDuration =
            this.transactionDurations.reduce((sum, d) => sum + d, 0) / this.transactionDurations.length;
    }

    getMetrics(): CoordinatorMetrics {
        return { ...this.metrics };
    }

    // 获取提交率
    getCommitRate(): number {
        const total = this.metrics.transactionCommitted + this.metrics.transactionAborted;
        return total > 0 ? this.metrics.transactionCommitted / total : 0;
    }

    // 打印指标摘要
    logMetricsSummary(): void {
        const metrics = this.getMetrics();

        logger.info('2PC 事务指标摘要', {
            总事务数: metrics.transactionBegun,
            提交数: metrics.transactionCommitted,
            回滚数: metrics.transactionAborted,
            超时数: metrics.transactionTimedOut,
            提交率: `${(this.getCommitRate() * 100).toFixed(2)}%`,
            平均耗时: `${metrics.averageTransactionDuration.toFixed(2)}ms`,
            第二阶段重试次数: metrics.phase2Retry,
            待决事务数: metrics.inDoubtTransactionCount
        });
    }
}

// 全局指标收集器
export const metricsCollector = new InMemoryMetricsCollector();
