import dayjs from 'dayjs';
import { TxLog } from './tx_log';
import { TxConfig } from './tx_config';
import { ResourceManagerClient } from './resourceManager';
import { Decision, LogPhase, TXState, Vote, isTerminal } from './enums';
import { CommitResult, ParticipantRecord, Transaction, TransactionSnapshot } from './model';
import { logger, LogContext } from './logger';
import { metricsCollector } from './metrics';
import { withRetry, RetryableError } from './retry';
import { withTimeout } from './timeout';
import {
    EnlistmentError,
    InvalidTransactionStateError,
    ParticipantUnreachableError,
    PrepareTimeoutError,
    StorageError,
    wrapError
} from './errors';

export interface CoordinatorDeps {
    txLog: TxLog;
    config: TxConfig;
    // 协调者停止时触发，第二阶段的重试随之中断，事务进入 IN_DOUBT
    signal: AbortSignal;
    onStateChange?: (coordinator: TransactionCoordinator) => void;
}

// 单笔全局事务的两阶段提交状态机
export class TransactionCoordinator {
    readonly id: string;
    private transaction: Transaction;
    private resources = new Map<string, ResourceManagerClient>();
    private deps: CoordinatorDeps;
    private abortRequested = false;
    // 至少有一条日志落盘后才写 PHASE2_COMPLETE，否则恢复时无法解释
    private logStarted = false;
    private decisionPromise: Promise<Decision> | null = null;
    private completion: Promise<boolean> | null = null;

    constructor(id: string, deps: CoordinatorDeps, timeoutDeadline: number) {
        this.id = id;
        this.deps = deps;
        this.transaction = {
            id,
            state: TXState.Active,
            participants: [],
            timeoutDeadline,
            createdAt: Date.now()
        };
    }

    // 恢复流程使用：按日志中的决议重建一个 IN_DOUBT 的协调者，不再进行投票
    static restore(
        id: string,
        resources: ResourceManagerClient[],
        decision: Decision,
        deps: CoordinatorDeps
    ): TransactionCoordinator {
        const coordinator = new TransactionCoordinator(id, deps, 0);
        for (const resource of resources) {
            coordinator.addParticipant(resource);
        }
        coordinator.transaction.state = TXState.InDoubt;
        coordinator.transaction.decision = decision;
        coordinator.logStarted = true;
        coordinator.decisionPromise = Promise.resolve(decision);
        return coordinator;
    }

    get state(): TXState {
        return this.transaction.state;
    }

    get decision(): Decision | undefined {
        return this.transaction.decision;
    }

    get participantIds(): string[] {
        return this.transaction.participants.map(p => p.resourceId);
    }

    snapshot(): TransactionSnapshot {
        const format = (ms: number) => dayjs(ms).format('YYYY-MM-DD HH:mm:ss.SSS');
        return {
            id: this.id,
            state: this.transaction.state,
            decision: this.transaction.decision,
            participants: this.transaction.participants.map(p => ({ ...p })),
            timeoutDeadline: format(this.transaction.timeoutDeadline),
            createdAt: format(this.transaction.createdAt)
        };
    }

    isExpired(now: number = Date.now()): boolean {
        return this.transaction.state === TXState.Active && now >= this.transaction.timeoutDeadline;
    }

    enlist(resource: ResourceManagerClient): void {
        if (this.transaction.state !== TXState.Active) {
            throw new EnlistmentError(this.id, resource.id, this.transaction.state);
        }
        if (this.resources.has(resource.id)) {
            logger.debug('参与者已加入事务，忽略', this.context({ resourceId: resource.id }));
            return;
        }

        this.addParticipant(resource);
        logger.debug('参与者加入事务', this.context({
            resourceId: resource.id,
            participantCount: this.transaction.participants.length
        }));
    }

    async commit(): Promise<CommitResult> {
        if (this.transaction.state !== TXState.Active) {
            throw new InvalidTransactionStateError(this.id, this.transaction.state, TXState.Active);
        }

        this.setState(TXState.Preparing);
        const decision = await this.startProtocol();
        const finished = await this.waitForPhase2(this.deps.config.commitWaitTimeout);

        return {
            txId: this.id,
            success: decision === Decision.Commit,
            state: this.transaction.state,
            pending: !finished,
            duration: Date.now() - this.transaction.createdAt
        };
    }

    async rollback(): Promise<void> {
        switch (this.transaction.state) {
            case TXState.Active:
                await this.rollbackSinglePhase();
                return;

            case TXState.Preparing: {
                // 投票收齐后由协议检查
                this.abortRequested = true;
                logger.info('准备阶段收到回滚请求', this.context());
                await this.awaitDecision();
                await this.waitForPhase2(this.deps.config.commitWaitTimeout);
                return;
            }

            case TXState.Aborting:
            case TXState.Aborted:
                return;

            default:
                throw new InvalidTransactionStateError(this.id, this.transaction.state, TXState.Active);
        }
    }

    // 恢复流程使用：按已记录的决议重新执行第二阶段，返回是否全部确认
    async resume(): Promise<boolean> {
        if (this.transaction.state !== TXState.InDoubt || !this.transaction.decision) {
            throw new InvalidTransactionStateError(this.id, this.transaction.state, TXState.InDoubt);
        }

        logger.info('恢复待决事务', this.context({ decision: this.transaction.decision }));
        this.completion = this.runPhase2(this.transaction.decision);
        return this.completion;
    }

    // 等待当前协议（若有）结束，不抛出
    async settled(): Promise<void> {
        try {
            await this.decisionPromise;
        } catch (error) {
            logger.debug('事务在做出决议前失败', this.context({ error: wrapError(error, 'settled').message }));
        }
        await this.completion;
    }

    private addParticipant(resource: ResourceManagerClient): void {
        this.resources.set(resource.id, resource);
        this.transaction.participants.push({
            resourceId: resource.id,
            vote: Vote.Unknown,
            ackReceived: false
        });
    }

    private startProtocol(): Promise<Decision> {
        // 决议做出后立即启动第二阶段，保证任何等待决议的调用方都能拿到 completion
        this.decisionPromise = this.runPrepare().then(decision => {
            this.completion = this.runPhase2(decision);
            return decision;
        });
        return this.decisionPromise;
    }

    private async awaitDecision(): Promise<Decision> {
        if (!this.decisionPromise) {
            throw new InvalidTransactionStateError(this.id, this.transaction.state, TXState.Preparing);
        }
        try {
            return await this.decisionPromise;
        } catch (error) {
            // PREPARE_START 未能落盘，事务已单阶段回滚
            return Decision.Abort;
        }
    }

    private async rollbackSinglePhase(): Promise<void> {
        this.abortRequested = true;
        this.transaction.decision = Decision.Abort;
        this.setState(TXState.Aborting);
        this.decisionPromise = Promise.resolve(Decision.Abort);

        try {
            await this.appendLog(LogPhase.AbortDecision, true);
        } catch (error) {
            // 参与者从未 prepare，没有记录也不会产生待决事务
            logger.error('ABORT_DECISION 写入失败，继续单阶段回滚', wrapError(error, 'rollback'), this.context());
        }

        this.completion = this.runPhase2(Decision.Abort);
        await this.waitForPhase2(this.deps.config.commitWaitTimeout);
    }

    private async runPrepare(): Promise<Decision> {
        try {
            await this.appendLog(LogPhase.PrepareStart, true);
        } catch (error) {
            const storageError = new StorageError('PREPARE_START', wrapError(error, 'PREPARE_START'));
            logger.error('PREPARE_START 写入失败，单阶段回滚', storageError, this.context());
            this.transaction.decision = Decision.Abort;
            this.setState(TXState.Aborting);
            this.completion = this.runPhase2(Decision.Abort);
            await this.completion;
            throw storageError;
        }

        logger.info('开始 prepare 阶段', this.context({ participantCount: this.transaction.participants.length }));

        const votes = await Promise.all(this.transaction.participants.map(p => this.collectVote(p)));
        let decision = votes.every(yes => yes) && !this.abortRequested ? Decision.Commit : Decision.Abort;

        if (decision === Decision.Commit) {
            // 提交点：进入 PREPARED 后不再接受回滚请求，ALL_PREPARED 落盘即意味着提交
            this.setState(TXState.Prepared);
            try {
                await this.appendLog(LogPhase.AllPrepared, false);
            } catch (error) {
                logger.error('ALL_PREPARED 写入失败，改为回滚', wrapError(error, 'ALL_PREPARED'), this.context());
                decision = Decision.Abort;
            }
        }

        if (decision === Decision.Commit) {
            try {
                await this.appendLog(LogPhase.CommitDecision, true);
            } catch (error) {
                logger.warn('COMMIT_DECISION 写入失败，ALL_PREPARED 已落盘，继续提交', this.context({
                    error: wrapError(error, 'COMMIT_DECISION').message
                }));
            }
        } else {
            try {
                await this.appendLog(LogPhase.AbortDecision, true);
            } catch (error) {
                // 没有提交决议落盘，恢复时同样会回滚
                logger.error('ABORT_DECISION 写入失败', wrapError(error, 'ABORT_DECISION'), this.context());
            }
        }

        this.transaction.decision = decision;
        this.setState(decision === Decision.Commit ? TXState.Committing : TXState.Aborting);
        logger.info('事务决议已做出', this.context({ decision }));
        return decision;
    }

    // 收集单个参与者的投票；异常与超时都视为反对票
    private async collectVote(record: ParticipantRecord): Promise<boolean> {
        const resource = this.resources.get(record.resourceId);
        const context = this.context({ resourceId: record.resourceId });
        const timeoutMs = this.deps.config.prepareTimeout;

        let vote = Vote.No;
        if (resource) {
            try {
                const result = await withTimeout(
                    Promise.resolve().then(() => resource.prepare(this.id)),
                    timeoutMs,
                    () => new PrepareTimeoutError(record.resourceId, timeoutMs)
                );
                vote = result === Vote.Yes ? Vote.Yes : Vote.No;
            } catch (error) {
                if (error instanceof PrepareTimeoutError) {
                    metricsCollector.recordPrepareTimeout(record.resourceId);
                    logger.warn('参与者 prepare 超时，视为反对票', { ...context, timeoutMs });
                } else {
                    logger.warn('参与者 prepare 失败，视为反对票', {
                        ...context,
                        error: wrapError(error, 'prepare').message
                    });
                }
            }
        }

        // 投票只能从 UNKNOWN 变化一次
        if (record.vote === Vote.Unknown) {
            record.vote = vote;
        }
        metricsCollector.recordVote(record.resourceId, record.vote === Vote.Yes);
        logger.debug('收到参与者投票', { ...context, vote: record.vote });
        return record.vote === Vote.Yes;
    }

    // 第二阶段：向全部参与者并发下发决议，直到全部确认或协调者停止；不会 reject
    private async runPhase2(decision: Decision): Promise<boolean> {
        const context = this.context({ decision });
        const results = await Promise.allSettled(
            this.transaction.participants.map(p => this.deliver(p, decision))
        );

        const interrupted = results.filter(r => r.status === 'rejected');
        if (interrupted.length > 0) {
            this.setState(TXState.InDoubt);
            logger.warn('第二阶段被中断，事务待决', {
                ...context,
                unacknowledged: this.transaction.participants.filter(p => !p.ackReceived).map(p => p.resourceId)
            });
            return false;
        }

        let completeLogged = false;
        if (this.logStarted) {
            try {
                await this.appendLog(LogPhase.Phase2Complete, false);
                completeLogged = true;
            } catch (error) {
                // 恢复时会按已记录的决议再次幂等下发
                logger.error('PHASE2_COMPLETE 写入失败', wrapError(error, 'PHASE2_COMPLETE'), context);
            }
        }

        if (completeLogged && this.deps.config.compactLog) {
            try {
                await this.deps.txLog.compact(this.id);
            } catch (error) {
                logger.warn('事务日志压缩失败', { ...context, error: wrapError(error, 'compact').message });
            }
        }

        const duration = Date.now() - this.transaction.createdAt;
        if (decision === Decision.Commit) {
            metricsCollector.recordTransactionCommitted(duration);
        } else {
            metricsCollector.recordTransactionAborted(duration);
        }

        this.setState(decision === Decision.Commit ? TXState.Committed : TXState.Aborted);
        logger.info('事务第二阶段完成', { ...context, duration });
        return true;
    }

    // 向单个参与者投递决议，按指数退避无限重试直到确认
    private async deliver(record: ParticipantRecord, decision: Decision): Promise<void> {
        const resource = this.resources.get(record.resourceId);
        if (!resource) {
            throw new InvalidTransactionStateError(this.id, this.transaction.state, `participant ${record.resourceId}`);
        }

        const context = this.context({ resourceId: record.resourceId, decision });
        const escalateAfter = this.deps.config.escalateAfterAttempts;
        let escalated = false;

        await withRetry(async () => {
            try {
                if (decision === Decision.Commit) {
                    await resource.commit(this.id);
                } else {
                    await resource.rollback(this.id);
                }
            } catch (error) {
                throw new RetryableError(`参与者 ${record.resourceId} 第二阶段失败`, wrapError(error, 'phase2'));
            }
        }, this.deps.config.phase2Retry, context, {
            signal: this.deps.signal,
            onRetry: (attempt, error, delay) => {
                const signal = new ParticipantUnreachableError(record.resourceId, attempt, error);
                metricsCollector.recordPhase2Retry(record.resourceId);
                logger.warn(signal.message, { ...context, code: signal.code, attempt, delay });

                if (!escalated && escalateAfter > 0 && attempt >= escalateAfter) {
                    escalated = true;
                    metricsCollector.recordPhase2Escalation(record.resourceId);
                    logger.error('第二阶段投递持续失败，需要人工关注', signal, context);
                }
            }
        });

        record.ackReceived = true;
        metricsCollector.recordPhase2Ack(record.resourceId);
        logger.debug('参与者已确认', context);
    }

    private async waitForPhase2(timeoutMs: number): Promise<boolean> {
        const completion = this.completion;
        if (!completion) {
            return false;
        }
        if (timeoutMs <= 0) {
            return completion;
        }

        try {
            return await withTimeout(completion, timeoutMs, () => new Error('phase2 wait timeout'));
        } catch (error) {
            logger.info('第二阶段仍在后台进行', this.context({ waitedMs: timeoutMs }));
            return false;
        }
    }

    private async appendLog(phase: LogPhase, withParticipants: boolean): Promise<void> {
        await this.deps.txLog.append({
            transactionId: this.id,
            phase,
            timestamp: Date.now(),
            participants: withParticipants ? this.participantIds : undefined
        });
        this.logStarted = true;
    }

    private setState(state: TXState): void {
        const previous = this.transaction.state;
        this.transaction.state = state;
        logger.debug('事务状态变更', this.context({ from: previous, to: state, terminal: isTerminal(state) }));

        try {
            this.deps.onStateChange?.(this);
        } catch (error) {
            logger.error('状态变更回调异常', wrapError(error, 'onStateChange'), this.context());
        }
    }

    private context(extra: LogContext = {}): LogContext {
        return { txId: this.id, state: this.transaction.state, ...extra };
    }
}
