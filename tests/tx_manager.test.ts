import { TxManager } from '../src/tx_manager';
import { TXState, LogPhase, Vote } from '../src/enums';
import { metricsCollector } from '../src/metrics';
import {
    DuplicateResourceError,
    EnlistmentError,
    InvalidTransactionStateError,
    ResourceExhaustedError,
    ResourceUnavailableError,
    StorageError,
    TransactionNotFoundError
} from '../src/errors';
import { MockResourceManager, RecordingTxLog, deferred, testConfig, waitFor } from './helpers';

describe('TxManager', () => {
    let txManager: TxManager;
    let txLog: RecordingTxLog;
    let events: string[];

    beforeEach(() => {
        metricsCollector.reset();
        events = [];
        txLog = new RecordingTxLog(events);
        txManager = new TxManager(txLog, testConfig());
    });

    afterEach(async () => {
        await txManager.stop();
    });

    function enlistAll(txId: string, ...resources: MockResourceManager[]) {
        for (const resource of resources) {
            txManager.enlist(txId, resource);
        }
    }

    describe('事务提交', () => {
        it('三个参与者都投 YES 时应该提交', async () => {
            const rms = [new MockResourceManager('p1'), new MockResourceManager('p2'), new MockResourceManager('p3')];
            const tx = txManager.begin();
            enlistAll(tx.id, ...rms);

            const result = await txManager.commit(tx);

            expect(result.success).toBe(true);
            expect(result.state).toBe(TXState.Committed);
            expect(result.pending).toBe(false);
            for (const rm of rms) {
                expect(rm.committed.has(tx.id)).toBe(true);
                expect(rm.count('prepare')).toBe(1);
                expect(rm.count('rollback')).toBe(0);
            }
            expect(txManager.getTransaction(tx.id)?.state).toBe(TXState.Committed);
            expect(txManager.getTransaction(tx.id)?.participants.every(p => p.vote === Vote.Yes && p.ackReceived)).toBe(true);

            const metrics = metricsCollector.getMetrics();
            expect(metrics.transactionBegun).toBe(1);
            expect(metrics.transactionCommitted).toBe(1);
            expect(metrics.voteYes).toBe(3);
            expect(metrics.phase2Ack).toBe(3);
        });

        it('第二个参与者投 NO 时应该回滚全部参与者', async () => {
            const rms = [new MockResourceManager('p1'), new MockResourceManager('p2'), new MockResourceManager('p3')];
            rms[1].vote = Vote.No;
            const tx = txManager.begin();
            enlistAll(tx.id, ...rms);

            const result = await txManager.commit(tx);

            expect(result.success).toBe(false);
            expect(result.state).toBe(TXState.Aborted);
            for (const rm of rms) {
                expect(rm.rolledBack.has(tx.id)).toBe(true);
                expect(rm.count('commit')).toBe(0);
            }

            const metrics = metricsCollector.getMetrics();
            expect(metrics.voteYes).toBe(2);
            expect(metrics.voteNo).toBe(1);
            expect(metrics.transactionAborted).toBe(1);
        });

        it('参与者 prepare 超时应视为反对票', async () => {
            const rms = [new MockResourceManager('p1'), new MockResourceManager('p2'), new MockResourceManager('p3')];
            rms[2].hang = true;
            const manager = new TxManager(txLog, testConfig({ prepareTimeout: 30 }));
            const tx = manager.begin();
            rms.forEach(rm => manager.enlist(tx, rm));

            const result = await manager.commit(tx);
            await manager.stop();

            expect(result.success).toBe(false);
            expect(result.state).toBe(TXState.Aborted);
            // 超时的参与者同样收到回滚
            expect(rms.every(rm => rm.rolledBack.has(tx.id))).toBe(true);
            expect(metricsCollector.getMetrics().prepareTimeout).toBe(1);
        });

        it('prepare 抛出异常应视为反对票', async () => {
            const p1 = new MockResourceManager('p1');
            const p2 = new MockResourceManager('p2');
            p2.prepareError = new ResourceUnavailableError('p2', 'connection refused');
            const tx = txManager.begin();
            enlistAll(tx.id, p1, p2);

            const result = await txManager.commit(tx);

            expect(result.state).toBe(TXState.Aborted);
            expect(txManager.getTransaction(tx.id)?.participants.map(p => p.vote)).toEqual([Vote.Yes, Vote.No]);
        });

        it('没有参与者的事务也应提交', async () => {
            const tx = txManager.begin();
            const result = await txManager.commit(tx);

            expect(result.success).toBe(true);
            expect(result.state).toBe(TXState.Committed);
        });

        it('应该按协议顺序写日志，且决议先于第二阶段消息落盘', async () => {
            const manager = new TxManager(txLog, testConfig({ compactLog: false }));
            const p1 = new MockResourceManager('p1', events);
            const p2 = new MockResourceManager('p2', events);
            const tx = manager.begin();
            manager.enlist(tx, p1);
            manager.enlist(tx, p2);

            await manager.commit(tx);
            await manager.stop();

            expect(txLog.phasesOf(tx.id)).toEqual([
                LogPhase.PrepareStart,
                LogPhase.AllPrepared,
                LogPhase.CommitDecision,
                LogPhase.Phase2Complete
            ]);
            expect(txLog.appended[0].participants).toEqual(['p1', 'p2']);
            expect(events.indexOf('log:PREPARE_START')).toBeLessThan(events.indexOf('p1:prepare'));
            expect(events.indexOf('log:COMMIT_DECISION')).toBeLessThan(events.indexOf('p1:commit'));
            expect(events.indexOf('log:COMMIT_DECISION')).toBeLessThan(events.indexOf('p2:commit'));
            expect(events.indexOf('log:PHASE2_COMPLETE')).toBeGreaterThan(events.indexOf('p2:commit'));
            expect(txLog.size).toBe(4);
        });

        it('回滚路径应写 ABORT_DECISION', async () => {
            const p1 = new MockResourceManager('p1', events);
            const p2 = new MockResourceManager('p2', events);
            p2.vote = Vote.No;
            const tx = txManager.begin();
            enlistAll(tx.id, p1, p2);

            await txManager.commit(tx);

            expect(txLog.phasesOf(tx.id)).toEqual([LogPhase.PrepareStart, LogPhase.AbortDecision, LogPhase.Phase2Complete]);
            expect(events.indexOf('log:ABORT_DECISION')).toBeLessThan(events.indexOf('p1:rollback'));
        });

        it('完成后应压缩事务日志', async () => {
            const tx = txManager.begin();
            txManager.enlist(tx, new MockResourceManager('p1'));

            await txManager.commit(tx);

            expect(txLog.size).toBe(0);
            expect(txLog.phasesOf(tx.id)).toHaveLength(4);
        });

        it('应该通知订阅者每一次状态变化', async () => {
            const states: TXState[] = [];
            const unsubscribe = txManager.subscribe(snapshot => states.push(snapshot.state));

            const tx = txManager.begin();
            txManager.enlist(tx, new MockResourceManager('p1'));
            await txManager.commit(tx);
            unsubscribe();
            txManager.begin();

            expect(states).toEqual([
                TXState.Active,
                TXState.Active,
                TXState.Preparing,
                TXState.Prepared,
                TXState.Committing,
                TXState.Committed
            ]);
        });
    });

    describe('第二阶段重试', () => {
        it('应该重试直到参与者确认，并在达到阈值后升级告警', async () => {
            const p1 = new MockResourceManager('p1');
            p1.failCommitTimes = 4;
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            const result = await txManager.commit(tx);

            expect(result.state).toBe(TXState.Committed);
            expect(p1.count('commit')).toBe(5);
            const metrics = metricsCollector.getMetrics();
            expect(metrics.phase2Retry).toBe(4);
            expect(metrics.phase2Escalation).toBe(1);
        });

        it('超过等待时间时应返回 pending，第二阶段在后台完成', async () => {
            const manager = new TxManager(txLog, testConfig({ commitWaitTimeout: 20, maxConcurrent: 1 }));
            const gate = deferred();
            const p1 = new MockResourceManager('p1');
            p1.commitGate = gate.promise;
            const tx = manager.begin();
            manager.enlist(tx, p1);

            const result = await manager.commit(tx);

            expect(result.success).toBe(true);
            expect(result.pending).toBe(true);
            expect(result.state).toBe(TXState.Committing);
            // 后台进行中的事务仍占用并发名额
            expect(() => manager.begin()).toThrow(ResourceExhaustedError);
            await expect(manager.rollback(tx)).rejects.toThrow(InvalidTransactionStateError);

            gate.release();
            await waitFor(() => manager.getTransaction(tx.id)?.state === TXState.Committed);
            expect(p1.committed.has(tx.id)).toBe(true);
            await manager.stop();
        });

        it('协调者停止后事务进入 IN_DOUBT，重启恢复后完成提交', async () => {
            const p1 = new MockResourceManager('p1');
            const p2 = new MockResourceManager('p2');
            p1.failCommitTimes = Infinity;
            const manager = new TxManager(txLog, testConfig({ commitWaitTimeout: 30 }));
            const tx = manager.begin();
            manager.enlist(tx, p1);
            manager.enlist(tx, p2);

            const result = await manager.commit(tx);
            expect(result.pending).toBe(true);

            await manager.stop();
            expect(manager.getTransaction(tx.id)?.state).toBe(TXState.InDoubt);
            expect(txLog.phasesOf(tx.id)).toEqual([LogPhase.PrepareStart, LogPhase.AllPrepared, LogPhase.CommitDecision]);

            // 重启：新的协调者共享同一份日志
            p1.failCommitTimes = 2;
            const restarted = new TxManager(txLog, testConfig());
            restarted.register(p1);
            restarted.register(p2);

            const recovered = await restarted.recover();

            expect(recovered.committed).toEqual([tx.id]);
            expect(p1.committed.has(tx.id)).toBe(true);
            expect(p1.count('rollback')).toBe(0);
            expect(restarted.getTransaction(tx.id)?.state).toBe(TXState.Committed);
            expect(txLog.size).toBe(0);
            expect(metricsCollector.getMetrics().recoveredCommitted).toBe(1);
            await restarted.stop();
        });
    });

    describe('事务回滚', () => {
        it('ACTIVE 事务应单阶段回滚', async () => {
            const p1 = new MockResourceManager('p1');
            const p2 = new MockResourceManager('p2');
            const tx = txManager.begin();
            enlistAll(tx.id, p1, p2);

            await txManager.rollback(tx);

            expect(p1.rolledBack.has(tx.id)).toBe(true);
            expect(p2.rolledBack.has(tx.id)).toBe(true);
            expect(p1.count('prepare')).toBe(0);
            expect(txLog.phasesOf(tx.id)).toEqual([LogPhase.AbortDecision, LogPhase.Phase2Complete]);
            expect(txManager.getTransaction(tx.id)?.state).toBe(TXState.Aborted);
        });

        it('重复回滚应为无操作，回滚后不能提交', async () => {
            const tx = txManager.begin();
            txManager.enlist(tx, new MockResourceManager('p1'));
            await txManager.rollback(tx);

            await expect(txManager.rollback(tx)).resolves.toBeUndefined();
            await expect(txManager.commit(tx)).rejects.toThrow(InvalidTransactionStateError);
        });

        it('prepare 阶段收到回滚请求应决议回滚', async () => {
            const gate = deferred();
            const p1 = new MockResourceManager('p1');
            const p2 = new MockResourceManager('p2');
            p1.prepareGate = gate.promise;
            const tx = txManager.begin();
            enlistAll(tx.id, p1, p2);

            const committing = txManager.commit(tx);
            expect(txManager.getTransaction(tx.id)?.state).toBe(TXState.Preparing);
            const rollingBack = txManager.rollback(tx);
            gate.release();

            const result = await committing;
            await rollingBack;

            expect(result.success).toBe(false);
            expect(result.state).toBe(TXState.Aborted);
            expect(p1.rolledBack.has(tx.id)).toBe(true);
            expect(p2.rolledBack.has(tx.id)).toBe(true);
            expect(txLog.phasesOf(tx.id)).toEqual([LogPhase.PrepareStart, LogPhase.AbortDecision, LogPhase.Phase2Complete]);
        });

        it('ALL_PREPARED 写入过程中的回滚请求应被拒绝，事务照常提交', async () => {
            const gate = deferred();
            txLog.appendGates.set(LogPhase.AllPrepared, gate.promise);
            const p1 = new MockResourceManager('p1');
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            const committing = txManager.commit(tx);
            await waitFor(() => txManager.getTransaction(tx.id)?.state === TXState.Prepared);

            await expect(txManager.rollback(tx)).rejects.toThrow(InvalidTransactionStateError);
            gate.release();
            const result = await committing;

            expect(result.state).toBe(TXState.Committed);
            expect(p1.count('rollback')).toBe(0);
            expect(txLog.phasesOf(tx.id)).toEqual([
                LogPhase.PrepareStart,
                LogPhase.AllPrepared,
                LogPhase.CommitDecision,
                LogPhase.Phase2Complete
            ]);
        });

        it('COMMIT_DECISION 写入过程中的回滚请求应被拒绝', async () => {
            const gate = deferred();
            txLog.appendGates.set(LogPhase.CommitDecision, gate.promise);
            const p1 = new MockResourceManager('p1');
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            const committing = txManager.commit(tx);
            await waitFor(() => txLog.phasesOf(tx.id).includes(LogPhase.AllPrepared));
            expect(txManager.getTransaction(tx.id)?.state).toBe(TXState.Prepared);

            await expect(txManager.rollback(tx)).rejects.toThrow(InvalidTransactionStateError);
            gate.release();

            expect((await committing).state).toBe(TXState.Committed);
            expect(p1.committed.has(tx.id)).toBe(true);
        });

        it('已提交的事务不能回滚', async () => {
            const tx = txManager.begin();
            txManager.enlist(tx, new MockResourceManager('p1'));
            await txManager.commit(tx);

            await expect(txManager.rollback(tx)).rejects.toThrow(InvalidTransactionStateError);
        });
    });

    describe('日志写入失败', () => {
        it('PREPARE_START 写入失败应回滚全部参与者并抛出 StorageError', async () => {
            txLog.failPhases.add(LogPhase.PrepareStart);
            const p1 = new MockResourceManager('p1');
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            await expect(txManager.commit(tx)).rejects.toThrow(StorageError);

            expect(p1.count('prepare')).toBe(0);
            expect(p1.rolledBack.has(tx.id)).toBe(true);
            expect(txManager.getTransaction(tx.id)?.state).toBe(TXState.Aborted);
        });

        it('ALL_PREPARED 写入失败应改为回滚', async () => {
            txLog.failPhases.add(LogPhase.AllPrepared);
            const p1 = new MockResourceManager('p1');
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            const result = await txManager.commit(tx);

            expect(result.success).toBe(false);
            expect(p1.rolledBack.has(tx.id)).toBe(true);
            expect(p1.count('commit')).toBe(0);
            expect(txLog.phasesOf(tx.id)).toEqual([LogPhase.PrepareStart, LogPhase.AbortDecision, LogPhase.Phase2Complete]);
        });

        it('COMMIT_DECISION 写入失败时仍应提交', async () => {
            txLog.failPhases.add(LogPhase.CommitDecision);
            const p1 = new MockResourceManager('p1');
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            const result = await txManager.commit(tx);

            expect(result.success).toBe(true);
            expect(p1.committed.has(tx.id)).toBe(true);
            expect(txLog.phasesOf(tx.id)).toEqual([LogPhase.PrepareStart, LogPhase.AllPrepared, LogPhase.Phase2Complete]);
        });
    });

    describe('参与者登记', () => {
        it('非 ACTIVE 事务不能加入参与者', async () => {
            const gate = deferred();
            const p1 = new MockResourceManager('p1');
            p1.prepareGate = gate.promise;
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            const committing = txManager.commit(tx);
            expect(() => txManager.enlist(tx, new MockResourceManager('p2'))).toThrow(EnlistmentError);

            gate.release();
            await committing;
        });

        it('同一参与者重复加入应为无操作', () => {
            const p1 = new MockResourceManager('p1');
            const tx = txManager.begin();
            txManager.enlist(tx, p1);
            txManager.enlist(tx, p1);

            expect(txManager.getTransaction(tx.id)?.participants).toHaveLength(1);
        });

        it('不同实例使用同一 id 应报错', () => {
            const tx1 = txManager.begin();
            const tx2 = txManager.begin();
            txManager.enlist(tx1, new MockResourceManager('p1'));

            expect(() => txManager.enlist(tx2, new MockResourceManager('p1'))).toThrow(DuplicateResourceError);
        });

        it('未知事务应抛出 TransactionNotFoundError', async () => {
            expect(() => txManager.enlist('missing', new MockResourceManager('p1'))).toThrow(TransactionNotFoundError);
            await expect(txManager.commit('missing')).rejects.toThrow(TransactionNotFoundError);
        });
    });

    describe('并发与超时', () => {
        it('达到并发上限时应拒绝开启事务', async () => {
            const manager = new TxManager(txLog, testConfig({ maxConcurrent: 2 }));
            manager.begin();
            manager.begin();

            expect(() => manager.begin()).toThrow(ResourceExhaustedError);
            await manager.stop();
        });

        it('事务 id 应唯一', () => {
            const ids = new Set(Array.from({ length: 50 }, () => txManager.begin().id));
            expect(ids.size).toBe(50);
        });

        it('应该回滚超时的 ACTIVE 事务', async () => {
            const p1 = new MockResourceManager('p1');
            const tx = txManager.begin();
            txManager.enlist(tx, p1);

            expect(await txManager.abortExpired(Date.now())).toBe(0);
            expect(await txManager.abortExpired(Date.now() + 10000)).toBe(1);

            expect(p1.rolledBack.has(tx.id)).toBe(true);
            expect(p1.count('prepare')).toBe(0);
            expect(txManager.getTransaction(tx.id)?.state).toBe(TXState.Aborted);
            expect(metricsCollector.getMetrics().transactionTimedOut).toBe(1);
        });

        it('监控任务应自动回滚超时事务', async () => {
            const manager = new TxManager(txLog, testConfig({ enableMonitor: true, monitorInterval: 10, timeout: 20 }));
            const tx = manager.begin();

            await waitFor(() => manager.getTransaction(tx.id)?.state === TXState.Aborted);
            await manager.stop();
        });

        it('停止后不能再开启事务', async () => {
            await txManager.stop();
            expect(() => txManager.begin()).toThrow('TxManager 已停止，无法开启事务');
        });
    });

    describe('健康检查', () => {
        it('应该返回健康状态', async () => {
            txManager.register(new MockResourceManager('p1'));
            txManager.begin();

            const health = await txManager.getHealthStatus();

            expect(health.healthy).toBe(true);
            expect(health.instanceId).toMatch(/^txmgr_/);
            expect(health.activeTransactions).toBe(1);
            expect(health.inDoubtTransactions).toBe(0);
            expect(health.resourcesCount).toBe(1);
            expect(health.monitorEnabled).toBe(false);
            expect(health.metrics.transactionBegun).toBe(1);
        });
    });
});
