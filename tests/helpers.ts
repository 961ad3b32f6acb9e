import { ResourceManagerClient } from '../src/resourceManager';
import { InMemoryTxLog } from '../src/stores/memory-log';
import { TxConfig, TxConfigOptions } from '../src/tx_config';
import { TxLogRecord } from '../src/model';
import { LogPhase, Vote } from '../src/enums';
import { StorageError } from '../src/errors';

// 测试用的快速配置：关闭监控，第二阶段重试间隔很短
export function testConfig(overrides: Partial<TxConfigOptions> = {}): TxConfig {
    return new TxConfig({
        timeout: 5000,
        prepareTimeout: 200,
        enableMonitor: false,
        escalateAfterAttempts: 3,
        phase2Retry: {
            maxRetries: Infinity,
            baseDelayMs: 5,
            maxDelayMs: 20,
            backoffMultiplier: 2,
            jitterMs: 0
        },
        ...overrides
    });
}

export function deferred() {
    let release: () => void = () => {};
    const promise = new Promise<void>(resolve => {
        release = resolve;
    });
    return { promise, release };
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > deadline) {
            throw new Error('waitFor 超时');
        }
        await new Promise(resolve => setTimeout(resolve, 5));
    }
}

// Mock 资源管理器
export class MockResourceManager implements ResourceManagerClient {
    id: string;
    vote: Vote.Yes | Vote.No = Vote.Yes;
    prepareError: Error | null = null;
    // 永不返回，用于模拟 prepare 超时
    hang = false;
    prepareGate: Promise<void> | null = null;
    commitGate: Promise<void> | null = null;
    failCommitTimes = 0;
    failRollbackTimes = 0;

    readonly calls: string[] = [];
    readonly committed = new Set<string>();
    readonly rolledBack = new Set<string>();
    private events: string[];

    constructor(id: string, events: string[] = []) {
        this.id = id;
        this.events = events;
    }

    count(phase: 'prepare' | 'commit' | 'rollback'): number {
        return this.calls.filter(call => call === phase).length;
    }

    async prepare(transactionId: string): Promise<Vote.Yes | Vote.No> {
        this.record('prepare');
        if (this.hang) {
            return new Promise<Vote.Yes | Vote.No>(() => {});
        }
        if (this.prepareGate) {
            await this.prepareGate;
        }
        if (this.prepareError) {
            throw this.prepareError;
        }
        return this.vote;
    }

    async commit(transactionId: string): Promise<void> {
        this.record('commit');
        if (this.commitGate) {
            await this.commitGate;
        }
        if (this.failCommitTimes > 0) {
            this.failCommitTimes--;
            throw new Error(`${this.id} commit 暂时失败`);
        }
        this.committed.add(transactionId);
    }

    async rollback(transactionId: string): Promise<void> {
        this.record('rollback');
        if (this.failRollbackTimes > 0) {
            this.failRollbackTimes--;
            throw new Error(`${this.id} rollback 暂时失败`);
        }
        this.rolledBack.add(transactionId);
    }

    private record(phase: string) {
        this.calls.push(phase);
        this.events.push(`${this.id}:${phase}`);
    }
}

// 可注入写入失败的事务日志，并记录追加顺序
export class RecordingTxLog extends InMemoryTxLog {
    readonly failPhases = new Set<LogPhase>();
    // 写入前等待的闸门，用于在某条记录落盘前插入操作
    readonly appendGates = new Map<LogPhase, Promise<void>>();
    readonly appended: TxLogRecord[] = [];
    private events: string[];

    constructor(events: string[] = []) {
        super();
        this.events = events;
    }

    async append(record: TxLogRecord): Promise<void> {
        const gate = this.appendGates.get(record.phase);
        if (gate) {
            await gate;
        }
        if (this.failPhases.has(record.phase)) {
            throw new StorageError(`append ${record.phase}`);
        }
        this.appended.push({ ...record });
        this.events.push(`log:${record.phase}`);
        await super.append(record);
    }

    phasesOf(transactionId: string): LogPhase[] {
        return this.appended.filter(r => r.transactionId === transactionId).map(r => r.phase);
    }
}
