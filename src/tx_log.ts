import { Decision, LogPhase } from "./enums";
import { TxLogRecord } from "./model";
import { RecoveryAmbiguityError } from "./errors";

export interface TxLog {
    // 追加一条记录；resolve 时记录已持久化，且排在该事务之前的记录之后
    append(record: TxLogRecord): Promise<void>
    // 获取指定事务的全部记录，按追加顺序
    getRecords(transactionId: string): Promise<TxLogRecord[]>
    // 获取全部记录，恢复时使用
    readAll(): Promise<TxLogRecord[]>
    // 删除已完成事务的记录，仅在 PHASE2_COMPLETE 落盘之后调用
    compact(transactionId: string): Promise<void>
    // 锁住事务日志，避免多个恢复流程并发处理
    // 单位毫秒
    lock(expireDuration: number): Promise<void>
    // 解锁事务日志
    unlock(): Promise<void>
}

// 日志回放的结果
export interface LogAnalysis {
    transactionId: string;
    participants: string[];
    allPrepared: boolean;
    // 显式记录的决议
    loggedDecision?: Decision;
    // 生效的决议：ALL_PREPARED 本身即意味着提交
    decision?: Decision;
    complete: boolean;
}

const PHASES = new Set<string>(Object.values(LogPhase));

function isLogPhase(value: unknown): value is LogPhase {
    return typeof value === 'string' && PHASES.has(value);
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

// 校验一条外部读入的日志记录，任何字段缺失或非法都视为日志损坏
export function parseLogRecord(raw: unknown): TxLogRecord {
    if (!isRecordObject(raw)) {
        throw new RecoveryAmbiguityError('unknown', '日志记录不是对象');
    }

    const { transactionId, phase, timestamp, participants } = raw;
    if (typeof transactionId !== 'string' || transactionId.length === 0) {
        throw new RecoveryAmbiguityError('unknown', '缺少 transactionId');
    }
    if (!isLogPhase(phase)) {
        throw new RecoveryAmbiguityError(transactionId, `未知阶段 ${String(phase)}`);
    }
    if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
        throw new RecoveryAmbiguityError(transactionId, `非法时间戳 ${String(timestamp)}`);
    }

    const record: TxLogRecord = { transactionId, phase, timestamp };

    if (participants !== undefined && participants !== null) {
        if (!Array.isArray(participants) || !participants.every(p => typeof p === 'string')) {
            throw new RecoveryAmbiguityError(transactionId, '参与者列表格式错误');
        }
        record.participants = participants.map(p => String(p));
    }

    return record;
}

// 按事务分组，保持每个事务内部的追加顺序
export function groupByTransaction(records: TxLogRecord[]): Map<string, TxLogRecord[]> {
    const groups = new Map<string, TxLogRecord[]>();
    for (const record of records) {
        const group = groups.get(record.transactionId);
        if (group) {
            group.push(record);
        } else {
            groups.set(record.transactionId, [record]);
        }
    }
    return groups;
}

// 回放一笔事务的日志；顺序与协议不符时抛出 RecoveryAmbiguityError，绝不猜测
export function analyzeLog(transactionId: string, records: TxLogRecord[]): LogAnalysis {
    if (records.length === 0) {
        throw new RecoveryAmbiguityError(transactionId, '没有任何日志记录');
    }

    const first = records[0];
    if (first.phase !== LogPhase.PrepareStart && first.phase !== LogPhase.AbortDecision) {
        throw new RecoveryAmbiguityError(transactionId, `首条记录应为 PREPARE_START 或 ABORT_DECISION，实际为 ${first.phase}`);
    }
    if (!first.participants) {
        throw new RecoveryAmbiguityError(transactionId, `${first.phase} 缺少参与者列表`);
    }

    const participants = [...first.participants];
    const analysis: LogAnalysis = {
        transactionId,
        participants,
        allPrepared: false,
        complete: false
    };

    records.forEach((record, index) => {
        if (record.transactionId !== transactionId) {
            throw new RecoveryAmbiguityError(transactionId, `混入了事务 ${record.transactionId} 的记录`);
        }
        if (analysis.complete) {
            throw new RecoveryAmbiguityError(transactionId, `PHASE2_COMPLETE 之后出现 ${record.phase}`);
        }

        for (const id of record.participants ?? []) {
            if (!participants.includes(id)) {
                participants.push(id);
            }
        }

        switch (record.phase) {
            case LogPhase.PrepareStart:
                if (index !== 0) {
                    throw new RecoveryAmbiguityError(transactionId, '重复的 PREPARE_START');
                }
                break;
            case LogPhase.AllPrepared:
                if (first.phase !== LogPhase.PrepareStart || analysis.allPrepared || analysis.loggedDecision) {
                    throw new RecoveryAmbiguityError(transactionId, 'ALL_PREPARED 出现的位置不合法');
                }
                analysis.allPrepared = true;
                break;
            case LogPhase.CommitDecision:
                if (!analysis.allPrepared || analysis.loggedDecision) {
                    throw new RecoveryAmbiguityError(transactionId, 'COMMIT_DECISION 出现的位置不合法');
                }
                analysis.loggedDecision = Decision.Commit;
                break;
            case LogPhase.AbortDecision:
                if (analysis.loggedDecision) {
                    throw new RecoveryAmbiguityError(transactionId, '决议被重复记录');
                }
                if (analysis.allPrepared) {
                    throw new RecoveryAmbiguityError(transactionId, 'ALL_PREPARED 之后出现 ABORT_DECISION');
                }
                analysis.loggedDecision = Decision.Abort;
                break;
            case LogPhase.Phase2Complete:
                if (!analysis.loggedDecision && !analysis.allPrepared) {
                    throw new RecoveryAmbiguityError(transactionId, 'PHASE2_COMPLETE 之前没有决议');
                }
                analysis.complete = true;
                break;
        }
    });

    analysis.decision = analysis.loggedDecision ?? (analysis.allPrepared ? Decision.Commit : undefined);
    return analysis;
}
