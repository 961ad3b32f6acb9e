import { Decision, LogPhase, TXState, Vote } from "./enums";

// 单个参与者在一笔事务中的记录
export interface ParticipantRecord {
    resourceId: string;
    vote: Vote;
    ackReceived: boolean;
}

// 全局事务（仅由其所属的 Coordinator 修改）
export interface Transaction {
    id: string;
    state: TXState;
    participants: ParticipantRecord[];
    timeoutDeadline: number;
    createdAt: number;
    decision?: Decision;
}

// 事务日志记录，只追加，不修改
export interface TxLogRecord {
    transactionId: string;
    phase: LogPhase;
    timestamp: number;
    // PREPARE_START 以及决议记录携带参与者列表，恢复时据此联系参与者
    participants?: string[];
}

// 对外暴露的只读快照
export interface TransactionSnapshot {
    id: string;
    state: TXState;
    decision?: Decision;
    participants: ParticipantRecord[];
    timeoutDeadline: string;
    createdAt: string;
}

export interface CommitResult {
    txId: string;
    success: boolean;
    state: TXState;
    // 决议已做出，但第二阶段仍在后台完成
    pending: boolean;
    duration: number;
}
