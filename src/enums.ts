// 全局事务状态
export enum TXState {
    Active = 'ACTIVE',
    Preparing = 'PREPARING',
    Prepared = 'PREPARED',
    Committing = 'COMMITTING',
    Committed = 'COMMITTED',
    Aborting = 'ABORTING',
    Aborted = 'ABORTED',
    InDoubt = 'IN_DOUBT'
}

// 参与者在 prepare 阶段的投票
export enum Vote {
    Unknown = 'UNKNOWN',
    Yes = 'YES',
    No = 'NO'
}

// 事务日志记录的阶段
export enum LogPhase {
    PrepareStart = 'PREPARE_START',
    AllPrepared = 'ALL_PREPARED',
    CommitDecision = 'COMMIT_DECISION',
    AbortDecision = 'ABORT_DECISION',
    Phase2Complete = 'PHASE2_COMPLETE'
}

// 第二阶段下发的最终决议
export enum Decision {
    Commit = 'COMMIT',
    Abort = 'ABORT'
}

export const TERMINAL_STATES: ReadonlySet<TXState> = new Set([TXState.Committed, TXState.Aborted]);

export function isTerminal(state: TXState): boolean {
    return TERMINAL_STATES.has(state);
}
