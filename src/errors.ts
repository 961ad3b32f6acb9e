export class CoordinatorError extends Error {
    constructor(message: string, public readonly code: string, public readonly cause?: Error) {
        super(message);
        this.name = 'CoordinatorError';
    }
}

export class ResourceExhaustedError extends CoordinatorError {
    constructor(public readonly maxConcurrent: number) {
        super(`并发事务数已达上限 ${maxConcurrent}`, 'RESOURCE_EXHAUSTED');
        this.name = 'ResourceExhaustedError';
    }
}

export class InvalidTransactionStateError extends CoordinatorError {
    constructor(txId: string, currentState: string, expectedState: string) {
        super(
            `事务 ${txId} 状态无效: 当前状态 ${currentState}, 期望状态 ${expectedState}`,
            'INVALID_TRANSACTION_STATE'
        );
        this.name = 'InvalidTransactionStateError';
    }
}

export class EnlistmentError extends CoordinatorError {
    constructor(txId: string, resourceId: string, currentState: string) {
        super(`参与者 ${resourceId} 无法加入事务 ${txId}: 当前状态 ${currentState}`, 'ENLISTMENT_ERROR');
        this.name = 'EnlistmentError';
    }
}

export class TransactionNotFoundError extends CoordinatorError {
    constructor(txId: string) {
        super(`事务 ${txId} 不存在`, 'TRANSACTION_NOT_FOUND');
        this.name = 'TransactionNotFoundError';
    }
}

export class DuplicateResourceError extends CoordinatorError {
    constructor(resourceId: string) {
        super(`资源管理器 ${resourceId} 已注册，不能重复注册`, 'DUPLICATE_RESOURCE');
        this.name = 'DuplicateResourceError';
    }
}

// 参与者暂不可用，prepare 阶段视为投反对票
export class ResourceUnavailableError extends CoordinatorError {
    constructor(public readonly resourceId: string, message: string, cause?: Error) {
        super(`资源管理器 ${resourceId} 不可用: ${message}`, 'RESOURCE_UNAVAILABLE', cause);
        this.name = 'ResourceUnavailableError';
    }
}

export class PrepareTimeoutError extends CoordinatorError {
    constructor(public readonly resourceId: string, timeoutMs: number) {
        super(`资源管理器 ${resourceId} prepare 超时 (${timeoutMs}ms)`, 'PREPARE_TIMEOUT');
        this.name = 'PrepareTimeoutError';
    }
}

// 第二阶段投递失败，只作为观测信号，不抛给应用
export class ParticipantUnreachableError extends CoordinatorError {
    constructor(
        public readonly resourceId: string,
        public readonly attempt: number,
        cause?: Error
    ) {
        super(`资源管理器 ${resourceId} 第二阶段第 ${attempt} 次投递失败`, 'PARTICIPANT_UNREACHABLE_PHASE2', cause);
        this.name = 'ParticipantUnreachableError';
    }
}

export class StorageError extends CoordinatorError {
    constructor(operation: string, cause?: Error) {
        super(`存储操作失败: ${operation}`, 'STORAGE_ERROR', cause);
        this.name = 'StorageError';
    }
}

export class LockAcquisitionError extends CoordinatorError {
    constructor(resource: string, timeoutMs: number) {
        super(`获取锁失败: ${resource} (超时 ${timeoutMs}ms)`, 'LOCK_ACQUISITION_ERROR');
        this.name = 'LockAcquisitionError';
    }
}

// 事务日志损坏或截断，需要人工介入
export class RecoveryAmbiguityError extends CoordinatorError {
    constructor(public readonly txId: string, reason: string) {
        super(`事务 ${txId} 日志无法解析: ${reason}`, 'RECOVERY_AMBIGUITY');
        this.name = 'RecoveryAmbiguityError';
    }
}

// 错误工具函数
export function wrapError(error: unknown, context: string): Error {
    if (error instanceof Error) {
        return error;
    }

    return new Error(`${context}: ${String(error)}`);
}
