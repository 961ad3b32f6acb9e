import { TxLog, parseLogRecord } from '../tx_log';
import { TxLogRecord } from '../model';
import { logger } from '../logger';
import { StorageError, LockAcquisitionError, RecoveryAmbiguityError, wrapError } from '../errors';
import { withRetry, RetryableError, RetryConfig } from '../retry';

// 事务日志用到的 mysql2/promise 接口；Pool 与 PoolConnection 都满足
export interface SqlSession {
    execute(sql: string, values?: unknown[]): Promise<[unknown, unknown]>;
    query(sql: string, values?: unknown[]): Promise<[unknown, unknown]>;
}

export interface SqlConnection extends SqlSession {
    release(): void;
}

export interface SqlPool extends SqlSession {
    getConnection(): Promise<SqlConnection>;
}

export interface MySQLLogConfig {
    pool: SqlPool;
    lockName?: string;
    retryConfig?: Partial<RetryConfig>;
}

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null;
}

function rowsOf(result: unknown, operation: string): Row[] {
    if (!Array.isArray(result) || !result.every(isRow)) {
        throw new StorageError(operation, new Error('查询结果不是行数组'));
    }
    return result;
}

function affectedRowsOf(result: unknown): number {
    return isRow(result) && typeof result.affectedRows === 'number' ? result.affectedRows : 0;
}

function isDuplicateEntry(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ER_DUP_ENTRY';
}

// 基于 MySQL 的事务日志，每条记录一行，按自增 id 保持追加顺序
export class MySQLTxLog implements TxLog {
    private pool: SqlPool;
    private lockName: string;
    private retryConfig: Partial<RetryConfig>;
    // GET_LOCK 属于会话，加锁与解锁必须在同一个连接上
    private lockConnection: SqlConnection | null = null;

    constructor(config: MySQLLogConfig) {
        this.pool = config.pool;
        this.lockName = config.lockName || 'tx_log_recovery_lock';
        this.retryConfig = config.retryConfig || {};
    }

    async ensureSchema(): Promise<void> {
        const sql = `
            CREATE TABLE IF NOT EXISTS tx_log (
                id BIGINT UNSIGNED NOT NULL AUTO_INCREMENT PRIMARY KEY,
                transaction_id VARCHAR(64) NOT NULL COMMENT '全局事务ID',
                phase VARCHAR(32) NOT NULL COMMENT '协议阶段',
                participants JSON DEFAULT NULL COMMENT '参与者列表',
                created_at BIGINT NOT NULL COMMENT '毫秒时间戳',
                UNIQUE KEY uk_transaction_phase (transaction_id, phase)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4
        `;

        try {
            await this.pool.execute(sql);
            logger.info('事务日志表初始化完成');
        } catch (error) {
            throw new StorageError('ensureSchema', wrapError(error, 'mysql'));
        }
    }

    // 每个事务的每个阶段只有一条记录，重试时遇到唯一键冲突说明上一次已经写入
    async append(record: TxLogRecord): Promise<void> {
        const context = { operation: 'append', txId: record.transactionId, phase: record.phase };

        return withRetry(async () => {
            try {
                const sql = `
                    INSERT INTO tx_log (transaction_id, phase, participants, created_at)
                    VALUES (?, ?, ?, ?)
                `;

                const [result] = await this.pool.execute(sql, [
                    record.transactionId,
                    record.phase,
                    record.participants ? JSON.stringify(record.participants) : null,
                    record.timestamp
                ]);

                if (affectedRowsOf(result) === 0) {
                    throw new Error('未写入任何行');
                }

                logger.debug('事务日志追加成功', context);

            } catch (error) {
                if (isDuplicateEntry(error)) {
                    logger.debug('事务日志记录已存在', context);
                    return;
                }
                const wrappedError = new StorageError('append', wrapError(error, 'mysql'));
                logger.error('追加事务日志失败', wrappedError, context);
                throw new RetryableError(wrappedError.message, wrappedError);
            }
        }, this.retryConfig, context);
    }

    async getRecords(transactionId: string): Promise<TxLogRecord[]> {
        const context = { operation: 'getRecords', txId: transactionId };

        return withRetry(async () => {
            const rows = await this.queryRows(
                `SELECT * FROM tx_log WHERE transaction_id = ? ORDER BY id ASC`,
                [transactionId],
                context
            );
            return rows.map(row => this.parseRow(row));
        }, this.retryConfig, context);
    }

    async readAll(): Promise<TxLogRecord[]> {
        const context = { operation: 'readAll' };

        return withRetry(async () => {
            const rows = await this.queryRows(`SELECT * FROM tx_log ORDER BY id ASC`, [], context);
            logger.debug('读取事务日志成功', { ...context, count: rows.length });
            return rows.map(row => this.parseRow(row));
        }, this.retryConfig, context);
    }

    async compact(transactionId: string): Promise<void> {
        const context = { operation: 'compact', txId: transactionId };

        return withRetry(async () => {
            try {
                const [result] = await this.pool.execute(
                    `DELETE FROM tx_log WHERE transaction_id = ?`,
                    [transactionId]
                );
                logger.debug('事务日志压缩成功', { ...context, removed: affectedRowsOf(result) });
            } catch (error) {
                const wrappedError = new StorageError('compact', wrapError(error, 'mysql'));
                logger.error('压缩事务日志失败', wrappedError, context);
                throw new RetryableError(wrappedError.message, wrappedError);
            }
        }, this.retryConfig, context);
    }

    async lock(expireDuration: number): Promise<void> {
        const context = { operation: 'lock', expireDuration };

        if (this.lockConnection) {
            throw new LockAcquisitionError(this.lockName, expireDuration);
        }

        return withRetry(async () => {
            let connection: SqlConnection | null = null;
            try {
                connection = await this.pool.getConnection();

                // 使用 GET_LOCK 函数实现分布式锁
                const [result] = await connection.query(
                    `SELECT GET_LOCK(?, ?) as lock_result`,
                    [this.lockName, expireDuration / 1000]
                );

                if (rowsOf(result, 'lock')[0]?.lock_result !== 1) {
                    throw new LockAcquisitionError(this.lockName, expireDuration);
                }

                this.lockConnection = connection;
                logger.debug('获取锁成功', context);

            } catch (error) {
                connection?.release();

                if (error instanceof LockAcquisitionError) {
                    throw error;
                }

                const wrappedError = new StorageError('lock', wrapError(error, 'mysql'));
                logger.error('获取锁失败', wrappedError, context);
                throw new RetryableError(wrappedError.message, wrappedError);
            }
        }, { ...this.retryConfig, maxRetries: 1 }, context); // 锁操作只重试一次
    }

    async unlock(): Promise<void> {
        const context = { operation: 'unlock', lockName: this.lockName };
        const connection = this.lockConnection;

        if (!connection) {
            logger.warn('尝试释放未持有的锁', context);
            return;
        }

        try {
            // 使用 RELEASE_LOCK 函数释放锁
            const [result] = await connection.query(
                `SELECT RELEASE_LOCK(?) as release_result`,
                [this.lockName]
            );

            const releaseResult = rowsOf(result, 'unlock')[0]?.release_result;
            if (releaseResult !== 1) {
                logger.warn('释放锁失败或锁已过期', { ...context, releaseResult });
            } else {
                logger.debug('释放锁成功', context);
            }

        } catch (error) {
            logger.error('释放锁异常', wrapError(error, 'mysql'), context);
        } finally {
            this.lockConnection = null;
            connection.release();
        }
    }

    // 健康检查
    async healthCheck(): Promise<boolean> {
        try {
            const [result] = await this.pool.query('SELECT 1 as health');
            return rowsOf(result, 'healthCheck')[0]?.health === 1;
        } catch (error) {
            logger.error('数据库健康检查失败', wrapError(error, 'mysql'));
            return false;
        }
    }

    private async queryRows(sql: string, params: unknown[], context: Record<string, unknown>): Promise<Row[]> {
        const operation = String(context.operation);
        try {
            const [result] = await this.pool.query(sql, params);
            return rowsOf(result, operation);
        } catch (error) {
            const wrappedError = error instanceof StorageError ? error : new StorageError(operation, wrapError(error, 'mysql'));
            logger.error('查询事务日志失败', wrappedError, context);
            throw new RetryableError(wrappedError.message, wrappedError);
        }
    }

    // 行格式不合法时抛出 RecoveryAmbiguityError，不参与重试
    private parseRow(row: Row): TxLogRecord {
        const transactionId = typeof row.transaction_id === 'string' ? row.transaction_id : 'unknown';
        let participants = row.participants;
        if (typeof participants === 'string') {
            try {
                participants = JSON.parse(participants);
            } catch (error) {
                throw new RecoveryAmbiguityError(transactionId, `参与者列表无法解析: ${wrapError(error, 'JSON').message}`);
            }
        }

        return parseLogRecord({
            transactionId: row.transaction_id,
            phase: row.phase,
            timestamp: Number(row.created_at),
            participants
        });
    }
}
