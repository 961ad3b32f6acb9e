import { TxLog } from '../tx_log';
import { TxLogRecord } from '../model';
import { LockAcquisitionError } from '../errors';
import { logger } from '../logger';

// 进程内事务日志。进程退出即丢失，适用于测试或把协调者嵌入到单进程应用中；
// 同一个实例可以在多个 TxManager 之间共享，以模拟协调者重启
export class InMemoryTxLog implements TxLog {
    private records: TxLogRecord[] = [];
    private lockExpireTime: number | null = null;

    async append(record: TxLogRecord): Promise<void> {
        this.records.push({
            ...record,
            participants: record.participants ? [...record.participants] : undefined
        });
        logger.debug('事务日志追加', { txId: record.transactionId, phase: record.phase });
    }

    async getRecords(transactionId: string): Promise<TxLogRecord[]> {
        return this.records
            .filter(record => record.transactionId === transactionId)
            .map(record => ({ ...record }));
    }

    async readAll(): Promise<TxLogRecord[]> {
        return this.records.map(record => ({ ...record }));
    }

    async compact(transactionId: string): Promise<void> {
        const before = this.records.length;
        this.records = this.records.filter(record => record.transactionId !== transactionId);
        logger.debug('事务日志压缩', { txId: transactionId, removed: before - this.records.length });
    }

    async lock(expireDuration: number): Promise<void> {
        const now = Date.now();
        if (this.lockExpireTime !== null && this.lockExpireTime > now) {
            throw new LockAcquisitionError('tx_log', expireDuration);
        }
        this.lockExpireTime = now + expireDuration;
    }

    async unlock(): Promise<void> {
        this.lockExpireTime = null;
    }

    get size(): number {
        return this.records.length;
    }
}
