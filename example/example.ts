import { TxManager } from "../src/tx_manager";
import { TxConfig } from "../src/tx_config";
import { InMemoryTxLog } from "../src/stores/memory-log";
import { ResourceManagerClient } from "../src/resourceManager";
import { Vote } from "../src/enums";
import { logger } from "../src/logger";
import { metricsCollector } from "../src/metrics";
import { wrapError } from "../src/errors";

// 进程内的账户资源：prepare 阶段冻结金额，commit 入账，rollback 解冻
class AccountResource implements ResourceManagerClient {
    id: string;
    balance: number;
    private pending = new Map<string, number>();
    private amount = 0;

    constructor(id: string, balance: number) {
        this.id = id;
        this.balance = balance;
    }

    // 本次事务要变更的金额，负数表示扣款
    plan(amount: number) {
        this.amount = amount;
    }

    async prepare(transactionId: string): Promise<Vote.Yes | Vote.No> {
        if (this.balance + this.amount < 0) {
            logger.warn('余额不足，投反对票', { resourceId: this.id, txId: transactionId, balance: this.balance });
            return Vote.No;
        }
        this.pending.set(transactionId, this.amount);
        return Vote.Yes;
    }

    async commit(transactionId: string): Promise<void> {
        const amount = this.pending.get(transactionId);
        if (amount === undefined) {
            return;
        }
        this.balance += amount;
        this.pending.delete(transactionId);
    }

    async rollback(transactionId: string): Promise<void> {
        this.pending.delete(transactionId);
    }
}

async function transfer(txManager: TxManager, from: AccountResource, to: AccountResource, amount: number) {
    from.plan(-amount);
    to.plan(amount);

    const tx = txManager.begin();
    txManager.enlist(tx, from);
    txManager.enlist(tx, to);

    const result = await txManager.commit(tx);
    logger.info(result.success ? '转账成功' : '转账被回滚', {
        txId: result.txId,
        amount,
        from: { id: from.id, balance: from.balance },
        to: { id: to.id, balance: to.balance }
    });
}

async function main() {
    const txManager = new TxManager(new InMemoryTxLog(), new TxConfig({
        timeout: 10000,
        prepareTimeout: 2000,
        enableMonitor: true
    }));

    const alice = new AccountResource('alice', 1000);
    const bob = new AccountResource('bob', 500);

    try {
        // a 转账给 b 100 元
        await transfer(txManager, alice, bob, 100);
        // 余额不足，全部回滚
        await transfer(txManager, bob, alice, 5000);

        logger.info('最终余额', { alice: alice.balance, bob: bob.balance });
        metricsCollector.logMetricsSummary();
    } finally {
        await txManager.stop();
    }
}

if (require.main === module) {
    main().catch(error => {
        logger.error('示例运行失败', wrapError(error, 'example'));
        process.exit(1);
    });
}
