import * as mysql from 'mysql2/promise';
import { TxManager } from "../src/tx_manager";
import { MySQLTxLog } from "../src/stores/mysql-log";
import { CoordinatorServer } from "../src/server";
import { logger } from "../src/logger";
import { DEFAULT_CONFIG, loadConfigFromEnv, mergeConfig, createTxConfig, validateConfig } from "../src/config";
import { wrapError } from "../src/errors";

// 优雅关闭处理
class GracefulShutdown {
    private shutdownHandlers: Array<() => Promise<void>> = [];
    private isShuttingDown = false;

    addHandler(handler: () => Promise<void>) {
        this.shutdownHandlers.push(handler);
    }

    async shutdown(code = 0) {
        if (this.isShuttingDown) return;

        this.isShuttingDown = true;
        logger.info('开始优雅关闭协调者服务...');

        // 后注册的先关闭
        for (const handler of [...this.shutdownHandlers].reverse()) {
            try {
                await handler();
            } catch (error) {
                logger.error('关闭处理器执行失败', wrapError(error, 'shutdown'));
            }
        }

        logger.info('协调者服务优雅关闭完成');
        process.exit(code);
    }

    setupSignalHandlers() {
        process.on('SIGTERM', () => {
            logger.info('收到 SIGTERM 信号');
            void this.shutdown();
        });

        process.on('SIGINT', () => {
            logger.info('收到 SIGINT 信号');
            void this.shutdown();
        });

        process.on('uncaughtException', (error) => {
            logger.error('未捕获的异常', error);
            void this.shutdown(1);
        });

        process.on('unhandledRejection', (reason) => {
            logger.error('未处理的 Promise 拒绝', wrapError(reason, 'unhandledRejection'));
            void this.shutdown(1);
        });
    }
}

// 主函数
async function main() {
    const shutdown = new GracefulShutdown();
    shutdown.setupSignalHandlers();

    const config = mergeConfig(DEFAULT_CONFIG, loadConfigFromEnv());

    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        logger.error('配置验证失败', new Error(configErrors.join('; ')));
        process.exit(1);
    }

    logger.setLevel(config.logging.level);
    logger.info('协调者服务启动', {
        config: {
            server: config.server,
            database: { ...config.database, password: '***' },
            transaction: config.transaction
        }
    });

    // 创建数据库连接池
    const pool = mysql.createPool({
        host: config.database.host,
        port: config.database.port,
        user: config.database.user,
        password: config.database.password,
        database: config.database.database,
        waitForConnections: true,
        connectionLimit: config.database.connectionLimit,
        enableKeepAlive: true,
        keepAliveInitialDelay: 0
    });

    shutdown.addHandler(async () => {
        logger.info('关闭数据库连接池');
        await pool.end();
    });

    const txLog = new MySQLTxLog({ pool, retryConfig: { maxRetries: 3 } });
    await txLog.ensureSchema();
    if (!(await txLog.healthCheck())) {
        throw new Error('事务日志数据库不可用');
    }

    const txManager = new TxManager(txLog, createTxConfig(config));
    shutdown.addHandler(async () => {
        logger.info('停止事务管理器');
        await txManager.stop();
    });

    const server = new CoordinatorServer(txManager, config.server);
    shutdown.addHandler(async () => {
        logger.info('停止 HTTP 服务');
        await server.stop();
    });

    const port = await server.start();
    const host = config.server.host === '0.0.0.0' ? 'localhost' : config.server.host;

    // 参与者需要重新注册后，待决事务才能完成；这里先处理不依赖外部参与者的部分
    const recovered = await txManager.recover();
    logger.info('启动恢复完成', {
        committed: recovered.committed.length,
        aborted: recovered.aborted.length,
        pending: recovered.pending,
        completed: recovered.completed.length
    });

    logger.info('使用说明', {
        '注册参与者': `POST http://${host}:${port}/api/v1/participants/register`,
        '开启事务': 'POST /api/v1/transactions',
        '加入参与者': 'POST /api/v1/transactions/:txId/participants',
        '提交事务': 'POST /api/v1/transactions/:txId/commit',
        '重新恢复': 'POST /api/v1/recovery',
        '查看健康状态': 'GET /api/v1/health'
    });
}

if (require.main === module) {
    main().catch(error => {
        logger.error('协调者服务启动失败', wrapError(error, 'main'));
        process.exit(1);
    });
}

export { main as runCoordinatorServer };
