import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import * as http from 'http';
import { logger } from '../src/logger';

export type MockVote = 'YES' | 'NO' | 'UNAVAILABLE';

type MockTxStatus = 'prepared' | 'refused' | 'committed' | 'rolledBack';

export interface MockParticipantOptions {
    vote?: MockVote;
    // commit/rollback 前若干次返回 503，用于演示第二阶段重试
    failAcksTimes?: number;
}

// 模拟资源管理器，实现 prepare / commit / rollback 接口
export class MockParticipantService {
    private app: express.Application;
    private server: http.Server | null = null;
    private serviceName: string;
    private vote: MockVote;
    private failAcksRemaining: number;

    // 模拟业务状态，按事务 id 索引
    private transactions = new Map<string, { status: MockTxStatus; timestamp: number }>();
    readonly received: Array<{ phase: string; transactionId: string }> = [];

    constructor(serviceName: string, options: MockParticipantOptions = {}) {
        this.serviceName = serviceName;
        this.vote = options.vote ?? 'YES';
        this.failAcksRemaining = options.failAcksTimes ?? 0;
        this.app = express();
        this.setupMiddleware();
        this.setupRoutes();
    }

    setVote(vote: MockVote) {
        this.vote = vote;
    }

    statusOf(transactionId: string): MockTxStatus | undefined {
        return this.transactions.get(transactionId)?.status;
    }

    private setupMiddleware() {
        this.app.use(cors());
        this.app.use(express.json());

        // 请求日志
        this.app.use((req: Request, res: Response, next: NextFunction) => {
            logger.debug(`[${this.serviceName}] 收到请求`, {
                method: req.method,
                url: req.url
            });
            next();
        });
    }

    private transactionIdOf(req: Request): string | undefined {
        const body: unknown = req.body;
        if (typeof body === 'object' && body !== null && 'transactionId' in body && typeof body.transactionId === 'string') {
            return body.transactionId;
        }
        return undefined;
    }

    private setupRoutes() {
        // 健康检查
        this.app.get('/health', (req: Request, res: Response) => {
            res.json({
                success: true,
                healthy: true,
                service: this.serviceName,
                timestamp: new Date().toISOString()
            });
        });

        this.app.post('/prepare', (req: Request, res: Response) => {
            const transactionId = this.transactionIdOf(req);
            if (!transactionId) {
                res.status(400).json({ success: false, message: '缺少 transactionId' });
                return;
            }
            this.received.push({ phase: 'prepare', transactionId });

            if (this.vote === 'UNAVAILABLE') {
                res.status(503).json({ success: false, message: `${this.serviceName} 暂不可用` });
                return;
            }

            const status: MockTxStatus = this.vote === 'YES' ? 'prepared' : 'refused';
            this.transactions.set(transactionId, { status, timestamp: Date.now() });

            logger.info(`[${this.serviceName}] prepare 投票`, { txId: transactionId, vote: this.vote });
            res.json({
                success: true,
                vote: this.vote,
                message: `${this.serviceName} 投票 ${this.vote}`
            });
        });

        this.app.post('/commit', (req: Request, res: Response) => {
            this.acknowledge(req, res, 'commit', 'committed');
        });

        this.app.post('/rollback', (req: Request, res: Response) => {
            this.acknowledge(req, res, 'rollback', 'rolledBack');
        });

        // 获取事务历史（调试用）
        this.app.get('/transactions', (req: Request, res: Response) => {
            res.json({
                success: true,
                service: this.serviceName,
                transactions: Array.from(this.transactions.entries()).map(([transactionId, value]) => ({
                    transactionId,
                    ...value
                }))
            });
        });
    }

    // commit 与 rollback 都是幂等的：重复调用返回成功
    private acknowledge(req: Request, res: Response, phase: string, status: MockTxStatus) {
        const transactionId = this.transactionIdOf(req);
        if (!transactionId) {
            res.status(400).json({ success: false, message: '缺少 transactionId' });
            return;
        }
        this.received.push({ phase, transactionId });

        if (this.failAcksRemaining > 0) {
            this.failAcksRemaining--;
            logger.warn(`[${this.serviceName}] ${phase} 模拟失败`, { txId: transactionId });
            res.status(503).json({ success: false, message: `${this.serviceName} 暂不可用` });
            return;
        }

        this.transactions.set(transactionId, { status, timestamp: Date.now() });
        logger.info(`[${this.serviceName}] ${phase} 完成`, { txId: transactionId });
        res.json({ success: true, message: `${this.serviceName} ${phase} 完成` });
    }

    // port 为 0 时由系统分配，返回实际端口
    async start(port: number = 0): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = http.createServer(this.app);
            server.once('error', (error) => {
                logger.error(`[${this.serviceName}] 服务启动失败`, error);
                reject(error);
            });
            server.listen(port, '127.0.0.1', () => {
                this.server = server;
                const address = server.address();
                const actualPort = typeof address === 'object' && address !== null ? address.port : port;
                logger.info(`[${this.serviceName}] 模拟参与者启动`, { port: actualPort });
                resolve(actualPort);
            });
        });
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = null;

        await new Promise<void>((resolve) => {
            server.close(() => {
                logger.info(`[${this.serviceName}] 模拟参与者已停止`);
                resolve();
            });
            server.closeIdleConnections();
        });
    }
}

// 启动多个模拟参与者
async function startMockParticipants() {
    const services = [
        new MockParticipantService('OrderService'),
        new MockParticipantService('InventoryService'),
        new MockParticipantService('PaymentService', { failAcksTimes: 2 })
    ];
    const basePort = parseInt(process.env.MOCK_BASE_PORT || '3001', 10);

    logger.info('启动模拟参与者...');
    for (const [index, service] of services.entries()) {
        await service.start(basePort + index);
    }
    logger.info('所有模拟参与者启动完成');

    const shutdown = async () => {
        logger.info('正在停止模拟参与者...');
        for (const service of services) {
            await service.stop();
        }
        process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    return services;
}

if (require.main === module) {
    startMockParticipants().catch(error => {
        console.error('启动模拟参与者失败:', error);
        process.exit(1);
    });
}

export { startMockParticipants };
