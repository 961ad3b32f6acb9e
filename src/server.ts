import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import * as http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { TxManager } from './tx_manager';
import { ServerConfig } from './config';
import {
    HttpResourceManager,
    ParticipantEndpoint,
    ParticipantRegistrationRequest,
    ParticipantRegistrationResponse
} from './network-participant';
import { ResourceManagerClient } from './resourceManager';
import { TransactionSnapshot } from './model';
import { logger } from './logger';
import { metricsCollector } from './metrics';
import { CoordinatorError, wrapError } from './errors';

const STATUS_BY_CODE: Record<string, number> = {
    ENLISTMENT_ERROR: 409,
    INVALID_TRANSACTION_STATE: 409,
    DUPLICATE_RESOURCE: 409,
    TRANSACTION_NOT_FOUND: 404,
    RESOURCE_EXHAUSTED: 503
};

export function statusForError(error: unknown): number {
    if (error instanceof CoordinatorError) {
        return STATUS_BY_CODE[error.code] ?? 500;
    }
    return 500;
}

function isEndpoint(value: unknown): value is ParticipantEndpoint {
    return typeof value === 'object' && value !== null &&
        'prepareUrl' in value && typeof value.prepareUrl === 'string' &&
        'commitUrl' in value && typeof value.commitUrl === 'string' &&
        'rollbackUrl' in value && typeof value.rollbackUrl === 'string';
}

function isRegistrationRequest(body: unknown): body is ParticipantRegistrationRequest {
    if (typeof body !== 'object' || body === null) {
        return false;
    }
    if (!('resourceId' in body) || typeof body.resourceId !== 'string' || body.resourceId.length === 0) {
        return false;
    }
    if ('metadata' in body && body.metadata !== undefined && (typeof body.metadata !== 'object' || body.metadata === null)) {
        return false;
    }
    return 'endpoint' in body && isEndpoint(body.endpoint);
}

function describe(resource: ResourceManagerClient) {
    return resource instanceof HttpResourceManager ? resource.getInfo() : { id: resource.id, type: 'local' };
}

// 协调者管理服务：REST 接口 + WebSocket 事务事件推送
export class CoordinatorServer {
    private app: express.Application;
    private server: http.Server;
    private wss: WebSocketServer;
    private txManager: TxManager;
    private config: ServerConfig;
    private unsubscribe: (() => void) | null = null;

    constructor(txManager: TxManager, config: ServerConfig) {
        this.txManager = txManager;
        this.config = config;
        this.app = express();
        this.server = http.createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupMiddleware();
        this.setupRoutes();
        this.setupWebSocket();
    }

    private setupMiddleware() {
        this.app.use(express.json({ limit: '1mb' }));

        // CORS 支持
        if (this.config.enableCors) {
            this.app.use(cors({
                origin: true,
                credentials: true
            }));
        }

        // 请求日志中间件
        this.app.use((req: Request, res: Response, next: NextFunction) => {
            const start = Date.now();

            res.on('finish', () => {
                logger.info('HTTP 请求', {
                    method: req.method,
                    url: req.url,
                    status: res.statusCode,
                    duration: Date.now() - start
                });
            });

            next();
        });
    }

    private setupRoutes() {
        const apiRouter = express.Router();

        // 健康检查
        apiRouter.get('/health', async (req: Request, res: Response) => {
            try {
                const health = await this.txManager.getHealthStatus();
                const participants = await this.checkParticipantsHealth();

                res.json({
                    success: true,
                    data: {
                        ...health,
                        participants,
                        server: {
                            uptime: process.uptime(),
                            version: process.version,
                            logLevel: logger.getLevel()
                        }
                    }
                });
            } catch (error) {
                this.fail(res, '健康检查失败', error);
            }
        });

        apiRouter.get('/metrics', (req: Request, res: Response) => {
            res.json({
                success: true,
                data: metricsCollector.getMetrics()
            });
        });

        // 已注册参与者列表
        apiRouter.get('/participants', (req: Request, res: Response) => {
            res.json({
                success: true,
                data: this.txManager.registry.list().map(describe)
            });
        });

        // 注册 HTTP 参与者
        apiRouter.post('/participants/register', async (req: Request, res: Response) => {
            const body: unknown = req.body;
            if (!isRegistrationRequest(body)) {
                res.status(400).json({
                    success: false,
                    message: '缺少必要参数：resourceId 和 endpoint(prepareUrl/commitUrl/rollbackUrl)'
                });
                return;
            }

            try {
                if (this.txManager.registry.has(body.resourceId)) {
                    res.status(409).json({
                        success: false,
                        message: `参与者 ${body.resourceId} 已经注册`
                    });
                    return;
                }

                const participant = new HttpResourceManager(body.resourceId, body.endpoint, body.metadata || {});

                // 进行健康检查
                const isHealthy = await participant.healthCheck();
                if (!isHealthy) {
                    res.status(400).json({
                        success: false,
                        message: `参与者 ${body.resourceId} 健康检查失败`
                    });
                    return;
                }

                this.txManager.register(participant);

                const response: ParticipantRegistrationResponse = {
                    success: true,
                    message: `参与者 ${body.resourceId} 注册成功`,
                    registrationId: body.resourceId
                };
                res.json(response);

            } catch (error) {
                this.fail(res, '参与者注册失败', error);
            }
        });

        // 取消注册；已加入事务的参与者不受影响，但恢复时将无法找到
        apiRouter.delete('/participants/:resourceId', (req: Request, res: Response) => {
            const resourceId = req.params.resourceId;
            if (!this.txManager.registry.unregister(resourceId)) {
                res.status(404).json({
                    success: false,
                    message: `参与者 ${resourceId} 未找到`
                });
                return;
            }

            logger.info('参与者取消注册成功', { resourceId });
            res.json({
                success: true,
                message: `参与者 ${resourceId} 取消注册成功`
            });
        });

        apiRouter.get('/transactions', (req: Request, res: Response) => {
            res.json({
                success: true,
                data: this.txManager.listTransactions()
            });
        });

        // 开启事务
        apiRouter.post('/transactions', (req: Request, res: Response) => {
            try {
                const handle = this.txManager.begin();
                res.status(201).json({
                    success: true,
                    data: this.txManager.getTransaction(handle.id)
                });
            } catch (error) {
                this.fail(res, '开启事务失败', error);
            }
        });

        // 获取事务状态
        apiRouter.get('/transactions/:txId', (req: Request, res: Response) => {
            const snapshot = this.txManager.getTransaction(req.params.txId);
            if (!snapshot) {
                res.status(404).json({
                    success: false,
                    message: `事务 ${req.params.txId} 不存在`
                });
                return;
            }

            res.json({ success: true, data: snapshot });
        });

        // 按 resourceId 把已注册的参与者加入事务
        apiRouter.post('/transactions/:txId/participants', (req: Request, res: Response) => {
            const body: unknown = req.body;
            const resourceId = typeof body === 'object' && body !== null && 'resourceId' in body ? body.resourceId : undefined;
            if (typeof resourceId !== 'string' || resourceId.length === 0) {
                res.status(400).json({ success: false, message: '缺少必要参数：resourceId' });
                return;
            }

            const resource = this.txManager.registry.get(resourceId);
            if (!resource) {
                res.status(404).json({ success: false, message: `参与者 ${resourceId} 未注册` });
                return;
            }

            try {
                this.txManager.enlist(req.params.txId, resource);
                res.json({ success: true, data: this.txManager.getTransaction(req.params.txId) });
            } catch (error) {
                this.fail(res, '参与者加入事务失败', error);
            }
        });

        apiRouter.post('/transactions/:txId/commit', async (req: Request, res: Response) => {
            try {
                const result = await this.txManager.commit(req.params.txId);
                res.json({
                    success: true,
                    data: result,
                    message: result.success ? '事务已提交' : '事务已回滚'
                });
            } catch (error) {
                this.fail(res, '提交事务失败', error);
            }
        });

        apiRouter.post('/transactions/:txId/rollback', async (req: Request, res: Response) => {
            try {
                await this.txManager.rollback(req.params.txId);
                res.json({ success: true, data: this.txManager.getTransaction(req.params.txId) });
            } catch (error) {
                this.fail(res, '回滚事务失败', error);
            }
        });

        // 手动触发恢复
        apiRouter.post('/recovery', async (req: Request, res: Response) => {
            try {
                const result = await this.txManager.recover();
                res.json({ success: true, data: result });
            } catch (error) {
                this.fail(res, '恢复失败', error);
            }
        });

        this.app.use('/api/v1', apiRouter);
    }

    private setupWebSocket() {
        this.wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => {
            logger.info('WebSocket 连接建立', {
                ip: req.socket.remoteAddress,
                userAgent: req.headers['user-agent']
            });

            // 发送当前状态
            this.sendCurrentStatus(ws).catch(error => {
                logger.error('发送当前状态失败', wrapError(error, 'websocket'));
            });

            ws.on('close', () => {
                logger.debug('WebSocket 连接关闭');
            });

            ws.on('error', (error) => {
                logger.error('WebSocket 错误', error);
            });
        });

        this.unsubscribe = this.txManager.subscribe(snapshot => this.broadcastTransaction(snapshot));
    }

    private async sendCurrentStatus(ws: WebSocket) {
        const health = await this.txManager.getHealthStatus();

        ws.send(JSON.stringify({
            type: 'status_update',
            data: {
                health,
                transactions: this.txManager.listTransactions(),
                timestamp: new Date().toISOString()
            }
        }));
    }

    private broadcastTransaction(snapshot: TransactionSnapshot) {
        const message = JSON.stringify({
            type: 'transaction_update',
            data: snapshot
        });

        this.wss.clients.forEach((client) => {
            if (client.readyState === WebSocket.OPEN) {
                client.send(message);
            }
        });
    }

    private async checkParticipantsHealth(): Promise<Array<{ id: string, healthy: boolean }>> {
        const checks = this.txManager.registry.list().map(async (resource) => {
            if (!(resource instanceof HttpResourceManager)) {
                return { id: resource.id, healthy: true };
            }
            return { id: resource.id, healthy: await resource.healthCheck() };
        });

        return Promise.all(checks);
    }

    private fail(res: Response, message: string, error: unknown) {
        const wrapped = wrapError(error, message);
        const status = statusForError(error);

        if (status >= 500) {
            logger.error(message, wrapped);
        } else {
            logger.warn(message, { error: wrapped.message, status });
        }

        res.status(status).json({
            success: false,
            message,
            code: error instanceof CoordinatorError ? error.code : undefined,
            error: wrapped.message
        });
    }

    // 监听成功后返回实际端口，port 为 0 时由系统分配
    async start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const onError = (error: Error) => {
                logger.error('服务器启动失败', error);
                reject(error);
            };
            this.server.once('error', onError);

            this.server.listen(this.config.port, this.config.host, () => {
                this.server.off('error', onError);
                const address = this.server.address();
                const port = typeof address === 'object' && address !== null ? address.port : this.config.port;

                logger.info('协调者服务启动成功', {
                    host: this.config.host,
                    port,
                    api: `http://${this.config.host}:${port}/api/v1`
                });
                resolve(port);
            });
        });
    }

    async stop(): Promise<void> {
        logger.info('正在停止协调者服务...');

        this.unsubscribe?.();
        this.unsubscribe = null;

        // 关闭 WebSocket 连接
        this.wss.clients.forEach((client) => {
            client.terminate();
        });

        await new Promise<void>((resolve) => {
            this.wss.close(() => resolve());
        });

        await new Promise<void>((resolve, reject) => {
            this.server.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                logger.info('协调者服务已停止');
                resolve();
            });
            this.server.closeIdleConnections();
        });
    }
}
