import axios, { AxiosInstance } from 'axios';
import { ResourceManagerClient } from './resourceManager';
import { Vote } from './enums';
import { logger } from './logger';
import { RetryableError } from './retry';
import { ResourceUnavailableError, wrapError } from './errors';

export interface ParticipantEndpoint {
    prepareUrl: string;
    commitUrl: string;
    rollbackUrl: string;
    healthUrl?: string;
    timeout?: number;
    headers?: Record<string, string>;
}

export interface ParticipantRegistrationRequest {
    resourceId: string;
    endpoint: ParticipantEndpoint;
    metadata?: Record<string, unknown>;
}

export interface ParticipantRegistrationResponse {
    success: boolean;
    message: string;
    registrationId?: string;
}

interface ParticipantResponse {
    success?: boolean;
    vote?: string;
    message?: string;
    healthy?: boolean;
}

type Phase = 'prepare' | 'commit' | 'rollback';

// 连接失败、超时或 5xx 视为参与者暂不可用
function isUnavailable(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }
    const status = error.response?.status;
    return error.code === 'ECONNREFUSED' ||
           error.code === 'ETIMEDOUT' ||
           error.code === 'ECONNABORTED' ||
           (status !== undefined && status >= 500);
}

// 通过 HTTP 接入的资源管理器
export class HttpResourceManager implements ResourceManagerClient {
    id: string;
    private endpoint: ParticipantEndpoint;
    private axiosInstance: AxiosInstance;
    private metadata: Record<string, unknown>;

    constructor(
        id: string,
        endpoint: ParticipantEndpoint,
        metadata: Record<string, unknown> = {},
        axiosInstance?: AxiosInstance
    ) {
        this.id = id;
        this.endpoint = endpoint;
        this.metadata = metadata;

        // 创建 axios 实例
        this.axiosInstance = axiosInstance ?? axios.create({
            timeout: endpoint.timeout || 30000,
            headers: {
                'Content-Type': 'application/json',
                'User-Agent': '2PC-Coordinator/1.0',
                ...endpoint.headers
            }
        });

        this.axiosInstance.interceptors.request.use(
            (config) => {
                logger.debug('发送 HTTP 请求', {
                    resourceId: this.id,
                    method: config.method,
                    url: config.url
                });
                return config;
            }
        );

        this.axiosInstance.interceptors.response.use(
            (response) => {
                logger.debug('收到 HTTP 响应', {
                    resourceId: this.id,
                    status: response.status,
                    url: response.config.url
                });
                return response;
            },
            (error) => {
                logger.warn('HTTP 响应错误', {
                    resourceId: this.id,
                    url: axios.isAxiosError(error) ? error.config?.url : undefined,
                    status: axios.isAxiosError(error) ? error.response?.status : undefined
                });
                return Promise.reject(error);
            }
        );
    }

    async prepare(transactionId: string): Promise<Vote.Yes | Vote.No> {
        try {
            const data = await this.send('prepare', this.endpoint.prepareUrl, transactionId);
            const vote = data.vote === Vote.Yes ? Vote.Yes : Vote.No;

            logger.info('参与者投票', { resourceId: this.id, txId: transactionId, vote, message: data.message });
            return vote;

        } catch (error) {
            if (isUnavailable(error)) {
                const cause = wrapError(error, 'prepare');
                throw new ResourceUnavailableError(this.id, cause.message, cause);
            }
            throw error;
        }
    }

    async commit(transactionId: string): Promise<void> {
        await this.acknowledge('commit', this.endpoint.commitUrl, transactionId);
    }

    async rollback(transactionId: string): Promise<void> {
        await this.acknowledge('rollback', this.endpoint.rollbackUrl, transactionId);
    }

    // 健康检查
    async healthCheck(): Promise<boolean> {
        try {
            const healthUrl = this.endpoint.healthUrl ?? this.endpoint.prepareUrl.replace(/\/prepare$/, '/health');
            const response = await this.axiosInstance.get<ParticipantResponse>(healthUrl, { timeout: 5000 });

            return response.status === 200 && response.data?.healthy === true;
        } catch (error) {
            logger.warn('参与者健康检查失败', {
                resourceId: this.id,
                error: wrapError(error, 'healthCheck').message
            });
            return false;
        }
    }

    // 获取参与者信息
    getInfo() {
        return {
            id: this.id,
            endpoint: this.endpoint,
            metadata: this.metadata,
            type: 'http'
        };
    }

    private async acknowledge(phase: Phase, url: string, transactionId: string): Promise<void> {
        try {
            const data = await this.send(phase, url, transactionId);
            if (!data.success) {
                throw new RetryableError(`${phase} 未被确认: ${data.message || '未知错误'}`);
            }

            logger.info(`参与者 ${phase} 已确认`, { resourceId: this.id, txId: transactionId });

        } catch (error) {
            if (error instanceof RetryableError) {
                throw error;
            }
            const cause = wrapError(error, phase);
            throw new RetryableError(`参与者 ${phase} 网络错误: ${cause.message}`, cause);
        }
    }

    private async send(phase: Phase, url: string, transactionId: string): Promise<ParticipantResponse> {
        const response = await this.axiosInstance.post<ParticipantResponse>(url, {
            transactionId,
            resourceId: this.id,
            phase,
            metadata: this.metadata,
            timestamp: new Date().toISOString()
        });
        return response.data ?? {};
    }
}
