import { TxConfig } from './tx_config';
import { LogLevel, isLogLevel } from './logger';
import { RetryConfig } from './retry';
import dotenv from 'dotenv';
dotenv.config();

export interface DatabaseConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    connectionLimit?: number;
}

export interface ServerConfig {
    port: number;
    host: string;
    enableCors: boolean;
}

export interface CoordinatorConfig {
    // 事务配置
    transaction: {
        timeout: number;
        prepareTimeout: number;
        commitWaitTimeout: number;
        maxConcurrent: number;
        monitorInterval: number;
        enableMonitor: boolean;
        compactLog: boolean;
    };

    // 第二阶段重试配置
    retry: RetryConfig & {
        escalateAfterAttempts: number;
    };

    // 日志配置
    logging: {
        level: LogLevel;
    };

    // 数据库配置
    database: DatabaseConfig;

    // 管理服务配置
    server: ServerConfig;
}

export type PartialCoordinatorConfig = {
    [K in keyof CoordinatorConfig]?: Partial<CoordinatorConfig[K]>;
};

// 默认配置
export const DEFAULT_CONFIG: CoordinatorConfig = {
    transaction: {
        timeout: 30000,           // 30秒事务存活时长
        prepareTimeout: 5000,     // 5秒 prepare 超时
        commitWaitTimeout: 0,     // 一直等待第二阶段确认
        maxConcurrent: 1000,
        monitorInterval: 5000,    // 5秒监控间隔
        enableMonitor: true,      // 启用监控
        compactLog: true
    },
    retry: {
        maxRetries: Infinity,     // 第二阶段必须最终送达
        baseDelayMs: 500,
        maxDelayMs: 30000,
        backoffMultiplier: 2,
        jitterMs: 100,
        escalateAfterAttempts: 10
    },
    logging: {
        level: LogLevel.INFO
    },
    database: {
        host: 'localhost',
        port: 3306,
        user: 'root',
        password: '',
        database: 'coordinator',
        connectionLimit: 10
    },
    server: {
        port: 5000,
        host: '0.0.0.0',
        enableCors: true
    }
};

function readInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw === '') {
        return undefined;
    }
    return parseInt(raw, 10);
}

function readBool(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
    const raw = env[key];
    if (raw === undefined || raw === '') {
        return undefined;
    }
    return raw === 'true';
}

function setIfDefined<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
    if (value !== undefined) {
        target[key] = value;
    }
}

function nonEmpty<T extends object>(value: T): T | undefined {
    return Object.keys(value).length > 0 ? value : undefined;
}

// 从环境变量加载配置
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PartialCoordinatorConfig {
    const config: PartialCoordinatorConfig = {};

    // 事务配置
    const transaction: Partial<CoordinatorConfig['transaction']> = {};
    setIfDefined(transaction, 'timeout', readInt(env, 'TX_TIMEOUT'));
    setIfDefined(transaction, 'prepareTimeout', readInt(env, 'TX_PREPARE_TIMEOUT'));
    setIfDefined(transaction, 'commitWaitTimeout', readInt(env, 'TX_COMMIT_WAIT_TIMEOUT'));
    setIfDefined(transaction, 'maxConcurrent', readInt(env, 'TX_MAX_CONCURRENT'));
    setIfDefined(transaction, 'monitorInterval', readInt(env, 'TX_MONITOR_INTERVAL'));
    setIfDefined(transaction, 'enableMonitor', readBool(env, 'TX_ENABLE_MONITOR'));
    setIfDefined(transaction, 'compactLog', readBool(env, 'TX_COMPACT_LOG'));
    config.transaction = nonEmpty(transaction);

    // 重试配置，未设置最大次数时保持无限重试
    const retry: Partial<CoordinatorConfig['retry']> = {};
    setIfDefined(retry, 'maxRetries', readInt(env, 'PHASE2_MAX_RETRIES'));
    setIfDefined(retry, 'baseDelayMs', readInt(env, 'PHASE2_BASE_DELAY_MS'));
    setIfDefined(retry, 'maxDelayMs', readInt(env, 'PHASE2_MAX_DELAY_MS'));
    setIfDefined(retry, 'escalateAfterAttempts', readInt(env, 'PHASE2_ESCALATE_AFTER'));
    config.retry = nonEmpty(retry);

    // 数据库配置
    const database: Partial<DatabaseConfig> = {};
    setIfDefined(database, 'host', env.DB_HOST || undefined);
    setIfDefined(database, 'port', readInt(env, 'DB_PORT'));
    setIfDefined(database, 'user', env.DB_USER || undefined);
    setIfDefined(database, 'password', env.DB_PASSWORD);
    setIfDefined(database, 'database', env.DB_NAME || undefined);
    config.database = nonEmpty(database);

    // 管理服务配置
    const server: Partial<ServerConfig> = {};
    setIfDefined(server, 'port', readInt(env, 'SERVER_PORT'));
    setIfDefined(server, 'host', env.SERVER_HOST || undefined);
    setIfDefined(server, 'enableCors', readBool(env, 'SERVER_ENABLE_CORS'));
    config.server = nonEmpty(server);

    // 日志配置
    const level = env.LOG_LEVEL?.toUpperCase();
    if (level && isLogLevel(level)) {
        config.logging = { level };
    }

    return config;
}

// 合并配置
export function mergeConfig(base: CoordinatorConfig, override: PartialCoordinatorConfig): CoordinatorConfig {
    return {
        transaction: { ...base.transaction, ...override.transaction },
        retry: { ...base.retry, ...override.retry },
        logging: { ...base.logging, ...override.logging },
        database: { ...base.database, ...override.database },
        server: { ...base.server, ...override.server }
    };
}

// 创建 TxConfig 实例
export function createTxConfig(config: CoordinatorConfig): TxConfig {
    const { escalateAfterAttempts, ...phase2Retry } = config.retry;
    return new TxConfig({
        ...config.transaction,
        phase2Retry,
        escalateAfterAttempts
    });
}

// 验证配置
export function validateConfig(config: CoordinatorConfig): string[] {
    const errors: string[] = [];

    // 验证事务配置
    if (!(config.transaction.timeout > 0)) {
        errors.push('事务存活时长必须大于0');
    }

    if (!(config.transaction.prepareTimeout > 0)) {
        errors.push('prepare 超时时间必须大于0');
    }

    if (!(config.transaction.commitWaitTimeout >= 0)) {
        errors.push('commit 等待时间不能小于0');
    }

    if (!(config.transaction.maxConcurrent > 0)) {
        errors.push('并发事务上限必须大于0');
    }

    if (!(config.transaction.monitorInterval > 0)) {
        errors.push('监控间隔必须大于0');
    }

    // 验证重试配置
    if (!(config.retry.maxRetries >= 0)) {
        errors.push('最大重试次数不能小于0');
    }

    if (!(config.retry.baseDelayMs > 0)) {
        errors.push('基础延迟时间必须大于0');
    }

    if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
        errors.push('最大延迟时间不能小于基础延迟时间');
    }

    // 验证数据库配置
    if (!config.database.host) {
        errors.push('数据库主机不能为空');
    }

    if (!(config.database.port > 0 && config.database.port <= 65535)) {
        errors.push('数据库端口必须在1-65535之间');
    }

    if (!config.database.user) {
        errors.push('数据库用户名不能为空');
    }

    if (!config.database.database) {
        errors.push('数据库名不能为空');
    }

    if (!(config.server.port >= 0 && config.server.port <= 65535)) {
        errors.push('服务端口必须在0-65535之间');
    }

    return errors;
}
