import { DEFAULT_CONFIG, createTxConfig, loadConfigFromEnv, mergeConfig, validateConfig } from '../src/config';
import { TxConfig } from '../src/tx_config';
import { LogLevel } from '../src/logger';

describe('配置', () => {
    it('默认配置应通过验证', () => {
        expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
    });

    it('配置只包含实际使用的节', () => {
        expect(Object.keys(DEFAULT_CONFIG)).toEqual(['transaction', 'retry', 'logging', 'database', 'server']);
    });

    it('应该从环境变量加载配置', () => {
        const config = loadConfigFromEnv({
            TX_TIMEOUT: '1000',
            TX_ENABLE_MONITOR: 'false',
            PHASE2_ESCALATE_AFTER: '5',
            DB_HOST: 'db.internal',
            DB_PASSWORD: 'test-secret',
            SERVER_PORT: '8080',
            LOG_LEVEL: 'debug'
        });

        expect(config).toEqual({
            transaction: { timeout: 1000, enableMonitor: false },
            retry: { escalateAfterAttempts: 5 },
            database: { host: 'db.internal', password: 'test-secret' },
            server: { port: 8080 },
            logging: { level: LogLevel.DEBUG }
        });
    });

    it('未设置的环境变量不应覆盖默认值', () => {
        const config = loadConfigFromEnv({ LOG_LEVEL: 'verbose' });

        expect(config.transaction).toBeUndefined();
        expect(config.logging).toBeUndefined();
        expect(mergeConfig(DEFAULT_CONFIG, config)).toEqual(DEFAULT_CONFIG);
    });

    it('应该按节合并配置', () => {
        const merged = mergeConfig(DEFAULT_CONFIG, {
            transaction: { prepareTimeout: 100 },
            server: { port: 0 }
        });

        expect(merged.transaction.prepareTimeout).toBe(100);
        expect(merged.transaction.timeout).toBe(DEFAULT_CONFIG.transaction.timeout);
        expect(merged.server).toEqual({ port: 0, host: '0.0.0.0', enableCors: true });
    });

    it('应该报告非法配置', () => {
        const errors = validateConfig(mergeConfig(DEFAULT_CONFIG, {
            transaction: { timeout: 0 },
            retry: { baseDelayMs: 1000, maxDelayMs: 10 },
            database: { host: '' }
        }));

        expect(errors).toEqual([
            '事务存活时长必须大于0',
            '最大延迟时间不能小于基础延迟时间',
            '数据库主机不能为空'
        ]);
    });

    it('应该创建 TxConfig，第二阶段默认无限重试', () => {
        const txConfig = createTxConfig(DEFAULT_CONFIG);

        expect(txConfig.timeout).toBe(30000);
        expect(txConfig.monitorInterval).toBe(5000);
        expect(txConfig.escalateAfterAttempts).toBe(10);
        expect(txConfig.phase2Retry).toEqual({
            maxRetries: Infinity,
            baseDelayMs: 500,
            maxDelayMs: 30000,
            backoffMultiplier: 2,
            jitterMs: 100
        });
    });

    it('TxConfig 应对非法值使用默认值', () => {
        const txConfig = new TxConfig({ timeout: -1, prepareTimeout: 0, commitWaitTimeout: -5, escalateAfterAttempts: -1 });

        expect(txConfig.timeout).toBe(30000);
        expect(txConfig.prepareTimeout).toBe(5000);
        expect(txConfig.commitWaitTimeout).toBe(0);
        expect(txConfig.escalateAfterAttempts).toBe(10);
        expect(txConfig.enableMonitor).toBe(true);
        expect(txConfig.compactLog).toBe(true);
    });
});
