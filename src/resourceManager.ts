import { Vote } from "./enums";

// 资源管理器客户端：每个参与事务的资源（数据库、消息队列等）实现一个适配器
export interface ResourceManagerClient {
    id: string;

    // 投 YES 即保证之后的 commit 不会因资源自身原因失败
    prepare(transactionId: string): Promise<Vote.Yes | Vote.No>;

    // 幂等，协调者可能重复调用
    commit(transactionId: string): Promise<void>;

    // 幂等，仅在未 prepare、投了 NO 或单阶段回滚时调用
    rollback(transactionId: string): Promise<void>;
}
