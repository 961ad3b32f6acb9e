import { ResourceManagerClient } from "./resourceManager";
import { DuplicateResourceError } from "./errors";
import { logger } from "./logger";

// 资源 id 到客户端的映射，enlist 与恢复流程共用
export class ResourceRegistry {
    private resources = new Map<string, ResourceManagerClient>();

    // 同一实例重复注册视为无操作，不同实例复用同一 id 则报错
    register(resource: ResourceManagerClient): void {
        const existing = this.resources.get(resource.id);
        if (existing) {
            if (existing !== resource) {
                throw new DuplicateResourceError(resource.id);
            }
            return;
        }

        this.resources.set(resource.id, resource);
        logger.info('资源管理器注册成功', {
            resourceId: resource.id,
            totalResources: this.resources.size
        });
    }

    unregister(resourceId: string): boolean {
        return this.resources.delete(resourceId);
    }

    get(resourceId: string): ResourceManagerClient | undefined {
        return this.resources.get(resourceId);
    }

    has(resourceId: string): boolean {
        return this.resources.has(resourceId);
    }

    list(): ResourceManagerClient[] {
        return Array.from(this.resources.values());
    }

    get size(): number {
        return this.resources.size;
    }
}
