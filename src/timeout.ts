// 在限定时间内等待 promise，超时则以 onTimeout 构造的错误拒绝；计时器总会被清理
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
    }
}
