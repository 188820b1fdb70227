// src/utils/sleep.ts

/**
 * 単純な sleep 関数
 * @param ms 待機するミリ秒
 */
export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise(resolve => setTimeout(resolve, ms));
}
