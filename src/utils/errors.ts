// src/utils/errors.ts

/**
 * トポロジグラフが不正 (未登録ノードを参照するエッジ、不正な k など)
 */
export class TopologyError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'TopologyError';
	}
}

/**
 * 外部コマンド (containerlab, docker, ovs-vsctl ...) が失敗した
 */
export class CommandError extends Error {
	constructor(
		public readonly command: string,
		public readonly exitCode: number | null,
		public readonly stderr: string
	) {
		super(`Command failed (exit ${exitCode ?? 'signal'}): ${command}\n${stderr.trim()}`);
		this.name = 'CommandError';
	}
}

export function toError(error: unknown): Error {
	if (error instanceof Error) return error;

	try {
		return new Error(JSON.stringify(error));
	} catch {
		return new Error(String(error));
	}
}
