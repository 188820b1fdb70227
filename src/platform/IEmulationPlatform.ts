// src/platform/IEmulationPlatform.ts

export interface ProcessOutcome {
	/** wait() の上限時間内にプロセスが終了したか */
	exited: boolean;
	exitCode: number | null;
	stdout: string;
	stderr: string;
}

/**
 * エミュレートされたホスト上で起動したプロセスのハンドル
 */
export interface IProcessHandle {
	readonly command: string;

	isRunning(): boolean;

	/**
	 * 終了を待ちます。timeoutMs 以内に終了しなければ exited: false で解決し、
	 * プロセスは停止しません (停止は kill() の責務)。
	 */
	wait(timeoutMs: number): Promise<ProcessOutcome>;

	kill(): Promise<void>;
}

/**
 * 'background': 出力を取得しないデーモン起動 (例: `iperf -s &`)
 * 'capture': stdout を取得する通常起動
 */
export type ExecutionMode = 'background' | 'capture';

/**
 * ネットワークエミュレーション基盤の契約。
 *
 * create* は start() の前にのみ呼び出されます。
 */
export interface IEmulationPlatform {
	createHost(name: string, address: string): void;
	createSwitch(name: string): void;
	createLink(left: string, right: string, bandwidthMbps: number, delay: string): void;

	start(): Promise<void>;

	/**
	 * 全ホスト間の疎通確認。
	 * @returns 到達できなかったペアの数
	 */
	pingAll(): Promise<number>;

	executeOnHost(hostName: string, command: string, mode: ExecutionMode): IProcessHandle;

	stop(): Promise<void>;

	/**
	 * 以前の実行が残した状態を含め、基盤全体を片付けます。
	 */
	cleanup(): Promise<void>;
}
