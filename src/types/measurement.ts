// src/types/measurement.ts
import { LinkOptions } from './network';

export interface TrafficPair {
	sender: string;
	receiver: string;
}

export type ProbeStatus = 'ok' | 'parse-failed' | 'no-output' | 'timed-out';

/**
 * 1 クライアント分の生の出力 (Orchestrator が収集)
 */
export interface RawProbeOutput {
	readonly label: string;
	readonly pair: TrafficPair;
	readonly output: string;
	/** 収集の上限時間内にプロセスが終了しなかった */
	readonly timedOut: boolean;
}

export interface ProbeResult {
	readonly label: string;
	readonly status: ProbeStatus;
	readonly rawOutput: string;
	/** status が 'ok' の場合のみ設定される */
	readonly throughputMbps?: number;
}

export type RunStatus = 'completed' | 'unreachable' | 'skipped';

export interface AggregateReport {
	status: RunStatus;
	totalMbps: number;
	okCount: number;
	failureCount: number;
	results: ProbeResult[];
}

export interface MeasurementOptions {
	/** スループット計測ツール (iperf) */
	probeTool: string;
	listenerSettleMs: number;
	clientDurationSec: number;
	/** クライアント実行中に待機する時間 (clientDurationSec より長くする) */
	clientWindowMs: number;
	/** 各クライアントの終了待ちの上限 */
	collectTimeoutMs: number;
}

export interface ExperimentOptions {
	link: LinkOptions;
	controllerSettleMs: number;
	measurement: MeasurementOptions;
}
