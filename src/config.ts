// src/config.ts
import * as path from 'path';
import { ExperimentOptions } from './types';

/** Fat-tree のポート数 k (Pod 数) */
export const FAT_TREE_K = 4;

/** リモート SDN コントローラ (OpenFlow) */
export const CONTROLLER_HOST = '127.0.0.1';
export const CONTROLLER_PORT = 6653;

export const RESULTS_FILE = path.join(process.cwd(), 'results', 'results.csv');

/**
 * 計測の固定パラメータ
 */
export const EXPERIMENT_OPTIONS: ExperimentOptions = {
	link: {
		bandwidthMbps: 15,
		delay: '5ms',
	},
	// コントローラがフローを投入し終えるまでの待機
	controllerSettleMs: 15_000,
	measurement: {
		probeTool: 'iperf',
		listenerSettleMs: 2_000,
		clientDurationSec: 10,
		clientWindowMs: 12_000,
		collectTimeoutMs: 5_000,
	},
};

/**
 * Containerlab 上にネットワークを展開する際の設定
 */
export const CONTAINERLAB = {
	LAB_NAME: 'fattree',
	// iperf (v2), ping, iproute2 を含むイメージ
	HOST_IMAGE: 'networkstatic/iperf:latest',
	WORK_DIR: path.join(process.cwd(), 'results', 'lab'),
	BIN: {
		CONTAINERLAB: 'containerlab',
		DOCKER: 'docker',
		OVS_VSCTL: 'ovs-vsctl',
		TC: 'tc',
	},
	PING_TIMEOUT_SEC: 1,
};
