// src/core/MeasurementOrchestrator.ts
import { IEmulationPlatform } from '../platform/IEmulationPlatform';
import { MeasurementOptions, RawProbeOutput, TrafficPair } from '../types';
import { log } from '../utils/logger';
import { IProgressManager } from '../utils/ProgressManager/IProgressManager';
import { SilentProgressManager } from '../utils/ProgressManager/ProgressManager';
import { sleep } from '../utils/sleep';
import { ProcessRegistry } from './ProcessRegistry';
import { pairLabel } from './TrafficMatrix';

/**
 * 全ペア同時のスループット計測を 1 回実行します。
 *
 * 1. 全ホストでリスナーをバックグラウンド起動し、少し待つ
 * 2. 全ペアのクライアントを待ち合わせなしで一斉に起動
 * 3. 固定時間待機
 * 4. 各クライアントの終了を上限付きで待ち、出力を回収
 *
 * 途中で例外が起きても、起動したプロセスは必ず停止する。
 */
export class MeasurementOrchestrator {
	private readonly registry = new ProcessRegistry();

	constructor(
		private readonly platform: IEmulationPlatform,
		private readonly options: MeasurementOptions,
		private readonly progressManager: IProgressManager = new SilentProgressManager()
	) { }

	public async run(pairs: readonly TrafficPair[], addresses: ReadonlyMap<string, string>): Promise<RawProbeOutput[]> {
		if (pairs.length === 0) {
			log.info('No traffic pairs; measurement skipped.');
			return [];
		}

		try {
			await this.startListeners([...addresses.keys()]);
			this.startClients(pairs, addresses);
			await this.waitClientWindow();
			return await this.collect(pairs);
		} finally {
			await this.registry.terminateAll();
		}
	}

	private async startListeners(hosts: string[]): Promise<void> {
		log.info(`Starting ${this.options.probeTool} servers on ${hosts.length} hosts...`);
		const command = `${this.options.probeTool} -s &`;
		for (const host of hosts) {
			const handle = this.platform.executeOnHost(host, command, 'background');
			this.registry.register(`listener:${host}`, 'listener', handle);
		}
		await sleep(this.options.listenerSettleMs);
	}

	private startClients(pairs: readonly TrafficPair[], addresses: ReadonlyMap<string, string>): void {
		log.info(`Starting ${pairs.length} ${this.options.probeTool} clients simultaneously...`);
		for (const pair of pairs) {
			const address = addresses.get(pair.receiver);
			if (address === undefined) {
				throw new Error(`No address for receiver ${pair.receiver}.`);
			}
			const command = `${this.options.probeTool} -c ${address} -t ${this.options.clientDurationSec} -y C`;
			const handle = this.platform.executeOnHost(pair.sender, command, 'capture');
			this.registry.register(pairLabel(pair), 'client', handle);
		}
	}

	private async waitClientWindow(): Promise<void> {
		const windowMs = this.options.clientWindowMs;
		const seconds = Math.ceil(windowMs / 1000);
		log.info(`Running ${this.options.probeTool} for ${windowMs / 1000} seconds...`);

		const bar = this.progressManager.addBar(this.options.probeTool, seconds, 0, { status: 'clients running' });
		let elapsed = 0;
		while (elapsed < windowMs) {
			const step = Math.min(1000, windowMs - elapsed);
			await sleep(step);
			elapsed += step;
			bar.increment(step / 1000);
		}
		bar.updatePayload({ status: 'collecting' });
		this.progressManager.removeBar(bar);
	}

	private async collect(pairs: readonly TrafficPair[]): Promise<RawProbeOutput[]> {
		log.info('Collecting client results...');
		return Promise.all(pairs.map(async (pair): Promise<RawProbeOutput> => {
			const label = pairLabel(pair);
			const entry = this.registry.get(label);
			if (!entry) {
				return { label, pair, output: '', timedOut: false };
			}

			const outcome = await entry.handle.wait(this.options.collectTimeoutMs);
			if (!outcome.exited) {
				log.warn(`${label}: client still running after ${this.options.collectTimeoutMs} ms.`);
			} else if (outcome.stderr.trim()) {
				log.debug(`${label} stderr: ${outcome.stderr.trim()}`);
			}
			return { label, pair, output: outcome.stdout, timedOut: !outcome.exited };
		}));
	}
}
