// src/core/ExperimentRunner.ts
import { IEmulationPlatform } from '../platform/IEmulationPlatform';
import { AggregateReport, ExperimentOptions, TopologyGraph } from '../types';
import { toError } from '../utils/errors';
import { log } from '../utils/logger';
import { IProgressManager } from '../utils/ProgressManager/IProgressManager';
import { SilentProgressManager } from '../utils/ProgressManager/ProgressManager';
import { sleep } from '../utils/sleep';
import { MeasurementOrchestrator } from './MeasurementOrchestrator';
import { aggregate, toProbeResult } from './ResultAggregator';
import { buildNetworkDescription, hostAddresses, materialize } from './TopologyAdapter';
import { generateTrafficPairs, pairLabel } from './TrafficMatrix';

/**
 * 帯域計測実験全体のライフサイクル (構築 → 疎通確認 → 計測 → 集計 → 後片付け) を管理します。
 * ネットワークは run() の間だけ存在し、どの経路で抜けても停止は 1 回だけ行われる。
 */
export class ExperimentRunner {
	constructor(
		private readonly graph: TopologyGraph,
		private readonly platform: IEmulationPlatform,
		private readonly options: ExperimentOptions,
		private readonly progressManager: IProgressManager = new SilentProgressManager(),
		private readonly random: () => number = Math.random
	) { }

	public async run(): Promise<AggregateReport> {
		await this.cleanupPlatform('stale state');

		// グラフ不正はネットワークを起動する前にここで失敗させる
		const description = buildNetworkDescription(this.graph, this.options.link);
		materialize(description, this.platform);

		return this.withNetwork(async () => {
			log.info(`Network started. Waiting ${this.options.controllerSettleMs / 1000} seconds for the controller to stabilize...`);
			await sleep(this.options.controllerSettleMs);

			log.step('Verifying network reachability');
			const lost = await this.platform.pingAll();
			if (lost > 0) {
				log.error(`${lost} ping(s) failed. Some hosts are unreachable; aborting bandwidth test.`);
				return aggregate([], 'unreachable');
			}

			const hosts = description.hosts.map(host => host.name);
			const pairs = generateTrafficPairs(hosts, this.random);
			if (pairs.length === 0) {
				log.warn(`Only ${hosts.length} host(s); bandwidth measurement skipped.`);
				return aggregate([], 'skipped');
			}
			log.debug(`Traffic pairs: ${pairs.map(pairLabel).join(', ')}`);

			log.step('Reachability confirmed. Starting bandwidth measurement');
			const orchestrator = new MeasurementOrchestrator(this.platform, this.options.measurement, this.progressManager);
			const outputs = await orchestrator.run(pairs, hostAddresses(description));
			return aggregate(outputs.map(toProbeResult));
		});
	}

	/**
	 * start() から stop() までを 1 つのスコープとして扱う。
	 * 後片付けの失敗はログに残すだけで、本体の結果や例外を上書きしない。
	 */
	private async withNetwork<T>(body: () => Promise<T>): Promise<T> {
		try {
			await this.platform.start();
			return await body();
		} finally {
			log.info('Stopping network and cleaning up.');
			try {
				await this.platform.stop();
			} catch (err) {
				log.error('Failed to stop the network.', toError(err));
			}
			await this.cleanupPlatform('teardown');
		}
	}

	private async cleanupPlatform(phase: string): Promise<void> {
		try {
			await this.platform.cleanup();
		} catch (err) {
			log.warn(`Platform cleanup (${phase}) failed: ${toError(err).message}`);
		}
	}
}
