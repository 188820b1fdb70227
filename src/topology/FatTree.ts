// src/topology/FatTree.ts
import { HostNode, SwitchNode, TopologyGraph } from '../types';
import { TopologyError } from '../utils/errors';
import { connect, createHost, createSwitch } from './graph';

/**
 * k-ary fat-tree のトポロジグラフ。
 *
 * - コアスイッチ (k/2)^2 台
 * - Pod k 個 (aggregation k/2 台, edge k/2 台)
 * - edge スイッチ 1 台につきホスト k/2 台 (hid は 2 から k/2+1)
 *
 * ノード ID は生成順に 1 から振られる。
 */
export class FatTree implements TopologyGraph {
	public readonly hosts: HostNode[] = [];
	public readonly switches: SwitchNode[] = [];

	constructor(public readonly k: number) {
		if (!Number.isInteger(k) || k < 2 || k % 2 !== 0) {
			throw new TopologyError(`Fat-tree arity must be an even integer >= 2 (got ${k}).`);
		}
		this.generate();
	}

	private generate(): void {
		const half = this.k / 2;
		let nextId = 0;

		const coreSwitches: SwitchNode[] = [];
		for (let i = 0; i < half * half; i++) {
			const core = createSwitch(++nextId, 'core');
			coreSwitches.push(core);
			this.switches.push(core);
		}

		const aggByPod: SwitchNode[][] = [];
		const edgeByPod: SwitchNode[][] = [];

		for (let pod = 0; pod < this.k; pod++) {
			const aggSwitches: SwitchNode[] = [];
			for (let s = 0; s < half; s++) {
				const agg = createSwitch(++nextId, 'agg', pod, s);
				aggSwitches.push(agg);
				this.switches.push(agg);
			}

			const edgeSwitches: SwitchNode[] = [];
			for (let s = 0; s < half; s++) {
				const edge = createSwitch(++nextId, 'edge', pod, s);
				edgeSwitches.push(edge);
				this.switches.push(edge);

				for (let h = 0; h < half; h++) {
					const host = createHost(++nextId, pod, s, h + 2);
					this.hosts.push(host);
					connect(edge, host);
				}
			}

			aggByPod.push(aggSwitches);
			edgeByPod.push(edgeSwitches);
		}

		// edge <-> aggregation (Pod 内フルメッシュ)
		edgeByPod.forEach((edgeSwitches, pod) => {
			for (const edge of edgeSwitches) {
				for (const agg of aggByPod[pod] ?? []) {
					connect(edge, agg);
				}
			}
		});

		// aggregation s <-> コア s*(k/2) .. s*(k/2)+k/2-1
		for (const aggSwitches of aggByPod) {
			aggSwitches.forEach((agg, s) => {
				for (let port = 0; port < half; port++) {
					const core = coreSwitches[s * half + port];
					if (!core) {
						throw new TopologyError(`Core switch ${s * half + port} does not exist.`);
					}
					connect(agg, core);
				}
			});
		}
	}
}
