// src/topology/__tests__/fixtures.ts
import { HostNode, SwitchNode, TopologyGraph } from '../../types';
import { connect, createHost, createSwitch } from '../graph';

/**
 * ホスト 4 台, スイッチ 2 台, エッジ 5 本
 *
 *   h1 h2      h3 h4
 *     \ /      \ /
 *     s1 ------ s2
 */
export function smallGraph(): TopologyGraph & { hosts: HostNode[]; switches: SwitchNode[] } {
	const s1 = createSwitch(1, 'edge', 0, 0);
	const s2 = createSwitch(2, 'edge', 0, 1);
	const hosts = [
		createHost(3, 0, 0, 2),
		createHost(4, 0, 0, 3),
		createHost(5, 0, 1, 2),
		createHost(6, 0, 1, 3),
	];
	hosts.forEach((host, index) => connect(index < 2 ? s1 : s2, host));
	connect(s1, s2);
	return { hosts, switches: [s1, s2] };
}

/**
 * ホスト 1 台だけのグラフ
 */
export function singleHostGraph(): TopologyGraph {
	const sw = createSwitch(1, 'edge', 0, 0);
	const host = createHost(2, 0, 0, 2);
	connect(sw, host);
	return { hosts: [host], switches: [sw] };
}
