// src/core/TopologyAdapter.ts
import { IEmulationPlatform } from '../platform/IEmulationPlatform';
import {
	ConcreteLink,
	GraphEdge,
	GraphNode,
	LinkOptions,
	NetworkDescription,
	SwitchTier,
	TopologyGraph,
} from '../types';
import { stripPrefix } from '../utils/address';
import { TopologyError } from '../utils/errors';
import { log } from '../utils/logger';

/**
 * ノード列の隣接リストを走査し、重複のないエッジ列を発見順で返します。
 * 同じエッジは両端から 2 回見えるため、端点のペアではなくエッジ自体の同一性で判定する。
 */
export function collectEdges(nodes: readonly GraphNode[]): GraphEdge[] {
	const seen = new Set<GraphEdge>();
	for (const node of nodes) {
		for (const edge of node.edges) {
			seen.add(edge);
		}
	}
	return [...seen];
}

function describeNode(node: GraphNode): string {
	return node.kind === 'host'
		? `host#${node.id} (${node.pod}.${node.sw}.${node.hid})`
		: `${node.tier} switch#${node.id}`;
}

/**
 * 抽象グラフから具体的なネットワーク構成を作ります。
 *
 * - ホスト: 入力順に h1, h2, ... アドレスは 10.<pod>.<sw>.<hid>/8
 * - スイッチ: 入力順に階層ごとの連番 (c1.., a1.., e1..)
 * - リンク: 異なるエッジ 1 本につき 1 本、全リンク同一の帯域・遅延
 *
 * @throws {TopologyError} 同じノードが重複している場合、または入力に含まれないノードを参照するエッジがある場合
 */
export function buildNetworkDescription(graph: TopologyGraph, linkOptions: LinkOptions): NetworkDescription {
	const names = new Map<GraphNode, string>();
	const description: NetworkDescription = { hosts: [], switches: [], links: [] };

	graph.hosts.forEach((host, index) => {
		const name = `h${index + 1}`;
		if (names.has(host)) {
			throw new TopologyError(`${describeNode(host)} appears more than once in the graph.`);
		}
		names.set(host, name);
		description.hosts.push({ name, address: `10.${host.pod}.${host.sw}.${host.hid}/8` });
	});

	const tierCounters = new Map<SwitchTier, number>();
	for (const sw of graph.switches) {
		const sequence = tierCounters.get(sw.tier) ?? 0;
		tierCounters.set(sw.tier, sequence + 1);
		const name = `${sw.tier.charAt(0)}${sequence + 1}`;
		if (names.has(sw)) {
			throw new TopologyError(`${describeNode(sw)} appears more than once in the graph.`);
		}
		names.set(sw, name);
		description.switches.push({ name });
	}

	const resolve = (node: GraphNode): string => {
		const name = names.get(node);
		if (name === undefined) {
			throw new TopologyError(`Edge references ${describeNode(node)}, which is not part of the graph.`);
		}
		return name;
	};

	for (const edge of collectEdges([...graph.hosts, ...graph.switches])) {
		const link: ConcreteLink = {
			left: resolve(edge.left),
			right: resolve(edge.right),
			bandwidthMbps: linkOptions.bandwidthMbps,
			delay: linkOptions.delay,
		};
		description.links.push(link);
	}

	log.info(`Network description: ${description.hosts.length} hosts, ${description.switches.length} switches, ${description.links.length} links.`);
	return description;
}

/**
 * 構成をエミュレーション基盤に登録します (ホスト → スイッチ → リンクの順)。
 */
export function materialize(description: NetworkDescription, platform: IEmulationPlatform): void {
	for (const host of description.hosts) {
		platform.createHost(host.name, host.address);
	}
	for (const sw of description.switches) {
		platform.createSwitch(sw.name);
	}
	for (const link of description.links) {
		platform.createLink(link.left, link.right, link.bandwidthMbps, link.delay);
	}
}

/**
 * ホスト名 -> プレフィックスなしのアドレス
 */
export function hostAddresses(description: NetworkDescription): Map<string, string> {
	return new Map(description.hosts.map(host => [host.name, stripPrefix(host.address)]));
}
