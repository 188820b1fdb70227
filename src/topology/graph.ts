// src/topology/graph.ts
import { GraphEdge, GraphNode, HostNode, SwitchNode, SwitchTier } from '../types';

export function createHost(id: number, pod: number, sw: number, hid: number): HostNode {
	return { kind: 'host', id, pod, sw, hid, edges: [] };
}

export function createSwitch(id: number, tier: SwitchTier, pod?: number, sw?: number): SwitchNode {
	return { kind: 'switch', id, tier, pod, sw, edges: [] };
}

/**
 * 2 ノード間にエッジを 1 本作成し、両方の隣接リストに追加します。
 */
export function connect(left: GraphNode, right: GraphNode): GraphEdge {
	const edge: GraphEdge = { left, right };
	left.edges.push(edge);
	right.edges.push(edge);
	return edge;
}
