// src/types/topology.ts

/**
 * Fat-tree のスイッチ階層
 */
export type SwitchTier = 'core' | 'agg' | 'edge';

/**
 * グラフ上のリンク。
 * 同一性はオブジェクトそのもので判定する (同じ端点間の並列リンクは別のエッジ)。
 */
export interface GraphEdge {
	readonly left: GraphNode;
	readonly right: GraphNode;
}

interface BaseNode {
	readonly id: number;
	/** 接続しているエッジ (両端のノードが同じエッジを共有する) */
	readonly edges: GraphEdge[];
}

export interface HostNode extends BaseNode {
	readonly kind: 'host';
	readonly pod: number;
	/** 接続先 edge スイッチの Pod 内インデックス */
	readonly sw: number;
	readonly hid: number;
}

export interface SwitchNode extends BaseNode {
	readonly kind: 'switch';
	readonly tier: SwitchTier;
	readonly pod?: number;
	readonly sw?: number;
}

export type GraphNode = HostNode | SwitchNode;

/**
 * 外部のトポロジ生成器が作る抽象グラフ
 */
export interface TopologyGraph {
	readonly hosts: readonly HostNode[];
	readonly switches: readonly SwitchNode[];
}
