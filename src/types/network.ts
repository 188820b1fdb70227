// src/types/network.ts

export interface LinkOptions {
	/** 帯域 (Mbit/s) */
	bandwidthMbps: number;
	/** 遅延 (例: '5ms') */
	delay: string;
}

export interface ConcreteHost {
	name: string;
	/** プレフィックス長付きのアドレス (例: '10.0.0.2/8') */
	address: string;
}

export interface ConcreteSwitch {
	name: string;
}

export interface ConcreteLink extends LinkOptions {
	left: string;
	right: string;
}

/**
 * エミュレーション基盤に渡す具体的なネットワーク構成
 */
export interface NetworkDescription {
	hosts: ConcreteHost[];
	switches: ConcreteSwitch[];
	links: ConcreteLink[];
}
