// src/core/TrafficMatrix.ts
import { TrafficPair } from '../types';

/**
 * Fisher-Yates シャッフル (元配列は変更しない)
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
	const result = [...items];
	for (let i = result.length - 1; i > 0; i--) {
		const j = Math.floor(random() * (i + 1));
		const a = result[i];
		const b = result[j];
		if (a === undefined || b === undefined) continue;
		result[i] = b;
		result[j] = a;
	}
	return result;
}

/**
 * 全ホストを 1 回ずつ送信元とし、自分自身を宛先にしないランダムなペアを作ります。
 *
 * 宛先リストをシャッフルし、先頭から 1 回だけ走査して dest[i] === hosts[i] なら
 * dest[(i + 1) % N] と入れ替える。ペアは走査時点の dest[i] で確定するので自己ペアは生じない。
 * 最後の要素で先頭と入れ替えた場合は確定済みの先頭ペアに反映されず、
 * 宛先が重複する (受信しないホストが出る) ことがある。
 *
 * @returns N <= 1 の場合は空配列 (計測はスキップされる)
 */
export function generateTrafficPairs(hosts: readonly string[], random: () => number = Math.random): TrafficPair[] {
	const n = hosts.length;
	if (n <= 1) return [];

	const destinations = shuffle(hosts, random);
	const pairs: TrafficPair[] = [];

	hosts.forEach((sender, i) => {
		if (destinations[i] === sender) {
			const swapIndex = (i + 1) % n;
			const neighbor = destinations[swapIndex];
			if (neighbor !== undefined) {
				destinations[swapIndex] = sender;
				destinations[i] = neighbor;
			}
		}
		const receiver = destinations[i];
		if (receiver !== undefined) {
			pairs.push({ sender, receiver });
		}
	});

	return pairs;
}

export function pairLabel(pair: TrafficPair): string {
	return `${pair.sender}->${pair.receiver}`;
}
