// src/results/ResultStore.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { log } from '../utils/logger';

export interface ResultRow {
	controller: string;
	bandwidthMbps: number;
}

export interface ControllerSummary {
	controller: string;
	runs: number;
	mean: number;
	/** 標本標準偏差 (1 回のみの場合は 0) */
	std: number;
}

/**
 * 1 回の計測結果を `<controller>,<bandwidth>` としてヘッダなし CSV に追記します。
 */
export async function appendResult(filePath: string, controller: string, totalMbps: number): Promise<void> {
	if (controller.includes(',') || controller.includes('\n')) {
		throw new Error(`Controller label must not contain commas or newlines: "${controller}"`);
	}
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${controller},${totalMbps.toFixed(2)}\n`);
	log.info(`Result appended to ${filePath}`);
}

export function parseResults(csv: string): ResultRow[] {
	const rows: ResultRow[] = [];
	for (const line of csv.split(/\r?\n/)) {
		if (!line.trim()) continue;
		const [controller, bandwidth] = line.split(',').map(field => field.trim());
		if (!controller || bandwidth === undefined || bandwidth === '') continue;
		const bandwidthMbps = Number(bandwidth);
		if (!Number.isFinite(bandwidthMbps)) {
			log.warn(`Skipping malformed result row: ${line}`);
			continue;
		}
		rows.push({ controller, bandwidthMbps });
	}
	return rows;
}

export async function readResults(filePath: string): Promise<ResultRow[]> {
	return parseResults(await fs.readFile(filePath, 'utf-8'));
}

/**
 * 'ft_routing' -> 'Ft Routing'
 */
export function prettifyController(label: string): string {
	return label
		.replace(/_/g, ' ')
		.toLowerCase()
		.replace(/(^|[^a-z])([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

export function summarizeResults(rows: readonly ResultRow[]): ControllerSummary[] {
	const groups = new Map<string, number[]>();
	for (const row of rows) {
		const controller = prettifyController(row.controller);
		const values = groups.get(controller) ?? [];
		values.push(row.bandwidthMbps);
		groups.set(controller, values);
	}

	return [...groups.entries()]
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([controller, values]) => {
			const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
			const variance = values.length > 1
				? values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1)
				: 0;
			return { controller, runs: values.length, mean, std: Math.sqrt(variance) };
		});
}

export function formatSummary(summaries: readonly ControllerSummary[]): string[] {
	const width = Math.max('controller'.length, ...summaries.map(s => s.controller.length));
	const lines = [`${'controller'.padEnd(width)}  runs  mean (Mbps)  std`];
	for (const s of summaries) {
		lines.push(`${s.controller.padEnd(width)}  ${String(s.runs).padStart(4)}  ${s.mean.toFixed(2).padStart(11)}  ${s.std.toFixed(2)}`);
	}
	return lines;
}
