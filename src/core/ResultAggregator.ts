// src/core/ResultAggregator.ts
import { AggregateReport, ProbeResult, RawProbeOutput, RunStatus } from '../types';

/** iperf -y C の 1 レコードのフィールド数 */
export const PROBE_FIELD_COUNT = 9;
/** 転送帯域 (bits/sec) のフィールド位置 */
export const BANDWIDTH_FIELD_INDEX = 8;

const BITS_PER_MEGABIT = 1_000_000;

// 10 進表記のみ (0x10 などは受け付けない)
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * iperf の CSV 出力 1 件をパースします。失敗しても例外は投げません。
 */
export function parseProbeOutput(label: string, output: string): ProbeResult {
	const rawOutput = output.trim();
	const fields = rawOutput.split(',');
	if (fields.length !== PROBE_FIELD_COUNT) {
		return { label, status: 'no-output', rawOutput };
	}

	const field = (fields[BANDWIDTH_FIELD_INDEX] ?? '').trim();
	const bits = DECIMAL_NUMBER.test(field) ? Number(field) : NaN;
	if (!Number.isFinite(bits)) {
		return { label, status: 'parse-failed', rawOutput };
	}

	return { label, status: 'ok', rawOutput, throughputMbps: bits / BITS_PER_MEGABIT };
}

export function toProbeResult(raw: RawProbeOutput): ProbeResult {
	if (raw.timedOut) {
		return { label: raw.label, status: 'timed-out', rawOutput: raw.output.trim() };
	}
	return parseProbeOutput(raw.label, raw.output);
}

export function aggregate(results: readonly ProbeResult[], status: RunStatus = 'completed'): AggregateReport {
	let totalMbps = 0;
	let okCount = 0;
	for (const result of results) {
		if (result.status === 'ok' && result.throughputMbps !== undefined) {
			totalMbps += result.throughputMbps;
			okCount++;
		}
	}
	return {
		status,
		totalMbps,
		okCount,
		failureCount: results.length - okCount,
		results: [...results],
	};
}

function describeFailure(result: ProbeResult, probeTool: string): string {
	switch (result.status) {
		case 'parse-failed':
			return `Could not parse bandwidth from output: ${result.rawOutput}`;
		case 'no-output':
			return `${probeTool} command produced no valid output`;
		case 'timed-out':
			return `${probeTool} client did not finish in time`;
		case 'ok':
			return '';
	}
}

/**
 * コンソール表示用の行 (ペアごとの結果と合計)
 * @param probeTool 失敗理由に表示する計測ツール名
 */
export function formatReport(report: AggregateReport, probeTool: string): string[] {
	const lines: string[] = [];

	if (report.status === 'unreachable') {
		lines.push('Some hosts are unreachable. Bandwidth test aborted.');
	} else if (report.status === 'skipped') {
		lines.push('Fewer than two hosts. Bandwidth test skipped.');
	}

	for (const result of report.results) {
		if (result.status === 'ok' && result.throughputMbps !== undefined) {
			lines.push(`    ${result.label}: ${result.throughputMbps.toFixed(2)} Mbps`);
		} else {
			lines.push(`    ${result.label}: FAILED (${describeFailure(result, probeTool)})`);
		}
	}

	const separator = '-'.repeat(50);
	lines.push(separator);
	lines.push(`Total Aggregate Bandwidth: ${report.totalMbps.toFixed(2)} Mbps`);
	if (report.failureCount > 0) {
		lines.push(`Failed pairs: ${report.failureCount}/${report.results.length}`);
	}
	lines.push(separator);
	return lines;
}
