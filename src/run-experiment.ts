#!/usr/bin/env node
// src/run-experiment.ts
import { EXPERIMENT_OPTIONS, FAT_TREE_K, RESULTS_FILE } from './config';
import { ExperimentRunner } from './core/ExperimentRunner';
import { formatReport } from './core/ResultAggregator';
import { ContainerlabPlatform } from './platform/ContainerlabPlatform';
import { appendResult } from './results/ResultStore';
import { FatTree } from './topology/FatTree';
import { toError } from './utils/errors';
import { isLogLevel, log } from './utils/logger';
import { IProgressManager } from './utils/ProgressManager/IProgressManager';
import { createProgressManager } from './utils/ProgressManager/ProgressManager';

interface CliArgs {
	controller: string;
	logLevel?: string;
}

/**
 * コマンドライン引数を解析します。
 * トポロジと計測パラメータは固定 (config.ts) で、指定できるのはラベルとログレベルのみ。
 */
function parseArgs(argv: string[]): CliArgs {
	const valueOf = (flag: string): string | undefined => {
		const index = argv.indexOf(flag);
		return index !== -1 ? argv[index + 1] : undefined;
	};
	return {
		controller: valueOf('--controller') ?? 'unknown',
		logLevel: valueOf('--logLevel'),
	};
}

async function main() {
	let progressManager: IProgressManager | undefined;

	try {
		const { controller, logLevel } = parseArgs(process.argv.slice(2));
		if (logLevel) {
			if (!isLogLevel(logLevel)) {
				throw new Error(`Unknown log level "${logLevel}" (error | warn | success | info | debug).`);
			}
			log.setLogLevel(logLevel);
		}

		log.step(`Starting fat-tree bandwidth test (k=${FAT_TREE_K}, controller=${controller})`);

		const graph = new FatTree(FAT_TREE_K);
		const platform = new ContainerlabPlatform();
		progressManager = createProgressManager();

		const runner = new ExperimentRunner(graph, platform, EXPERIMENT_OPTIONS, progressManager);
		const report = await runner.run();
		progressManager.stop();

		for (const line of formatReport(report, EXPERIMENT_OPTIONS.measurement.probeTool)) {
			log.success(line);
		}

		if (report.status === 'completed') {
			await appendResult(RESULTS_FILE, controller, report.totalMbps);
		} else if (report.status === 'unreachable') {
			process.exitCode = 1;
		}
	} catch (error) {
		log.error('The bandwidth test failed with a fatal error.', toError(error));
		process.exitCode = 1;
	} finally {
		progressManager?.stop();
		await log.flushErrorLogs();
	}
}

main().catch((error: unknown) => {
	console.error(toError(error));
	process.exitCode = 1;
});
