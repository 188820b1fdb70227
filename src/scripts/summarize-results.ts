// src/scripts/summarize-results.ts
import { RESULTS_FILE } from '../config';
import { formatSummary, readResults, summarizeResults } from '../results/ResultStore';
import { toError } from '../utils/errors';
import { log } from '../utils/logger';

/**
 * results.csv をコントローラごとに集計して表示します。
 * 使い方: npm run summarize -- [path/to/results.csv]
 */
async function main() {
	const filePath = process.argv[2] ?? RESULTS_FILE;
	try {
		const rows = await readResults(filePath);
		if (rows.length === 0) {
			log.error(`The results file ${filePath} is empty. Run the benchmark first.`);
			process.exitCode = 1;
			return;
		}
		console.log('\nPerformance Summary:');
		for (const line of formatSummary(summarizeResults(rows))) {
			console.log(line);
		}
	} catch (error) {
		log.error(`Could not read results from ${filePath}.`, toError(error));
		process.exitCode = 1;
	}
}

main().catch((error: unknown) => {
	console.error(toError(error));
	process.exitCode = 1;
});
