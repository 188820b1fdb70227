// src/utils/ProgressManager/ProgressManager.ts
import cliProgress from 'cli-progress';
import { IProgressBar, IProgressManager, ProgressPayload } from './IProgressManager';

// TTY でない場合に使用する何もしない実装
class SilentProgressBar implements IProgressBar {
	increment(): void { }
	updatePayload(): void { }
}
const silentProgressBar = new SilentProgressBar();

/**
 * プログレスバーを一切表示しない IProgressManager の実装。
 * TTY でない環境やテストで使用されます。
 */
export class SilentProgressManager implements IProgressManager {
	start(): void { }
	stop(): void { }
	addBar(): IProgressBar {
		return silentProgressBar;
	}
	removeBar(): void { }
}

// SingleBar を IProgressBar でラップする
class ProgressBarWrapper implements IProgressBar {
	constructor(public readonly bar: cliProgress.SingleBar) { }

	increment(value: number = 1, payload?: ProgressPayload): void {
		this.bar.increment(value, payload);
	}

	updatePayload(payload: ProgressPayload): void {
		this.bar.increment(0, payload);
	}
}

/**
 * cli-progress を使った IProgressManager の具象実装
 */
class RealProgressManager implements IProgressManager {
	private multiBar: cliProgress.MultiBar | null = null;

	public start(): void {
		if (this.multiBar) {
			return;
		}

		this.multiBar = new cliProgress.MultiBar({
			// ログ (stderr) と競合しないよう stdout に描画する
			stream: process.stdout,
			hideCursor: true,
			format: '{name} | {bar} | {percentage}% ({value}/{total}s) | {status}',
		}, cliProgress.Presets.shades_classic);
	}

	public stop(): void {
		if (this.multiBar) {
			this.multiBar.stop();
			this.multiBar = null;
		}
	}

	public addBar(name: string, total: number, startValue: number = 0, payload: ProgressPayload = { status: 'Running...' }): IProgressBar {
		const multiBar = this.multiBar ?? this.createStarted();
		const bar = multiBar.create(total, startValue, {
			name: name.padEnd(8),
			...payload,
		});
		return new ProgressBarWrapper(bar);
	}

	public removeBar(bar: IProgressBar): void {
		if (this.multiBar && bar instanceof ProgressBarWrapper) {
			this.multiBar.remove(bar.bar);
		}
	}

	private createStarted(): cliProgress.MultiBar {
		this.start();
		if (!this.multiBar) {
			throw new Error('MultiBar could not be started.');
		}
		return this.multiBar;
	}
}

/**
 * TTY の場合は RealProgressManager を、それ以外は SilentProgressManager を返す
 */
export function createProgressManager(isTTY: boolean = process.stdout.isTTY === true): IProgressManager {
	return isTTY ? new RealProgressManager() : new SilentProgressManager();
}
