// src/platform/ShellProcess.ts
import { ChildProcess, spawn } from 'child_process';
import { IProcessHandle, ProcessOutcome } from './IEmulationPlatform';

/**
 * spawn した子プロセスを IProcessHandle として扱うラッパー。
 * stdout/stderr は起動直後からバッファしておく。
 */
export class ShellProcess implements IProcessHandle {
	private readonly child: ChildProcess;
	private stdout = '';
	private stderr = '';
	private exitCode: number | null = null;
	private exited = false;
	private readonly exitPromise: Promise<void>;

	constructor(
		public readonly command: string,
		file: string,
		args: string[]
	) {
		this.child = spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'] });

		this.child.stdout?.on('data', (data: Buffer) => { this.stdout += data.toString('utf-8'); });
		this.child.stderr?.on('data', (data: Buffer) => { this.stderr += data.toString('utf-8'); });

		this.exitPromise = new Promise<void>(resolve => {
			this.child.on('close', (code) => {
				this.exitCode = code;
				this.exited = true;
				resolve();
			});
			// 起動失敗 (ENOENT など) も終了として扱う
			this.child.on('error', (err) => {
				this.stderr += err.message;
				this.exited = true;
				resolve();
			});
		});
	}

	public isRunning(): boolean {
		return !this.exited;
	}

	public async wait(timeoutMs: number): Promise<ProcessOutcome> {
		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<void>(resolve => {
			timer = setTimeout(resolve, Math.max(0, timeoutMs));
		});

		try {
			await Promise.race([this.exitPromise, timeout]);
		} finally {
			clearTimeout(timer);
		}

		return {
			exited: this.exited,
			exitCode: this.exitCode,
			stdout: this.stdout,
			stderr: this.stderr,
		};
	}

	public async kill(): Promise<void> {
		if (this.exited) return;
		this.child.kill('SIGTERM');
		await this.exitPromise;
	}
}
