// src/utils/command.ts
import { spawn } from 'child_process';
import { CommandError } from './errors';
import { log } from './logger';

/**
 * コマンドを実行し、終了コードが 0 でなければ CommandError を投げます。
 * @returns トリムされた stdout
 */
export function runCommand(args: string[]): Promise<string> {
	const [file, ...rest] = args;
	if (!file) {
		return Promise.reject(new Error('runCommand: empty command'));
	}
	const commandLine = args.join(' ');
	log.debug(`$ ${commandLine}`);

	return new Promise<string>((resolve, reject) => {
		const child = spawn(file, rest, { stdio: ['ignore', 'pipe', 'pipe'] });
		let stdout = '';
		let stderr = '';

		child.stdout.on('data', (data: Buffer) => { stdout += data.toString('utf-8'); });
		child.stderr.on('data', (data: Buffer) => { stderr += data.toString('utf-8'); });

		child.on('close', (code) => {
			if (code === 0) {
				resolve(stdout.trim());
			} else {
				reject(new CommandError(commandLine, code, stderr));
			}
		});
		child.on('error', (err) => {
			reject(new CommandError(commandLine, null, err.message));
		});
	});
}
