// src/core/ProcessRegistry.ts
import { IProcessHandle } from '../platform/IEmulationPlatform';
import { toError } from '../utils/errors';
import { log } from '../utils/logger';

export type ProcessRole = 'listener' | 'client';

export interface RegisteredProcess {
	readonly label: string;
	readonly role: ProcessRole;
	readonly handle: IProcessHandle;
}

/**
 * 計測中に起動した全プロセスの台帳。
 * 待機したかどうかに関係なく terminateAll() でまとめて停止できる。
 */
export class ProcessRegistry {
	private readonly processes = new Map<string, RegisteredProcess>();

	public register(label: string, role: ProcessRole, handle: IProcessHandle): void {
		if (this.processes.has(label)) {
			throw new Error(`Process "${label}" is already registered.`);
		}
		this.processes.set(label, { label, role, handle });
	}

	public get(label: string): RegisteredProcess | undefined {
		return this.processes.get(label);
	}

	public entries(role?: ProcessRole): RegisteredProcess[] {
		const all = [...this.processes.values()];
		return role ? all.filter(p => p.role === role) : all;
	}

	/**
	 * リスナーは常に、クライアントはまだ動いているものだけ停止します。
	 * 停止の失敗はログに残し、例外は投げません。
	 * @returns 停止に失敗したプロセスの数
	 */
	public async terminateAll(): Promise<number> {
		const targets = this.entries().filter(p => p.role === 'listener' || p.handle.isRunning());
		const outcomes = await Promise.allSettled(targets.map(p => p.handle.kill()));

		let failures = 0;
		outcomes.forEach((outcome, index) => {
			if (outcome.status === 'rejected') {
				failures++;
				const label = targets[index]?.label ?? '?';
				log.warn(`Failed to terminate ${label}: ${toError(outcome.reason).message}`);
			}
		});
		log.debug(`Terminated ${targets.length - failures}/${targets.length} processes.`);
		this.processes.clear();
		return failures;
	}
}
