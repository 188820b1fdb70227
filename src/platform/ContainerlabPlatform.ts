// src/platform/ContainerlabPlatform.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { CONTAINERLAB, CONTROLLER_HOST, CONTROLLER_PORT } from '../config';
import { stripPrefix } from '../utils/address';
import { runCommand } from '../utils/command';
import { CommandError, toError } from '../utils/errors';
import { log } from '../utils/logger';
import { ExecutionMode, IEmulationPlatform, IProcessHandle, ProcessOutcome } from './IEmulationPlatform';
import { ShellProcess } from './ShellProcess';

export interface ContainerlabOptions {
	labName: string;
	hostImage: string;
	workDir: string;
	controllerHost: string;
	controllerPort: number;
	pingTimeoutSec: number;
	bin: {
		containerlab: string;
		docker: string;
		ovsVsctl: string;
		tc: string;
	};
}

export const DEFAULT_CONTAINERLAB_OPTIONS: ContainerlabOptions = {
	labName: CONTAINERLAB.LAB_NAME,
	hostImage: CONTAINERLAB.HOST_IMAGE,
	workDir: CONTAINERLAB.WORK_DIR,
	controllerHost: CONTROLLER_HOST,
	controllerPort: CONTROLLER_PORT,
	pingTimeoutSec: CONTAINERLAB.PING_TIMEOUT_SEC,
	bin: {
		containerlab: CONTAINERLAB.BIN.CONTAINERLAB,
		docker: CONTAINERLAB.BIN.DOCKER,
		ovsVsctl: CONTAINERLAB.BIN.OVS_VSCTL,
		tc: CONTAINERLAB.BIN.TC,
	},
};

interface LabHost {
	address: string;
	/** 最初のリンクのインターフェース (アドレスを割り当てる) */
	dataInterface?: string;
}

interface ShapedEndpoint {
	node: string;
	iface: string;
	onHost: boolean;
	bandwidthMbps: number;
	delay: string;
}

/**
 * `docker exec -d` で起動したデーモンのハンドル。
 * 停止はコンテナ内で pkill する。
 */
class DetachedProcess implements IProcessHandle {
	private readonly launcher: ShellProcess;
	private killed = false;

	constructor(
		public readonly command: string,
		private readonly docker: string,
		private readonly container: string
	) {
		this.launcher = new ShellProcess(command, docker, ['exec', '-d', container, 'sh', '-c', command]);
	}

	public isRunning(): boolean {
		return !this.killed;
	}

	public wait(timeoutMs: number): Promise<ProcessOutcome> {
		return this.launcher.wait(timeoutMs);
	}

	public async kill(): Promise<void> {
		if (this.killed) return;
		this.killed = true;
		const pattern = this.command.replace(/&\s*$/, '').trim();
		try {
			await runCommand([this.docker, 'exec', this.container, 'pkill', '-f', pattern]);
		} catch (err) {
			// pkill は一致するプロセスがない場合に 1 を返す
			if (!(err instanceof CommandError && err.exitCode === 1)) {
				throw err;
			}
		}
	}
}

/**
 * Containerlab (ホスト = Linux コンテナ) と Open vSwitch (スイッチ = リモートコントローラ配下のブリッジ)
 * にネットワークを展開する IEmulationPlatform 実装。
 */
export class ContainerlabPlatform implements IEmulationPlatform {
	private readonly hosts = new Map<string, LabHost>();
	private readonly switches = new Set<string>();
	private readonly links: [string, string][] = [];
	private readonly shaped: ShapedEndpoint[] = [];
	private readonly interfaceCounters = new Map<string, number>();
	private started = false;

	constructor(private readonly options: ContainerlabOptions = DEFAULT_CONTAINERLAB_OPTIONS) { }

	public get topologyFile(): string {
		return path.join(this.options.workDir, `${this.options.labName}.clab.yml`);
	}

	public containerName(hostName: string): string {
		return `clab-${this.options.labName}-${hostName}`;
	}

	public createHost(name: string, address: string): void {
		this.assertNotStarted();
		this.assertUnique(name);
		this.hosts.set(name, { address });
	}

	public createSwitch(name: string): void {
		this.assertNotStarted();
		this.assertUnique(name);
		this.switches.add(name);
	}

	public createLink(left: string, right: string, bandwidthMbps: number, delay: string): void {
		this.assertNotStarted();
		const leftIface = this.allocateInterface(left);
		const rightIface = this.allocateInterface(right);
		this.links.push([`${left}:${leftIface}`, `${right}:${rightIface}`]);

		for (const [node, iface] of [[left, leftIface], [right, rightIface]] as const) {
			const host = this.hosts.get(node);
			if (host && !host.dataInterface) {
				host.dataInterface = iface;
			}
			this.shaped.push({ node, iface, onHost: host !== undefined, bandwidthMbps, delay });
		}
	}

	/**
	 * Containerlab のトポロジ定義 (.clab.yml の内容)
	 */
	public buildTopology(): object {
		const nodes: Record<string, object> = {};
		for (const name of this.hosts.keys()) {
			nodes[name] = {
				kind: 'linux',
				image: this.options.hostImage,
				entrypoint: 'sleep',
				cmd: 'infinity',
			};
		}
		for (const name of this.switches) {
			nodes[name] = { kind: 'ovs-bridge' };
		}
		return {
			name: this.options.labName,
			topology: {
				nodes,
				links: this.links.map(endpoints => ({ endpoints })),
			},
		};
	}

	public async start(): Promise<void> {
		const { bin } = this.options;

		await fs.mkdir(this.options.workDir, { recursive: true });
		await fs.writeFile(this.topologyFile, yaml.stringify(this.buildTopology()));
		log.info(`Topology written to ${this.topologyFile}`);

		// ovs-bridge ノードはデプロイ前に存在している必要がある
		const controller = `tcp:${this.options.controllerHost}:${this.options.controllerPort}`;
		for (const name of this.switches) {
			await runCommand([bin.ovsVsctl, '--may-exist', 'add-br', name]);
			await runCommand([bin.ovsVsctl, 'set', 'bridge', name, 'protocols=OpenFlow13']);
			await runCommand([bin.ovsVsctl, 'set-fail-mode', name, 'secure']);
			await runCommand([bin.ovsVsctl, 'set-controller', name, controller]);
		}

		await runCommand([bin.containerlab, 'deploy', '-t', this.topologyFile, '--reconfigure']);
		this.started = true;

		for (const [name, host] of this.hosts) {
			if (!host.dataInterface) {
				log.warn(`Host ${name} has no link; address ${host.address} is not assigned.`);
				continue;
			}
			const container = this.containerName(name);
			await runCommand([bin.docker, 'exec', container, 'ip', 'addr', 'add', host.address, 'dev', host.dataInterface]);
			await runCommand([bin.docker, 'exec', container, 'ip', 'link', 'set', host.dataInterface, 'up']);
		}

		for (const endpoint of this.shaped) {
			if (endpoint.onHost) {
				await runCommand([
					bin.containerlab, 'tools', 'netem', 'set',
					'-n', this.containerName(endpoint.node),
					'-i', endpoint.iface,
					'--delay', endpoint.delay,
					'--rate', String(Math.round(endpoint.bandwidthMbps * 1000)),
				]);
			} else {
				await runCommand([
					bin.tc, 'qdisc', 'replace', 'dev', endpoint.iface, 'root',
					'netem', 'delay', endpoint.delay, 'rate', `${endpoint.bandwidthMbps}mbit`,
				]);
			}
		}
		log.info(`Lab "${this.options.labName}" deployed: ${this.hosts.size} hosts, ${this.switches.size} switches, ${this.links.length} links.`);
	}

	public async pingAll(): Promise<number> {
		const { bin, pingTimeoutSec } = this.options;
		const names = [...this.hosts.keys()];
		let failures = 0;

		for (const src of names) {
			const row: string[] = [];
			for (const dst of names) {
				if (src === dst) continue;
				const address = stripPrefix(this.hosts.get(dst)?.address ?? '');
				try {
					await runCommand([bin.docker, 'exec', this.containerName(src), 'ping', '-c', '1', '-W', String(pingTimeoutSec), address]);
					row.push(dst);
				} catch {
					failures++;
					row.push('X');
				}
			}
			log.info(`${src} -> ${row.join(' ')}`);
		}

		const total = names.length * (names.length - 1);
		log.info(`Ping: ${failures}/${total} lost`);
		return failures;
	}

	public executeOnHost(hostName: string, command: string, mode: ExecutionMode): IProcessHandle {
		if (!this.hosts.has(hostName)) {
			throw new Error(`Unknown host: ${hostName}`);
		}
		const container = this.containerName(hostName);
		const docker = this.options.bin.docker;

		if (mode === 'background') {
			return new DetachedProcess(command, docker, container);
		}
		return new ShellProcess(command, docker, ['exec', container, 'sh', '-c', command]);
	}

	public async stop(): Promise<void> {
		await runCommand([this.options.bin.containerlab, 'destroy', '-t', this.topologyFile, '--cleanup']);
		this.started = false;
		await this.removeBridges();
	}

	public async cleanup(): Promise<void> {
		try {
			await fs.access(this.topologyFile);
			await runCommand([this.options.bin.containerlab, 'destroy', '-t', this.topologyFile, '--cleanup']);
		} catch (err) {
			log.debug(`No previous lab to destroy: ${toError(err).message}`);
		}
		await this.removeBridges();
	}

	private async removeBridges(): Promise<void> {
		for (const name of this.switches) {
			await runCommand([this.options.bin.ovsVsctl, '--if-exists', 'del-br', name]);
		}
	}

	private allocateInterface(node: string): string {
		const next = (this.interfaceCounters.get(node) ?? 0) + 1;
		this.interfaceCounters.set(node, next);
		if (this.hosts.has(node)) {
			return `eth${next}`;
		}
		if (this.switches.has(node)) {
			// ブリッジ側はホストの名前空間に作られるのでノード名で一意にする
			return `${node}-p${next}`;
		}
		throw new Error(`Link endpoint "${node}" was never created.`);
	}

	private assertUnique(name: string): void {
		if (this.hosts.has(name) || this.switches.has(name)) {
			throw new Error(`Node "${name}" already exists.`);
		}
	}

	private assertNotStarted(): void {
		if (this.started) {
			throw new Error('Nodes and links cannot be added after the lab has started.');
		}
	}
}
