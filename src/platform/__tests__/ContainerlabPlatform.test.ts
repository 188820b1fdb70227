import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { runCommand } from '../../utils/command';
import { ContainerlabOptions, ContainerlabPlatform } from '../ContainerlabPlatform';

jest.mock('../../utils/command', () => ({ runCommand: jest.fn() }));

const runCommandMock = jest.mocked(runCommand);

describe('ContainerlabPlatform', () => {
	let workDir: string;
	let options: ContainerlabOptions;

	const twoHostLab = () => {
		const platform = new ContainerlabPlatform(options);
		platform.createHost('h1', '10.0.0.2/8');
		platform.createHost('h2', '10.0.0.3/8');
		platform.createSwitch('e1');
		platform.createLink('e1', 'h1', 15, '5ms');
		platform.createLink('e1', 'h2', 15, '5ms');
		return platform;
	};

	beforeEach(async () => {
		runCommandMock.mockReset();
		runCommandMock.mockResolvedValue('');
		workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'clab-'));
		options = {
			labName: 'test',
			hostImage: 'iperf-image',
			workDir,
			controllerHost: '127.0.0.1',
			controllerPort: 6653,
			pingTimeoutSec: 1,
			bin: { containerlab: 'clab', docker: 'docker', ovsVsctl: 'ovs-vsctl', tc: 'tc' },
		};
	});

	afterEach(async () => {
		await fs.rm(workDir, { recursive: true, force: true });
	});

	it('describes hosts as containers and switches as bridges', () => {
		expect(twoHostLab().buildTopology()).toEqual({
			name: 'test',
			topology: {
				nodes: {
					h1: { kind: 'linux', image: 'iperf-image', entrypoint: 'sleep', cmd: 'infinity' },
					h2: { kind: 'linux', image: 'iperf-image', entrypoint: 'sleep', cmd: 'infinity' },
					e1: { kind: 'ovs-bridge' },
				},
				links: [
					{ endpoints: ['e1:e1-p1', 'h1:eth1'] },
					{ endpoints: ['e1:e1-p2', 'h2:eth1'] },
				],
			},
		});
	});

	it('rejects duplicate nodes and links to unknown nodes', () => {
		const platform = new ContainerlabPlatform(options);
		platform.createHost('h1', '10.0.0.2/8');

		expect(() => platform.createSwitch('h1')).toThrow('Node "h1" already exists.');
		expect(() => platform.createLink('h1', 'e9', 15, '5ms')).toThrow('Link endpoint "e9" was never created.');
	});

	it('deploys bridges, the lab, addresses and link shaping in order', async () => {
		const platform = twoHostLab();
		await platform.start();

		const file = path.join(workDir, 'test.clab.yml');
		expect(runCommandMock.mock.calls.map(([args]) => args)).toEqual([
			['ovs-vsctl', '--may-exist', 'add-br', 'e1'],
			['ovs-vsctl', 'set', 'bridge', 'e1', 'protocols=OpenFlow13'],
			['ovs-vsctl', 'set-fail-mode', 'e1', 'secure'],
			['ovs-vsctl', 'set-controller', 'e1', 'tcp:127.0.0.1:6653'],
			['clab', 'deploy', '-t', file, '--reconfigure'],
			['docker', 'exec', 'clab-test-h1', 'ip', 'addr', 'add', '10.0.0.2/8', 'dev', 'eth1'],
			['docker', 'exec', 'clab-test-h1', 'ip', 'link', 'set', 'eth1', 'up'],
			['docker', 'exec', 'clab-test-h2', 'ip', 'addr', 'add', '10.0.0.3/8', 'dev', 'eth1'],
			['docker', 'exec', 'clab-test-h2', 'ip', 'link', 'set', 'eth1', 'up'],
			['tc', 'qdisc', 'replace', 'dev', 'e1-p1', 'root', 'netem', 'delay', '5ms', 'rate', '15mbit'],
			['clab', 'tools', 'netem', 'set', '-n', 'clab-test-h1', '-i', 'eth1', '--delay', '5ms', '--rate', '15000'],
			['tc', 'qdisc', 'replace', 'dev', 'e1-p2', 'root', 'netem', 'delay', '5ms', 'rate', '15mbit'],
			['clab', 'tools', 'netem', 'set', '-n', 'clab-test-h2', '-i', 'eth1', '--delay', '5ms', '--rate', '15000'],
		]);
	});

	it('writes the lab definition as YAML', async () => {
		await twoHostLab().start();

		const text = await fs.readFile(path.join(workDir, 'test.clab.yml'), 'utf-8');
		expect(text.startsWith('name: test\ntopology:\n')).toBe(true);
		expect(yaml.parse(text)).toEqual({
			name: 'test',
			topology: {
				nodes: {
					h1: { kind: 'linux', image: 'iperf-image', entrypoint: 'sleep', cmd: 'infinity' },
					h2: { kind: 'linux', image: 'iperf-image', entrypoint: 'sleep', cmd: 'infinity' },
					e1: { kind: 'ovs-bridge' },
				},
				links: [
					{ endpoints: ['e1:e1-p1', 'h1:eth1'] },
					{ endpoints: ['e1:e1-p2', 'h2:eth1'] },
				],
			},
		});
	});

	it('refuses new nodes once the lab is running', async () => {
		const platform = twoHostLab();
		await platform.start();

		expect(() => platform.createHost('h3', '10.0.1.2/8')).toThrow(
			'Nodes and links cannot be added after the lab has started.'
		);
	});

	it('counts every failed ping between ordered host pairs', async () => {
		const platform = twoHostLab();
		runCommandMock.mockImplementation(async (args) => {
			if (args.includes('clab-test-h1') && args.includes('10.0.0.3')) {
				throw new Error('100% packet loss');
			}
			return '';
		});

		await expect(platform.pingAll()).resolves.toEqual(1);
		expect(runCommandMock.mock.calls.map(([args]) => args)).toEqual([
			['docker', 'exec', 'clab-test-h1', 'ping', '-c', '1', '-W', '1', '10.0.0.3'],
			['docker', 'exec', 'clab-test-h2', 'ping', '-c', '1', '-W', '1', '10.0.0.2'],
		]);
	});

	it('refuses to run commands on an unknown host', () => {
		expect(() => twoHostLab().executeOnHost('h9', 'iperf -s &', 'background')).toThrow('Unknown host: h9');
	});

	it('destroys the lab and removes its bridges on stop', async () => {
		await twoHostLab().stop();

		expect(runCommandMock.mock.calls.map(([args]) => args)).toEqual([
			['clab', 'destroy', '-t', path.join(workDir, 'test.clab.yml'), '--cleanup'],
			['ovs-vsctl', '--if-exists', 'del-br', 'e1'],
		]);
	});

	it('only removes bridges during cleanup when no lab file exists', async () => {
		await twoHostLab().cleanup();

		expect(runCommandMock.mock.calls.map(([args]) => args)).toEqual([
			['ovs-vsctl', '--if-exists', 'del-br', 'e1'],
		]);
	});
});
