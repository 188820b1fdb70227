import { FakeEmulationPlatform } from '../../platform/__tests__/FakeEmulationPlatform';
import { MeasurementOptions, TrafficPair } from '../../types';
import { MeasurementOrchestrator } from '../MeasurementOrchestrator';

const OPTIONS: MeasurementOptions = {
	probeTool: 'iperf',
	listenerSettleMs: 0,
	clientDurationSec: 10,
	clientWindowMs: 0,
	collectTimeoutMs: 50,
};

const ADDRESSES = new Map([
	['h1', '10.0.0.2'],
	['h2', '10.0.0.3'],
	['h3', '10.0.1.2'],
]);

const PAIRS: TrafficPair[] = [
	{ sender: 'h1', receiver: 'h2' },
	{ sender: 'h2', receiver: 'h3' },
	{ sender: 'h3', receiver: 'h1' },
];

describe('MeasurementOrchestrator', () => {
	let platform: FakeEmulationPlatform;

	beforeEach(() => {
		platform = new FakeEmulationPlatform();
		platform.behavior = (host) => ({ stdout: `record from ${host}\n` });
	});

	it('starts every listener before any client', async () => {
		await new MeasurementOrchestrator(platform, OPTIONS).run(PAIRS, ADDRESSES);

		expect(platform.events).toEqual([
			'exec background h1 iperf -s &',
			'exec background h2 iperf -s &',
			'exec background h3 iperf -s &',
			'exec capture h1 iperf -c 10.0.0.3 -t 10 -y C',
			'exec capture h2 iperf -c 10.0.1.2 -t 10 -y C',
			'exec capture h3 iperf -c 10.0.0.2 -t 10 -y C',
			'wait h1',
			'wait h2',
			'wait h3',
		]);
	});

	it('launches every client before collecting any output', async () => {
		await new MeasurementOrchestrator(platform, OPTIONS).run(PAIRS, ADDRESSES);

		const firstWait = platform.events.findIndex(e => e.startsWith('wait '));
		const lastLaunch = platform.events.map(e => e.startsWith('exec capture ')).lastIndexOf(true);
		expect(firstWait).toBeGreaterThan(-1);
		expect(lastLaunch).toBeLessThan(firstWait);
		expect(platform.events.filter(e => e.startsWith('exec capture '))).toHaveLength(3);
	});

	it('returns the output of each client in pair order', async () => {
		const outputs = await new MeasurementOrchestrator(platform, OPTIONS).run(PAIRS, ADDRESSES);

		expect(outputs).toEqual([
			{ label: 'h1->h2', pair: PAIRS[0], output: 'record from h1\n', timedOut: false },
			{ label: 'h2->h3', pair: PAIRS[1], output: 'record from h2\n', timedOut: false },
			{ label: 'h3->h1', pair: PAIRS[2], output: 'record from h3\n', timedOut: false },
		]);
		expect(platform.clients().map(c => c.waitCalls)).toEqual([[50], [50], [50]]);
	});

	it('kills every listener and only the clients still running', async () => {
		platform.behavior = (host, command) => ({ hangs: host === 'h2' && command.includes('-c') });

		const outputs = await new MeasurementOrchestrator(platform, OPTIONS).run(PAIRS, ADDRESSES);

		expect(outputs.map(o => o.timedOut)).toEqual([false, true, false]);
		expect(platform.listeners().every(l => l.killed)).toBe(true);
		expect(platform.clients().map(c => c.killed)).toEqual([false, true, false]);
	});

	it('stops the listeners when a receiver has no address', async () => {
		const pairs: TrafficPair[] = [{ sender: 'h1', receiver: 'h9' }];

		await expect(new MeasurementOrchestrator(platform, OPTIONS).run(pairs, ADDRESSES)).rejects.toThrow(
			'No address for receiver h9.'
		);
		expect(platform.listeners()).toHaveLength(3);
		expect(platform.listeners().every(l => l.killed)).toBe(true);
		expect(platform.clients()).toHaveLength(0);
	});

	it('does not fail when a process cannot be killed', async () => {
		platform.behavior = (host, command) => ({ stdout: 'x', killFails: host === 'h1' && command.includes('-s') });

		const outputs = await new MeasurementOrchestrator(platform, OPTIONS).run(PAIRS, ADDRESSES);

		expect(outputs).toHaveLength(3);
		expect(platform.listeners().map(l => l.killed)).toEqual([false, true, true]);
	});

	it('launches nothing without pairs', async () => {
		const outputs = await new MeasurementOrchestrator(platform, OPTIONS).run([], ADDRESSES);

		expect(outputs).toEqual([]);
		expect(platform.events).toEqual([]);
	});
});
