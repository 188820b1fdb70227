import { FakeProcessHandle } from '../../platform/__tests__/FakeEmulationPlatform';
import { ProcessRegistry } from '../ProcessRegistry';

describe('ProcessRegistry', () => {
	it('rejects a second process under the same label', () => {
		const registry = new ProcessRegistry();
		registry.register('h1->h2', 'client', new FakeProcessHandle('h1', 'iperf -c', 'capture', {}));

		expect(() =>
			registry.register('h1->h2', 'client', new FakeProcessHandle('h1', 'iperf -c', 'capture', {}))
		).toThrow('Process "h1->h2" is already registered.');
	});

	it('filters entries by role', () => {
		const registry = new ProcessRegistry();
		registry.register('listener:h1', 'listener', new FakeProcessHandle('h1', 'iperf -s &', 'background', {}));
		registry.register('h1->h2', 'client', new FakeProcessHandle('h1', 'iperf -c', 'capture', {}));

		expect(registry.entries()).toHaveLength(2);
		expect(registry.entries('listener').map(e => e.label)).toEqual(['listener:h1']);
		expect(registry.entries('client').map(e => e.label)).toEqual(['h1->h2']);
		expect(registry.get('h1->h2')?.role).toEqual('client');
	});

	it('kills listeners and running clients, then forgets everything', async () => {
		const registry = new ProcessRegistry();
		const listener = new FakeProcessHandle('h1', 'iperf -s &', 'background', {});
		const finished = new FakeProcessHandle('h1', 'iperf -c', 'capture', {});
		const running = new FakeProcessHandle('h2', 'iperf -c', 'capture', { hangs: true });
		registry.register('listener:h1', 'listener', listener);
		registry.register('h1->h2', 'client', finished);
		registry.register('h2->h1', 'client', running);
		await finished.wait(10);

		const failures = await registry.terminateAll();

		expect(failures).toEqual(0);
		expect(listener.killed).toBe(true);
		expect(finished.killed).toBe(false);
		expect(running.killed).toBe(true);
		expect(registry.entries()).toEqual([]);
	});

	it('counts kill failures without throwing', async () => {
		const registry = new ProcessRegistry();
		const stuck = new FakeProcessHandle('h1', 'iperf -s &', 'background', { killFails: true });
		const other = new FakeProcessHandle('h2', 'iperf -s &', 'background', {});
		registry.register('listener:h1', 'listener', stuck);
		registry.register('listener:h2', 'listener', other);

		await expect(registry.terminateAll()).resolves.toEqual(1);
		expect(other.killed).toBe(true);
	});
});
