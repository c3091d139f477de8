import {beforeEach, describe, expect, it, vi} from 'vitest';
import {ConfigurationManager, conditionHolds} from './configurationManager.js';
import {createGridLayout} from './layoutGenerators.js';
import {LayoutError} from './utils/errors.js';
import {FakeDisplays, managedWindow, MemoryStore, recordingLogger, windowType} from './testing/fakes.js';
import type {AutoActivationCondition, Configuration} from './types/layout.js';

const SCREEN = {x: 0, y: 0, width: 1600, height: 900};
const typeA = windowType('A');
const typeB = windowType('B');

function configuration(id: string, autoActivation: AutoActivationCondition | null = null): Configuration {
    return {id, name: `Config ${id}`, layout: createGridLayout(2, 2, 1, SCREEN), autoActivation};
}

describe('conditionHolds', () => {
    const windows = [managedWindow(1, typeA), managedWindow(2, typeA), managedWindow(3, typeB)];

    it('requires an exact window count', () => {
        expect(conditionHolds({type: 'windowCount', count: 3}, windows)).toBe(true);
        expect(conditionHolds({type: 'windowCount', count: 2}, windows)).toBe(false);
    });

    it('requires every listed type to have exactly its count', () => {
        expect(conditionHolds({type: 'windowTypeCount', typeCounts: {A: 2, B: 1}}, windows)).toBe(true);
        expect(conditionHolds({type: 'windowTypeCount', typeCounts: {A: 2}}, windows)).toBe(true);
        expect(conditionHolds({type: 'windowTypeCount', typeCounts: {A: 1}}, windows)).toBe(false);
        expect(conditionHolds({type: 'windowTypeCount', typeCounts: {C: 0}}, windows)).toBe(true);
        expect(conditionHolds({type: 'windowTypeCount', typeCounts: {C: 1}}, windows)).toBe(false);
    });
});

describe('ConfigurationManager', () => {
    let store: MemoryStore;
    let manager: ConfigurationManager;

    beforeEach(() => {
        store = new MemoryStore();
        manager = new ConfigurationManager({
            store,
            defaultWindowTypes: () => [typeA, typeB],
            logger: recordingLogger().logger,
        });
    });

    describe('load', () => {
        it('uses and saves the default window types on first run', async () => {
            await manager.load();

            expect(manager.windowTypes).toEqual([typeA, typeB]);
            expect(store.windowTypes).toEqual([typeA, typeB]);
            expect(manager.configurations).toEqual([]);
        });

        it('prefers stored data', async () => {
            store.windowTypes = [typeB];
            store.configurations = [configuration('stored')];

            await manager.load();

            expect(manager.windowTypes).toEqual([typeB]);
            expect(manager.configurations.map(c => c.id)).toEqual(['stored']);
            expect(store.saves).toBe(0);
        });

        it('lists only enabled window types as enabled', async () => {
            store.windowTypes = [typeA, {...typeB, enabled: false}];
            await manager.load();

            expect(manager.enabledWindowTypes).toEqual([typeA]);
        });
    });

    describe('configurations', () => {
        beforeEach(async () => {
            await manager.load();
        });

        it('adds configurations and replaces a clashing id', async () => {
            const first = await manager.addConfiguration(configuration('same'));
            const second = await manager.addConfiguration(configuration('same'));

            expect(first.id).toBe('same');
            expect(second.id).not.toBe('same');
            expect(store.configurations?.map(c => c.id)).toEqual(['same', second.id]);
        });

        it('updates known ids only', async () => {
            await manager.addConfiguration(configuration('a'));

            expect(await manager.updateConfiguration({...configuration('a'), name: 'Renamed'})).toBe(true);
            expect(await manager.updateConfiguration(configuration('missing'))).toBe(false);
            expect(manager.getConfiguration('a')?.name).toBe('Renamed');
            expect(manager.getConfiguration('missing')).toBeNull();
        });

        it('refreshes the active configuration on update', async () => {
            await manager.addConfiguration(configuration('a'));
            manager.activateConfiguration('a');

            await manager.updateConfiguration({...configuration('a'), name: 'Renamed'});

            expect(manager.activeConfiguration?.name).toBe('Renamed');
        });

        it('deactivates a removed active configuration', async () => {
            await manager.addConfiguration(configuration('a'));
            manager.activateConfiguration('a');
            const deactivated = vi.fn();
            manager.connect('configuration-deactivated', deactivated);

            expect(await manager.removeConfiguration('a')).toBe(true);
            expect(await manager.removeConfiguration('a')).toBe(false);
            expect(manager.activeConfiguration).toBeNull();
            expect(deactivated).toHaveBeenCalledTimes(1);
        });

        it('emits configurations-changed after saving', async () => {
            const changed = vi.fn();
            manager.connect('configurations-changed', changed);

            await manager.addConfiguration(configuration('a'));

            expect(changed).toHaveBeenCalledTimes(1);
            expect(changed.mock.calls[0][0]).toHaveLength(1);
        });

        it('propagates store failures', async () => {
            store.saveConfigurations = async () => {
                throw new Error('disk full');
            };

            await expect(manager.addConfiguration(configuration('a'))).rejects.toThrow('disk full');
        });
    });

    describe('window types', () => {
        beforeEach(async () => {
            await manager.load();
        });

        it('adds, updates and removes window types', async () => {
            const added = await manager.addWindowType(typeA);
            expect(added.id).not.toBe('A');

            expect(await manager.updateWindowType({...typeB, name: 'Renamed'})).toBe(true);
            expect(await manager.updateWindowType(windowType('missing'))).toBe(false);
            expect(manager.getWindowType('B')?.name).toBe('Renamed');

            expect(await manager.removeWindowType('A')).toBe(true);
            expect(await manager.removeWindowType('A')).toBe(false);
            expect(manager.windowTypes.map(t => t.id)).toEqual(['B', added.id]);
        });
    });

    describe('activation', () => {
        beforeEach(async () => {
            store.configurations = [
                configuration('two', {type: 'windowCount', count: 2}),
                configuration('mixed', {type: 'windowTypeCount', typeCounts: {A: 2, B: 1}}),
                configuration('manual'),
            ];
            await manager.load();
        });

        it('activates known configurations and emits', () => {
            const activated = vi.fn();
            manager.connect('configuration-activated', activated);

            expect(manager.activateConfiguration('manual')).toBe(true);
            expect(manager.activateConfiguration('missing')).toBe(false);

            expect(manager.activeConfiguration?.id).toBe('manual');
            expect(activated).toHaveBeenCalledTimes(1);
        });

        it('returns the first configuration whose condition holds', () => {
            const three = [managedWindow(1, typeA), managedWindow(2, typeA), managedWindow(3, typeB)];
            const two = [managedWindow(1, typeA), managedWindow(2, typeB)];

            expect(manager.evaluateAutoActivation(three)?.id).toBe('mixed');
            expect(manager.evaluateAutoActivation(two)?.id).toBe('two');
            expect(manager.evaluateAutoActivation([])).toBeNull();
        });

        it('skips auto-activation while a configuration is active', () => {
            manager.activateConfiguration('manual');
            expect(manager.evaluateAutoActivation([managedWindow(1, typeA), managedWindow(2, typeA)])).toBeNull();

            manager.deactivate();
            expect(manager.evaluateAutoActivation([managedWindow(1, typeA), managedWindow(2, typeA)])?.id).toBe('two');
        });
    });

    describe('captureConfiguration', () => {
        beforeEach(async () => {
            await manager.load();
        });

        it('stores the optimized arrangement without auto-activation', async () => {
            const windows = [0, 1, 2, 3].map(i => managedWindow(i + 1, typeA, {
                frame: {x: (i % 2) * 800, y: Math.floor(i / 2) * 450, width: 790, height: 440},
            }));

            const captured = await manager.captureConfiguration('Evening', windows, new FakeDisplays());

            expect(captured.name).toBe('Evening');
            expect(captured.layout.name).toBe('Evening');
            expect(captured.autoActivation).toBeNull();
            expect(captured.layout.slots.map(s => [s.frame.x, s.frame.y])).toEqual([[0, 0], [800, 0], [0, 450], [800, 450]]);
            expect(manager.getConfiguration(captured.id)).toEqual(captured);
        });

        it('rejects an empty capture', async () => {
            await expect(manager.captureConfiguration('Empty', [], new FakeDisplays())).rejects.toBeInstanceOf(LayoutError);
        });
    });
});
