import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {DetectionService, DetectionStatus} from './detectionService.js';
import type {DetectionStatusType} from './detectionService.js';
import {Settings} from './settings.js';
import {WindowDetector} from './windowDetector.js';
import {FakeDisplays, FakeEnvironment, recordingLogger, windowType} from './testing/fakes.js';
import type {ManagedWindow} from './types/window.js';

const tables = windowType('tables', {titlePattern: 'Table*'});

function table(id: number, x = 0): Record<string, unknown> {
    return {id, pid: 1, title: `Table ${id}`, bounds: {x, y: 0, width: 400, height: 300}};
}

describe('DetectionService', () => {
    let environment: FakeEnvironment;
    let displays: FakeDisplays;
    let settings: Settings;
    let service: DetectionService;
    let snapshots: Array<readonly ManagedWindow[]>;
    let statuses: Array<[DetectionStatusType, string | null]>;

    beforeEach(() => {
        vi.useFakeTimers();
        environment = new FakeEnvironment();
        displays = new FakeDisplays();
        settings = new Settings();
        const {logger} = recordingLogger();
        service = new DetectionService({
            detector: new WindowDetector({environment, displays, logger}),
            settings,
            logger,
        });
        snapshots = [];
        statuses = [];
        service.connect('windows-changed', windows => snapshots.push(windows));
        service.connect('status-changed', (status, message) => statuses.push([status, message]));
    });

    afterEach(() => {
        service.destroy();
        vi.useRealTimers();
    });

    it('detects immediately and then on every interval', () => {
        environment.windows = [table(1)];
        service.start([tables]);

        expect(service.windows.map(w => w.id)).toEqual([1]);
        expect(service.status).toBe(DetectionStatus.MONITORING);

        environment.windows = [table(1), table(2, 500)];
        vi.advanceTimersByTime(1000);

        expect(service.windows.map(w => w.id)).toEqual([1, 2]);
        expect(snapshots.map(s => s.length)).toEqual([1, 2]);
        expect(statuses).toEqual([
            [DetectionStatus.DETECTING, null],
            [DetectionStatus.MONITORING, null],
        ]);
    });

    it('publishes frozen snapshots only when they change', () => {
        environment.windows = [table(1)];
        service.start([tables]);
        vi.advanceTimersByTime(3000);

        expect(snapshots).toHaveLength(1);
        expect(Object.isFrozen(service.windows)).toBe(true);

        environment.windows = [table(1, 40)];
        vi.advanceTimersByTime(1000);

        expect(snapshots).toHaveLength(2);
        expect(snapshots[1][0].frame.x).toBe(40);
    });

    it('reports noWindows without starting when no type is enabled', () => {
        expect(service.start([{...tables, enabled: false}])).toBe(false);

        expect(service.isRunning).toBe(false);
        expect(service.status).toBe(DetectionStatus.NO_WINDOWS);
    });

    it('reports noWindows when nothing matches', () => {
        environment.windows = [{id: 1, pid: 1, title: 'Lobby', bounds: {x: 0, y: 0, width: 400, height: 300}}];
        service.start([tables]);

        expect(service.status).toBe(DetectionStatus.NO_WINDOWS);
        expect(service.isRunning).toBe(true);
    });

    it('keeps the previous snapshot when a pass fails', () => {
        environment.windows = [table(1)];
        service.start([tables]);

        displays.displays = [];
        vi.advanceTimersByTime(1000);

        expect(service.status).toBe(DetectionStatus.ERROR);
        expect(service.lastError).toBe('No displays available for window detection');
        expect(service.windows.map(w => w.id)).toEqual([1]);
        expect(statuses[statuses.length - 1]).toEqual([DetectionStatus.ERROR, 'No displays available for window detection']);
    });

    it('restarts the loop when the interval setting changes', () => {
        environment.windows = [table(1)];
        service.start([tables]);
        settings.set('detection-interval', 5000);

        environment.windows = [table(1), table(2, 500)];
        vi.advanceTimersByTime(4000);
        expect(service.windows).toHaveLength(1);

        vi.advanceTimersByTime(1000);
        expect(service.windows).toHaveLength(2);
    });

    it('stops detecting after stop()', () => {
        environment.windows = [table(1)];
        service.start([tables]);
        service.stop();

        environment.windows = [];
        vi.advanceTimersByTime(5000);

        expect(service.windows).toHaveLength(1);
        expect(service.status).toBe(DetectionStatus.IDLE);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('holds the arranging status across passes', () => {
        environment.windows = [table(1)];
        service.start([tables]);

        service.beginArranging();
        vi.advanceTimersByTime(1000);
        expect(service.status).toBe(DetectionStatus.ARRANGING);

        service.endArranging();
        expect(service.status).toBe(DetectionStatus.MONITORING);
    });

    it('drops its settings subscription on destroy', () => {
        service.destroy();
        expect(settings.connectionCount).toBe(0);
    });
});
