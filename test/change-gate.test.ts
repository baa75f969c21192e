import { ChangeGate } from '../src/change-gate';
import type { BatteryStatus, CameraStatus } from '../src/status-records';

interface Categories {
    battery: BatteryStatus;
    camera: CameraStatus;
}

const cameras = (zed: boolean): CameraStatus => ({ zed, undercarriage: false, chassis: true, mainNavigation: true });

describe('ChangeGate', () => {
    let gate: ChangeGate<Categories>;

    beforeEach(() => {
        gate = new ChangeGate<Categories>({ battery: 0.2 });
        gate.seed('battery', { batteryVoltage: 0 }, 0);
        gate.seed('camera', cameras(false), 0);
    });

    test('unchanged record is not published twice', () => {
        expect(gate.shouldPublish('camera', cameras(false), false, 100)).toBe(false);
        expect(gate.shouldPublish('camera', cameras(false), false, 200)).toBe(false);
    });

    test('a single changed field publishes immediately without a ceiling', () => {
        expect(gate.shouldPublish('camera', cameras(true), false, 1)).toBe(true);
    });

    test('unseeded category publishes on first sight', () => {
        const fresh = new ChangeGate<Categories>();
        expect(fresh.shouldPublish('camera', cameras(false), false, 0)).toBe(true);
    });

    test('rate ceiling holds changed values to one publish per period', () => {
        const published: number[] = [];
        const present = (voltage: number, now: number) =>
            gate.publishIfNeeded('battery', { batteryVoltage: voltage }, false, now, value => {
                published.push(value.batteryVoltage);
            });

        expect(present(24.1, 5000)).toBe(true);
        expect(present(24.2, 6000)).toBe(false);
        expect(present(24.3, 9999)).toBe(false);
        expect(present(24.4, 10000)).toBe(true);
        expect(published).toEqual([24.1, 24.4]);
    });

    test('a value changed during the hold is dropped, not queued', () => {
        gate.recordPublished('battery', { batteryVoltage: 24 }, 5000);
        expect(gate.shouldPublish('battery', { batteryVoltage: 25 }, false, 6000)).toBe(false);
        // Back to the published value by the time the window opens
        expect(gate.shouldPublish('battery', { batteryVoltage: 24 }, false, 10000)).toBe(false);
    });

    test('manual override publishes unchanged and rate-held records', () => {
        expect(gate.shouldPublish('camera', cameras(false), true, 10)).toBe(true);
        gate.recordPublished('battery', { batteryVoltage: 24 }, 5000);
        expect(gate.shouldPublish('battery', { batteryVoltage: 24 }, true, 5001)).toBe(true);
    });

    test('recordPublished moves the baseline', () => {
        gate.recordPublished('camera', cameras(true), 50);
        expect(gate.shouldPublish('camera', cameras(true), false, 60)).toBe(false);
        expect(gate.shouldPublish('camera', cameras(false), false, 60)).toBe(true);
    });

    test('non-positive ceilings are ignored', () => {
        const open = new ChangeGate<Categories>({ battery: 0 });
        open.seed('battery', { batteryVoltage: 0 }, 0);
        expect(open.shouldPublish('battery', { batteryVoltage: 1 }, false, 1)).toBe(true);
    });
});
