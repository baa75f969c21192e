import { NO_CONTROLLER_COMMAND, mapCommand, mixDifferential } from '../src/command-mapper';
import { DEFAULT_CALIBRATION, decode } from '../src/register-decoder';
import { centredFrame } from './helpers';

function frameOf(overrides: Record<number, number>) {
    const result = decode(centredFrame(overrides));
    if (!result.ok) throw result.error;
    return result.value;
}

describe('Command Mapper', () => {
    test('both drive axes at the sentinel give a stopped, ignored command', () => {
        const command = mapCommand(frameOf({ 0: 0, 1: 0, 13: 1811 }));
        expect(command).toEqual({
            kind: 'drive',
            controllerPresent: false,
            ignoreDriveControl: true,
            linear: 0.0,
            angular: 0.0
        });
        expect(command).toBe(NO_CONTROLLER_COMMAND);
    });

    test('full left stick with centred right stick mixes to half linear and negative angular', () => {
        const command = mapCommand(frameOf({ 0: 991 + 820, 1: 991 }));
        expect(command).toEqual({
            kind: 'drive',
            controllerPresent: true,
            ignoreDriveControl: false,
            linear: 0.5,
            angular: -0.5
        });
    });

    test('ignore switch above the threshold sets ignoreDriveControl', () => {
        const command = mapCommand(frameOf({ 13: 1811 }));
        expect(command.kind).toBe('drive');
        if (command.kind !== 'drive') return;
        expect(command.ignoreDriveControl).toBe(true);
    });

    test('mode switch above mid plus deadzone selects arm mode', () => {
        expect(mapCommand(frameOf({ 12: 1811 }))).toEqual({ kind: 'arm' });
        expect(mapCommand(frameOf({ 12: 997 }))).toEqual({ kind: 'arm' });
    });

    test('mode switch between mid and mid plus deadzone maps to neither mode', () => {
        for (const raw of [991, 993, 996]) {
            expect(mapCommand(frameOf({ 12: raw }))).toEqual({ kind: 'none', modeSwitchRaw: raw });
        }
    });

    test('thresholds come from the calibration', () => {
        const calibration = { ...DEFAULT_CALIBRATION, driveModeBelow: 500, armModeAbove: 1500 };
        expect(mapCommand(frameOf({ 12: 600 }), calibration).kind).toBe('none');
        expect(mapCommand(frameOf({ 12: 400 }), calibration).kind).toBe('drive');
        expect(mapCommand(frameOf({ 12: 1600 }), calibration).kind).toBe('arm');
    });

    test('switch roles can be reassigned', () => {
        const command = mapCommand(frameOf({ 12: 1811, 8: 172 }), DEFAULT_CALIBRATION, { driveVsArm: 'sa', ignoreControl: 'sb' });
        expect(command.kind).toBe('drive');
    });

    test('mixDifferential averages and halves the difference', () => {
        expect(mixDifferential(1, 1)).toEqual({ linear: 1, angular: 0 });
        expect(mixDifferential(-1, 1)).toEqual({ linear: 0, angular: 1 });
    });
});
