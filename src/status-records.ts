/**
 * Status record value types, one per published category.
 * Records are flat and immutable; a change is a new object.
 */

import * as CONST from './constants';

export interface BatteryStatus {
    readonly batteryVoltage: number;
}

export interface CameraStatus {
    readonly zed: boolean;
    readonly undercarriage: boolean;
    readonly chassis: boolean;
    readonly mainNavigation: boolean;
}

export interface WheelStatus {
    readonly frontLeft: boolean;
    readonly middleLeft: boolean;
    readonly rearLeft: boolean;
    readonly frontRight: boolean;
    readonly middleRight: boolean;
    readonly rearRight: boolean;
}

export interface ControllerStatus {
    readonly controllerConnected: boolean;
}

export interface GpsStatus {
    readonly connected: boolean;
    readonly fix: boolean;
    readonly numSatellites: number;
    readonly horizontalDilution: number;
    readonly kmph: number;
    readonly heading: number;
}

export interface JetsonStatus {
    readonly cpu: number;
    readonly ram: number;
    readonly emmc: number;
    readonly nvmeSsd: number;
    readonly gpuTemp: number;
}

export interface MiscStatus {
    readonly arm: boolean;
    readonly armEndEffector: boolean;
    readonly chassisPanTilt: boolean;
    readonly sampleContainment: boolean;
    readonly tower: boolean;
}

export interface IrisStatus {
    readonly irisConnected: boolean;
    readonly voltage24v: number;
}

export interface StatusRecords {
    battery: BatteryStatus;
    camera: CameraStatus;
    wheel: WheelStatus;
    controller: ControllerStatus;
    gps: GpsStatus;
    jetson: JetsonStatus;
    misc: MiscStatus;
}

export type StatusCategory = keyof StatusRecords;

/** Publish order used by the status node on every tick. */
export const STATUS_CATEGORIES: readonly StatusCategory[] = ['battery', 'camera', 'jetson', 'controller', 'wheel', 'gps', 'misc'];

export function initialStatusRecords(): StatusRecords {
    return {
        battery: { batteryVoltage: 0 },
        camera: { zed: false, undercarriage: false, chassis: false, mainNavigation: false },
        wheel: {
            frontLeft: false,
            middleLeft: false,
            rearLeft: false,
            frontRight: false,
            middleRight: false,
            rearRight: false
        },
        controller: { controllerConnected: false },
        gps: {
            connected: false,
            fix: false,
            numSatellites: 0,
            horizontalDilution: 0,
            kmph: 0,
            heading: CONST.HEADING_UNAVAILABLE
        },
        jetson: { cpu: 0, ram: 0, emmc: 0, nvmeSsd: 0, gpuTemp: CONST.GPU_TEMP_UNAVAILABLE },
        misc: { arm: false, armEndEffector: false, chassisPanTilt: false, sampleContainment: false, tower: false }
    };
}

export const INITIAL_IRIS_STATUS: IrisStatus = { irisConnected: false, voltage24v: 0 };

function sameValue(a: unknown, b: unknown): boolean {
    if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b)) {
        return true;
    }
    return a === b;
}

/**
 * Field-by-field value equality over every field of both records.
 */
export function recordsEqual(a: object, b: object): boolean {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) {
        return false;
    }
    const valuesB = new Map<string, unknown>(Object.entries(b));
    return Object.entries(a).every(([key, value]) => valuesB.has(key) && sameValue(value, valuesB.get(key)));
}
