/**
 * Register Decoder
 * Turns one raw holding-register snapshot from the transceiver bridge into a ChannelFrame
 */

import * as CONST from './constants';
import { DecodeError } from './errors';
import { Result, ok, err } from './utils';

export interface Calibration {
    min: number;
    mid: number;
    max: number;
    range: number;
    deadzone: number;
    sentinel: number;
    switchThreshold: number;
    driveModeBelow: number;
    armModeAbove: number;
    voltageScale: number;
}

export const DEFAULT_CALIBRATION: Calibration = {
    min: CONST.SBUS_MIN,
    mid: CONST.SBUS_MID,
    max: CONST.SBUS_MAX,
    range: CONST.SBUS_RANGE,
    deadzone: CONST.SBUS_DEADZONE,
    sentinel: CONST.NO_INPUT_SENTINEL,
    switchThreshold: CONST.SBUS_MID,
    driveModeBelow: CONST.SBUS_MID,
    armModeAbove: CONST.SBUS_MID + CONST.SBUS_DEADZONE,
    voltageScale: CONST.DEFAULT_VOLTAGE_SCALE
};

export type SwitchName = 'sa' | 'sb' | 'sc' | 'sd' | 'se' | 'sf' | 'sg' | 'sh';

export const SWITCH_NAMES: readonly SwitchName[] = ['sa', 'sb', 'sc', 'sd', 'se', 'sf', 'sg', 'sh'];

export const SWITCH_REGISTERS: Record<SwitchName, number> = {
    sa: CONST.REG_SA_SWITCH,
    sb: CONST.REG_SB_SWITCH,
    sc: CONST.REG_SC_SWITCH,
    sd: CONST.REG_SD_SWITCH,
    se: CONST.REG_SE_SWITCH,
    sf: CONST.REG_SF_SWITCH,
    sg: CONST.REG_SG_SWITCH,
    sh: CONST.REG_SH_SWITCH
};

export interface StickAxes {
    readonly leftY: number;
    readonly rightY: number;
    readonly rightX: number;
    readonly leftX: number;
}

export interface Pots {
    readonly left: number;
    readonly s1: number;
    readonly s2: number;
    readonly right: number;
}

export interface VoltageRails {
    readonly v24: number;
    readonly v5: number;
    readonly usb5: number;
    readonly v3v3: number;
}

export interface ChannelFrame {
    /** False when both drive axes read the no-input sentinel. */
    readonly controllerPresent: boolean;
    readonly sticks: StickAxes;
    readonly switches: Readonly<Record<SwitchName, boolean>>;
    readonly switchRaw: Readonly<Record<SwitchName, number>>;
    readonly pots: Pots;
    readonly rails: VoltageRails;
}

export function normalizeAxis(value: number, calibration: Pick<Calibration, 'mid' | 'range'>): number {
    return (value - calibration.mid) / calibration.range;
}

export function isNoInput(leftY: number, rightY: number, sentinel: number): boolean {
    return leftY === sentinel && rightY === sentinel;
}

function isRegisterValue(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= CONST.MAX_REGISTER_VALUE;
}

function readSwitches<T>(read: (index: number) => T): Record<SwitchName, T> {
    return {
        sa: read(SWITCH_REGISTERS.sa),
        sb: read(SWITCH_REGISTERS.sb),
        sc: read(SWITCH_REGISTERS.sc),
        sd: read(SWITCH_REGISTERS.sd),
        se: read(SWITCH_REGISTERS.se),
        sf: read(SWITCH_REGISTERS.sf),
        sg: read(SWITCH_REGISTERS.sg),
        sh: read(SWITCH_REGISTERS.sh)
    };
}

/**
 * Decode a raw register vector. Fails closed: a short or malformed vector never yields a frame.
 */
export function decode(raw: readonly number[], calibration: Calibration = DEFAULT_CALIBRATION): Result<ChannelFrame, DecodeError> {
    if (raw.length < CONST.REGISTER_COUNT) {
        return err(new DecodeError('ShortFrame', CONST.REGISTER_COUNT, raw.length));
    }

    for (let i = 0; i < CONST.REGISTER_COUNT; i++) {
        if (!isRegisterValue(raw[i])) {
            return err(new DecodeError('InvalidRegister', CONST.REGISTER_COUNT, raw.length, `register ${i} = ${raw[i]}`));
        }
    }

    const leftYRaw = raw[CONST.REG_LEFT_STICK_Y];
    const rightYRaw = raw[CONST.REG_RIGHT_STICK_Y];
    const controllerPresent = !isNoInput(leftYRaw, rightYRaw, calibration.sentinel);

    const sticks: StickAxes = controllerPresent
        ? {
            leftY: normalizeAxis(leftYRaw, calibration),
            rightY: normalizeAxis(rightYRaw, calibration),
            rightX: normalizeAxis(raw[CONST.REG_RIGHT_STICK_X], calibration),
            leftX: normalizeAxis(raw[CONST.REG_LEFT_STICK_X], calibration)
        }
        : { leftY: 0, rightY: 0, rightX: 0, leftX: 0 };

    const switchRaw = readSwitches(index => raw[index]);
    const switches = readSwitches(index => raw[index] > calibration.switchThreshold);

    return ok({
        controllerPresent,
        sticks,
        switches,
        switchRaw,
        pots: {
            left: raw[CONST.REG_LEFT_POT],
            s1: raw[CONST.REG_S1_POT],
            s2: raw[CONST.REG_S2_POT],
            right: raw[CONST.REG_RIGHT_POT]
        },
        rails: {
            v24: raw[CONST.REG_VOLTAGE_24V] * calibration.voltageScale,
            v5: raw[CONST.REG_VOLTAGE_5V] * calibration.voltageScale,
            usb5: raw[CONST.REG_USB_VOLTAGE_5V] * calibration.voltageScale,
            v3v3: raw[CONST.REG_VOLTAGE_3V3] * calibration.voltageScale
        }
    });
}
