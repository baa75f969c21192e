import fs from 'fs-extra';
import * as CONST from './constants';
import { ConfigError } from './errors';
import { LOG_LEVELS, LogLevel } from './logger';
import { DEFAULT_SWITCH_ROLES, SwitchRoles } from './command-mapper';
import { Calibration, DEFAULT_CALIBRATION, SWITCH_NAMES } from './register-decoder';
import {
    sanitizeEnum,
    sanitizeInteger,
    sanitizeNumber,
    sanitizeRecord,
    sanitizeString
} from './sanitizers';
import type { CameraPaths } from './status-aggregator';
import { toErrorMessage } from './utils';

export interface IrisConfig {
    serialPort: string;
    baudRate: number;
    unitId: number;
    transportTimeoutMs: number;
    turnaroundMs: number;
    hertz: number;
    connectedTimeoutMs: number;
    hardDisconnectMs: number;
    calibration: Calibration;
    switchRoles: SwitchRoles;
    topics: {
        driveCommand: string;
        irisStatus: string;
    };
}

export interface StatusConfig {
    hertz: number;
    rateCeilings: {
        battery: number;
        jetson: number;
    };
    publishTopics: {
        battery: string;
        camera: string;
        wheel: string;
        controller: string;
        gps: string;
        jetson: string;
        misc: string;
    };
    subscribeTopics: {
        requestUpdate: string;
        irisStatus: string;
        driveStatusLeft: string;
        driveStatusRight: string;
        driveStatusRear: string;
        gpsSentence: string;
        driveCommand: string;
    };
    cameraPaths: CameraPaths;
    emmcMount: string;
    nvmeMount: string;
    sensorsCommand: string;
    gpuTempLine: number;
}

export interface AppConfig {
    brokerUrl: string;
    logLevel: LogLevel;
    iris: IrisConfig;
    status: StatusConfig;
}

export const CONFIG_PATH_ENV = 'ROVER_TELEMETRY_CONFIG';

function sanitizeCalibration(value: unknown): Calibration {
    const raw = sanitizeRecord(value);
    const d = DEFAULT_CALIBRATION;
    const mid = sanitizeInteger(raw.mid, d.mid, 0, CONST.MAX_REGISTER_VALUE);
    const deadzone = sanitizeInteger(raw.deadzone, d.deadzone, 0, CONST.MAX_REGISTER_VALUE);
    return {
        min: sanitizeInteger(raw.min, d.min, 0, CONST.MAX_REGISTER_VALUE),
        mid,
        max: sanitizeInteger(raw.max, d.max, 0, CONST.MAX_REGISTER_VALUE),
        range: sanitizeNumber(raw.range, d.range, 1),
        deadzone,
        sentinel: sanitizeInteger(raw.sentinel, d.sentinel, 0, CONST.MAX_REGISTER_VALUE),
        switchThreshold: sanitizeInteger(raw.switchThreshold, mid, 0, CONST.MAX_REGISTER_VALUE),
        driveModeBelow: sanitizeInteger(raw.driveModeBelow, mid, 0, CONST.MAX_REGISTER_VALUE),
        armModeAbove: sanitizeInteger(raw.armModeAbove, mid + deadzone, 0, CONST.MAX_REGISTER_VALUE),
        voltageScale: sanitizeNumber(raw.voltageScale, d.voltageScale, 0)
    };
}

export function sanitizeIrisConfig(value: unknown): IrisConfig {
    const raw = sanitizeRecord(value);
    const topics = sanitizeRecord(raw.topics);
    const roles = sanitizeRecord(raw.switchRoles);
    const hardDisconnectMs = sanitizeInteger(raw.hardDisconnectMs, CONST.DEFAULT_HARD_DISCONNECT, 1);
    return {
        serialPort: sanitizeString(raw.serialPort, CONST.DEFAULT_SERIAL_PORT),
        baudRate: sanitizeInteger(raw.baudRate, CONST.DEFAULT_BAUD, 1200),
        unitId: sanitizeInteger(raw.unitId, CONST.DEFAULT_MODBUS_ID, 1, 247),
        transportTimeoutMs: sanitizeInteger(raw.transportTimeoutMs, CONST.DEFAULT_TRANSPORT_TIMEOUT, 10),
        turnaroundMs: sanitizeInteger(raw.turnaroundMs, CONST.DEFAULT_TURNAROUND_DELAY, 0),
        hertz: sanitizeNumber(raw.hertz, CONST.DEFAULT_HERTZ, 0.1),
        // Connected can never outlast the hard limit
        connectedTimeoutMs: Math.min(
            hardDisconnectMs,
            sanitizeInteger(raw.connectedTimeoutMs, CONST.DEFAULT_CONNECTED_TIMEOUT, 1)
        ),
        hardDisconnectMs,
        calibration: sanitizeCalibration(raw.calibration),
        switchRoles: {
            driveVsArm: sanitizeEnum(roles.driveVsArm, SWITCH_NAMES, DEFAULT_SWITCH_ROLES.driveVsArm),
            ignoreControl: sanitizeEnum(roles.ignoreControl, SWITCH_NAMES, DEFAULT_SWITCH_ROLES.ignoreControl)
        },
        topics: {
            driveCommand: sanitizeString(topics.driveCommand, CONST.DEFAULT_DRIVE_COMMAND_TOPIC),
            irisStatus: sanitizeString(topics.irisStatus, CONST.DEFAULT_IRIS_STATUS_TOPIC)
        }
    };
}

export function sanitizeStatusConfig(value: unknown): StatusConfig {
    const raw = sanitizeRecord(value);
    const ceilings = sanitizeRecord(raw.rateCeilings);
    const pub = sanitizeRecord(raw.publishTopics);
    const sub = sanitizeRecord(raw.subscribeTopics);
    const cameras = sanitizeRecord(raw.cameraPaths);
    return {
        hertz: sanitizeNumber(raw.hertz, CONST.DEFAULT_HERTZ, 0.1),
        rateCeilings: {
            battery: sanitizeNumber(ceilings.battery, CONST.MAX_BATTERY_UPDATE_HERTZ, 0),
            jetson: sanitizeNumber(ceilings.jetson, CONST.MAX_JETSON_UPDATE_HERTZ, 0)
        },
        publishTopics: {
            battery: sanitizeString(pub.battery, CONST.DEFAULT_BATTERY_TOPIC),
            camera: sanitizeString(pub.camera, CONST.DEFAULT_CAMERA_TOPIC),
            wheel: sanitizeString(pub.wheel, CONST.DEFAULT_WHEEL_TOPIC),
            controller: sanitizeString(pub.controller, CONST.DEFAULT_CONTROLLER_TOPIC),
            gps: sanitizeString(pub.gps, CONST.DEFAULT_GPS_TOPIC),
            jetson: sanitizeString(pub.jetson, CONST.DEFAULT_JETSON_TOPIC),
            misc: sanitizeString(pub.misc, CONST.DEFAULT_MISC_TOPIC)
        },
        subscribeTopics: {
            requestUpdate: sanitizeString(sub.requestUpdate, CONST.DEFAULT_REQUEST_UPDATE_TOPIC),
            irisStatus: sanitizeString(sub.irisStatus, CONST.DEFAULT_IRIS_STATUS_TOPIC),
            driveStatusLeft: sanitizeString(sub.driveStatusLeft, CONST.DEFAULT_DRIVE_STATUS_LEFT_TOPIC),
            driveStatusRight: sanitizeString(sub.driveStatusRight, CONST.DEFAULT_DRIVE_STATUS_RIGHT_TOPIC),
            driveStatusRear: sanitizeString(sub.driveStatusRear, CONST.DEFAULT_DRIVE_STATUS_REAR_TOPIC),
            gpsSentence: sanitizeString(sub.gpsSentence, CONST.DEFAULT_GPS_SENTENCE_TOPIC),
            driveCommand: sanitizeString(sub.driveCommand, CONST.DEFAULT_DRIVE_COMMAND_TOPIC)
        },
        cameraPaths: {
            zed: sanitizeString(cameras.zed, CONST.DEFAULT_CAMERA_PATHS.zed),
            undercarriage: sanitizeString(cameras.undercarriage, CONST.DEFAULT_CAMERA_PATHS.undercarriage),
            chassis: sanitizeString(cameras.chassis, CONST.DEFAULT_CAMERA_PATHS.chassis),
            mainNavigation: sanitizeString(cameras.mainNavigation, CONST.DEFAULT_CAMERA_PATHS.mainNavigation)
        },
        emmcMount: sanitizeString(raw.emmcMount, CONST.DEFAULT_EMMC_MOUNT),
        nvmeMount: sanitizeString(raw.nvmeMount, CONST.DEFAULT_NVME_MOUNT),
        sensorsCommand: sanitizeString(raw.sensorsCommand, CONST.DEFAULT_SENSORS_COMMAND),
        gpuTempLine: sanitizeInteger(raw.gpuTempLine, CONST.DEFAULT_GPU_TEMP_LINE, 0)
    };
}

export function sanitizeConfig(value: unknown): AppConfig {
    const raw = sanitizeRecord(value);
    return {
        brokerUrl: sanitizeString(raw.brokerUrl, CONST.DEFAULT_BROKER_URL),
        logLevel: sanitizeEnum(raw.logLevel, LOG_LEVELS, 'info'),
        iris: sanitizeIrisConfig(raw.iris),
        status: sanitizeStatusConfig(raw.status)
    };
}

/**
 * Load configuration from a JSON file merged over the defaults.
 * Without a path (argument or environment) the defaults are returned.
 */
export async function loadConfig(path: string | undefined = process.env[CONFIG_PATH_ENV]): Promise<AppConfig> {
    if (!path) {
        return sanitizeConfig({});
    }

    if (!(await fs.pathExists(path))) {
        throw new ConfigError(path, 'file not found');
    }

    let raw: unknown;
    try {
        raw = await fs.readJson(path);
    } catch (e) {
        throw new ConfigError(path, toErrorMessage(e));
    }
    return sanitizeConfig(raw);
}
