/**
 * Wire shapes of the messages exchanged on the bus, and guards for the inbound ones.
 */

import type { DriveCommand } from './command-mapper';
import { isRecord } from './sanitizers';
import type { DriveSide, InboundUpdate } from './status-aggregator';
import type { IrisStatus } from './status-records';

export interface DriveCommandMessage {
    controllerPresent: boolean;
    ignoreDriveControl: boolean;
    linear: number;
    angular: number;
}

export function toDriveCommandMessage(command: DriveCommand): DriveCommandMessage {
    return {
        controllerPresent: command.controllerPresent,
        ignoreDriveControl: command.ignoreDriveControl,
        linear: command.linear,
        angular: command.angular
    };
}

export function toIrisStatusMessage(status: IrisStatus): IrisStatus {
    return { irisConnected: status.irisConnected, voltage24v: status.voltage24v };
}

export function parseIrisStatusMessage(payload: unknown): InboundUpdate | null {
    if (!isRecord(payload)) return null;
    const { voltage24v } = payload;
    if (typeof voltage24v !== 'number' || !Number.isFinite(voltage24v)) {
        return null;
    }
    return { kind: 'irisStatus', voltage24v };
}

/** Drive controller health: `{ firstMotorConnected, secondMotorConnected }` for one side. */
export function parseDriveStatusMessage(side: DriveSide, payload: unknown): InboundUpdate | null {
    if (!isRecord(payload)) return null;
    const { firstMotorConnected, secondMotorConnected } = payload;
    if (typeof firstMotorConnected !== 'boolean' || typeof secondMotorConnected !== 'boolean') {
        return null;
    }
    return { kind: 'driveStatus', side, firstMotorConnected, secondMotorConnected };
}

export function parseDriveCommandMessage(payload: unknown): InboundUpdate | null {
    if (!isRecord(payload)) return null;
    const { controllerPresent } = payload;
    if (typeof controllerPresent !== 'boolean') {
        return null;
    }
    return { kind: 'driveCommand', controllerPresent };
}

/** NMEA text: a plain or JSON string, or `{ sentence }`. */
export function parseGpsSentenceMessage(payload: unknown): InboundUpdate | null {
    if (typeof payload === 'string') {
        return { kind: 'gpsSentence', sentence: payload };
    }
    if (!isRecord(payload)) return null;
    const { sentence } = payload;
    if (typeof sentence !== 'string') {
        return null;
    }
    return { kind: 'gpsSentence', sentence };
}
