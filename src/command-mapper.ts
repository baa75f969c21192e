import { Calibration, ChannelFrame, DEFAULT_CALIBRATION, SwitchName } from './register-decoder';

export interface DriveCommand {
    readonly kind: 'drive';
    readonly controllerPresent: boolean;
    readonly ignoreDriveControl: boolean;
    readonly linear: number;
    readonly angular: number;
}

/** Arm mode is selected; arm control is not published yet. */
export interface ArmNoOp {
    readonly kind: 'arm';
}

/** Mode switch sits in the band between the drive and arm thresholds. */
export interface NoCommand {
    readonly kind: 'none';
    readonly modeSwitchRaw: number;
}

export type MappedCommand = DriveCommand | ArmNoOp | NoCommand;

export interface SwitchRoles {
    driveVsArm: SwitchName;
    ignoreControl: SwitchName;
}

export const DEFAULT_SWITCH_ROLES: SwitchRoles = {
    driveVsArm: 'se',
    ignoreControl: 'sf'
};

export const NO_CONTROLLER_COMMAND: DriveCommand = {
    kind: 'drive',
    controllerPresent: false,
    ignoreDriveControl: true,
    linear: 0.0,
    angular: 0.0
};

/**
 * Differential-drive mix of the two vertical stick axes.
 */
export function mixDifferential(left: number, right: number): { linear: number; angular: number } {
    return {
        linear: (left + right) / 2.0,
        angular: (right - left) / 2.0
    };
}

export function mapCommand(
    frame: ChannelFrame,
    calibration: Calibration = DEFAULT_CALIBRATION,
    roles: SwitchRoles = DEFAULT_SWITCH_ROLES
): MappedCommand {
    const modeRaw = frame.switchRaw[roles.driveVsArm];

    if (modeRaw < calibration.driveModeBelow) {
        if (!frame.controllerPresent) {
            return NO_CONTROLLER_COMMAND;
        }
        const { linear, angular } = mixDifferential(frame.sticks.leftY, frame.sticks.rightY);
        return {
            kind: 'drive',
            controllerPresent: true,
            ignoreDriveControl: frame.switchRaw[roles.ignoreControl] > calibration.switchThreshold,
            linear,
            angular
        };
    }

    if (modeRaw > calibration.armModeAbove) {
        return { kind: 'arm' };
    }

    // TODO: decide whether raw values between driveModeBelow and armModeAbove should hold the previous mode
    return { kind: 'none', modeSwitchRaw: modeRaw };
}
