import fs from 'fs-extra';
import * as CONST from './constants';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import { parseSentence } from './nmea';
import {
    CameraStatus,
    GpsStatus,
    MiscStatus,
    StatusCategory,
    StatusRecords,
    WheelStatus,
    initialStatusRecords
} from './status-records';
import type { SystemMetricsProvider } from './system-metrics';
import { toErrorMessage } from './utils';

export type DriveSide = 'left' | 'right' | 'rear';

/**
 * Messages from upstream subscriptions. Each one feeds exactly one category.
 */
export type InboundUpdate =
    | { kind: 'irisStatus'; voltage24v: number }
    | { kind: 'driveStatus'; side: DriveSide; firstMotorConnected: boolean; secondMotorConnected: boolean }
    | { kind: 'driveCommand'; controllerPresent: boolean }
    | { kind: 'gpsSentence'; sentence: string };

export interface MiscStatusSource {
    read(): Promise<MiscStatus>;
}

/** Subsystem probes are not wired yet; every subsystem reads as disconnected. */
export const DISCONNECTED_MISC_SOURCE: MiscStatusSource = {
    read: async () => ({ arm: false, armEndEffector: false, chassisPanTilt: false, sampleContainment: false, tower: false })
};

export type CameraPaths = Record<keyof CameraStatus, string>;

export interface StatusAggregatorOptions {
    metrics: SystemMetricsProvider;
    cameraPaths?: CameraPaths;
    misc?: MiscStatusSource;
    pathExists?: (path: string) => Promise<boolean>;
    logger?: Logger;
}

const WHEEL_PAIRS: Record<DriveSide, [keyof WheelStatus, keyof WheelStatus]> = {
    left: ['frontLeft', 'middleLeft'],
    right: ['frontRight', 'middleRight'],
    rear: ['rearLeft', 'rearRight']
};

/**
 * Holds the current status record of every category.
 *
 * Polled sources are pulled by refreshAll(); subscription payloads are queued
 * with enqueue() and merged by drainInbox(). Every write replaces the whole
 * record of one category, and a write carries a sequence number so a refresh
 * that started before a newer write cannot clobber it.
 */
export class StatusAggregator {
    private readonly metrics: SystemMetricsProvider;
    private readonly cameraPaths: CameraPaths;
    private readonly misc: MiscStatusSource;
    private readonly pathExists: (path: string) => Promise<boolean>;
    private readonly logger: Logger;
    private readonly records: StatusRecords;
    private readonly writtenAt: Map<StatusCategory, number>;
    private inbox: InboundUpdate[];
    private sequence: number;

    constructor(options: StatusAggregatorOptions) {
        this.metrics = options.metrics;
        this.cameraPaths = options.cameraPaths ?? { ...CONST.DEFAULT_CAMERA_PATHS };
        this.misc = options.misc ?? DISCONNECTED_MISC_SOURCE;
        this.pathExists = options.pathExists ?? (path => fs.pathExists(path));
        this.logger = options.logger ?? new NoopLogger();
        this.records = initialStatusRecords();
        this.writtenAt = new Map();
        this.inbox = [];
        this.sequence = 0;
    }

    get<K extends StatusCategory>(category: K): StatusRecords[K] {
        return this.records[category];
    }

    /**
     * Queue an upstream update; it takes effect at the next drainInbox().
     */
    enqueue(update: InboundUpdate): void {
        this.inbox.push(update);
    }

    pendingUpdates(): number {
        return this.inbox.length;
    }

    /**
     * Apply queued updates in arrival order. Returns how many were applied.
     */
    drainInbox(): number {
        const pending = this.inbox;
        this.inbox = [];
        for (const update of pending) {
            this.apply(update);
        }
        return pending.length;
    }

    apply(update: InboundUpdate): void {
        switch (update.kind) {
            case 'irisStatus':
                this.write('battery', { batteryVoltage: update.voltage24v });
                break;
            case 'driveStatus': {
                const [first, second] = WHEEL_PAIRS[update.side];
                this.write('wheel', {
                    ...this.records.wheel,
                    [first]: update.firstMotorConnected,
                    [second]: update.secondMotorConnected
                });
                break;
            }
            case 'driveCommand':
                this.write('controller', { controllerConnected: update.controllerPresent });
                break;
            case 'gpsSentence':
                this.write('gps', this.mergeGpsSentence(update.sentence));
                break;
        }
    }

    /**
     * Pull every polled source and store the results, changed or not.
     */
    async refreshAll(): Promise<void> {
        const startedAt = this.sequence;
        const [camera, jetson, misc] = await Promise.all([
            this.readCameras(),
            this.metrics.read(),
            this.misc.read()
        ]);
        this.writeIfNotNewer('camera', camera, startedAt);
        this.writeIfNotNewer('jetson', jetson, startedAt);
        this.writeIfNotNewer('misc', misc, startedAt);
    }

    private mergeGpsSentence(sentence: string): GpsStatus {
        // Any sentence at all means the receiver is talking
        const current: GpsStatus = { ...this.records.gps, connected: true };
        const parsed = parseSentence(sentence);
        if (!parsed.ok) {
            this.logger.debug('Ignoring GPS sentence.', { error: parsed.error.message });
            return current;
        }

        const nmea = parsed.value;
        if (nmea.type === 'GGA') {
            return {
                ...current,
                fix: nmea.fix,
                numSatellites: nmea.numSatellites ?? current.numSatellites,
                horizontalDilution: nmea.horizontalDilution ?? current.horizontalDilution
            };
        }
        if (nmea.type === 'VTG') {
            return {
                ...current,
                kmph: nmea.kmph ?? current.kmph,
                heading: nmea.trueTrack ?? CONST.HEADING_UNAVAILABLE
            };
        }
        return current;
    }

    private async readCameras(): Promise<CameraStatus> {
        const check = async (path: string): Promise<boolean> => {
            try {
                return await this.pathExists(path);
            } catch (e) {
                this.logger.debug('Presence check failed.', { path, error: toErrorMessage(e) });
                return false;
            }
        };
        const [zed, undercarriage, chassis, mainNavigation] = await Promise.all([
            check(this.cameraPaths.zed),
            check(this.cameraPaths.undercarriage),
            check(this.cameraPaths.chassis),
            check(this.cameraPaths.mainNavigation)
        ]);
        return { zed, undercarriage, chassis, mainNavigation };
    }

    private write<K extends StatusCategory>(category: K, value: StatusRecords[K]): void {
        this.sequence++;
        this.records[category] = value;
        this.writtenAt.set(category, this.sequence);
    }

    private writeIfNotNewer<K extends StatusCategory>(category: K, value: StatusRecords[K], startedAt: number): void {
        const lastWrite = this.writtenAt.get(category) ?? 0;
        if (lastWrite > startedAt) {
            this.logger.trace('Dropping refresh older than the stored value.', { category });
            return;
        }
        this.write(category, value);
    }
}
