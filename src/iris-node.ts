import type { MessageBus } from './bus';
import { ChangeGate } from './change-gate';
import type { ChannelPoller } from './channel-poller';
import { DEFAULT_SWITCH_ROLES, MappedCommand, SwitchRoles, mapCommand } from './command-mapper';
import type { IrisConfig } from './config';
import { HardDisconnectError } from './errors';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import { toDriveCommandMessage, toIrisStatusMessage } from './messages';
import { decode } from './register-decoder';
import { TickScheduler } from './scheduler';
import { INITIAL_IRIS_STATUS, IrisStatus } from './status-records';
import { toErrorMessage } from './utils';

export type IrisTickStage = 'idle' | 'polling' | 'decoding' | 'mapping' | 'publishing';

export interface IrisTickResult {
    /** Null when no frame was decoded this tick. */
    command: MappedCommand | null;
    statusPublished: boolean;
}

export interface IrisNodeOptions {
    poller: ChannelPoller;
    bus: MessageBus;
    config: Pick<IrisConfig, 'hertz' | 'calibration' | 'topics'> & Partial<Pick<IrisConfig, 'switchRoles'>>;
    /** Runs after the node has shut itself down on a hard disconnect. */
    onHardDisconnect?: (error: HardDisconnectError) => void;
    logger?: Logger;
    now?: () => number;
}

interface IrisCategories {
    iris: IrisStatus;
}

/**
 * Bridge between the transceiver and the bus: each tick polls the register
 * block, decodes it, publishes the drive command for the selected mode and
 * republishes the channel health record when it changed.
 */
export class IrisNode {
    private readonly poller: ChannelPoller;
    private readonly bus: MessageBus;
    private readonly config: IrisNodeOptions['config'];
    private readonly switchRoles: SwitchRoles;
    private readonly onHardDisconnect?: (error: HardDisconnectError) => void;
    private readonly logger: Logger;
    private readonly now: () => number;
    private readonly gate: ChangeGate<IrisCategories>;
    private readonly scheduler: TickScheduler;
    private currentStage: IrisTickStage;
    private lastVoltage: number;
    private shutdownPromise: Promise<void> | null;

    constructor(options: IrisNodeOptions) {
        this.poller = options.poller;
        this.bus = options.bus;
        this.config = options.config;
        this.switchRoles = options.config.switchRoles ?? DEFAULT_SWITCH_ROLES;
        this.onHardDisconnect = options.onHardDisconnect;
        this.logger = options.logger ?? new NoopLogger();
        this.now = options.now ?? Date.now;
        this.gate = new ChangeGate<IrisCategories>();
        this.gate.seed('iris', INITIAL_IRIS_STATUS, this.now());
        this.currentStage = 'idle';
        this.lastVoltage = INITIAL_IRIS_STATUS.voltage24v;
        this.shutdownPromise = null;
        this.scheduler = new TickScheduler({
            hertz: this.config.hertz,
            tick: async () => {
                await this.runTick();
            },
            onFatal: error => {
                void this.handleHardDisconnect(error);
            },
            logger: this.logger
        });
    }

    get stage(): IrisTickStage {
        return this.currentStage;
    }

    start(): void {
        this.logger.info('Iris node started.', { hertz: this.config.hertz });
        this.scheduler.start();
    }

    async runTick(): Promise<IrisTickResult> {
        let result: IrisTickResult;
        try {
            result = await this.runStages();
        } catch (e) {
            this.logger.debug('Tick stopped mid-stage.', { stage: this.currentStage });
            this.currentStage = 'idle';
            // A hard disconnect outranks whatever aborted the tick
            this.assertNotHardDisconnected();
            throw e;
        }
        this.currentStage = 'idle';
        this.assertNotHardDisconnected();
        return result;
    }

    /**
     * Stop ticking and release the serial link and the bus. Safe to call more than once.
     */
    shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.closeAll();
        }
        return this.shutdownPromise;
    }

    private async runStages(): Promise<IrisTickResult> {
        this.currentStage = 'polling';
        const polled = await this.poller.poll();
        if (!polled.ok) {
            this.currentStage = 'publishing';
            const statusPublished = this.publishStatus({ irisConnected: this.poller.isConnected(), voltage24v: this.lastVoltage });
            return { command: null, statusPublished };
        }

        this.currentStage = 'decoding';
        const decoded = decode(polled.value, this.config.calibration);
        if (!decoded.ok) {
            this.logger.debug('Dropping undecodable frame.', { kind: decoded.error.kind, error: decoded.error.message });
            return { command: null, statusPublished: false };
        }
        const frame = decoded.value;

        this.currentStage = 'mapping';
        const command = mapCommand(frame, this.config.calibration, this.switchRoles);

        this.currentStage = 'publishing';
        if (command.kind === 'drive') {
            this.bus.publish(this.config.topics.driveCommand, toDriveCommandMessage(command));
        } else if (command.kind === 'arm') {
            this.logger.trace('Arm mode selected; no arm command is published.');
        }

        this.lastVoltage = frame.rails.v24;
        const statusPublished = this.publishStatus({ irisConnected: true, voltage24v: frame.rails.v24 });
        return { command, statusPublished };
    }

    private publishStatus(status: IrisStatus): boolean {
        return this.gate.publishIfNeeded('iris', status, false, this.now(), value => {
            this.bus.publish(this.config.topics.irisStatus, toIrisStatusMessage(value));
        });
    }

    private assertNotHardDisconnected(): void {
        if (this.poller.isHardDisconnected()) {
            throw new HardDisconnectError(this.poller.timeSinceLastSuccess(), this.poller.hardDisconnectTimeout);
        }
    }

    private async handleHardDisconnect(error: HardDisconnectError): Promise<void> {
        try {
            await this.shutdown();
        } catch (e) {
            this.logger.error('Shutdown after hard disconnect failed.', { error: toErrorMessage(e) });
        }
        this.onHardDisconnect?.(error);
    }

    private async closeAll(): Promise<void> {
        await this.scheduler.stop();
        const results = await Promise.allSettled([this.poller.close(), this.bus.close()]);
        for (const result of results) {
            if (result.status === 'rejected') {
                this.logger.warn('Resource failed to close cleanly.', { error: toErrorMessage(result.reason) });
            }
        }
        this.logger.info('Iris node stopped.');
    }
}
