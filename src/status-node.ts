import type { MessageBus } from './bus';
import { ChangeGate } from './change-gate';
import type { StatusConfig } from './config';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import {
    parseDriveCommandMessage,
    parseDriveStatusMessage,
    parseGpsSentenceMessage,
    parseIrisStatusMessage
} from './messages';
import { TickScheduler } from './scheduler';
import type { InboundUpdate, StatusAggregator } from './status-aggregator';
import { STATUS_CATEGORIES, StatusCategory, StatusRecords } from './status-records';
import { toErrorMessage } from './utils';

export interface StatusNodeOptions {
    bus: MessageBus;
    aggregator: StatusAggregator;
    config: Pick<StatusConfig, 'hertz' | 'rateCeilings' | 'publishTopics' | 'subscribeTopics'>;
    logger?: Logger;
    now?: () => number;
}

/**
 * Republishes the rover's status records, one topic per category, only when
 * a record changed or a refresh was requested. Battery and Jetson records are
 * additionally held to their rate ceilings.
 */
export class StatusNode {
    private readonly bus: MessageBus;
    private readonly aggregator: StatusAggregator;
    private readonly config: StatusNodeOptions['config'];
    private readonly logger: Logger;
    private readonly now: () => number;
    private readonly gate: ChangeGate<StatusRecords>;
    private readonly scheduler: TickScheduler;
    private manualRefreshRequested: boolean;
    private initialized: boolean;
    private shutdownPromise: Promise<void> | null;

    constructor(options: StatusNodeOptions) {
        this.bus = options.bus;
        this.aggregator = options.aggregator;
        this.config = options.config;
        this.logger = options.logger ?? new NoopLogger();
        this.now = options.now ?? Date.now;
        this.gate = new ChangeGate<StatusRecords>({
            battery: this.config.rateCeilings.battery,
            jetson: this.config.rateCeilings.jetson
        });
        this.manualRefreshRequested = false;
        this.initialized = false;
        this.shutdownPromise = null;
        this.scheduler = new TickScheduler({
            hertz: this.config.hertz,
            tick: async () => {
                await this.runTick();
            },
            logger: this.logger
        });
    }

    /**
     * Take the first reading of every source, use it as the published
     * baseline, then start listening upstream.
     */
    async init(): Promise<void> {
        if (this.initialized) return;
        await this.aggregator.refreshAll();
        const now = this.now();
        for (const category of STATUS_CATEGORIES) {
            this.gate.seed(category, this.aggregator.get(category), now);
        }
        this.subscribeUpstream();
        this.initialized = true;
    }

    async start(): Promise<void> {
        await this.init();
        this.logger.info('Status node started.', { hertz: this.config.hertz });
        this.scheduler.start();
    }

    requestRefresh(): void {
        this.manualRefreshRequested = true;
    }

    get refreshPending(): boolean {
        return this.manualRefreshRequested;
    }

    /**
     * One pass: merge upstream updates, pull polled sources, publish what changed.
     * Returns the categories published this tick.
     */
    async runTick(): Promise<StatusCategory[]> {
        const applied = this.aggregator.drainInbox();
        if (applied > 0) {
            this.logger.trace('Merged upstream updates.', { applied });
        }
        await this.aggregator.refreshAll();

        const manual = this.manualRefreshRequested;
        const now = this.now();
        const published: StatusCategory[] = [];
        for (const category of STATUS_CATEGORIES) {
            const sent = this.gate.publishIfNeeded(category, this.aggregator.get(category), manual, now, value => {
                this.bus.publish(this.config.publishTopics[category], value);
            });
            if (sent) published.push(category);
        }
        if (manual) {
            this.manualRefreshRequested = false;
            this.logger.debug('Manual refresh served.', { published });
        }
        return published;
    }

    shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.closeAll();
        }
        return this.shutdownPromise;
    }

    private subscribeUpstream(): void {
        const topics = this.config.subscribeTopics;
        this.bus.subscribe(topics.requestUpdate, () => this.requestRefresh());
        this.listen(topics.irisStatus, parseIrisStatusMessage);
        this.listen(topics.driveStatusLeft, payload => parseDriveStatusMessage('left', payload));
        this.listen(topics.driveStatusRight, payload => parseDriveStatusMessage('right', payload));
        this.listen(topics.driveStatusRear, payload => parseDriveStatusMessage('rear', payload));
        this.listen(topics.gpsSentence, parseGpsSentenceMessage);
        this.listen(topics.driveCommand, parseDriveCommandMessage);
    }

    private listen(topic: string, parse: (payload: unknown) => InboundUpdate | null): void {
        this.bus.subscribe(topic, payload => {
            const update = parse(payload);
            if (!update) {
                this.logger.debug('Ignoring malformed upstream message.', { topic });
                return;
            }
            this.aggregator.enqueue(update);
        });
    }

    private async closeAll(): Promise<void> {
        await this.scheduler.stop();
        try {
            await this.bus.close();
        } catch (e) {
            this.logger.warn('Bus failed to close cleanly.', { error: toErrorMessage(e) });
        }
        this.logger.info('Status node stopped.');
    }
}
