import { HardDisconnectError } from './errors';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import { toErrorMessage } from './utils';

export type SchedulerState = 'idle' | 'running' | 'stopped';

export interface TickSchedulerOptions {
    hertz: number;
    tick: () => Promise<void>;
    /** Called once when a tick raises HardDisconnectError; the scheduler is already stopped. */
    onFatal?: (error: HardDisconnectError) => void;
    logger?: Logger;
    now?: () => number;
}

/**
 * Fixed-rate tick driver. A tick always runs to completion before the next
 * one is considered; a tick that overruns its period pushes the next one back
 * rather than overlapping it.
 */
export class TickScheduler {
    private readonly periodMs: number;
    private readonly tick: () => Promise<void>;
    private readonly onFatal?: (error: HardDisconnectError) => void;
    private readonly logger: Logger;
    private readonly now: () => number;
    private timer: NodeJS.Timeout | null;
    private inFlight: Promise<void> | null;
    private currentState: SchedulerState;
    private completedTicks: number;
    private abortedTicks: number;

    constructor(options: TickSchedulerOptions) {
        if (!Number.isFinite(options.hertz) || options.hertz <= 0) {
            throw new RangeError(`Tick rate must be positive, got ${options.hertz}`);
        }
        this.periodMs = 1000 / options.hertz;
        this.tick = options.tick;
        this.onFatal = options.onFatal;
        this.logger = options.logger ?? new NoopLogger();
        this.now = options.now ?? Date.now;
        this.timer = null;
        this.inFlight = null;
        this.currentState = 'idle';
        this.completedTicks = 0;
        this.abortedTicks = 0;
    }

    get state(): SchedulerState {
        return this.currentState;
    }

    get stats(): { completed: number; aborted: number } {
        return { completed: this.completedTicks, aborted: this.abortedTicks };
    }

    start(): void {
        if (this.currentState !== 'idle') return;
        this.currentState = 'running';
        this.schedule(this.periodMs);
    }

    async stop(): Promise<void> {
        this.currentState = 'stopped';
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    /**
     * Run one tick now unless one is already in progress.
     */
    async runOnce(): Promise<void> {
        if (this.currentState === 'stopped' || this.inFlight) return;
        const startedAt = this.now();
        this.inFlight = this.execute();
        try {
            await this.inFlight;
        } finally {
            this.inFlight = null;
        }
        if (this.currentState === 'running') {
            const elapsed = this.now() - startedAt;
            this.schedule(Math.max(0, this.periodMs - elapsed));
        }
    }

    private schedule(delayMs: number): void {
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.runOnce();
        }, delayMs);
    }

    private async execute(): Promise<void> {
        try {
            await this.tick();
            this.completedTicks++;
        } catch (e) {
            if (e instanceof HardDisconnectError) {
                this.currentState = 'stopped';
                if (this.timer) {
                    clearTimeout(this.timer);
                    this.timer = null;
                }
                this.logger.error('Hard disconnect; stopping.', {
                    silentForMs: e.silentForMs,
                    timeoutMs: e.timeoutMs
                });
                this.onFatal?.(e);
                return;
            }
            this.abortedTicks++;
            this.logger.error('Tick aborted.', { error: toErrorMessage(e) });
        }
    }
}
