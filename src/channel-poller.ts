import * as CONST from './constants';
import { TransportError } from './errors';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import type { RegisterTransport } from './modbus-transport';
import { Result, err, ok, toErrorMessage } from './utils';

export type ConnectionState = 'Connected' | 'Stale' | 'Disconnected';

export interface ChannelPollerOptions {
    address?: number;
    count?: number;
    connectedTimeoutMs?: number;
    hardDisconnectMs?: number;
    now?: () => number;
    logger?: Logger;
}

/**
 * Owns the register transport for one channel and tracks when it last answered.
 *
 * A failed read is "no data this tick": it is logged once and returned as a
 * value, and the last-success time is left alone so connectivity decays.
 */
export class ChannelPoller {
    private readonly transport: RegisterTransport;
    private readonly address: number;
    private readonly count: number;
    private readonly connectedTimeoutMs: number;
    private readonly hardDisconnectMs: number;
    private readonly now: () => number;
    private readonly logger: Logger;
    private lastSuccessTime: number;
    private consecutiveFailures: number;

    constructor(transport: RegisterTransport, options: ChannelPollerOptions = {}) {
        this.transport = transport;
        this.address = options.address ?? CONST.REGISTER_START;
        this.count = options.count ?? CONST.REGISTER_COUNT;
        this.connectedTimeoutMs = options.connectedTimeoutMs ?? CONST.DEFAULT_CONNECTED_TIMEOUT;
        this.hardDisconnectMs = options.hardDisconnectMs ?? CONST.DEFAULT_HARD_DISCONNECT;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? new NoopLogger();
        // Startup counts as a sighting so the channel gets one full timeout to answer
        this.lastSuccessTime = this.now();
        this.consecutiveFailures = 0;
    }

    async poll(): Promise<Result<number[], TransportError>> {
        try {
            const registers = await this.transport.readRegisters(this.address, this.count);
            if (this.consecutiveFailures > 0) {
                this.logger.info('Register reads recovered.', { failures: this.consecutiveFailures });
            }
            this.consecutiveFailures = 0;
            this.lastSuccessTime = this.now();
            return ok(registers);
        } catch (e) {
            const error = e instanceof TransportError ? e : new TransportError('read', toErrorMessage(e));
            const wasConnected = this.consecutiveFailures === 0;
            this.consecutiveFailures++;
            this.logger.debug('Register read failed.', {
                operation: error.operation,
                error: error.message,
                failures: this.consecutiveFailures,
                sinceLastSuccessMs: this.timeSinceLastSuccess()
            });
            if (wasConnected) {
                this.logger.warn('Channel stopped answering.', { error: error.message });
            }
            return err(error);
        }
    }

    timeSinceLastSuccess(): number {
        return this.now() - this.lastSuccessTime;
    }

    connectionState(): ConnectionState {
        const since = this.timeSinceLastSuccess();
        if (since <= this.connectedTimeoutMs) return 'Connected';
        if (since <= this.hardDisconnectMs) return 'Stale';
        return 'Disconnected';
    }

    isConnected(): boolean {
        return this.connectionState() === 'Connected';
    }

    isHardDisconnected(): boolean {
        return this.timeSinceLastSuccess() > this.hardDisconnectMs;
    }

    get hardDisconnectTimeout(): number {
        return this.hardDisconnectMs;
    }

    async close(): Promise<void> {
        await this.transport.close();
    }
}
