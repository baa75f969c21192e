import ModbusRTU from 'modbus-serial';
import * as CONST from './constants';
import { TransportError } from './errors';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import { isFatalLinkError, toErrorMessage, withTimeout } from './utils';

/**
 * Read access to a block of holding registers. Every failure rejects with TransportError.
 */
export interface RegisterTransport {
    readRegisters(address: number, count: number): Promise<number[]>;
    close(): Promise<void>;
}

export interface ModbusTransportOptions {
    path: string;
    baudRate: number;
    unitId: number;
    timeoutMs: number;
    /** Quiet time after each exchange so the half-duplex bus can turn around. */
    turnaroundMs?: number;
    logger?: Logger;
}

/**
 * Modbus RTU transport over a serial line.
 *
 * Requests are serialized through a promise queue so only one exchange is on
 * the wire at a time. The port is opened lazily and reopened after a fatal
 * link error.
 */
export class ModbusRegisterTransport implements RegisterTransport {
    private readonly options: ModbusTransportOptions;
    private readonly logger: Logger;
    private client: ModbusRTU | null;
    private queue: Promise<unknown>;
    private closed: boolean;

    constructor(options: ModbusTransportOptions) {
        this.options = options;
        this.logger = options.logger ?? new NoopLogger();
        this.client = null;
        this.queue = Promise.resolve();
        this.closed = false;
    }

    async readRegisters(address: number, count: number): Promise<number[]> {
        return this.enqueue(async () => {
            if (this.closed) {
                throw new TransportError('read', 'transport closed');
            }
            const client = await this.acquire();
            try {
                const result = await withTimeout(client.readHoldingRegisters(address, count), this.options.timeoutMs, 'read');
                await this.turnaround();
                return result.data;
            } catch (e) {
                const fatal = isFatalLinkError(e);
                if (fatal) {
                    this.invalidate();
                }
                if (e instanceof TransportError) throw e;
                throw new TransportError('read', toErrorMessage(e), fatal);
            }
        });
    }

    async close(): Promise<void> {
        this.closed = true;
        await this.queue;
        this.invalidate();
    }

    private enqueue<T>(action: () => Promise<T>): Promise<T> {
        const resultPromise = this.queue.then(action);
        // Keep the queue moving after a failed request; the caller still sees the rejection
        this.queue = resultPromise.catch(() => undefined);
        return resultPromise;
    }

    private async acquire(): Promise<ModbusRTU> {
        if (this.client && this.client.isOpen) {
            return this.client;
        }

        const client = new ModbusRTU();
        // Port errors arrive as events, not as rejected reads
        client.on('error', (error: unknown) => {
            this.logger.debug('Serial link error.', { path: this.options.path, error: toErrorMessage(error) });
            this.invalidate(client);
        });
        client.on('close', () => {
            this.invalidate(client);
        });
        try {
            await withTimeout(
                client.connectRTUBuffered(this.options.path, { baudRate: this.options.baudRate }),
                this.options.timeoutMs * 10,
                'connect'
            );
            client.setID(this.options.unitId);
            client.setTimeout(this.options.timeoutMs);
        } catch (e) {
            throw new TransportError('connect', `${this.options.path}: ${toErrorMessage(e)}`, true);
        }

        this.logger.info('Serial link opened.', { path: this.options.path, baudRate: this.options.baudRate });
        this.client = client;
        return client;
    }

    private async turnaround(): Promise<void> {
        const delay = this.options.turnaroundMs ?? CONST.DEFAULT_TURNAROUND_DELAY;
        if (delay > 0) {
            await new Promise(r => setTimeout(r, delay));
        }
    }

    private invalidate(client: ModbusRTU | null = this.client): void {
        if (this.client === client) {
            this.client = null;
        }
        if (client && client.isOpen) {
            client.close(() => {
                this.logger.debug('Serial link closed.', { path: this.options.path });
            });
        }
    }
}
