import type { MessageBus, MessageHandler } from '../src/bus';
import { TransportError } from '../src/errors';
import type { RegisterTransport } from '../src/modbus-transport';
import { DEFAULT_CALIBRATION } from '../src/register-decoder';

export interface Published {
    topic: string;
    payload: object;
}

/**
 * In-process bus: records publishes and lets a test deliver messages to subscribers.
 */
export class FakeBus implements MessageBus {
    readonly published: Published[] = [];
    readonly handlers = new Map<string, MessageHandler[]>();
    closed = false;

    publish(topic: string, payload: object): void {
        this.published.push({ topic, payload });
    }

    subscribe(topic: string, handler: MessageHandler): void {
        const list = this.handlers.get(topic) ?? [];
        list.push(handler);
        this.handlers.set(topic, list);
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    deliver(topic: string, payload: unknown): void {
        for (const handler of this.handlers.get(topic) ?? []) {
            handler(payload, topic);
        }
    }

    on(topic: string): object[] {
        return this.published.filter(p => p.topic === topic).map(p => p.payload);
    }
}

/**
 * Transport that answers from a script: a frame, or an error to throw.
 */
export class FakeTransport implements RegisterTransport {
    readonly responses: (number[] | Error)[] = [];
    fallback: number[] | Error = new TransportError('read', 'no response');
    reads = 0;
    closed = false;

    async readRegisters(_address: number, _count: number): Promise<number[]> {
        this.reads++;
        const next = this.responses.shift() ?? this.fallback;
        if (next instanceof Error) throw next;
        return next;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

export class ManualClock {
    constructor(public time = 0) {}

    now = (): number => this.time;

    advance(ms: number): void {
        this.time += ms;
    }
}

/** A full register block with every stick centred, every switch low and rails at zero. */
export function centredFrame(overrides: Record<number, number> = {}): number[] {
    const frame = new Array<number>(20).fill(DEFAULT_CALIBRATION.mid);
    for (let i = 8; i < 16; i++) frame[i] = DEFAULT_CALIBRATION.min;
    for (let i = 16; i < 20; i++) frame[i] = 0;
    for (const [index, value] of Object.entries(overrides)) {
        frame[Number(index)] = value;
    }
    return frame;
}
