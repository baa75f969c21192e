import { connect } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import { toErrorMessage } from './utils';

export type MessageHandler = (payload: unknown, topic: string) => void;

/**
 * Topic-based publish/subscribe transport between nodes.
 * Payloads are published as JSON. Inbound payloads that are not JSON reach
 * handlers as their UTF-8 text. Delivery order across topics is not guaranteed.
 */
export interface MessageBus {
    publish(topic: string, payload: object): void;
    subscribe(topic: string, handler: MessageHandler): void;
    close(): Promise<void>;
}

/**
 * MessageBus over an MQTT broker, QoS 0, JSON payloads.
 */
export class MqttMessageBus implements MessageBus {
    private readonly client: MqttClient;
    private readonly logger: Logger;
    private readonly handlers: Map<string, MessageHandler[]>;

    constructor(client: MqttClient, logger: Logger = new NoopLogger()) {
        this.client = client;
        this.logger = logger;
        this.handlers = new Map();

        this.client.on('message', (topic: string, payload: Buffer) => {
            this.dispatch(topic, payload);
        });
        this.client.on('error', (error: Error) => {
            this.logger.warn('Broker connection error.', { error: error.message });
        });
    }

    publish(topic: string, payload: object): void {
        this.client.publish(topic, JSON.stringify(payload), { qos: 0 }, (error?: Error) => {
            if (error) {
                this.logger.warn('Publish failed.', { topic, error: error.message });
            }
        });
    }

    subscribe(topic: string, handler: MessageHandler): void {
        const existing = this.handlers.get(topic);
        if (existing) {
            existing.push(handler);
            return;
        }
        this.handlers.set(topic, [handler]);
        this.client.subscribe(topic, { qos: 0 }, (error: Error | null) => {
            if (error) {
                this.logger.error('Subscribe failed.', { topic, error: error.message });
            }
        });
    }

    async close(): Promise<void> {
        this.handlers.clear();
        await this.client.endAsync();
    }

    private dispatch(topic: string, payload: Buffer): void {
        const handlers = this.handlers.get(topic);
        if (!handlers) return;

        const text = payload.toString('utf8');
        let message: unknown;
        try {
            message = JSON.parse(text);
        } catch (e) {
            this.logger.trace('Payload is not JSON; passing it on as text.', { topic, error: toErrorMessage(e) });
            message = text;
        }

        for (const handler of handlers) {
            try {
                handler(message, topic);
            } catch (e) {
                this.logger.error('Message handler failed.', { topic, error: toErrorMessage(e) });
            }
        }
    }
}

export function connectMqttBus(brokerUrl: string, clientId: string, logger: Logger = new NoopLogger()): MqttMessageBus {
    const options: IClientOptions = {
        clientId,
        clean: true,
        reconnectPeriod: 1000
    };
    const client = connect(brokerUrl, options);
    client.on('connect', () => {
        logger.info('Connected to broker.', { brokerUrl, clientId });
    });
    return new MqttMessageBus(client, logger);
}
