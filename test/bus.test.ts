import { EventEmitter } from 'node:events';
import type { MqttClient } from 'mqtt';
import { MqttMessageBus } from '../src/bus';
import type { Logger } from '../src/logger';

class FakeClient extends EventEmitter {
    publish = jest.fn((_topic: string, _payload: string, _opts: object, cb?: (error?: Error) => void) => cb?.());
    subscribe = jest.fn((_topic: string, _opts: object, cb?: (error: Error | null) => void) => cb?.(null));
    endAsync = jest.fn().mockResolvedValue(undefined);
}

function spyLogger(): Logger & { warn: jest.Mock; error: jest.Mock } {
    return { error: jest.fn(), warn: jest.fn(), info: jest.fn(), debug: jest.fn(), trace: jest.fn() };
}

describe('MqttMessageBus', () => {
    let client: FakeClient;
    let logger: ReturnType<typeof spyLogger>;
    let bus: MqttMessageBus;

    beforeEach(() => {
        client = new FakeClient();
        logger = spyLogger();
        bus = new MqttMessageBus(client as unknown as MqttClient, logger);
    });

    test('publishes JSON at QoS 0', () => {
        bus.publish('rover_status/battery_status', { batteryVoltage: 24.5 });
        expect(client.publish).toHaveBeenCalledWith(
            'rover_status/battery_status',
            '{"batteryVoltage":24.5}',
            { qos: 0 },
            expect.any(Function)
        );
    });

    test('logs a failed publish', () => {
        client.publish.mockImplementationOnce((_t: string, _p: string, _o: object, cb?: (error?: Error) => void) => cb?.(new Error('not connected')));
        bus.publish('a/b', {});
        expect(logger.warn).toHaveBeenCalledWith('Publish failed.', { topic: 'a/b', error: 'not connected' });
    });

    test('subscribes to the broker once per topic and fans out to every handler', () => {
        const first = jest.fn();
        const second = jest.fn();
        bus.subscribe('rover_status/update_requested', first);
        bus.subscribe('rover_status/update_requested', second);

        client.emit('message', 'rover_status/update_requested', Buffer.from('{}'));

        expect(client.subscribe).toHaveBeenCalledTimes(1);
        expect(first).toHaveBeenCalledWith({}, 'rover_status/update_requested');
        expect(second).toHaveBeenCalledWith({}, 'rover_status/update_requested');
    });

    test('ignores topics nobody subscribed to', () => {
        const handler = jest.fn();
        bus.subscribe('x/y', handler);
        client.emit('message', 'x/z', Buffer.from('{}'));
        expect(handler).not.toHaveBeenCalled();
    });

    test('passes a payload that is not JSON on as text', () => {
        const handler = jest.fn();
        bus.subscribe('rover_odometry/gps/sentence', handler);
        client.emit('message', 'rover_odometry/gps/sentence', Buffer.from('$GPVTG,,T,,M,0.0,N,0.0,K,N*2C'));
        expect(handler).toHaveBeenCalledWith('$GPVTG,,T,,M,0.0,N,0.0,K,N*2C', 'rover_odometry/gps/sentence');
        expect(logger.warn).not.toHaveBeenCalled();
    });

    test('a throwing handler does not stop the others', () => {
        const after = jest.fn();
        bus.subscribe('t', () => {
            throw new Error('handler bug');
        });
        bus.subscribe('t', after);
        client.emit('message', 't', Buffer.from('"hello"'));
        expect(after).toHaveBeenCalledWith('hello', 't');
        expect(logger.error).toHaveBeenCalledWith('Message handler failed.', { topic: 't', error: 'handler bug' });
    });

    test('close ends the client and forgets handlers', async () => {
        const handler = jest.fn();
        bus.subscribe('t', handler);
        await bus.close();
        client.emit('message', 't', Buffer.from('{}'));
        expect(client.endAsync).toHaveBeenCalledTimes(1);
        expect(handler).not.toHaveBeenCalled();
    });
});
