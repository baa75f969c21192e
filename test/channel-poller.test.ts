import { ChannelPoller } from '../src/channel-poller';
import { TransportError } from '../src/errors';
import { FakeTransport, ManualClock, centredFrame } from './helpers';

describe('ChannelPoller', () => {
    let clock: ManualClock;
    let transport: FakeTransport;
    let poller: ChannelPoller;

    beforeEach(() => {
        clock = new ManualClock(1000);
        transport = new FakeTransport();
        poller = new ChannelPoller(transport, { connectedTimeoutMs: 300, hardDisconnectMs: 1000, now: clock.now });
    });

    test('returns the registers and resets the silence timer on success', async () => {
        clock.advance(200);
        transport.responses.push(centredFrame());
        const result = await poller.poll();
        expect(result.ok).toBe(true);
        expect(result.ok && result.value).toHaveLength(20);
        expect(poller.timeSinceLastSuccess()).toBe(0);
    });

    test('returns a failure value instead of throwing', async () => {
        transport.responses.push(new TransportError('read', 'timed out after 150ms'));
        const result = await poller.poll();
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe('Transport read failed: timed out after 150ms');
    });

    test('wraps non-transport errors', async () => {
        transport.responses.push(new Error('CRC mismatch'));
        const result = await poller.poll();
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(TransportError);
        expect(result.error.operation).toBe('read');
    });

    test('failures leave the last success time alone', async () => {
        transport.responses.push(centredFrame());
        await poller.poll();
        clock.advance(250);
        await poller.poll();
        expect(poller.timeSinceLastSuccess()).toBe(250);
    });

    test('connectivity decays from connected through stale to disconnected', async () => {
        expect(poller.connectionState()).toBe('Connected');
        clock.advance(300);
        expect(poller.isConnected()).toBe(true);
        clock.advance(1);
        expect(poller.connectionState()).toBe('Stale');
        expect(poller.isHardDisconnected()).toBe(false);
        clock.advance(699);
        expect(poller.connectionState()).toBe('Stale');
        expect(poller.isHardDisconnected()).toBe(false);
        clock.advance(1);
        expect(poller.connectionState()).toBe('Disconnected');
        expect(poller.isHardDisconnected()).toBe(true);
    });

    test('close releases the transport', async () => {
        await poller.close();
        expect(transport.closed).toBe(true);
    });
});
