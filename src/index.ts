#!/usr/bin/env node
import { connectMqttBus } from './bus';
import { ChannelPoller } from './channel-poller';
import { CliCommand, NodeKind, USAGE, parseCliArgs } from './cli-args';
import { AppConfig, loadConfig } from './config';
import * as CONST from './constants';
import { IrisNode } from './iris-node';
import { ConsoleLogger } from './logger';
import { ModbusRegisterTransport } from './modbus-transport';
import { StatusAggregator } from './status-aggregator';
import { StatusNode } from './status-node';
import { HostMetricsProvider } from './system-metrics';
import { toErrorMessage } from './utils';

interface RunningNode {
    shutdown(): Promise<void>;
}

function clientId(node: NodeKind): string {
    return `rover-${node}-${process.pid}`;
}

function startIris(config: AppConfig, root: ConsoleLogger): RunningNode {
    const logger = root.child('iris');
    const iris = config.iris;
    const transport = new ModbusRegisterTransport({
        path: iris.serialPort,
        baudRate: iris.baudRate,
        unitId: iris.unitId,
        timeoutMs: iris.transportTimeoutMs,
        turnaroundMs: iris.turnaroundMs,
        logger: logger.child('modbus')
    });
    const poller = new ChannelPoller(transport, {
        address: CONST.REGISTER_START,
        count: CONST.REGISTER_COUNT,
        connectedTimeoutMs: iris.connectedTimeoutMs,
        hardDisconnectMs: iris.hardDisconnectMs,
        logger
    });
    const node = new IrisNode({
        poller,
        bus: connectMqttBus(config.brokerUrl, clientId('iris'), logger.child('bus')),
        config: iris,
        logger,
        onHardDisconnect: error => {
            logger.error('Receiver link lost; exiting.', { error: error.message });
            process.exit(1);
        }
    });
    node.start();
    return node;
}

async function startStatus(config: AppConfig, root: ConsoleLogger): Promise<RunningNode> {
    const logger = root.child('status');
    const status = config.status;
    const aggregator = new StatusAggregator({
        metrics: new HostMetricsProvider({
            emmcMount: status.emmcMount,
            nvmeMount: status.nvmeMount,
            sensorsCommand: status.sensorsCommand,
            gpuTempLine: status.gpuTempLine,
            logger: logger.child('metrics')
        }),
        cameraPaths: status.cameraPaths,
        logger
    });
    const node = new StatusNode({
        bus: connectMqttBus(config.brokerUrl, clientId('status'), logger.child('bus')),
        aggregator,
        config: status,
        logger
    });
    await node.start();
    return node;
}

async function run(command: Extract<CliCommand, { kind: 'run' }>): Promise<void> {
    const config = await loadConfig(command.configPath);
    const logger = new ConsoleLogger('rover', config.logLevel);
    const node = command.node === 'iris' ? startIris(config, logger) : await startStatus(config, logger);

    let stopping = false;
    const stop = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        logger.info('Shutting down.', { signal });
        node.shutdown().then(
            () => process.exit(0),
            (e: unknown) => {
                logger.error('Shutdown failed.', { error: toErrorMessage(e) });
                process.exit(1);
            }
        );
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
}

const command = parseCliArgs(process.argv.slice(2));
if (command.kind === 'help') {
    console.log(USAGE);
} else if (command.kind === 'invalid') {
    console.error(`${command.reason}\n\n${USAGE}`);
    process.exitCode = 2;
} else {
    run(command).catch((e: unknown) => {
        console.error(`rover-telemetry: ${toErrorMessage(e)}`);
        process.exit(1);
    });
}
