import { execFile } from 'node:child_process';
import { statfs } from 'node:fs/promises';
import os from 'node:os';
import * as CONST from './constants';
import type { Logger } from './logger';
import { NoopLogger } from './logger';
import type { JetsonStatus } from './status-records';
import { roundTo, toErrorMessage } from './utils';

/**
 * Source of onboard computer load figures for the Jetson status record.
 */
export interface SystemMetricsProvider {
    read(): Promise<JetsonStatus>;
}

export interface CpuTimes {
    idle: number;
    total: number;
}

export interface FsUsage {
    bsize: number;
    blocks: number;
    bfree: number;
    bavail: number;
}

export interface HostMetricsDeps {
    cpuTimes(): CpuTimes;
    memory(): { total: number; free: number };
    statfs(path: string): Promise<FsUsage>;
    runSensors(command: string): Promise<string>;
}

export interface HostMetricsOptions {
    emmcMount?: string;
    nvmeMount?: string;
    sensorsCommand?: string;
    /** Which `temp` line of the sensors output belongs to the GPU. */
    gpuTempLine?: number;
    logger?: Logger;
    deps?: Partial<HostMetricsDeps>;
}

export function sampleCpuTimes(): CpuTimes {
    let idle = 0;
    let total = 0;
    for (const cpu of os.cpus()) {
        const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
        idle += cpuIdle;
        total += user + nice + sys + cpuIdle + irq;
    }
    return { idle, total };
}

/**
 * Busy percentage between two cumulative samples, one decimal.
 */
export function cpuPercent(previous: CpuTimes, current: CpuTimes): number {
    const total = current.total - previous.total;
    const idle = current.idle - previous.idle;
    if (total <= 0) return 0;
    return roundTo(100 * (1 - idle / total), 1);
}

export function memoryPercent(total: number, free: number): number {
    if (total <= 0) return 0;
    return roundTo(100 * (total - free) / total, 1);
}

/**
 * Used share of a filesystem as seen by unprivileged users: used / (used + available).
 */
export function diskUsedPercent(usage: FsUsage): number {
    const used = usage.bsize * (usage.blocks - usage.bfree);
    const available = usage.bsize * usage.bavail;
    if (used + available <= 0) return 0;
    return roundTo(100 * used / (used + available), 2);
}

/**
 * First reading on the n-th line mentioning "temp" in `sensors` output, or null.
 */
export function parseSensorsTemperature(output: string, lineIndex: number): number | null {
    const readings = output
        .split('\n')
        .filter(line => line.includes('temp'))
        .map(line => /([+-]?\d+(?:\.\d+)?)\s*°C/.exec(line))
        .map(match => (match ? Number(match[1]) : null));
    const value = readings[lineIndex];
    return value === undefined ? null : value;
}

/**
 * Split a configured command line on whitespace into executable and arguments. No shell quoting.
 */
export function splitCommand(command: string): { file: string; args: string[] } {
    const [file = '', ...args] = command.trim().split(/\s+/);
    return { file, args };
}

function runCommand(command: string): Promise<string> {
    const { file, args } = splitCommand(command);
    return new Promise((resolve, reject) => {
        execFile(file, args, { timeout: 2000 }, (error, stdout) => {
            if (error) {
                reject(error);
                return;
            }
            resolve(stdout);
        });
    });
}

const DEFAULT_DEPS: HostMetricsDeps = {
    cpuTimes: sampleCpuTimes,
    memory: () => ({ total: os.totalmem(), free: os.freemem() }),
    statfs: path => statfs(path),
    runSensors: runCommand
};

/**
 * Reads load figures from the host the status node runs on.
 */
export class HostMetricsProvider implements SystemMetricsProvider {
    private readonly deps: HostMetricsDeps;
    private readonly emmcMount: string;
    private readonly nvmeMount: string;
    private readonly sensorsCommand: string;
    private readonly gpuTempLine: number;
    private readonly logger: Logger;
    private previousCpu: CpuTimes;
    private sensorsFailureLogged: boolean;

    constructor(options: HostMetricsOptions = {}) {
        this.deps = { ...DEFAULT_DEPS, ...options.deps };
        this.emmcMount = options.emmcMount ?? CONST.DEFAULT_EMMC_MOUNT;
        this.nvmeMount = options.nvmeMount ?? CONST.DEFAULT_NVME_MOUNT;
        this.sensorsCommand = options.sensorsCommand ?? CONST.DEFAULT_SENSORS_COMMAND;
        this.gpuTempLine = options.gpuTempLine ?? CONST.DEFAULT_GPU_TEMP_LINE;
        this.logger = options.logger ?? new NoopLogger();
        this.previousCpu = this.deps.cpuTimes();
        this.sensorsFailureLogged = false;
    }

    async read(): Promise<JetsonStatus> {
        const cpuNow = this.deps.cpuTimes();
        const cpu = cpuPercent(this.previousCpu, cpuNow);
        this.previousCpu = cpuNow;

        const { total, free } = this.deps.memory();
        const [emmc, nvmeSsd, gpuTemp] = await Promise.all([
            this.readDisk(this.emmcMount),
            this.readDisk(this.nvmeMount),
            this.readGpuTemperature()
        ]);

        return { cpu, ram: memoryPercent(total, free), emmc, nvmeSsd, gpuTemp };
    }

    private async readDisk(path: string): Promise<number> {
        try {
            return diskUsedPercent(await this.deps.statfs(path));
        } catch (e) {
            this.logger.debug('Disk usage read failed.', { path, error: toErrorMessage(e) });
            return 0;
        }
    }

    private async readGpuTemperature(): Promise<number> {
        try {
            const output = await this.deps.runSensors(this.sensorsCommand);
            return parseSensorsTemperature(output, this.gpuTempLine) ?? CONST.GPU_TEMP_UNAVAILABLE;
        } catch (e) {
            // Expected off-target (VMs, CI); say so once
            if (!this.sensorsFailureLogged) {
                this.logger.warn('sensors call failed; reporting GPU temperature as unavailable.', {
                    command: this.sensorsCommand,
                    error: toErrorMessage(e)
                });
                this.sensorsFailureLogged = true;
            }
            return CONST.GPU_TEMP_UNAVAILABLE;
        }
    }
}
