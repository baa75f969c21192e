/**
 * Custom Error Classes for Rover Telemetry
 * Expected failures travel as Result values; these classes describe them
 */

export type DecodeErrorKind = 'ShortFrame' | 'InvalidRegister';

/**
 * Error describing a register snapshot that could not be decoded
 */
export class DecodeError extends Error {
    public kind: DecodeErrorKind;
    public expected: number;
    public received: number;

    constructor(kind: DecodeErrorKind, expected: number, received: number, detail?: string) {
        super(kind === 'ShortFrame'
            ? `Short frame: expected ${expected} registers, received ${received}`
            : `Invalid register value${detail ? ` (${detail})` : ''}`);
        this.name = 'DecodeError';
        this.kind = kind;
        this.expected = expected;
        this.received = received;
    }
}

/**
 * Error thrown when the register link fails or times out
 */
export class TransportError extends Error {
    public operation: string;
    public fatal: boolean;

    constructor(operation: string, message: string, fatal = false) {
        super(`Transport ${operation} failed: ${message}`);
        this.name = 'TransportError';
        this.operation = operation;
        this.fatal = fatal;
    }
}

/**
 * Error raised once a channel has been silent past the hard disconnect timeout.
 * The only error that ends the process.
 */
export class HardDisconnectError extends Error {
    public silentForMs: number;
    public timeoutMs: number;

    constructor(silentForMs: number, timeoutMs: number) {
        super(`Channel not seen for ${silentForMs}ms (limit ${timeoutMs}ms)`);
        this.name = 'HardDisconnectError';
        this.silentForMs = silentForMs;
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Error describing malformed upstream telemetry text
 */
export class ParseError extends Error {
    public input: string;

    constructor(input: string, message: string) {
        super(`Parse failed: ${message}`);
        this.name = 'ParseError';
        this.input = input;
    }
}

/**
 * Error thrown when a configuration file cannot be read
 */
export class ConfigError extends Error {
    public path: string;

    constructor(path: string, message: string) {
        super(`Config ${path}: ${message}`);
        this.name = 'ConfigError';
        this.path = path;
    }
}
