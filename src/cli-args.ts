export type NodeKind = 'iris' | 'status';

export type CliCommand =
    | { kind: 'run'; node: NodeKind; configPath?: string }
    | { kind: 'help' }
    | { kind: 'invalid'; reason: string };

export const USAGE = `rover-telemetry <node> [options]

Nodes:
  iris      poll the receiver link and publish drive commands
  status    aggregate and republish rover status records

Options:
  --config <path>   JSON configuration (default: $ROVER_TELEMETRY_CONFIG)
  --help
`;

function getArg(args: string[], flag: string): string | undefined {
    const idx = args.indexOf(flag);
    if (idx === -1) return undefined;
    const val = args[idx + 1];
    if (!val || val.startsWith('--')) return undefined;
    return val;
}

export function parseCliArgs(args: string[]): CliCommand {
    if (args.includes('--help')) {
        return { kind: 'help' };
    }
    const cmd = args[0] ?? 'help';
    if (cmd === 'help') {
        return { kind: 'help' };
    }
    if (cmd !== 'iris' && cmd !== 'status') {
        return { kind: 'invalid', reason: `unknown node "${cmd}"` };
    }
    if (args.includes('--config')) {
        const configPath = getArg(args, '--config');
        if (!configPath) {
            return { kind: 'invalid', reason: '--config needs a path' };
        }
        return { kind: 'run', node: cmd, configPath };
    }
    return { kind: 'run', node: cmd };
}
