import { parseCliArgs } from '../src/cli-args';

describe('CLI arguments', () => {
    test('selects the node to run', () => {
        expect(parseCliArgs(['iris'])).toEqual({ kind: 'run', node: 'iris' });
        expect(parseCliArgs(['status'])).toEqual({ kind: 'run', node: 'status' });
    });

    test('takes a config path', () => {
        expect(parseCliArgs(['status', '--config', '/etc/rover.json'])).toEqual({
            kind: 'run',
            node: 'status',
            configPath: '/etc/rover.json'
        });
    });

    test('--config without a value is an error', () => {
        expect(parseCliArgs(['iris', '--config'])).toEqual({ kind: 'invalid', reason: '--config needs a path' });
        expect(parseCliArgs(['iris', '--config', '--help'])).toEqual({ kind: 'help' });
    });

    test('no arguments or --help asks for usage', () => {
        expect(parseCliArgs([])).toEqual({ kind: 'help' });
        expect(parseCliArgs(['status', '--help'])).toEqual({ kind: 'help' });
    });

    test('unknown nodes are rejected', () => {
        expect(parseCliArgs(['arm'])).toEqual({ kind: 'invalid', reason: 'unknown node "arm"' });
    });
});
