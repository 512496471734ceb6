#!/usr/bin/env node
import { parseArgs as nodeParseArgs } from 'node:util';
import { readFileSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { createDefaultRegistry } from './command-sets/index.js';
import {
    listCommands,
    openSource,
    showProfile,
    traceSource,
    type CommandContext,
    type CommandOptions,
} from './commands.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface ParsedOptions {
    help: boolean;
    version: boolean;
    format: string | undefined;
    verbose: boolean;
    interactive: boolean;
    suppressSelect: boolean;
    suppressStatus: boolean;
    bindIp: string | undefined;
    bindPort: string | undefined;
}

export interface ParsedArgs {
    options: ParsedOptions;
    positionals: string[];
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
    const { values, positionals } = nodeParseArgs({
        args,
        options: {
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean', short: 'v' },
            format: { type: 'string', short: 'f' },
            verbose: { type: 'boolean' },
            interactive: { type: 'boolean', short: 'I' },
            'no-suppress-select': { type: 'boolean' },
            'no-suppress-status': { type: 'boolean' },
            'bind-ip': { type: 'string', short: 'i' },
            'bind-port': { type: 'string', short: 'p' },
        },
        allowPositionals: true,
    });

    return {
        options: {
            help: values.help ?? false,
            version: values.version ?? false,
            format: values.format,
            verbose: values.verbose ?? false,
            interactive: values.interactive ?? false,
            suppressSelect: !(values['no-suppress-select'] ?? false),
            suppressStatus: !(values['no-suppress-status'] ?? false),
            bindIp: values['bind-ip'],
            bindPort: values['bind-port'],
        },
        positionals,
    };
}

/**
 * Show help text
 */
export function showHelp(): string {
    return `apdu-trace - Decode smart card APDU traces against a model of the card

Usage: apdu-trace [options] <source> [arguments]

Sources:
  gsmtap-udp           Live capture of GSMTAP-SIM on a UDP port
  gsmtap-pcap <file>   Replay GSMTAP-SIM packets from a pcap file
  hex-file <file>      Replay a text file of hex APDUs, one exchange per line

Commands:
  list-commands        List the decoded commands
  show-profile         Show the card file system

Options:
  -h, --help             Show this help message
  -v, --version          Show version number
  -f, --format <type>    Output format: text, json (default: text)
  --verbose              Show detailed output
  -I, --interactive      Show the trace in the terminal UI
  --no-suppress-select   Don't suppress displaying SELECT APDUs
  --no-suppress-status   Don't suppress displaying STATUS APDUs
  -i, --bind-ip <addr>   Local address for gsmtap-udp (default: 127.0.0.1)
  -p, --bind-port <n>    Local UDP port for gsmtap-udp (default: 4729)

Examples:
  apdu-trace gsmtap-udp                         Listen on 127.0.0.1:4729
  apdu-trace -i 0.0.0.0 -p 4729 gsmtap-udp      Listen on all interfaces
  apdu-trace gsmtap-pcap capture.pcap           Decode a capture file
  apdu-trace --no-suppress-select hex-file trace.txt
  apdu-trace -f json hex-file trace.txt         One JSON object per exchange
  apdu-trace show-profile                       Print the card file system
`;
}

/**
 * Get package version
 */
export function showVersion(): string {
    try {
        const packagePath = join(__dirname, '..', 'package.json');
        const pkg = JSON.parse(readFileSync(packagePath, 'utf8')) as { version: string };
        return pkg.version;
    } catch {
        return '0.0.0';
    }
}

/**
 * Create command context from parsed options
 */
function createContext(options: ParsedOptions): CommandContext {
    return {
        output: (msg: string) => {
            console.log(msg);
        },
        error: (msg: string) => {
            console.error(msg);
        },
        format: options.format,
        verbose: options.verbose,
        color: process.stdout.isTTY,
    };
}

/**
 * Run a command and handle errors
 */
export async function runCommand(
    command: string,
    args: string[],
    options: ParsedOptions,
    ctx: CommandContext,
    commandOptions: CommandOptions = {}
): Promise<number> {
    switch (command) {
        case 'list-commands':
            return listCommands(ctx, commandOptions);
        case 'show-profile':
            return showProfile(ctx, commandOptions);
        case 'gsmtap-udp':
        case 'gsmtap-pcap':
        case 'hex-file': {
            const registry = commandOptions.registry ?? createDefaultRegistry();
            const source = openSource(ctx, command, args, options, registry);
            if (!source) {
                return 1;
            }
            const settings = { suppressSelect: options.suppressSelect, suppressStatus: options.suppressStatus };
            if (options.interactive) {
                const { runInteractive } = await import('./interactive.js');
                return runInteractive(source, settings, { ...commandOptions, registry });
            }
            const stop = (): void => {
                void source.close();
            };
            process.once('SIGINT', stop);
            try {
                return await traceSource(ctx, source, settings, { ...commandOptions, registry });
            } finally {
                process.off('SIGINT', stop);
            }
        }
        default:
            ctx.error(`Unknown source or command '${command}'`);
            ctx.error(`Run 'apdu-trace --help' for usage`);
            return 1;
    }
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    if (args.options.help) {
        console.log(showHelp());
        return;
    }

    if (args.options.version) {
        console.log(showVersion());
        return;
    }

    const command = args.positionals[0];

    if (!command) {
        console.error(showHelp());
        process.exitCode = 1;
        return;
    }

    const ctx = createContext(args.options);
    const commandArgs = args.positionals.slice(1);
    process.exitCode = await runCommand(command, commandArgs, args.options, ctx);
}

function isEntryPoint(): boolean {
    const entry = process.argv[1];
    if (!entry) {
        return false;
    }
    try {
        return realpathSync(entry) === realpathSync(__filename);
    } catch {
        return false;
    }
}

if (isEntryPoint()) {
    main().catch((error: unknown) => {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
    });
}
