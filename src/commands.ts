/**
 * CLI command implementations
 */

import { formatClaPattern, hexByte } from './apdu.js';
import { CardADF, CardDF, CardEF, loadDefaultProfile, type CardFile, type CardProfile } from './card-profile.js';
import type { CommandRegistry } from './command-registry.js';
import { createDefaultRegistry } from './command-sets/index.js';
import { errorMessage, SourceError } from './errors.js';
import { GsmtapUdpSource } from './sources/gsmtap-udp-source.js';
import { HexTraceSource } from './sources/hex-trace-source.js';
import { PcapSource } from './sources/pcap-source.js';
import { formatRecord, Tracer } from './tracer.js';
import type { ApduSource, LogFn } from './types.js';

/**
 * Context for command execution
 */
export interface CommandContext {
    output: (message: string) => void;
    error: (message: string) => void;
    format: string | undefined;
    verbose: boolean | undefined;
    /** Colour status words in text output */
    color?: boolean | undefined;
}

/**
 * Options for commands (for dependency injection in tests)
 */
export interface CommandOptions {
    registry?: CommandRegistry;
    profile?: CardProfile;
}

export interface TraceSettings {
    suppressSelect: boolean;
    suppressStatus: boolean;
}

export interface SourceSettings {
    bindIp: string | undefined;
    bindPort: string | undefined;
}

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

/**
 * Diagnostics go to stderr, dimmed; debug messages only with --verbose
 */
export function createLog(ctx: CommandContext): { log: LogFn; debug: LogFn | undefined } {
    const log: LogFn = (message) => {
        ctx.error(ctx.color ? `${DIM}${message}${RESET}` : message);
    };
    return { log, debug: ctx.verbose ? log : undefined };
}

function checkFormat(ctx: CommandContext): 'text' | 'json' | undefined {
    const format = ctx.format ?? 'text';
    if (format === 'text' || format === 'json') {
        return format;
    }
    ctx.error(`Unknown format '${format}' (expected text or json)`);
    return undefined;
}

/**
 * Create the source named on the command line, or report a usage error and return undefined
 */
export function openSource(
    ctx: CommandContext,
    kind: string,
    args: string[],
    settings: SourceSettings,
    registry: CommandRegistry
): ApduSource | undefined {
    const { log } = createLog(ctx);
    const apduCase = (cla: number, ins: number) => registry.apduCase(cla, ins);

    switch (kind) {
        case 'gsmtap-udp': {
            const port = settings.bindPort === undefined ? undefined : Number(settings.bindPort);
            if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
                ctx.error(`Invalid port '${String(settings.bindPort)}'`);
                return undefined;
            }
            return new GsmtapUdpSource(apduCase, { bindIp: settings.bindIp, bindPort: port, log });
        }
        case 'gsmtap-pcap':
        case 'hex-file': {
            const file = args[0];
            if (!file) {
                ctx.error(`Usage: apdu-trace ${kind} <file>`);
                return undefined;
            }
            return kind === 'hex-file' ? new HexTraceSource(file, log) : new PcapSource(file, apduCase, { log });
        }
        default:
            return undefined;
    }
}

/**
 * Run the trace loop over a source, printing one record per exchange
 */
export async function traceSource(
    ctx: CommandContext,
    source: ApduSource,
    settings: TraceSettings,
    options: CommandOptions = {}
): Promise<number> {
    const format = checkFormat(ctx);
    if (!format) {
        await source.close();
        return 1;
    }
    const { log, debug } = createLog(ctx);

    try {
        const tracer = new Tracer({
            source,
            registry: options.registry,
            profile: options.profile,
            suppressSelect: settings.suppressSelect,
            suppressStatus: settings.suppressStatus,
            debug,
            onRecord: (record) => ctx.output(formatRecord(record, { format, color: ctx.color })),
            onReset: (atr) => debug?.(`Card reset${atr ? ` (ATR ${atr.toString('hex')})` : ''}`),
        });
        log(`Reading from ${source.name}`);
        const summary = await tracer.run();
        log(
            `${String(summary.exchanges)} exchange(s), ${String(summary.resets)} reset(s), ` +
                `${String(summary.emitted)} shown, ${String(summary.suppressed)} suppressed`
        );
        return 0;
    } catch (error: unknown) {
        if (error instanceof SourceError) {
            ctx.error(`Error: ${error.message}`);
            return 1;
        }
        throw error;
    } finally {
        await source.close();
    }
}

/**
 * List the registered command interpreters
 */
export function listCommands(ctx: CommandContext, options: CommandOptions = {}): number {
    const format = checkFormat(ctx);
    if (!format) {
        return 1;
    }
    const registry = options.registry ?? createDefaultRegistry();
    const descriptors = registry
        .descriptors()
        .sort((a, b) => a.ins - b.ins || a.name.localeCompare(b.name));

    if (format === 'json') {
        ctx.output(
            JSON.stringify(
                descriptors.map((d) => ({
                    name: d.name,
                    ins: hexByte(d.ins),
                    cla: d.cla.map(formatClaPattern),
                    apduCase: d.apduCase,
                    category: d.category,
                })),
                null,
                2
            )
        );
        return 0;
    }

    ctx.output(`${String(descriptors.length)} command(s):\n`);
    for (const d of descriptors) {
        const cla = d.cla.map(formatClaPattern).join(',');
        ctx.output(`  ${hexByte(d.ins)}  ${cla.padEnd(9)} ${d.name.padEnd(22)} case ${String(d.apduCase)}`);
    }
    return 0;
}

interface ProfileNode {
    name: string;
    fid?: string;
    aid?: string;
    structure?: string;
    sfid?: number;
    children?: ProfileNode[];
}

function toProfileNode(file: CardFile): ProfileNode {
    const node: ProfileNode = { name: file.name };
    if (file.fid !== undefined) node.fid = file.fid;
    if (file instanceof CardADF) node.aid = file.aid;
    if (file instanceof CardEF) {
        node.structure = file.structure;
        if (file.sfid !== undefined) node.sfid = file.sfid;
    }
    if (file instanceof CardDF) node.children = file.children.map(toProfileNode);
    return node;
}

function describeFile(file: CardFile): string {
    const parts = [file.name];
    if (file instanceof CardADF) parts.push(file.aid);
    else if (file.fid !== undefined) parts.push(file.fid);
    if (file instanceof CardEF) {
        parts.push(file.structure);
        if (file.sfid !== undefined) parts.push(`sfi=${String(file.sfid)}`);
    }
    return parts.join(' ');
}

/**
 * Print the card file system the trace is interpreted against
 */
export function showProfile(ctx: CommandContext, options: CommandOptions = {}): number {
    const format = checkFormat(ctx);
    if (!format) {
        return 1;
    }
    let profile: CardProfile;
    try {
        profile = options.profile ?? loadDefaultProfile();
    } catch (error: unknown) {
        ctx.error(`Error: ${errorMessage(error)}`);
        return 1;
    }

    if (format === 'json') {
        ctx.output(JSON.stringify({ name: profile.name, mf: toProfileNode(profile.mf) }, null, 2));
        return 0;
    }

    ctx.output(profile.name);
    const walk = (file: CardFile, depth: number): void => {
        ctx.output(`${'  '.repeat(depth)}${describeFile(file)}`);
        if (file instanceof CardDF) {
            for (const child of file.children) {
                walk(child, depth + 1);
            }
        }
    };
    walk(profile.mf, 1);
    return 0;
}
