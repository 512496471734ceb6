export { Tracer, toRecord, formatRecord } from './tracer.js';
export type { TraceRecord, TraceSummary, TracerOptions, FormatOptions } from './tracer.js';
export { ApduDecoder } from './apdu-decoder.js';
export { CommandRegistry } from './command-registry.js';
export { ApduCommand, UnknownCommand, defineCommand, describe } from './apdu-command.js';
export type { CommandCategory, CommandDescriptor, CommandFactory, CommandFields } from './apdu-command.js';
export { createDefaultRegistry, SIM_COMMANDS, UICC_COMMANDS, USIM_COMMANDS } from './command-sets/index.js';
export { RuntimeState, RuntimeLchan } from './runtime-state.js';
export type { SelectResult, PendingResponse } from './runtime-state.js';
export {
    CardFile,
    CardDF,
    CardADF,
    CardMF,
    CardEF,
    buildCardProfile,
    loadDefaultProfile,
    emptyProfile,
} from './card-profile.js';
export type { CardProfile } from './card-profile.js';
export {
    claPattern,
    matchesCla,
    formatClaPattern,
    logicalChannelFromCla,
    parseHex,
    parseCommandApdu,
    parseResponseApdu,
    parseTpduExchange,
    formatCommandHex,
    formatSw,
} from './apdu.js';
export type { ClaPattern } from './apdu.js';
export { decodeFcp, decodeSimSelectResponse, getTagName } from './fcp-tags.js';
export type { Fcp, SimSelectResponse, FileDescriptor, PinStatus } from './fcp-tags.js';
export { decodeContent, FILE_DECODERS } from './file-decoders.js';
export type { ContentDecoder, DecodedContent } from './file-decoders.js';
export { interpretSw } from './status-words.js';
export { GsmtapUdpSource } from './sources/gsmtap-udp-source.js';
export type { GsmtapUdpOptions } from './sources/gsmtap-udp-source.js';
export { PcapSource } from './sources/pcap-source.js';
export type { PcapSourceOptions } from './sources/pcap-source.js';
export { HexTraceSource, parseTraceLine } from './sources/hex-trace-source.js';
export { ReplaySource } from './sources/replay-source.js';
export { decodeGsmtapPacket, parseGsmtapHeader, GSMTAP_PORT } from './sources/gsmtap.js';
export { TraceError, SourceError, ProfileError, ApduFormatError } from './errors.js';
export type {
    ApduCase,
    ApduCaseResolver,
    ApduResponse,
    ApduSource,
    LogFn,
    RawExchange,
    SourceEvent,
} from './types.js';
export type { Tlv } from '@tomkp/ber-tlv';
