import type { RuntimeState } from '../runtime-state.js';
import type { TraceRecord, TraceSummary } from '../tracer.js';

export type Screen = 'trace' | 'error';

/**
 * Where one logical channel's cursor stands
 */
export interface ChannelInfo {
    nr: number;
    path: string;
    application: string | undefined;
}

export type TraceStatus = 'waiting' | 'running' | 'ended';

export interface TraceFilters {
    showSelect: boolean;
    showStatus: boolean;
}

export interface TraceView {
    records: TraceRecord[];
    channels: ChannelInfo[];
    stats: TraceSummary;
    status: TraceStatus;
}

/** Records kept in memory for display */
export const MAX_RECORDS = 500;

export function channelInfo(state: RuntimeState): ChannelInfo[] {
    return state.channels().map((lchan) => ({
        nr: lchan.nr,
        path: lchan.selectedFile.fullyQualifiedPathStr(),
        application: lchan.selectedAdf?.name,
    }));
}

/**
 * Records that pass the view filters, newest last
 */
export function visibleRecords(records: readonly TraceRecord[], filters: TraceFilters, limit: number): TraceRecord[] {
    const shown = records.filter(
        (record) =>
            (filters.showSelect || record.category !== 'select') &&
            (filters.showStatus || record.category !== 'status')
    );
    return shown.slice(Math.max(0, shown.length - limit));
}
