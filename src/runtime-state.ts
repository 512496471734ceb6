import { CardADF, CardDF, CardEF, type CardFile, type CardMF, type CardProfile } from './card-profile.js';
import type { Fcp, SimSelectResponse } from './fcp-tags.js';

/**
 * Outcome of a selection attempt. The cursor only moves on success.
 */
export type SelectResult = { ok: true; file: CardFile } | { ok: false; reason: string };

/**
 * What a later GET RESPONSE on the same channel returns data for
 */
export interface PendingResponse {
    /** Name of the command that left data to fetch (e.g. SELECT) */
    command: string;
    /** How the returned data is to be interpreted */
    format: 'fcp' | 'sim-select' | 'raw';
    file: CardFile;
}

/**
 * Per logical channel cursor
 */
export class RuntimeLchan {
    readonly nr: number;
    private readonly mf: CardMF;
    selectedFile: CardFile;
    selectedAdf: CardADF | undefined;
    /** FCP (or SIM select response) of the last successfully selected file */
    selectedFcp: Fcp | SimSelectResponse | undefined;
    /** Current record number of the selected record-oriented EF */
    currentRecord: number | undefined;
    pendingResponse: PendingResponse | undefined;

    constructor(nr: number, mf: CardMF) {
        this.nr = nr;
        this.mf = mf;
        this.selectedFile = mf;
        this.selectedAdf = undefined;
        this.selectedFcp = undefined;
        this.currentRecord = undefined;
        this.pendingResponse = undefined;
    }

    /**
     * Return the cursor to the MF and forget the application context
     */
    reset(): void {
        this.selectedFile = this.mf;
        this.selectedAdf = undefined;
        this.selectedFcp = undefined;
        this.currentRecord = undefined;
        this.pendingResponse = undefined;
    }

    /**
     * Copy the selection of another channel (MANAGE CHANNEL opened from it)
     */
    inheritFrom(other: RuntimeLchan): void {
        this.selectedFile = other.selectedFile;
        this.selectedAdf = other.selectedAdf;
        this.selectedFcp = other.selectedFcp;
    }

    /**
     * The DF the cursor is in (parent DF when an EF is selected)
     */
    cwd(): CardDF {
        return this.selectedFile.currentDf();
    }

    get selectedEf(): CardEF | undefined {
        return this.selectedFile instanceof CardEF ? this.selectedFile : undefined;
    }

    private moveTo(file: CardFile): SelectResult {
        if (file !== this.selectedFile) {
            this.currentRecord = undefined;
            this.selectedFcp = undefined;
        }
        this.selectedFile = file;
        if (file instanceof CardADF) {
            this.selectedAdf = file;
        }
        return { ok: true, file };
    }

    /**
     * Resolve a FID the way a card does for SELECT by file identifier:
     * MF, current application (7FFF), current DF, its children,
     * its parent and the DFs next to it.
     */
    resolveFid(fid: string): CardFile | undefined {
        const id = fid.toUpperCase();
        const cwd = this.cwd();
        if (id === this.mf.fid) return this.mf;
        if (id === '7FFF') return this.selectedAdf;
        if (cwd.fid === id) return cwd;

        const child = cwd.childByFid(id);
        if (child) return child;

        const parent = cwd.parent;
        if (parent) {
            if (parent.fid === id) return parent;
            const sibling = parent.childByFid(id);
            if (sibling instanceof CardDF) return sibling;
        }
        return undefined;
    }

    selectFid(fid: string): SelectResult {
        const file = this.resolveFid(fid);
        if (!file) {
            const reason =
                fid.toUpperCase() === '7FFF'
                    ? 'no application selected (7FFF)'
                    : `${fid.toUpperCase()} not found from ${this.cwd().fullyQualifiedPathStr()}`;
            return { ok: false, reason };
        }
        return this.moveTo(file);
    }

    /**
     * Select a child of the current DF by FID or name
     */
    selectChild(identifier: string, kind: 'any' | 'df' = 'any'): SelectResult {
        const cwd = this.cwd();
        const file = cwd.child(identifier);
        if (!file || (kind === 'df' && !(file instanceof CardDF))) {
            return { ok: false, reason: `${identifier} not found under ${cwd.fullyQualifiedPathStr()}` };
        }
        return this.moveTo(file);
    }

    selectParent(): SelectResult {
        const parent = this.cwd().parent;
        if (!parent) {
            return { ok: false, reason: `${this.cwd().name} has no parent` };
        }
        return this.moveTo(parent);
    }

    /**
     * Select along a path of FIDs (or names), starting from the MF or from the current DF.
     * '7FFF' as first element stands for the current application.
     * The cursor only moves when the whole path resolves.
     */
    selectPath(path: readonly string[], fromMf: boolean): SelectResult {
        let node: CardFile = fromMf ? this.mf : this.cwd();
        for (const [index, element] of path.entries()) {
            const id = element.toUpperCase();
            if (index === 0 && fromMf && id === this.mf.fid) {
                continue;
            }
            if (index === 0 && id === '7FFF') {
                if (!this.selectedAdf) {
                    return { ok: false, reason: 'no application selected (7FFF)' };
                }
                node = this.selectedAdf;
                continue;
            }
            if (!(node instanceof CardDF)) {
                return { ok: false, reason: `${node.fullyQualifiedPathStr()} is not a DF` };
            }
            const next = node.child(element);
            if (!next) {
                return { ok: false, reason: `${element} not found under ${node.fullyQualifiedPathStr()}` };
            }
            node = next;
        }
        return this.moveTo(node);
    }

    /**
     * Select an application by (possibly partial) AID
     */
    selectAid(aid: string): SelectResult {
        const adf = this.mf.applicationByAid(aid);
        if (!adf) {
            return { ok: false, reason: `unknown application ${aid.toLowerCase()}` };
        }
        return this.moveTo(adf);
    }

    /**
     * Select an EF of the current DF by short file identifier
     */
    selectSfid(sfid: number): SelectResult {
        const cwd = this.cwd();
        const ef = cwd.childBySfid(sfid);
        if (!ef) {
            return { ok: false, reason: `no EF with SFI ${String(sfid)} under ${cwd.fullyQualifiedPathStr()}` };
        }
        return this.moveTo(ef);
    }
}

/**
 * Reconstructed state of the card: the file system and the cursor of every open logical channel
 */
export class RuntimeState {
    readonly profile: CardProfile;
    private readonly lchans = new Map<number, RuntimeLchan>();

    constructor(profile: CardProfile) {
        this.profile = profile;
        this.lchans.set(0, new RuntimeLchan(0, profile.mf));
    }

    get mf(): CardMF {
        return this.profile.mf;
    }

    /**
     * Card reset: close every channel but the basic one and return it to the MF
     */
    reset(): void {
        this.lchans.clear();
        this.lchans.set(0, new RuntimeLchan(0, this.profile.mf));
    }

    /**
     * Return a single channel's cursor to the MF
     */
    resetChannel(channel: number): void {
        this.lchans.get(channel)?.reset();
    }

    lchan(nr: number): RuntimeLchan | undefined {
        return this.lchans.get(nr);
    }

    channels(): RuntimeLchan[] {
        return [...this.lchans.values()].sort((a, b) => a.nr - b.nr);
    }

    /**
     * Open a logical channel; when opened from another channel it inherits that channel's selection.
     * Returns undefined when the channel is already open.
     */
    openChannel(nr: number, from?: RuntimeLchan): RuntimeLchan | undefined {
        if (this.lchans.has(nr)) {
            return undefined;
        }
        const lchan = new RuntimeLchan(nr, this.profile.mf);
        if (from && from.nr !== 0) {
            lchan.inheritFrom(from);
        }
        this.lchans.set(nr, lchan);
        return lchan;
    }

    closeChannel(nr: number): boolean {
        if (nr === 0) {
            return false;
        }
        return this.lchans.delete(nr);
    }

    private requireLchan(channel: number): RuntimeLchan {
        const lchan = this.lchans.get(channel);
        if (!lchan) {
            throw new RangeError(`Logical channel ${String(channel)} is not open`);
        }
        return lchan;
    }

    currentNode(channel: number): CardFile {
        return this.requireLchan(channel).selectedFile;
    }

    selectChild(channel: number, identifier: string): SelectResult {
        const lchan = this.lchans.get(channel);
        if (!lchan) {
            return { ok: false, reason: `logical channel ${String(channel)} is not open` };
        }
        return lchan.selectChild(identifier);
    }

    selectAbsolute(channel: number, path: readonly string[]): SelectResult {
        const lchan = this.lchans.get(channel);
        if (!lchan) {
            return { ok: false, reason: `logical channel ${String(channel)} is not open` };
        }
        return lchan.selectPath(path, true);
    }

    applicationContext(channel: number): CardADF | undefined {
        return this.lchans.get(channel)?.selectedAdf;
    }
}
