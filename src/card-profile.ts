import { readDataFile } from './data-files.js';
import { ProfileError } from './errors.js';
import type { EfStructure } from './fcp-tags.js';
import { isKnownDecoder } from './file-decoders.js';

/**
 * A node of the card file system
 */
export abstract class CardFile {
    readonly name: string;
    readonly fid: string | undefined;
    readonly description: string;
    private parentDf: CardDF | undefined;

    protected constructor(name: string, fid: string | undefined, description: string) {
        this.name = name;
        this.fid = fid?.toUpperCase();
        this.description = description;
    }

    get parent(): CardDF | undefined {
        return this.parentDf;
    }

    /** @internal used by CardDF.addFile */
    attachTo(parent: CardDF): void {
        if (this.parentDf) {
            throw new ProfileError(`${this.name} already belongs to ${this.parentDf.name}`);
        }
        this.parentDf = parent;
    }

    /**
     * Names of all files from the MF down to this one
     */
    fullyQualifiedPath(): string[] {
        const path: string[] = [];
        for (let node: CardFile | undefined = this; node; node = node.parent) {
            path.unshift(node.name);
        }
        return path;
    }

    fullyQualifiedPathStr(): string {
        return this.fullyQualifiedPath().join('/');
    }

    /**
     * The DF this file lives in (the file itself for DFs)
     */
    abstract currentDf(): CardDF;
}

/**
 * Dedicated File: a directory of files
 */
export class CardDF extends CardFile {
    private readonly byFid = new Map<string, CardFile>();
    private readonly byName = new Map<string, CardFile>();

    constructor(name: string, fid: string | undefined, description = '') {
        super(name, fid, description);
    }

    addFile<T extends CardFile>(file: T): T {
        if (this.byName.has(file.name)) {
            throw new ProfileError(`${this.name} already contains a file named ${file.name}`);
        }
        if (file.fid !== undefined && this.byFid.has(file.fid)) {
            throw new ProfileError(`${this.name} already contains a file with FID ${file.fid}`);
        }
        file.attachTo(this);
        this.byName.set(file.name, file);
        if (file.fid !== undefined) {
            this.byFid.set(file.fid, file);
        }
        return file;
    }

    get children(): CardFile[] {
        return [...this.byName.values()];
    }

    childByFid(fid: string): CardFile | undefined {
        return this.byFid.get(fid.toUpperCase());
    }

    childByName(name: string): CardFile | undefined {
        return this.byName.get(name);
    }

    /**
     * Find a child by FID or by name
     */
    child(identifier: string): CardFile | undefined {
        return this.childByFid(identifier) ?? this.childByName(identifier);
    }

    childBySfid(sfid: number): CardEF | undefined {
        return this.children.find((file): file is CardEF => file instanceof CardEF && file.sfid === sfid);
    }

    override currentDf(): CardDF {
        return this;
    }
}

/**
 * Application Dedicated File
 */
export class CardADF extends CardDF {
    readonly aid: string;

    constructor(name: string, aid: string, description = '') {
        super(name, undefined, description);
        this.aid = aid.toLowerCase();
    }
}

/**
 * Master File, root of the tree
 */
export class CardMF extends CardDF {
    private readonly apps = new Map<string, CardADF>();

    constructor(name = 'MF', description = 'Master File') {
        super(name, '3F00', description);
    }

    addApplication(adf: CardADF): CardADF {
        if (this.apps.has(adf.aid)) {
            throw new ProfileError(`Application ${adf.aid} registered twice`);
        }
        this.addFile(adf);
        this.apps.set(adf.aid, adf);
        return adf;
    }

    get applications(): CardADF[] {
        return [...this.apps.values()];
    }

    /**
     * Find the application for a partial AID, or for a full AID that extends
     * the registered one (RID + PIX with application provider bytes)
     */
    applicationByAid(aid: string): CardADF | undefined {
        const wanted = aid.toLowerCase();
        if (wanted.length === 0) {
            return undefined;
        }
        return this.applications.find((app) => app.aid.startsWith(wanted) || wanted.startsWith(app.aid));
    }
}

/**
 * Elementary File
 */
export class CardEF extends CardFile {
    readonly structure: EfStructure;
    readonly sfid: number | undefined;
    readonly decoder: string | undefined;

    constructor(
        name: string,
        fid: string,
        structure: EfStructure,
        options: { sfid?: number | undefined; decoder?: string | undefined; description?: string | undefined } = {}
    ) {
        super(name, fid, options.description ?? '');
        this.structure = structure;
        this.sfid = options.sfid;
        this.decoder = options.decoder;
    }

    get isRecordOriented(): boolean {
        return this.structure === 'linear_fixed' || this.structure === 'cyclic';
    }

    override currentDf(): CardDF {
        const parent = this.parent;
        if (!parent) {
            throw new ProfileError(`${this.name} is not attached to a DF`);
        }
        return parent;
    }
}

/**
 * Static description of a card: its MF with all DFs, EFs and applications
 */
export interface CardProfile {
    readonly name: string;
    readonly mf: CardMF;
}

const STRUCTURES: readonly EfStructure[] = ['transparent', 'linear_fixed', 'cyclic', 'ber_tlv'];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(node: JsonObject, key: string, where: string): string {
    const value = node[key];
    if (typeof value !== 'string' || value.length === 0) {
        throw new ProfileError(`${where}: '${key}' must be a non-empty string`);
    }
    return value;
}

function optionalString(node: JsonObject, key: string, where: string): string | undefined {
    const value = node[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ProfileError(`${where}: '${key}' must be a string`);
    }
    return value;
}

function requireFid(node: JsonObject, where: string): string {
    const fid = requireString(node, 'fid', where);
    if (!/^[0-9a-fA-F]{4}$/.test(fid)) {
        throw new ProfileError(`${where}: invalid FID '${fid}'`);
    }
    return fid;
}

function childrenOf(node: JsonObject, where: string): unknown[] {
    const children = node.children ?? [];
    if (!Array.isArray(children)) {
        throw new ProfileError(`${where}: 'children' must be an array`);
    }
    return children;
}

function buildEf(node: JsonObject, where: string): CardEF {
    const name = requireString(node, 'name', where);
    const structure = requireString(node, 'structure', `${where}/${name}`);
    const found = STRUCTURES.find((s) => s === structure);
    if (!found) {
        throw new ProfileError(`${where}/${name}: unknown structure '${structure}'`);
    }
    const sfid = node.sfid;
    if (sfid !== undefined && (typeof sfid !== 'number' || !Number.isInteger(sfid) || sfid < 1 || sfid > 30)) {
        throw new ProfileError(`${where}/${name}: SFID must be an integer from 1 to 30`);
    }
    const decoder = optionalString(node, 'decoder', `${where}/${name}`);
    if (decoder !== undefined && !isKnownDecoder(decoder)) {
        throw new ProfileError(`${where}/${name}: unknown decoder '${decoder}'`);
    }
    return new CardEF(name, requireFid(node, `${where}/${name}`), found, {
        sfid: typeof sfid === 'number' ? sfid : undefined,
        decoder,
        description: optionalString(node, 'description', `${where}/${name}`),
    });
}

function populate(df: CardDF, children: unknown[], where: string): void {
    for (const child of children) {
        if (!isObject(child)) {
            throw new ProfileError(`${where}: file entries must be objects`);
        }
        const type = child.type;
        if (type === 'EF') {
            df.addFile(buildEf(child, where));
        } else if (type === 'DF') {
            const name = requireString(child, 'name', where);
            const path = `${where}/${name}`;
            const sub = df.addFile(
                new CardDF(name, requireFid(child, path), optionalString(child, 'description', path))
            );
            populate(sub, childrenOf(child, path), path);
        } else {
            throw new ProfileError(`${where}: file type must be 'EF' or 'DF'`);
        }
    }
}

/**
 * Build a card profile from its JSON description
 */
export function buildCardProfile(json: unknown): CardProfile {
    if (!isObject(json)) {
        throw new ProfileError('Card profile must be a JSON object');
    }
    const name = requireString(json, 'name', 'profile');
    const mfNode = json.mf;
    if (!isObject(mfNode)) {
        throw new ProfileError("profile: 'mf' must be an object");
    }
    const mf = new CardMF(
        optionalString(mfNode, 'name', 'MF') ?? 'MF',
        optionalString(mfNode, 'description', 'MF') ?? 'Master File'
    );
    populate(mf, childrenOf(mfNode, mf.name), mf.name);

    const apps = json.applications ?? [];
    if (!Array.isArray(apps)) {
        throw new ProfileError("profile: 'applications' must be an array");
    }
    for (const app of apps) {
        if (!isObject(app)) {
            throw new ProfileError('profile: application entries must be objects');
        }
        const appName = requireString(app, 'name', 'application');
        const aid = requireString(app, 'aid', appName);
        if (!/^([0-9a-fA-F]{2}){5,16}$/.test(aid)) {
            throw new ProfileError(`${appName}: AID must be 5-16 bytes of hex`);
        }
        const adf = mf.addApplication(new CardADF(appName, aid, optionalString(app, 'description', appName)));
        populate(adf, childrenOf(app, appName), `${mf.name}/${appName}`);
    }

    return { name, mf };
}

/**
 * Load the bundled card profile (UICC with SIM, USIM and ISIM)
 */
export function loadDefaultProfile(): CardProfile {
    return buildCardProfile(readDataFile('card-profile.json'));
}

/**
 * A profile with nothing but an empty MF
 */
export function emptyProfile(): CardProfile {
    return { name: 'empty', mf: new CardMF() };
}
