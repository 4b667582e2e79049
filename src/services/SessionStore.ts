import path from 'path';
import fs from 'fs';
import { createLogger } from '../core/logger.js';
import {
    DecodedSession,
    GAME_STATE_SECTION,
    GEOMETRY_SECTION,
    IniDocument,
    decodeGameState,
    encodeGameState,
    parseIni,
    stringifyIni,
} from '../core/sessionCodec.js';
import type { PersistenceCorrupt, SessionGeometry, SessionRecord } from '../core/types.js';
import type { Result } from '../chess/types.js';

const log = createLogger('STORE');

export const CONFIG_FILE_NAME = 'config.ini';

export type LoadResult =
    | { status: 'none' }
    | { status: 'loaded'; session: DecodedSession }
    | { status: 'corrupt'; error: PersistenceCorrupt };

/**
 * Reads and writes the session file. Sections other than [GameState]
 * and [Geometry] are kept as they were found.
 */
export class SessionStore {
    public readonly configFile: string;

    constructor(private readonly dataDir: string, fileName: string = CONFIG_FILE_NAME) {
        this.configFile = path.join(dataDir, fileName);
    }

    /**
     * Load the saved game, if there is one
     */
    public load(): LoadResult {
        if (!fs.existsSync(this.configFile)) return { status: 'none' };

        const doc = this.readDocument();
        if (!doc.ok) return this.reportCorrupt(doc.error);
        if (!doc.value[GAME_STATE_SECTION]) return { status: 'none' };

        const decoded = decodeGameState(doc.value[GAME_STATE_SECTION]);
        if (!decoded.ok) return this.reportCorrupt(decoded.error);
        return { status: 'loaded', session: decoded.value };
    }

    /**
     * Write the game, keeping every other section of the file
     */
    public save(record: SessionRecord, geometry?: SessionGeometry): void {
        const doc = this.readDocumentOrEmpty();
        doc[GAME_STATE_SECTION] = encodeGameState(record);
        if (geometry) {
            doc[GEOMETRY_SECTION] = { ...doc[GEOMETRY_SECTION], size: geometry.size, state: geometry.state };
        }
        this.writeDocument(doc);
    }

    /**
     * Forget the saved game; other sections stay
     */
    public clearGameState(): void {
        if (!fs.existsSync(this.configFile)) return;
        const doc = this.readDocumentOrEmpty();
        if (!doc[GAME_STATE_SECTION]) return;
        delete doc[GAME_STATE_SECTION];
        this.writeDocument(doc);
    }

    private reportCorrupt(error: PersistenceCorrupt): LoadResult {
        log.warn(`Discarding saved game in ${this.configFile}: ${error.message}`);
        return { status: 'corrupt', error };
    }

    private readDocument(): Result<IniDocument, PersistenceCorrupt> {
        if (!fs.existsSync(this.configFile)) return { ok: true, value: {} };
        try {
            return parseIni(fs.readFileSync(this.configFile, 'utf-8'));
        } catch (err) {
            return {
                ok: false,
                error: { kind: 'PersistenceCorrupt', message: err instanceof Error ? err.message : String(err) },
            };
        }
    }

    /** An unreadable file is replaced rather than merged */
    private readDocumentOrEmpty(): IniDocument {
        const doc = this.readDocument();
        return doc.ok ? doc.value : {};
    }

    private writeDocument(doc: IniDocument): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
        fs.writeFileSync(this.configFile, stringifyIni(doc), 'utf-8');
    }
}
