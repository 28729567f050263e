import Database from 'better-sqlite3';
import { z } from 'zod';
import type { IEventStore } from '../../Platform/Ports.js';
import type { Evidence } from '../../kernel-core/L5/Audit.js';

interface AuditRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    event: string;
    actor: string;
    status: string;
    timestamp: string;
    payload: string;
    reason: string | null;
    metadata: string | null;
}

const EventSchema = z.enum([
    'KernelDeployed', 'LockupCreated', 'TokensReleased', 'LockupRevoked', 'OwnershipTransferred',
    'createLockup', 'release', 'revoke', 'transferOwnership'
]);
const StatusSchema = z.enum(['SUCCESS', 'REJECT']);
const PayloadSchema = z.record(z.union([z.string(), z.boolean()]));
const MetadataSchema = z.record(z.unknown());

// bigint has no JSON form
const encode = (value: unknown): string =>
    JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'lockup.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize(): void {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                event TEXT NOT NULL,
                actor TEXT NOT NULL,
                status TEXT NOT NULL,
                timestamp TEXT NOT NULL,
                payload TEXT NOT NULL,
                reason TEXT,
                metadata TEXT
            )
        `);
    }

    append(evidence: Evidence): void {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, event, actor, status, timestamp, payload, reason, metadata
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.event,
            evidence.actor,
            evidence.status,
            evidence.timestamp,
            encode(evidence.payload),
            evidence.reason ?? null,
            evidence.metadata ? encode(evidence.metadata) : null
        );
    }

    getHistory(): Evidence[] {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEvidence(row));
    }

    getLatest(): Evidence | null {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(row: AuditRow): Evidence {
        const evidence: Evidence = {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            event: EventSchema.parse(row.event),
            actor: row.actor,
            status: StatusSchema.parse(row.status),
            payload: PayloadSchema.parse(JSON.parse(row.payload)),
            timestamp: row.timestamp
        };
        if (row.reason !== null) evidence.reason = row.reason;
        if (row.metadata !== null) evidence.metadata = MetadataSchema.parse(JSON.parse(row.metadata));
        return evidence;
    }

    public close(): void {
        this.db.close();
    }
}
