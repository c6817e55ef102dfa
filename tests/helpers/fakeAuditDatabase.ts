import type pg from 'pg';
import type { AuditDatabase, TxClient } from '../../libs/db/index.js';
import type { DbRole } from '../../libs/db/roles.js';

export interface RecordedQuery {
    role: DbRole;
    text: string;
    params: unknown[];
    inTransaction: boolean;
}

export type Responder = (query: RecordedQuery) => object[];

/**
 * In-process stand-in for the role-scoped database. Every statement is
 * recorded; rows come from the responder and are decoded from JSON, the way
 * the driver hands them over.
 */
export class FakeAuditDatabase implements AuditDatabase {
    readonly queries: RecordedQuery[] = [];
    readonly ownerStatements: string[] = [];
    transactions = 0;
    rolledBack = 0;
    probed = false;
    closed = false;

    constructor(public responder: Responder = () => []) { }

    async queryAsRole<T extends pg.QueryResultRow = pg.QueryResultRow>(
        role: DbRole,
        text: string,
        params: unknown[] = []
    ): Promise<pg.QueryResult<T>> {
        return this.run<T>({ role, text, params, inTransaction: false });
    }

    async transactionAsRole<T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> {
        this.transactions += 1;
        const client: TxClient = {
            query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params: unknown[] = []) =>
                this.run<R>({ role, text, params, inTransaction: true })
        };
        try {
            return await callback(client);
        } catch (error) {
            this.rolledBack += 1;
            throw error;
        }
    }

    async probeRoles(): Promise<void> {
        this.probed = true;
    }

    async executeAsOwner(text: string): Promise<void> {
        this.ownerStatements.push(text);
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    private async run<T extends pg.QueryResultRow>(query: RecordedQuery): Promise<pg.QueryResult<T>> {
        this.queries.push(query);
        const rows = this.responder(query);
        return {
            command: query.text.trim().split(/\s+/)[0] ?? '',
            rowCount: rows.length,
            oid: 0,
            fields: [],
            rows: JSON.parse(JSON.stringify(rows))
        };
    }
}
