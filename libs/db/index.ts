import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import type { DatabaseConfig } from '../config/auditConfig.js';
import { assertDbRole, DB_ROLES } from './roles.js';
import type { DbRole } from './roles.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

/**
 * Role-scoped access to the audit database. Every statement runs under an
 * explicit role so the writer can only INSERT and the reader can only SELECT.
 */
export interface AuditDatabase {
    queryAsRole<T extends pg.QueryResultRow = pg.QueryResultRow>(role: DbRole, text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
    transactionAsRole<T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T>;
    probeRoles(): Promise<void>;
    /** Runs as the connecting user inside one transaction (schema migrations). */
    executeAsOwner(text: string): Promise<void>;
    close(): Promise<void>;
}

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function quoteIdentifier(identifier: string): string {
    const escaped = identifier.replace(/"/g, '""');
    return `"${escaped}"`;
}

async function verifyRole(client: pg.PoolClient, role: DbRole): Promise<void> {
    const roleCheck = await client.query<{ current_user: string }>('SELECT current_user');
    const currentUser = roleCheck.rows[0]?.current_user;
    if (currentUser !== role) {
        throw new Error(`CRITICAL: Role enforcement failure. Target: ${role}, Actual: ${currentUser}`);
    }
}

async function resetRole(client: pg.PoolClient, context: string): Promise<boolean> {
    try {
        await client.query('RESET ROLE');
        return true;
    } catch (error) {
        logger.warn({ error }, `[DB] Failed to reset role during ${context}`);
        return false;
    }
}

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

class TaintedClientError extends Error {
    constructor(readonly original: Error) {
        super(original.message, { cause: original });
        this.name = 'TaintedClientError';
    }
}

async function runTransaction<T>(
    client: pg.PoolClient,
    role: DbRole,
    callback: (tx: TxClient) => Promise<T>
): Promise<T> {
    const store = transactionContext.getStore();
    if (store?.inTx) {
        throw new Error('Nested transaction detected: transactionAsRole cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        let commitAttempted = false;
        try {
            await client.query('BEGIN');
            await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
            await verifyRole(client, role);

            const txClient: TxClient = {
                query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<R>(text, params)
            };

            const result = await callback(txClient);
            commitAttempted = true;
            await client.query('COMMIT');
            return result;
        } catch (error) {
            let rollbackFailed = false;
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                rollbackFailed = true;
                logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            const sanitized = ErrorSanitizer.sanitize(error, 'AuditDatabase:TransactionFailed');
            if (commitAttempted || rollbackFailed) {
                throw new TaintedClientError(sanitized);
            }
            throw sanitized;
        }
    });
}

export function createPool(config: DatabaseConfig): pg.Pool {
    return new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.name,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.ssl || config.caCert
            ? { rejectUnauthorized: true, ...(config.caCert !== undefined && { ca: config.caCert }) }
            : false
    });
}

export function createDatabase(pool: pg.Pool): AuditDatabase {
    return {
        queryAsRole: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
            role: DbRole,
            text: string,
            params?: unknown[]
        ): Promise<pg.QueryResult<T>> => {
            const validatedRole = assertDbRole(role);
            const client = await pool.connect();
            try {
                await client.query(`SET ROLE ${quoteIdentifier(validatedRole)}`);
                await verifyRole(client, validatedRole);
                return await client.query<T>(text, params);
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'AuditDatabase:QueryAsRoleFailure');
            } finally {
                const resetOk = await resetRole(client, 'queryAsRole');
                releaseClient(client, !resetOk, 'queryAsRole');
            }
        },

        /**
         * Executes callback inside BEGIN/COMMIT under the given role, rolling
         * back on any error. A client whose commit outcome is unknown is destroyed.
         */
        transactionAsRole: async <T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> => {
            const validatedRole = assertDbRole(role);
            const client = await pool.connect();
            let forceDestroy = false;
            try {
                return await runTransaction(client, validatedRole, callback);
            } catch (error) {
                if (error instanceof TaintedClientError) {
                    forceDestroy = true;
                    throw error.original;
                }
                throw error;
            } finally {
                const resetOk = await resetRole(client, 'transactionAsRole');
                releaseClient(client, forceDestroy || !resetOk, 'transactionAsRole');
            }
        },

        /**
         * Boot-time probe that DB_USER can SET ROLE into each audit role.
         */
        probeRoles: async (): Promise<void> => {
            const client = await pool.connect();
            try {
                for (const role of DB_ROLES) {
                    await client.query('BEGIN');
                    try {
                        await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
                        await verifyRole(client, role);
                        await client.query('ROLLBACK');
                    } catch (error) {
                        try {
                            await client.query('ROLLBACK');
                        } catch (rollbackError) {
                            logger.error({ error: rollbackError }, '[DB] Failed to rollback role probe');
                        }
                        throw ErrorSanitizer.sanitize(error, 'AuditDatabase:ProbeRolesFailure');
                    }
                }
            } finally {
                releaseClient(client, false, 'probeRoles');
            }
        },

        executeAsOwner: async (text: string): Promise<void> => {
            const client = await pool.connect();
            let forceDestroy = false;
            try {
                await client.query('BEGIN');
                await client.query(text);
                await client.query('COMMIT');
            } catch (error) {
                try {
                    await client.query('ROLLBACK');
                } catch (rollbackError) {
                    forceDestroy = true;
                    logger.error({ error: rollbackError }, '[DB] Failed to rollback migration');
                }
                throw ErrorSanitizer.sanitize(error, 'AuditDatabase:MigrationFailure');
            } finally {
                releaseClient(client, forceDestroy, 'executeAsOwner');
            }
        },

        close: async (): Promise<void> => {
            await pool.end();
        }
    };
}

export type { DbRole };
