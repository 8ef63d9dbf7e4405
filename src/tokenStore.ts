import { promises as fs } from 'node:fs';
import path from 'node:path';
import { type ColumnType, Kysely, MysqlDialect, PostgresDialect, SqliteDialect } from 'kysely';
import type { DbDriver } from './config.js';
import type { CredentialCipher } from './credentialCipher.js';
import { DecryptionError } from './errors.js';
import { createLogger } from './log.js';
import type { CredentialRecord, SealedCredentialRow } from './types.js';

const log = createLogger('token-store');

type TokenStoreConfig =
  | {
      driver?: DbDriver;
      url?: string;
      sqlitePath?: string;
    }
  | undefined;

// pg hands BIGINT back as a string.
type EpochMsColumn = ColumnType<number | string, number, number>;

type CredentialRow = {
  user_id: string;
  access_token_enc: string;
  refresh_token_enc: string | null;
  expires_at: EpochMsColumn;
  scopes: string;
  created_at: EpochMsColumn;
  updated_at: EpochMsColumn;
};

type ConsumedStateRow = {
  nonce: string;
  expires_at: EpochMsColumn;
};

interface TokenDatabase {
  oauth_credentials: CredentialRow;
  consumed_flow_states: ConsumedStateRow;
}

/** Persistence underneath {@link TokenStore}. Only ever sees sealed token material. */
export interface CredentialBackend {
  getRow(userId: string): Promise<SealedCredentialRow | null>;
  /** Upsert; returns false and writes nothing when the stored row is newer. */
  putRow(row: SealedCredentialRow): Promise<boolean>;
  deleteRow(userId: string): Promise<void>;
  /** Records a flow-state nonce; false when it was already recorded. */
  consumeStateNonce(nonce: string, expiresAt: number): Promise<boolean>;
  pruneConsumedStates(now: number): Promise<number>;
  close(): Promise<void>;
}

export class InMemoryCredentialBackend implements CredentialBackend {
  private rows = new Map<string, SealedCredentialRow>();
  private consumedStates = new Map<string, number>();

  async getRow(userId: string): Promise<SealedCredentialRow | null> {
    const row = this.rows.get(userId);
    return row ? { ...row, scopes: [...row.scopes] } : null;
  }

  async putRow(row: SealedCredentialRow): Promise<boolean> {
    const existing = this.rows.get(row.userId);
    if (existing && existing.updatedAt > row.updatedAt) {
      return false;
    }
    this.rows.set(row.userId, {
      ...row,
      scopes: [...row.scopes],
      createdAt: existing?.createdAt ?? row.createdAt,
    });
    return true;
  }

  async deleteRow(userId: string): Promise<void> {
    this.rows.delete(userId);
  }

  async consumeStateNonce(nonce: string, expiresAt: number): Promise<boolean> {
    if (this.consumedStates.has(nonce)) {
      return false;
    }
    this.consumedStates.set(nonce, expiresAt);
    return true;
  }

  async pruneConsumedStates(now: number): Promise<number> {
    let removed = 0;
    for (const [nonce, expiresAt] of this.consumedStates) {
      if (expiresAt <= now) {
        this.consumedStates.delete(nonce);
        removed += 1;
      }
    }
    return removed;
  }

  async close(): Promise<void> {
    this.rows.clear();
    this.consumedStates.clear();
  }
}

export class KyselyCredentialBackend implements CredentialBackend {
  constructor(
    private readonly db: Kysely<TokenDatabase>,
    private readonly driver: DbDriver,
    private readonly destroyFn: () => Promise<void> | void,
  ) {}

  async getRow(userId: string): Promise<SealedCredentialRow | null> {
    const row = await this.db
      .selectFrom('oauth_credentials')
      .selectAll()
      .where('user_id', '=', userId)
      .executeTakeFirst();
    if (!row) return null;
    return {
      userId: row.user_id,
      accessTokenEnc: row.access_token_enc,
      refreshTokenEnc: row.refresh_token_enc,
      expiresAt: Number(row.expires_at),
      scopes: parseScopes(row.scopes),
      createdAt: Number(row.created_at),
      updatedAt: Number(row.updated_at),
    };
  }

  async putRow(row: SealedCredentialRow): Promise<boolean> {
    return this.db.transaction().execute(async (trx) => {
      const existing = await trx
        .selectFrom('oauth_credentials')
        .select('updated_at')
        .where('user_id', '=', row.userId)
        .executeTakeFirst();
      if (existing && Number(existing.updated_at) > row.updatedAt) {
        return false;
      }
      if (existing) {
        await trx
          .updateTable('oauth_credentials')
          .set({
            access_token_enc: row.accessTokenEnc,
            refresh_token_enc: row.refreshTokenEnc,
            expires_at: row.expiresAt,
            scopes: JSON.stringify(row.scopes),
            updated_at: row.updatedAt,
          })
          .where('user_id', '=', row.userId)
          .execute();
      } else {
        await trx
          .insertInto('oauth_credentials')
          .values({
            user_id: row.userId,
            access_token_enc: row.accessTokenEnc,
            refresh_token_enc: row.refreshTokenEnc,
            expires_at: row.expiresAt,
            scopes: JSON.stringify(row.scopes),
            created_at: row.createdAt,
            updated_at: row.updatedAt,
          })
          .execute();
      }
      return true;
    });
  }

  async deleteRow(userId: string): Promise<void> {
    await this.db.deleteFrom('oauth_credentials').where('user_id', '=', userId).execute();
  }

  async consumeStateNonce(nonce: string, expiresAt: number): Promise<boolean> {
    const insert = this.db
      .insertInto('consumed_flow_states')
      .values({ nonce, expires_at: expiresAt });
    const result =
      this.driver === 'mysql'
        ? await insert.ignore().executeTakeFirst()
        : await insert.onConflict((oc) => oc.column('nonce').doNothing()).executeTakeFirst();
    return (result.numInsertedOrUpdatedRows ?? 0n) > 0n;
  }

  async pruneConsumedStates(now: number): Promise<number> {
    const result = await this.db
      .deleteFrom('consumed_flow_states')
      .where('expires_at', '<=', now)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  async close(): Promise<void> {
    await this.destroyFn();
  }
}

function parseScopes(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed)
      ? parsed.filter((item): item is string => typeof item === 'string')
      : [];
  } catch {
    return [];
  }
}

/**
 * Per-user credential custody. Token fields are sealed on the way in and
 * opened on the way out; nothing below this class sees a plaintext token.
 */
export class TokenStore {
  constructor(
    private readonly backend: CredentialBackend,
    private readonly cipher: CredentialCipher,
  ) {}

  /**
   * A row that fails to open is purged and reported as {@link DecryptionError};
   * it is never handed out.
   */
  async get(userId: string): Promise<CredentialRecord | null> {
    const row = await this.backend.getRow(userId);
    if (!row) return null;
    try {
      return {
        userId: row.userId,
        accessToken: this.cipher.open(row.accessTokenEnc),
        refreshToken: row.refreshTokenEnc ? this.cipher.open(row.refreshTokenEnc) : undefined,
        expiresAt: row.expiresAt,
        scopes: row.scopes,
        updatedAt: row.updatedAt,
      };
    } catch (error) {
      if (!(error instanceof DecryptionError)) {
        throw error;
      }
      log.error('stored credential failed to decrypt; purging', {
        userId,
        reason: error.message,
      });
      await this.backend.deleteRow(userId);
      throw error;
    }
  }

  async put(record: CredentialRecord): Promise<boolean> {
    return this.backend.putRow({
      userId: record.userId,
      accessTokenEnc: this.cipher.seal(record.accessToken),
      refreshTokenEnc: record.refreshToken ? this.cipher.seal(record.refreshToken) : null,
      expiresAt: record.expiresAt,
      scopes: [...record.scopes],
      createdAt: record.updatedAt,
      updatedAt: record.updatedAt,
    });
  }

  async delete(userId: string): Promise<void> {
    await this.backend.deleteRow(userId);
  }

  async consumeStateNonce(nonce: string, expiresAt: number): Promise<boolean> {
    return this.backend.consumeStateNonce(nonce, expiresAt);
  }

  async pruneConsumedStates(now: number): Promise<number> {
    return this.backend.pruneConsumedStates(now);
  }

  async close(): Promise<void> {
    await this.backend.close();
  }
}

async function ensureSqliteDir(filePath: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
}

async function ensureSchema(db: Kysely<TokenDatabase>): Promise<void> {
  await db.schema
    .createTable('oauth_credentials')
    .ifNotExists()
    .addColumn('user_id', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('access_token_enc', 'text', (col) => col.notNull())
    .addColumn('refresh_token_enc', 'text')
    .addColumn('expires_at', 'bigint', (col) => col.notNull())
    .addColumn('scopes', 'text', (col) => col.notNull())
    .addColumn('created_at', 'bigint', (col) => col.notNull())
    .addColumn('updated_at', 'bigint', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('consumed_flow_states')
    .ifNotExists()
    .addColumn('nonce', 'varchar(64)', (col) => col.primaryKey())
    .addColumn('expires_at', 'bigint', (col) => col.notNull())
    .execute();
}

function normalizeSqlitePath(target: string): string {
  if (!target) return target;
  if (target.startsWith('sqlite:') || target.startsWith('file:')) {
    try {
      const url = new URL(target);
      const combined =
        url.hostname && url.hostname !== 'localhost'
          ? path.join('/', url.hostname, url.pathname)
          : url.pathname;
      return decodeURIComponent(combined);
    } catch {
      return target.replace(/^sqlite:\/\//, '').replace(/^sqlite:/, '').replace(/^file:\/*/, '');
    }
  }
  return target;
}

async function createSqliteBackend(sqlitePath?: string): Promise<CredentialBackend> {
  const rawPath = sqlitePath ?? path.resolve(process.cwd(), 'data', 'token-custody.sqlite');
  let filePath = normalizeSqlitePath(rawPath);
  if (filePath !== ':memory:') {
    if (!path.isAbsolute(filePath)) {
      filePath = path.resolve(process.cwd(), filePath);
    }
    await ensureSqliteDir(filePath);
  }

  let sqliteModule;
  try {
    sqliteModule = await import('better-sqlite3');
  } catch (error) {
    throw new Error(
      'Failed to load better-sqlite3. Install it with `npm install better-sqlite3` when using TOKEN_DB_DRIVER=sqlite.',
      { cause: error },
    );
  }
  const BetterSqlite3 = sqliteModule.default;
  const sqlite = new BetterSqlite3(filePath);
  if (filePath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  const dialect = new SqliteDialect({ database: sqlite });
  const db = new Kysely<TokenDatabase>({ dialect });
  await ensureSchema(db);
  // Kysely's sqlite driver closes the database on destroy.
  return new KyselyCredentialBackend(db, 'sqlite', () => db.destroy());
}

async function createPostgresBackend(url?: string): Promise<CredentialBackend> {
  if (!url) {
    throw new Error('PostgreSQL URL required (set TOKEN_DB_URL or DATABASE_URL).');
  }
  let pgModule;
  try {
    pgModule = await import('pg');
  } catch (error) {
    throw new Error(
      'Failed to load pg module. Install it with `npm install pg` when using TOKEN_DB_DRIVER=postgres.',
      { cause: error },
    );
  }
  const pool = new pgModule.default.Pool({ connectionString: url });
  const dialect = new PostgresDialect({ pool });
  const db = new Kysely<TokenDatabase>({ dialect });
  await ensureSchema(db);
  // destroy() ends the pool.
  return new KyselyCredentialBackend(db, 'postgres', () => db.destroy());
}

async function createMysqlBackend(url?: string): Promise<CredentialBackend> {
  if (!url) {
    throw new Error('MySQL URL required (set TOKEN_DB_URL or DATABASE_URL).');
  }
  let mysqlModule;
  try {
    mysqlModule = await import('mysql2');
  } catch (error) {
    throw new Error(
      'Failed to load mysql2 module. Install it with `npm install mysql2` when using TOKEN_DB_DRIVER=mysql.',
      { cause: error },
    );
  }
  const pool = mysqlModule.default.createPool(url);
  const dialect = new MysqlDialect({ pool });
  const db = new Kysely<TokenDatabase>({ dialect });
  await ensureSchema(db);
  return new KyselyCredentialBackend(db, 'mysql', () => db.destroy());
}

export async function createCredentialBackend(
  config?: TokenStoreConfig,
): Promise<CredentialBackend> {
  if (!config || !config.driver) {
    return new InMemoryCredentialBackend();
  }

  const driver = config.driver;
  if (driver === 'sqlite') {
    return createSqliteBackend(config.sqlitePath ?? config.url);
  }
  if (driver === 'postgres') {
    return createPostgresBackend(config.url);
  }
  if (driver === 'mysql') {
    return createMysqlBackend(config.url);
  }

  throw new Error(`Unsupported TOKEN_DB_DRIVER value: ${String(driver)}`);
}

export async function createTokenStore(
  config: TokenStoreConfig,
  cipher: CredentialCipher,
): Promise<TokenStore> {
  return new TokenStore(await createCredentialBackend(config), cipher);
}
