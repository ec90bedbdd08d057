import Database from 'better-sqlite3';
import { stripHexPrefix } from './hex.js';

/** Creation bytecode already fetched, keyed by lower-cased address and chain id. */
export class CreationCodeStore {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS creation_codes (
        address TEXT NOT NULL,
        chain_id INTEGER NOT NULL,
        creation_code TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (address, chain_id)
      )
    `);
  }

  get(address: string, chainId: number): string | null {
    const row = this.db
      .prepare<[string, number], { creation_code: string }>(
        'SELECT creation_code FROM creation_codes WHERE address = ? AND chain_id = ?',
      )
      .get(address.toLowerCase(), chainId);
    return row?.creation_code ?? null;
  }

  /** Insert or replace; `code` is stored without a 0x prefix. */
  save(address: string, chainId: number, code: string): void {
    this.db
      .prepare(`
        INSERT OR REPLACE INTO creation_codes (address, chain_id, creation_code, created_at)
        VALUES (?, ?, ?, ?)
      `)
      .run(address.toLowerCase(), chainId, stripHexPrefix(code), new Date().toISOString());
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM creation_codes').get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
