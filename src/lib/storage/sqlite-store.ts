import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { z } from "zod";
import { InvalidTransitionError, StorageError } from "../errors";
import { SUPPORTED_LANGUAGES } from "../agent/language";
import { createLogger, type Logger } from "../logger";
import type { DigitalParchi, ParchiUpdate } from "../trade/types";
import { applyParchiUpdate, assertListOptions, type ListOptions, type ParchiStore } from "./types";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS parchis (
  id TEXT PRIMARY KEY,
  vendor_id TEXT,
  status TEXT NOT NULL,
  product_name TEXT NOT NULL,
  quantity REAL NOT NULL,
  unit TEXT NOT NULL,
  unit_price REAL NOT NULL,
  total_amount REAL NOT NULL,
  mandi_cess REAL NOT NULL,
  trade_timestamp TEXT NOT NULL,
  language TEXT NOT NULL,
  conversation_id TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_parchis_created_at ON parchis(created_at);
CREATE INDEX IF NOT EXISTS idx_parchis_vendor_id ON parchis(vendor_id);
`;

// Rows are validated on the way out so a hand-edited database surfaces as
// a StorageError instead of a mistyped record.
const ParchiRowSchema = z.object({
  id: z.string(),
  vendor_id: z.string().nullable(),
  status: z.enum(["DRAFT", "COMPLETED", "CANCELLED"]),
  product_name: z.string(),
  quantity: z.number(),
  unit: z.string(),
  unit_price: z.number(),
  total_amount: z.number(),
  mandi_cess: z.number(),
  trade_timestamp: z.string(),
  language: z.enum(SUPPORTED_LANGUAGES),
  conversation_id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

type ParchiRow = z.infer<typeof ParchiRowSchema>;

function toRow(p: DigitalParchi): ParchiRow {
  const t = p.tradeData;
  return {
    id: p.id,
    vendor_id: p.vendorId,
    status: p.status,
    product_name: t.productName,
    quantity: t.quantity,
    unit: t.unit,
    unit_price: t.unitPrice,
    total_amount: t.totalAmount,
    mandi_cess: t.mandiCess,
    trade_timestamp: t.timestamp.toISOString(),
    language: t.language,
    conversation_id: t.conversationId,
    created_at: p.createdAt.toISOString(),
    updated_at: p.updatedAt.toISOString(),
  };
}

function toParchi(raw: unknown): DigitalParchi {
  const parsed = ParchiRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageError(`Malformed parchi row: ${JSON.stringify(parsed.error.issues)}`);
  }
  const r = parsed.data;
  return {
    id: r.id,
    tradeData: {
      productName: r.product_name,
      quantity: r.quantity,
      unit: r.unit,
      unitPrice: r.unit_price,
      totalAmount: r.total_amount,
      mandiCess: r.mandi_cess,
      timestamp: new Date(r.trade_timestamp),
      language: r.language,
      conversationId: r.conversation_id,
    },
    vendorId: r.vendor_id,
    status: r.status,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new StorageError(`Could not open parchi database at ${dbPath}`, error);
  }
}

export interface SqliteStoreOptions {
  /** File path, or ":memory:" for a throwaway database. */
  path: string;
  now?: () => Date;
}

/**
 * better-sqlite3 backed store. The schema is created on open; each write
 * runs in its own transaction.
 */
export class SqliteParchiStore implements ParchiStore {
  private db: Database.Database;
  private now: () => Date;
  private log: Logger;

  constructor(options: SqliteStoreOptions) {
    this.now = options.now ?? (() => new Date());
    this.log = createLogger("storage/sqlite");
    this.db = openDatabase(options.path);
    this.log.debug({ path: options.path }, "parchi database opened");
  }

  async save(parchi: DigitalParchi): Promise<string> {
    const row = toRow(parchi);
    this.guard(`save parchi ${parchi.id}`, () => {
      const insert = this.db.prepare(`INSERT OR REPLACE INTO parchis (id, vendor_id, status, product_name, quantity, unit, unit_price, total_amount, mandi_cess, trade_timestamp, language, conversation_id, created_at, updated_at)
        VALUES (@id, @vendor_id, @status, @product_name, @quantity, @unit, @unit_price, @total_amount, @mandi_cess, @trade_timestamp, @language, @conversation_id, @created_at, @updated_at)`);
      this.db.transaction(() => insert.run(row))();
    });
    return parchi.id;
  }

  async get(id: string): Promise<DigitalParchi | null> {
    const row = this.guard(`read parchi ${id}`, () => this.db.prepare("SELECT * FROM parchis WHERE id = ?").get(id));
    return row === undefined ? null : toParchi(row);
  }

  async list(options: ListOptions): Promise<DigitalParchi[]> {
    const { limit, offset } = assertListOptions(options);
    const rows = this.guard("list parchis", () =>
      options.since
        ? this.db
            .prepare("SELECT * FROM parchis WHERE created_at >= ? ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?")
            .all(options.since.toISOString(), limit, offset)
        : this.db.prepare("SELECT * FROM parchis ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?").all(limit, offset)
    );
    return rows.map(toParchi);
  }

  // Read, transition check and write share one synchronous transaction, so
  // concurrent updates cannot both start from the same status.
  async update(id: string, changes: ParchiUpdate): Promise<boolean> {
    return this.guard(`update parchi ${id}`, () => {
      const read = this.db.prepare("SELECT * FROM parchis WHERE id = ?");
      const write = this.db.prepare(
        "UPDATE parchis SET status = @status, vendor_id = @vendor_id, updated_at = @updated_at WHERE id = @id"
      );
      return this.db.transaction(() => {
        const raw = read.get(id);
        if (raw === undefined) return false;
        // Lifecycle violations propagate as InvalidTransitionError
        const row = toRow(applyParchiUpdate(toParchi(raw), changes, this.now()));
        return write.run({ id: row.id, status: row.status, vendor_id: row.vendor_id, updated_at: row.updated_at }).changes > 0;
      })();
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = this.guard(`delete parchi ${id}`, () => this.db.prepare("DELETE FROM parchis WHERE id = ?").run(id));
    return result.changes > 0;
  }

  async count(): Promise<number> {
    const row = this.guard("count parchis", () => this.db.prepare("SELECT COUNT(*) AS n FROM parchis").get());
    const parsed = z.object({ n: z.number() }).safeParse(row);
    if (!parsed.success) throw new StorageError("Unexpected result from count query");
    return parsed.data.n;
  }

  async healthCheck(): Promise<boolean> {
    try {
      this.db.prepare("SELECT 1").get();
      return true;
    } catch (error) {
      this.log.warn({ err: error }, "parchi database health check failed");
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof InvalidTransitionError || error instanceof StorageError) throw error;
      this.log.error({ err: error, action }, "parchi database error");
      throw new StorageError(`Failed to ${action}`, error);
    }
  }
}
