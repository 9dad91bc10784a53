import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { asc, eq, or, sql } from "drizzle-orm";
import { mergeContact, StoreUnavailableError } from "@rolodex/core";
import type {
  Contact,
  ContactChanges,
  ContactQuery,
  ContactStore,
  NewContact,
} from "@rolodex/core";
import { contacts, type ContactRow } from "./schema.js";

type Transaction = Parameters<Parameters<BetterSQLite3Database["transaction"]>[0]>[0];

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    first_name: row.first_name,
    last_name: row.last_name,
    email: row.email,
    phone_number: row.phone_number,
    address: row.address ?? null,
  };
}

/**
 * SqliteContactStore
 * ContactStore backed by SQLite (better-sqlite3 + Drizzle).
 *
 * Each call runs in its own transaction, so a failure rolls back the whole
 * call. Driver exceptions surface as StoreUnavailableError.
 */
export class SqliteContactStore implements ContactStore {
  private sqlite: Database.Database;
  private db: BetterSQLite3Database;

  constructor(path = ":memory:") {
    this.sqlite = new Database(path);
    this.db = drizzle(this.sqlite);
    this.registerFunctions();
    this.ensureTables();
  }

  /**
   * SQLite's lower() folds ASCII only; fold() uses the same Unicode case
   * mapping as the in-memory store's search.
   */
  private registerFunctions() {
    this.sqlite.function("fold", { deterministic: true }, (value: unknown) =>
      typeof value === "string" ? value.toLowerCase() : value
    );
  }

  private ensureTables() {
    // Not a migration system: the table is created once if it is missing
    this.sqlite.exec(`
      CREATE TABLE IF NOT EXISTS contacts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        email TEXT NOT NULL,
        phone_number TEXT NOT NULL,
        address TEXT
      );
    `);
  }

  private async run<T>(operation: string, fn: (tx: Transaction) => T): Promise<T> {
    try {
      return this.db.transaction((tx) => fn(tx));
    } catch (err) {
      throw new StoreUnavailableError(`SQLite ${operation} failed`, err);
    }
  }

  async insert(input: NewContact): Promise<Contact> {
    return this.run("insert", (tx) => {
      const row = tx
        .insert(contacts)
        .values({
          first_name: input.first_name,
          last_name: input.last_name,
          email: input.email,
          phone_number: input.phone_number,
          address: input.address ?? null,
        })
        .returning()
        .get();
      if (!row) {
        throw new Error("insert returned no row");
      }
      return toContact(row);
    });
  }

  async list(query: ContactQuery): Promise<Contact[]> {
    return this.run("list", (tx) => {
      // instr() keeps the search literal: % and _ are not wildcards here
      const needle = query.search;
      const matches = needle
        ? or(
            sql`instr(fold(${contacts.first_name}), fold(${needle})) > 0`,
            sql`instr(fold(${contacts.last_name}), fold(${needle})) > 0`,
            sql`instr(fold(${contacts.email}), fold(${needle})) > 0`
          )
        : undefined;
      const rows = tx
        .select()
        .from(contacts)
        .where(matches)
        .orderBy(asc(contacts.id))
        .limit(query.limit)
        .offset(query.skip)
        .all();
      return rows.map(toContact);
    });
  }

  async findById(id: number): Promise<Contact | null> {
    return this.run("findById", (tx) => {
      const row = tx.select().from(contacts).where(eq(contacts.id, id)).get();
      return row ? toContact(row) : null;
    });
  }

  async update(id: number, changes: ContactChanges): Promise<Contact | null> {
    return this.run("update", (tx) => {
      const row = tx.select().from(contacts).where(eq(contacts.id, id)).get();
      if (!row) return null;

      const merged = mergeContact(toContact(row), changes);
      const updated = tx
        .update(contacts)
        .set({
          first_name: merged.first_name,
          last_name: merged.last_name,
          email: merged.email,
          phone_number: merged.phone_number,
          address: merged.address,
        })
        .where(eq(contacts.id, id))
        .returning()
        .get();
      return updated ? toContact(updated) : null;
    });
  }

  async remove(id: number): Promise<Contact | null> {
    return this.run("remove", (tx) => {
      const row = tx.delete(contacts).where(eq(contacts.id, id)).returning().get();
      return row ? toContact(row) : null;
    });
  }

  close(): void {
    this.sqlite.close();
  }
}
