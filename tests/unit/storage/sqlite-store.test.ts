import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { StorageError } from "@/lib/errors";
import { createParchiStore, InMemoryParchiStore, SqliteParchiStore } from "@/lib/storage";
import { describeParchiStoreContract } from "../../helpers/store-contract";
import { makeCompletedParchi } from "../../helpers/trades";

describeParchiStoreContract("SqliteParchiStore", (now) => new SqliteParchiStore({ path: ":memory:", now }));

describe("SqliteParchiStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "parchi-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("keeps parchis across a reopen of the same file", async () => {
    const dbPath = path.join(dir, "nested", "parchis.db");
    const parchi = makeCompletedParchi();

    const first = new SqliteParchiStore({ path: dbPath });
    await first.save(parchi);
    await first.close();

    const second = new SqliteParchiStore({ path: dbPath });
    await expect(second.get(parchi.id)).resolves.toEqual(parchi);
    await second.close();
  });

  it("reports unhealthy and rejects with StorageError once closed", async () => {
    const store = new SqliteParchiStore({ path: ":memory:" });
    await store.close();

    await expect(store.healthCheck()).resolves.toBe(false);
    await expect(store.get("parchi-1")).rejects.toBeInstanceOf(StorageError);
    await expect(store.save(makeCompletedParchi())).rejects.toThrow(/^Failed to save parchi /);
    await expect(store.update("parchi-1", { status: "CANCELLED" })).rejects.toThrow("Failed to update parchi parchi-1");
  });

  it("closes more than once without error", async () => {
    const store = new SqliteParchiStore({ path: ":memory:" });
    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});

describe("createParchiStore", () => {
  it("builds the configured backend", async () => {
    const memory = createParchiStore({ backend: "memory", sqlitePath: "unused.db" });
    const sqlite = createParchiStore({ backend: "sqlite", sqlitePath: ":memory:" });

    expect(memory).toBeInstanceOf(InMemoryParchiStore);
    expect(sqlite).toBeInstanceOf(SqliteParchiStore);

    await memory.close();
    await sqlite.close();
  });
});
