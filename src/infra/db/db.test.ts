import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { afterEach, describe, expect, it } from "vitest";
import { createRelayDB } from "./db";

describe("relay db", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map(async (dir) => rm(dir, { recursive: true, force: true })));
  });

  it("creates cursor and ledger tables in a nested directory", async () => {
    const dir = await mkdtemp(join(tmpdir(), "backlog-relay-db-"));
    tempDirs.push(dir);

    const database = await createRelayDB(join(dir, "state", "relay.db"));
    const result = await database.client.execute(
      "select name from sqlite_master where type='table' and name in ('cursor','ledger') order by name",
    );

    expect(result.rows.map((row) => row.name)).toEqual(["cursor", "ledger"]);
    database.client.close();
  });

  it("can be opened twice on the same file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "backlog-relay-db-"));
    tempDirs.push(dir);
    const dbPath = join(dir, "relay.db");

    const first = await createRelayDB(dbPath);
    first.client.close();
    const second = await createRelayDB(dbPath);
    const result = await second.client.execute("select count(*) as total from ledger");

    expect(Number(result.rows[0]?.total)).toBe(0);
    second.client.close();
  });
});
