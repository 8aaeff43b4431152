import { createClient } from "@libsql/client";
import { drizzle } from "drizzle-orm/libsql";
import { dirname } from "node:path";
import { ensureDir } from "@infra/fs/runtime-fs";
import { CONNECTION_PRAGMAS, REQUIRED_TABLE_STATEMENTS } from "./db.consts";
import type { RelayDB } from "./db.types";

export async function createRelayDB(dbPath: string): Promise<RelayDB> {
  await ensureDir(dirname(dbPath));
  const client = createClient({
    url: `file:${dbPath}`,
  });

  for (const statement of CONNECTION_PRAGMAS) {
    await client.execute(statement);
  }
  for (const statement of REQUIRED_TABLE_STATEMENTS) {
    await client.execute(statement);
  }

  return {
    client,
    db: drizzle(client),
  };
}

export { cursorTable, ledgerTable } from "./db.schema";
export type { RelayDB } from "./db.types";
