export const CURSOR_ROW_ID = 1;

export const CONNECTION_PRAGMAS = ["pragma busy_timeout = 5000", "pragma journal_mode = wal"] as const;

export const REQUIRED_TABLE_STATEMENTS = [
  `
    create table if not exists cursor (
      id integer primary key,
      last_update_id integer not null,
      last_processed_time integer,
      created_at integer not null
    )
  `,
  `
    create table if not exists ledger (
      update_id integer primary key,
      message_id integer,
      chat_id integer,
      processed_time integer not null,
      message_type text not null
    )
  `,
  "create index if not exists ledger_processed_time_idx on ledger (processed_time)",
] as const;
