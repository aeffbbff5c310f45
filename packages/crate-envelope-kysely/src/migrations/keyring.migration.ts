import { sql, type Kysely } from "kysely";

// Migrations only touch the schema, so they take any database type.
export async function up<DB>(db: Kysely<DB>): Promise<void> {
  await db.schema
    .createTable("crate_keyring")
    .ifNotExists()
    .addColumn("fingerprint", "text", (col) => col.primaryKey())
    .addColumn("armored_key", "text", (col) => col.notNull())
    .addColumn("key_kind", "text", (col) =>
      col.notNull().check(sql`key_kind in ('public', 'private')`),
    )
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_crate_keyring_kind")
    .ifNotExists()
    .on("crate_keyring")
    .column("key_kind")
    .execute();
}

export async function down<DB>(db: Kysely<DB>): Promise<void> {
  await db.schema.dropIndex("idx_crate_keyring_kind").ifExists().execute();
  await db.schema.dropTable("crate_keyring").ifExists().execute();
}
