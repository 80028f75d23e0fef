import { withConnection } from "./connection";
import { Column, Entity, GeneratedValue } from "./decorators";
import { postgresDialect, sqliteDialect, type Dialect } from "./dialect";
import { describeEntity } from "./entity-descriptor";
import { SchemaSyncError } from "./errors";
import { Types } from "./field-types";
import { SchemaSynchronizer } from "./schema-synchronizer";
import { SqliteAdapter } from "./sqlite-adapter";
import { RecordingProvider, mockLogger } from "./test-support";
import type { EntityClass, EntityDescriptor } from "./types";

@Entity("products")
class Product {
  @Column({ primary: true, nullable: false })
  @GeneratedValue()
  id!: number;

  @Column({ nullable: false })
  name!: string;

  @Column({ type: Types.decimal })
  price!: string;

  @Column({ unique: true })
  sku!: string;
}

@Entity("orders")
class Order {
  @Column({ primary: true })
  id!: number;

  @Column()
  status!: string;

  @Column()
  placedAt!: Date;
}

function descriptorOf<T extends object>(entity: EntityClass<T>, dialect: Dialect): EntityDescriptor<T> {
  const descriptor = describeEntity(entity, dialect);
  if (!descriptor) {
    throw new Error(`${entity.name} is not an entity`);
  }
  return descriptor;
}

// =============================================================================
// SQLite (in-memory)
// =============================================================================

describe("SchemaSynchronizer on SQLite", () => {
  let adapter: SqliteAdapter;

  beforeEach(() => {
    adapter = new SqliteAdapter({ filename: ":memory:" });
  });

  afterEach(async () => {
    await adapter.close();
  });

  const columnsOf = (table: string) =>
    withConnection(adapter, async (connection) => {
      const { rows } = await connection.query("SELECT name FROM pragma_table_info(?)", [table]);
      return rows.map((row) => row.name);
    });

  const exec = (sql: string) => withConnection(adapter, (connection) => connection.query(sql));

  it("creates a missing table with every column", async () => {
    const synchronizer = new SchemaSynchronizer(adapter);
    const result = await synchronizer.sync(descriptorOf(Product, sqliteDialect));

    expect(result).toEqual({
      table: "products",
      created: true,
      addedColumns: ["id", "name", "price", "sku"],
      statements: [
        'CREATE TABLE IF NOT EXISTS "products" ("id" INTEGER PRIMARY KEY NOT NULL, "name" TEXT NOT NULL, "price" TEXT, "sku" TEXT UNIQUE)',
      ],
    });
    expect(await columnsOf("products")).toEqual(["id", "name", "price", "sku"]);
  });

  it("does nothing when the table is up to date", async () => {
    const synchronizer = new SchemaSynchronizer(adapter);
    await synchronizer.sync(descriptorOf(Product, sqliteDialect));

    const second = await synchronizer.sync(descriptorOf(Product, sqliteDialect));

    expect(second).toEqual({
      table: "products",
      created: false,
      addedColumns: [],
      statements: [],
    });
  });

  it("adds missing columns and keeps the ones it does not know", async () => {
    await exec('CREATE TABLE "orders" ("id" INTEGER PRIMARY KEY, "legacy" TEXT)');
    const synchronizer = new SchemaSynchronizer(adapter);

    const result = await synchronizer.sync(descriptorOf(Order, sqliteDialect));

    expect(result.created).toBe(false);
    expect(result.addedColumns).toEqual(["status", "placedAt"]);
    expect(result.statements).toEqual([
      'ALTER TABLE "orders" ADD COLUMN "status" TEXT',
      'ALTER TABLE "orders" ADD COLUMN "placedAt" TIMESTAMP',
    ]);
    expect(await columnsOf("orders")).toEqual(["id", "legacy", "status", "placedAt"]);
  });

  it("logs what it changed", async () => {
    const logger = mockLogger();
    const synchronizer = new SchemaSynchronizer(adapter, logger);
    await exec('CREATE TABLE "orders" ("id" INTEGER PRIMARY KEY)');

    await synchronizer.sync(descriptorOf(Product, sqliteDialect));
    await synchronizer.sync(descriptorOf(Order, sqliteDialect));

    expect(logger.info).toHaveBeenCalledWith("Created table: products");
    expect(logger.info).toHaveBeenCalledWith("Added columns to orders: status, placedAt");
  });

  it("wraps a rejected statement in SchemaSyncError", async () => {
    await exec('CREATE TABLE "products" ("id" INTEGER PRIMARY KEY, "name" TEXT, "price" NUMERIC)');
    const synchronizer = new SchemaSynchronizer(adapter);

    const error = await synchronizer.sync(descriptorOf(Product, sqliteDialect)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaSyncError);
    expect(error).toMatchObject({
      code: "SCHEMA_SYNC_ERROR",
      table: "products",
      statement: 'ALTER TABLE "products" ADD COLUMN "sku" TEXT UNIQUE',
    });
  });
});

// =============================================================================
// PostgreSQL DDL (recorded)
// =============================================================================

describe("SchemaSynchronizer on PostgreSQL", () => {
  it("asks the catalog, then creates the table", async () => {
    const provider = new RecordingProvider(postgresDialect);
    const synchronizer = new SchemaSynchronizer(provider);

    await synchronizer.sync(descriptorOf(Product, postgresDialect));

    expect(provider.queries).toEqual([
      { sql: postgresDialect.listColumnsSql, params: ["products"] },
      {
        sql: 'CREATE TABLE IF NOT EXISTS "products" ("id" SERIAL PRIMARY KEY NOT NULL, "name" TEXT NOT NULL, "price" NUMERIC(18,4), "sku" TEXT UNIQUE)',
        params: [],
      },
    ]);
    expect(provider.released).toBe(provider.acquired);
  });

  it("adds only the columns the catalog does not list", async () => {
    const provider = new RecordingProvider(postgresDialect, (sql) =>
      sql === postgresDialect.listColumnsSql
        ? { rows: [{ name: "id" }, { name: "name" }], rowCount: 2 }
        : { rows: [], rowCount: 0 }
    );
    const synchronizer = new SchemaSynchronizer(provider);

    const result = await synchronizer.sync(descriptorOf(Product, postgresDialect));

    expect(result.statements).toEqual([
      'ALTER TABLE "products" ADD COLUMN "price" NUMERIC(18,4)',
      'ALTER TABLE "products" ADD COLUMN "sku" TEXT UNIQUE',
    ]);
  });

  it("skips entities without columns", async () => {
    class Empty {}
    const provider = new RecordingProvider(postgresDialect);
    const synchronizer = new SchemaSynchronizer(provider);

    const result = await synchronizer.sync({ entity: Empty, tableName: "empty", columns: [] });

    expect(result).toEqual({ table: "empty", created: false, addedColumns: [], statements: [] });
    expect(provider.acquired).toBe(0);
  });

  it("releases the connection when the catalog query fails", async () => {
    const provider = new RecordingProvider(postgresDialect, () => {
      throw new Error("permission denied for schema public");
    });
    const synchronizer = new SchemaSynchronizer(provider);

    await expect(synchronizer.sync(descriptorOf(Product, postgresDialect))).rejects.toThrow(
      "Failed to synchronize table products: permission denied for schema public"
    );
    expect(provider.released).toBe(1);
  });
});
