/**
 * Additive schema synchronization.
 *
 * Compares an entity descriptor with the columns the database reports for
 * its table and issues the DDL that closes the gap: CREATE TABLE when the
 * table has no columns, one ADD COLUMN per missing column otherwise.
 * Existing columns are never dropped, renamed, retyped or made NOT NULL.
 *
 * Two processes synchronizing the same table are not coordinated; the loser
 * of such a race gets a SchemaSyncError.
 */

import { withConnection, type Connection, type ConnectionProvider } from "./connection";
import { errorMessage, SchemaSyncError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { stringColumn } from "./type-guards";
import type { ColumnDescriptor, EntityDescriptor } from "./types";

export interface SyncResult {
  table: string;
  /** True when the table was created by this call */
  created: boolean;
  addedColumns: string[];
  /** DDL statements issued, in order */
  statements: string[];
}

export class SchemaSynchronizer {
  constructor(
    private readonly provider: ConnectionProvider,
    private readonly logger: Logger = createLogger("SchemaSynchronizer")
  ) {}

  async sync(descriptor: EntityDescriptor): Promise<SyncResult> {
    const table = descriptor.tableName;
    const result: SyncResult = {
      table,
      created: false,
      addedColumns: [],
      statements: [],
    };
    if (descriptor.columns.length === 0) {
      return result;
    }

    return withConnection(this.provider, async (connection) => {
      const existing = await this.existingColumns(connection, table);
      const pending = descriptor.columns.filter((c) => !existing.has(c.name));
      if (pending.length === 0) {
        this.logger.debug(`Table ${table} is up to date`);
        return result;
      }

      const { quoteIdent } = this.provider.dialect;
      const definitions = pending.map((c) => this.columnDefinition(c));
      if (existing.size === 0) {
        result.created = true;
        result.statements.push(
          `CREATE TABLE IF NOT EXISTS ${quoteIdent(table)} (${definitions.join(", ")})`
        );
      } else {
        for (const definition of definitions) {
          result.statements.push(
            `ALTER TABLE ${quoteIdent(table)} ADD COLUMN ${definition}`
          );
        }
      }

      for (const statement of result.statements) {
        await this.execute(connection, table, statement);
      }
      result.addedColumns = pending.map((c) => c.name);

      this.logger.info(
        result.created
          ? `Created table: ${table}`
          : `Added columns to ${table}: ${result.addedColumns.join(", ")}`
      );
      return result;
    });
  }

  /** `"name" TYPE [PRIMARY KEY] [NOT NULL] [UNIQUE]` */
  columnDefinition(column: ColumnDescriptor): string {
    let definition = `${this.provider.dialect.quoteIdent(column.name)} ${column.sqlType}`;
    if (column.isPrimaryKey) definition += " PRIMARY KEY";
    if (!column.isNullable) definition += " NOT NULL";
    if (column.isUnique) definition += " UNIQUE";
    return definition;
  }

  private async existingColumns(
    connection: Connection,
    table: string
  ): Promise<Set<string>> {
    const { rows } = await this.query(
      connection,
      table,
      this.provider.dialect.listColumnsSql,
      [table]
    );
    const names = new Set<string>();
    for (const row of rows) {
      const name = stringColumn(row, "name");
      if (name !== undefined) names.add(name);
    }
    return names;
  }

  private async execute(
    connection: Connection,
    table: string,
    statement: string
  ): Promise<void> {
    this.logger.debug(statement);
    await this.query(connection, table, statement, []);
  }

  private async query(
    connection: Connection,
    table: string,
    statement: string,
    params: string[]
  ) {
    try {
      return await connection.query(statement, params);
    } catch (error) {
      throw new SchemaSyncError(
        `Failed to synchronize table ${table}: ${errorMessage(error)}`,
        { table, statement },
        { cause: error }
      );
    }
  }
}
