/**
 * Declarative repositories.
 *
 * A repository is declared as a table of query methods, each with its own
 * named-parameter SQL template and return shape. At registration the
 * templates are parsed once and every method becomes an async function that
 * binds its arguments, runs one statement on its own connection and
 * materializes the rows. Entities stay free of database logic.
 *
 * @example
 * ```typescript
 * export const UserRepository = defineRepository(User, {
 *   findById: Query.single<[id: number]>(
 *     "SELECT * FROM users WHERE id = :id",
 *     ["id"]
 *   ),
 *   findAll: Query.list("SELECT * FROM users ORDER BY id"),
 *   rename: Query.count<[id: number, name: string]>(
 *     "UPDATE users SET name = :name WHERE id = :id",
 *     ["id", "name"]
 *   ),
 * });
 * ```
 */

import { withConnection, type ConnectionProvider } from "./connection";
import { findColumn } from "./entity-descriptor";
import { DeclarationError, ExecutionError, errorMessage } from "./errors";
import type { FieldType } from "./field-types";
import type { Logger } from "./logger";
import { materialize, type ReturnShape, type ShapedResult } from "./materializer";
import {
  bindParameters,
  buildArgumentMap,
  parseTemplate,
  type ParsedTemplate,
} from "./query-template";
import type { EntityClass, EntityDescriptor } from "./types";

/** One parameter name per argument of the method. */
export type ParamNames<A extends unknown[]> = { readonly [K in keyof A]: string };

export type ParamTypes = Readonly<Record<string, FieldType>>;

export interface QueryDefinition<
  A extends unknown[] = unknown[],
  S extends ReturnShape = ReturnShape,
> {
  readonly kind: "query";
  readonly sql: string;
  readonly returns: S;
  /** Parameter names, in argument order */
  readonly params?: readonly string[];
  /** Field types for parameters that need more than runtime inference */
  readonly types?: ParamTypes;
  /** Carries the argument tuple for typing only; never set. */
  readonly args?: A;
}

export type RepositoryMethods = Readonly<Record<string, QueryDefinition>>;

export type RepositoryOf<T extends object, M extends RepositoryMethods> = {
  readonly [K in keyof M]: M[K] extends QueryDefinition<infer A extends unknown[], infer S extends ReturnShape>
    ? (...args: A) => Promise<ShapedResult<T, S>>
    : never;
};

export interface RepositoryDefinition<
  T extends object = object,
  M extends RepositoryMethods = RepositoryMethods,
> {
  readonly name: string;
  readonly entity: EntityClass<T>;
  readonly methods: M;
}

const RETURN_SHAPES: readonly ReturnShape[] = ["list", "single", "optional", "count", "void"];

function declareQuery<S extends ReturnShape>(returns: S) {
  return function <A extends unknown[] = []>(
    sql: string,
    params?: ParamNames<A> & readonly string[],
    types?: ParamTypes
  ): QueryDefinition<A, S> {
    const definition: QueryDefinition<A, S> = {
      kind: "query",
      sql,
      returns,
      params,
      types,
    };
    return Object.freeze(definition);
  };
}

/**
 * Query method declarations, one per return shape.
 */
export const Query = {
  /** Every row, as entities */
  list: declareQuery("list"),
  /** The first row as an entity, or null */
  single: declareQuery("single"),
  /** The first row as an entity, or undefined */
  optional: declareQuery("optional"),
  /** The number of affected rows */
  count: declareQuery("count"),
  /** Runs the statement and resolves to nothing */
  execute: declareQuery("void"),
};

export function defineRepository<T extends object, M extends RepositoryMethods>(
  entity: EntityClass<T>,
  methods: M,
  name = `${entity.name}Repository`
): RepositoryDefinition<T, M> {
  return Object.freeze({ name, entity, methods });
}

export interface RepositoryContext {
  provider: ConnectionProvider;
  logger: Logger;
}

interface CompiledMethod {
  readonly definition: QueryDefinition;
  readonly template: ParsedTemplate;
}

/**
 * Build the live implementation of a repository definition: an explicit
 * dispatch table from method name to parsed template and return shape.
 *
 * @throws DeclarationError when a method is not a usable query declaration
 */
export function createRepository<T extends object, M extends RepositoryMethods>(
  definition: RepositoryDefinition<T, M>,
  descriptor: EntityDescriptor<T>,
  context: RepositoryContext
): RepositoryOf<T, M> {
  const { provider, logger } = context;
  const repository: Record<string, unknown> = {};

  for (const [method, value] of Object.entries(definition.methods)) {
    const compiled = compileMethod(definition.name, method, value, provider);
    const { definition: query, template } = compiled;
    const names = query.params ?? [];
    const resolveType = (name: string) =>
      query.types?.[name] ?? findColumn(descriptor, name)?.fieldType;

    repository[method] = async (...args: unknown[]) => {
      const values = bindParameters(
        template.parameterNames,
        buildArgumentMap(names, args),
        resolveType
      );
      logger.debug(template.statement, values);

      const result = await withConnection(provider, async (connection) => {
        try {
          return await connection.query(template.statement, values);
        } catch (error) {
          throw new ExecutionError(errorMessage(error), template.statement, {
            cause: error,
          });
        }
      });
      return materialize(result, descriptor, query.returns, logger);
    };
  }

  // Keys and signatures follow definition.methods one to one
  return Object.freeze(repository) as RepositoryOf<T, M>;
}

function compileMethod(
  repository: string,
  method: string,
  value: unknown,
  provider: ConnectionProvider
): CompiledMethod {
  const target = `${repository}.${method}`;
  if (!isQueryDefinition(value)) {
    throw new DeclarationError(
      `${target} has no query declaration. Declare it with Query.list/single/optional/count/execute.`,
      target
    );
  }
  if (value.sql.trim().length === 0) {
    throw new DeclarationError(`${target} declares an empty SQL template.`, target);
  }

  const template = parseTemplate(value.sql, provider.dialect);
  if (template.parameterNames.length > 0 && value.params === undefined) {
    throw new DeclarationError(
      `${target} uses named parameters (${template.parameterNames.join(", ")}) but declares no parameter names.`,
      target
    );
  }
  const params = value.params ?? [];
  const duplicate = params.find((name, index) => params.indexOf(name) !== index);
  if (duplicate !== undefined) {
    throw new DeclarationError(
      `${target} declares parameter "${duplicate}" more than once.`,
      target
    );
  }

  return { definition: value, template };
}

function isQueryDefinition(value: unknown): value is QueryDefinition {
  if (typeof value !== "object" || value === null) return false;
  if (!("kind" in value && "sql" in value && "returns" in value)) return false;
  const { kind, sql, returns } = value;
  return (
    kind === "query" &&
    typeof sql === "string" &&
    RETURN_SHAPES.some((shape) => shape === returns)
  );
}
