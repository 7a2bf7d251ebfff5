import type { FieldMap } from "./Field.js";

/** Names of the root operation types. */
export interface RootSchema {
  readonly query?: string;
  readonly mutation?: string;
}

export type TypeRegistry = Readonly<Record<string, FieldMap>>;

export interface GraphQL {
  readonly schema: RootSchema;
  /** Type name to field name to field. */
  readonly types: TypeRegistry;
}

export function emptyGraphQL(): GraphQL {
  return { schema: {}, types: {} };
}

export function rootSchema(query?: string, mutation?: string): RootSchema {
  return {
    ...(query !== undefined && { query }),
    ...(mutation !== undefined && { mutation }),
  };
}

export function withGraphQLQuery(graphQL: GraphQL, query: string): GraphQL {
  return { ...graphQL, schema: { ...graphQL.schema, query } };
}

export function withGraphQLMutation(graphQL: GraphQL, mutation: string): GraphQL {
  return { ...graphQL, schema: { ...graphQL.schema, mutation } };
}

/** Adds a type, replacing any type already registered under the same name. */
export function withGraphQLType(graphQL: GraphQL, name: string, fields: FieldMap): GraphQL {
  return { ...graphQL, types: { ...graphQL.types, [name]: { ...fields } } };
}
