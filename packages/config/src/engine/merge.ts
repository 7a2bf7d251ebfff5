import { emptyConfig, type Config } from "../model/Config.js";
import { rootSchema, type GraphQL } from "../model/GraphQL.js";
import type { Server } from "../model/Server.js";

export function mergeServer(self: Server, other: Server): Server {
  const baseURL = other.baseURL ?? self.baseURL;
  return baseURL === undefined ? {} : { baseURL };
}

/**
 * Root names resolve independently. Types are a shallow union keyed by type
 * name: a type present on both sides takes `other`'s field map as a whole.
 */
export function mergeGraphQL(self: GraphQL, other: GraphQL): GraphQL {
  return {
    schema: rootSchema(
      other.schema.query ?? self.schema.query,
      other.schema.mutation ?? self.schema.mutation,
    ),
    types: { ...self.types, ...other.types },
  };
}

/**
 * Overlays `other` on top of `self`. `version` always comes from `other`;
 * everything else falls back to `self` where `other` leaves it unset.
 */
export function mergeRight(self: Config, other: Config): Config {
  return {
    version: other.version,
    server: mergeServer(self.server, other.server),
    graphQL: mergeGraphQL(self.graphQL, other.graphQL),
  };
}

/** Folds configurations left to right; later entries win. */
export function mergeAll(configs: readonly Config[]): Config {
  return configs.reduce<Config>((merged, next) => mergeRight(merged, next), emptyConfig());
}
