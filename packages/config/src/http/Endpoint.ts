import type { HttpMethod } from "./Method.js";
import type { TSchema } from "./TSchema.js";

/**
 * Description of an upstream HTTP operation, as produced by the execution
 * layer. Only read when an Http step is built from it.
 */
export interface Endpoint {
  readonly path: string;
  readonly method: HttpMethod;
  readonly input?: TSchema;
  readonly output?: TSchema;
}
