import type { Endpoint } from "../http/Endpoint.js";
import type { HttpMethod } from "../http/Method.js";
import type { TSchema } from "../http/TSchema.js";
import type { JsonValue } from "./json.js";

/** Calls an upstream endpoint. `path` may contain template placeholders. */
export interface HttpStep {
  readonly kind: "http";
  readonly path: string;
  readonly method?: HttpMethod;
  readonly input?: TSchema;
  readonly output?: TSchema;
}

/** Resolves the field to a literal JSON value. */
export interface ConstantStep {
  readonly kind: "constant";
  readonly json: JsonValue;
}

/**
 * Projects an upstream object: each output name maps to the path of segments
 * to follow in the source object.
 */
export interface ObjPathStep {
  readonly kind: "objectPath";
  readonly map: Readonly<Record<string, readonly string[]>>;
}

export type Step = HttpStep | ConstantStep | ObjPathStep;

export type StepKind = Step["kind"];

export type HttpStepOptions = {
  method?: HttpMethod;
  input?: TSchema;
  output?: TSchema;
};

export function httpStep(path: string, options: HttpStepOptions = {}): HttpStep {
  return {
    kind: "http",
    path,
    ...(options.method !== undefined && { method: options.method }),
    ...(options.input !== undefined && { input: options.input }),
    ...(options.output !== undefined && { output: options.output }),
  };
}

export function constantStep(json: JsonValue): ConstantStep {
  return { kind: "constant", json };
}

export function objPathStep(map: Readonly<Record<string, readonly string[]>>): ObjPathStep {
  // fromEntries defines own keys, so a "__proto__" entry stays an entry
  return {
    kind: "objectPath",
    map: Object.fromEntries(Object.entries(map).map(([name, segments]) => [name, [...segments]])),
  };
}

export function httpFromEndpoint(endpoint: Endpoint): HttpStep {
  return httpStep(endpoint.path, {
    method: endpoint.method,
    input: endpoint.input,
    output: endpoint.output,
  });
}

export function withMethod(step: HttpStep, method: HttpMethod | undefined): HttpStep {
  const { method: _previous, ...rest } = step;
  return method === undefined ? rest : { ...rest, method };
}

export function withInput(step: HttpStep, input: TSchema | undefined): HttpStep {
  const { input: _previous, ...rest } = step;
  return input === undefined ? rest : { ...rest, input };
}

export function withOutput(step: HttpStep, output: TSchema | undefined): HttpStep {
  const { output: _previous, ...rest } = step;
  return output === undefined ? rest : { ...rest, output };
}

export function assertNeverStep(step: never): never {
  throw new Error(`Unhandled step variant: ${JSON.stringify(step)}`);
}
