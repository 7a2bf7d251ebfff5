import type { Step } from "./Step.js";

/** An argument accepted by a field. */
export interface Arg {
  readonly typeOf: string;
  readonly list: boolean;
  readonly required: boolean;
}

/**
 * A field of a GraphQL type. When `steps` is non-empty the gateway resolves
 * the field by running the steps in order.
 */
export interface Field {
  readonly typeOf: string;
  readonly list: boolean;
  readonly required: boolean;
  readonly steps?: readonly Step[];
  readonly args?: Readonly<Record<string, Arg>>;
}

export type FieldMap = Readonly<Record<string, Field>>;

export type ArgMap = Readonly<Record<string, Arg>>;

export function createArg(typeOf: string): Arg {
  return { typeOf, list: false, required: false };
}

export const stringArg = (): Arg => createArg("String");
export const intArg = (): Arg => createArg("Int");
export const boolArg = (): Arg => createArg("Boolean");

/** Builds a field; steps are attached only when at least one is given. */
export function createField(typeOf: string, ...steps: Step[]): Field {
  const field: Field = { typeOf, list: false, required: false };
  return steps.length > 0 ? { ...field, steps } : field;
}

export const stringField = (): Field => createField("String");
export const intField = (): Field => createField("Int");
export const boolField = (): Field => createField("Boolean");

export function asList<T extends Field | Arg>(node: T): T {
  return { ...node, list: true };
}

export function asRequired<T extends Field | Arg>(node: T): T {
  return { ...node, required: true };
}

export function withArgs(field: Field, args: ArgMap): Field {
  return { ...field, args: { ...args } };
}

export function withSteps(field: Field, ...steps: Step[]): Field {
  return { ...field, steps };
}
