import { describe, expect, it } from "vitest";
import { objectSchema, scalarSchema } from "../http/TSchema.js";
import { AbsoluteUrl } from "./AbsoluteUrl.js";
import {
  createConfig,
  emptyConfig,
  withBaseUrl,
  withMutation,
  withQuery,
  withRootSchema,
  withType,
  withVersion,
} from "./Config.js";
import { asList, asRequired, boolField, createField, intArg, stringField, withArgs, withSteps } from "./Field.js";
import { isServerEmpty } from "./Server.js";
import { constantStep, httpFromEndpoint, httpStep, objPathStep, withMethod } from "./Step.js";

describe("config builders", () => {
  it("creates the empty config", () => {
    expect(emptyConfig()).toEqual({ version: 0, server: {}, graphQL: { schema: {}, types: {} } });
    expect(isServerEmpty(emptyConfig().server)).toBe(true);
  });

  it("returns new values without touching the receiver", () => {
    const base = emptyConfig();
    const next = withVersion(withQuery(base, "Query"), 4);
    expect(base).toEqual(emptyConfig());
    expect(next.version).toBe(4);
    expect(next.graphQL.schema).toEqual({ query: "Query" });
  });

  it("sets and clears the base URL", () => {
    const parsed = AbsoluteUrl.parse("https://upstream.example.com");
    if (!parsed.ok) {
      throw new Error(parsed.error);
    }
    const withUrl = withBaseUrl(emptyConfig(), parsed.value);
    expect(isServerEmpty(withUrl.server)).toBe(false);
    expect(withBaseUrl(withUrl, undefined).server).toEqual({});
  });

  it("keeps root names that withRootSchema does not mention", () => {
    const config = withMutation(withQuery(emptyConfig(), "Query"), "Mutation");
    expect(withRootSchema(config, { query: "RootQuery" }).graphQL.schema).toEqual({
      query: "RootQuery",
      mutation: "Mutation",
    });
    expect(withRootSchema(config, { mutation: undefined }).graphQL.schema).toEqual({ query: "Query" });
  });

  it("replaces a type registered under the same name", () => {
    const config = withType(
      withType(emptyConfig(), ["User", { id: stringField() }]),
      ["User", { name: stringField() }],
      ["Post", { published: boolField() }],
    );
    expect(config.graphQL.types).toEqual({
      User: { name: stringField() },
      Post: { published: boolField() },
    });
  });

  it("starts from the given sections", () => {
    const config = createConfig({ version: 7, graphQL: { schema: { query: "Q" }, types: {} } });
    expect(config).toEqual({ version: 7, server: {}, graphQL: { schema: { query: "Q" }, types: {} } });
  });
});

describe("field builders", () => {
  it("attaches steps only when some are given", () => {
    expect(createField("String")).toEqual({ typeOf: "String", list: false, required: false });
    expect(createField("String", constantStep("x")).steps).toEqual([{ kind: "constant", json: "x" }]);
  });

  it("sets flags, steps and arguments on copies", () => {
    const base = createField("Post");
    const built = withArgs(withSteps(asRequired(asList(base)), httpStep("/posts")), { limit: intArg() });
    expect(base).toEqual({ typeOf: "Post", list: false, required: false });
    expect(built).toEqual({
      typeOf: "Post",
      list: true,
      required: true,
      steps: [{ kind: "http", path: "/posts" }],
      args: { limit: { typeOf: "Int", list: false, required: false } },
    });
  });
});

describe("step builders", () => {
  it("copies an endpoint into an http step", () => {
    const output = objectSchema({ id: scalarSchema("int") });
    expect(httpFromEndpoint({ path: "/users/{{args.id}}", method: "GET", output })).toEqual({
      kind: "http",
      path: "/users/{{args.id}}",
      method: "GET",
      output,
    });
  });

  it("sets and clears the method", () => {
    const post = withMethod(httpStep("/users"), "POST");
    expect(post.method).toBe("POST");
    expect("method" in withMethod(post, undefined)).toBe(false);
  });

  it("copies the object path map", () => {
    const segments = ["a", "b"];
    const step = objPathStep({ x: segments });
    segments.push("c");
    expect(step.map).toEqual({ x: ["a", "b"] });
  });
});
