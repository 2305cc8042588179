import { describe, it, expect } from "vitest";
import { parseJIDParts } from "../../src/protocol/parser.js";
import {
  IllegalJIDError,
  InvalidJIDError,
} from "../../src/protocol/errors.js";
import { thrown } from "../helpers.js";

describe("parseJIDParts", () => {
  it("splits a full JID", () => {
    expect(parseJIDParts("user@example.com/home")).toEqual({
      node: "user",
      domain: "example.com",
      resource: "home",
    });
  });

  it("parses a bare domain", () => {
    expect(parseJIDParts("example.com")).toEqual({
      node: null,
      domain: "example.com",
      resource: null,
    });
  });

  it("parses a domain with a resource", () => {
    expect(parseJIDParts("example.com/res")).toEqual({
      node: null,
      domain: "example.com",
      resource: "res",
    });
  });

  it("does not prepare anything", () => {
    expect(parseJIDParts("User@EXAMPLE.com/Home")).toEqual({
      node: "User",
      domain: "EXAMPLE.com",
      resource: "Home",
    });
  });

  it("ignores a leading @", () => {
    expect(parseJIDParts("@example.com")).toEqual({
      node: null,
      domain: "example.com",
      resource: null,
    });
  });

  it("yields no resource for a trailing slash", () => {
    expect(parseJIDParts("a/")).toEqual({
      node: null,
      domain: "a",
      resource: null,
    });
    expect(parseJIDParts("user@example.com/").resource).toBeNull();
  });

  it("keeps slashes and @ inside the resource", () => {
    expect(parseJIDParts("user@example.com/a/b@c")).toEqual({
      node: "user",
      domain: "example.com",
      resource: "a/b@c",
    });
  });

  it("treats an @ after the first slash as part of the resource", () => {
    expect(parseJIDParts("example.com/user@x")).toEqual({
      node: null,
      domain: "example.com",
      resource: "user@x",
    });
  });

  it("only splits on the first @", () => {
    expect(parseJIDParts("a@b@c")).toEqual({
      node: "a",
      domain: "b@c",
      resource: null,
    });
  });

  it("yields an empty domain when the text starts with a slash", () => {
    expect(parseJIDParts("/res")).toEqual({
      node: null,
      domain: "",
      resource: "res",
    });
  });

  it("yields an empty domain for empty text", () => {
    expect(parseJIDParts("")).toEqual({
      node: null,
      domain: "",
      resource: null,
    });
  });

  it("rejects a trailing @", () => {
    expect(() => parseJIDParts("example.com@")).toThrow(InvalidJIDError);
    expect(() => parseJIDParts("@")).toThrow(InvalidJIDError);
  });

  it("reports the attempted address", () => {
    const err = thrown(() => parseJIDParts("example.com@"));
    expect(err).toBeInstanceOf(IllegalJIDError);
    expect(err).toBeInstanceOf(InvalidJIDError);
    expect(err).toHaveProperty("name", "InvalidJIDError");
    expect(err).toHaveProperty("literal", "example.com@");
    expect(err).toHaveProperty(
      "message",
      "Illegal JID: example.com@ (empty domain)"
    );
  });

  it("returns all parts null for null or undefined", () => {
    const empty = { node: null, domain: null, resource: null };
    expect(parseJIDParts(null)).toEqual(empty);
    expect(parseJIDParts(undefined)).toEqual(empty);
  });
});
