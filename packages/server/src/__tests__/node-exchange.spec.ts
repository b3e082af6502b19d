import { describe, it, expect } from "vitest";
import { parseQuery, parseRequestUrl, readHeader } from "../node-exchange.js";

describe("parseQuery", () => {
  it("should decode the query string", () => {
    expect(parseQuery("/engine?transport=polling&sid=a%2Bb")).toEqual({
      transport: "polling",
      sid: "a+b",
    });
  });

  it("should keep the last value of a repeated key", () => {
    expect(parseQuery("/engine?sid=first&sid=second")).toEqual({ sid: "second" });
  });

  it("should return an empty query for a target that is not a URL", () => {
    expect(parseQuery("//[")).toEqual({});
  });

  it("should return an empty query for a missing url", () => {
    expect(parseQuery(undefined)).toEqual({});
  });
});

describe("readHeader", () => {
  it("should look up headers case-insensitively", () => {
    expect(readHeader({ origin: "https://app.test" }, "Origin")).toBe("https://app.test");
  });

  it("should join repeated headers", () => {
    expect(readHeader({ "set-cookie": ["a=1", "b=2"] }, "set-cookie")).toBe("a=1, b=2");
  });

  it("should return undefined for an absent header", () => {
    expect(readHeader({}, "origin")).toBeUndefined();
  });
});

describe("parseRequestUrl", () => {
  it("should parse a path with its query", () => {
    const url = parseRequestUrl("/engine?transport=polling");

    expect(url?.pathname).toBe("/engine");
    expect(url?.searchParams.get("transport")).toBe("polling");
  });

  it("should return undefined for a target that is not a URL", () => {
    expect(parseRequestUrl("//[")).toBeUndefined();
  });
});
