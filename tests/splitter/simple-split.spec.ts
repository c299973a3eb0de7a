import { describe, expect, it } from "vitest";

import { DelimiterSplitter } from "../../src/splitter/simple-split.js";

describe("DelimiterSplitter", () => {
  const splitter = new DelimiterSplitter();

  it("drops delimiters between segments", () => {
    expect(splitter.split("usage_getdata")).toEqual(["usage", "getdata"]);
    expect(splitter.split("NSTEMPLATEMATCHREFSET_METER")).toEqual([
      "NSTEMPLATEMATCHREFSET",
      "METER",
    ]);
    expect(splitter.split("a.b-c d$e")).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("ignores leading, trailing and repeated delimiters", () => {
    expect(splitter.split("__init__")).toEqual(["init"]);
    expect(splitter.split("")).toEqual([]);
    expect(splitter.split("___")).toEqual([]);
  });

  it("splits at lower-to-upper transitions", () => {
    expect(splitter.split("getMAX")).toEqual(["get", "MAX"]);
    expect(splitter.split("fooBarBaz")).toEqual(["foo", "Bar", "Baz"]);
  });

  it("leaves upper-to-lower transitions for the case-transition stage", () => {
    expect(splitter.split("GPSmodule")).toEqual(["GPSmodule"]);
    expect(splitter.split("ASTVisitor")).toEqual(["ASTVisitor"]);
  });

  it("splits digit runs into their own segments", () => {
    expect(splitter.split("utf8_decode")).toEqual(["utf", "8", "decode"]);
    expect(splitter.split("x86_64")).toEqual(["x", "86", "64"]);
    expect(splitter.split("getMAX2json")).toEqual(["get", "MAX", "2", "json"]);
  });

  it("drops digit runs when keepDigits is false", () => {
    const noDigits = new DelimiterSplitter({ keepDigits: false });
    expect(noDigits.split("utf8_decode")).toEqual(["utf", "decode"]);
    expect(noDigits.split("x86_64")).toEqual(["x"]);
  });

  it("handles non-ASCII letters", () => {
    expect(splitter.split("größeWert")).toEqual(["größe", "Wert"]);
  });
});
