import { normalizeDomain, isValidHost, toRootSet } from "../lib/subdomain";

describe("normalizeDomain / isValidHost", () => {
  test("normalizes urls and punycode", () => {
    expect(normalizeDomain("https://пример.рф/path")).toBe("xn--e1afmkfd.xn--p1ai");
    expect(normalizeDomain("EXAMPLE.com:8080/foo")).toBe("example.com");
    expect(normalizeDomain("sub.example.co.uk")).toBe("sub.example.co.uk");
    expect(normalizeDomain(" example.com. ")).toBe("example.com");
  });

  test("isValidHost detects valid hosts", () => {
    expect(isValidHost("example.com")).toBe(true);
    expect(isValidHost("xn--e1afmkfd.xn--p1ai")).toBe(true);
    expect(isValidHost("invalid..host")).toBe(false);
    expect(isValidHost("not a host")).toBe(false);
    expect(isValidHost("")).toBe(false);
  });

  test("rejects blank input", () => {
    expect(() => normalizeDomain("   ")).toThrow("Invalid input");
  });
});

describe("toRootSet", () => {
  test("normalises, deduplicates and skips blank lines", () => {
    const roots = toRootSet(["example.com", "", "  EXAMPLE.com ", "https://example.org/x"]);
    expect(Array.from(roots)).toEqual(["example.com", "example.org"]);
  });

  test("reports invalid lines", () => {
    const invalid: string[] = [];
    const roots = toRootSet(["example.com", "invalid..host"], (line) => invalid.push(line));
    expect(Array.from(roots)).toEqual(["example.com"]);
    expect(invalid).toEqual(["invalid..host"]);
  });
});
