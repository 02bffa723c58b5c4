import { describe, it, expect } from "vitest";
import { cidrContains, parseCidr, parseIpAddress, prefixContains, tryParseCidr } from "./cidr.js";
import { ParseError } from "../errors.js";

describe("parseIpAddress", () => {
  it("parses IPv4 to an integer", () => {
    expect(parseIpAddress("10.0.0.1")).toEqual({ family: 4, value: 167772161n });
  });

  it("expands compressed IPv6", () => {
    expect(parseIpAddress("::1")).toEqual({ family: 6, value: 1n });
    expect(parseIpAddress("fd00::")?.value).toBe(0xfd00n << 112n);
  });

  it("handles an embedded dotted quad", () => {
    expect(parseIpAddress("::ffff:10.0.0.1")?.value).toBe((0xffffn << 32n) | 167772161n);
  });

  it("rejects garbage", () => {
    expect(parseIpAddress("10.0.0")).toBeNull();
    expect(parseIpAddress("")).toBeNull();
    expect(parseIpAddress("vm1")).toBeNull();
  });
});

describe("parseCidr", () => {
  it("masks host bits", () => {
    const block = parseCidr("10.1.2.3/8");
    expect(block.network).toBe(167772160n);
    expect(block.prefixLength).toBe(8);
    expect(block.text).toBe("10.1.2.3/8");
  });

  it("treats a bare address as a host route", () => {
    expect(parseCidr("192.168.1.4").prefixLength).toBe(32);
  });

  it("throws ParseError for malformed prefixes", () => {
    expect(() => parseCidr("10.0.0.0/33")).toThrow(ParseError);
    expect(() => parseCidr("10.0.0.0/abc")).toThrow(ParseError);
    expect(() => parseCidr("10.0.0.0/8/1")).toThrow(ParseError);
    expect(() => parseCidr("Internet")).toThrow(ParseError);
    expect(tryParseCidr("")).toBeNull();
  });
});

describe("cidrContains", () => {
  it("matches addresses inside the range", () => {
    const block = parseCidr("10.0.0.0/8");
    expect(cidrContains(block, "10.255.1.9")).toBe(true);
    expect(cidrContains(block, "11.0.0.1")).toBe(false);
  });

  it("matches everything for a zero-length prefix of the same family", () => {
    expect(prefixContains("0.0.0.0/0", "203.0.113.7")).toBe(true);
    expect(prefixContains("0.0.0.0/0", "fd00::1")).toBe(false);
  });

  it("respects range boundaries", () => {
    expect(prefixContains("172.20.4.0/22", "172.20.7.255")).toBe(true);
    expect(prefixContains("172.20.4.0/22", "172.20.8.0")).toBe(false);
  });

  it("supports IPv6 prefixes", () => {
    expect(prefixContains("fd00:10::/32", "fd00:10:0:1::4")).toBe(true);
    expect(prefixContains("fd00:10::/32", "fd00:11::4")).toBe(false);
  });

  it("never matches empty or malformed addresses", () => {
    expect(prefixContains("10.0.0.0/8", "")).toBe(false);
    expect(prefixContains("10.0.0.0/8", undefined)).toBe(false);
    expect(prefixContains("10.0.0.0/8", "10.0.0")).toBe(false);
    expect(prefixContains("not-a-prefix", "10.0.0.1")).toBe(false);
  });
});
