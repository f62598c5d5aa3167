import { describe, expect, it } from "vitest";
import {
  formatHardwareAddress,
  ipv4SortKey,
  normalizeHardwareAddress,
  parseHardwareAddress,
  parseIpv4,
} from "./address.js";

describe("hardware addresses", () => {
  it("normalizes separators and case", () => {
    expect(normalizeHardwareAddress("D4-2D-C5-14-C5-70")).toBe("d4:2d:c5:14:c5:70");
    expect(normalizeHardwareAddress(" d42dc514c570 ")).toBe("d4:2d:c5:14:c5:70");
  });

  it("rejects mixed separators and wrong lengths", () => {
    for (const raw of ["d4:2d-c5:14:c5:70", "d4:2d:c5:14:c5", "zz:2d:c5:14:c5:70", ""]) {
      expect(() => normalizeHardwareAddress(raw)).toThrow(`invalid hardware address "${raw}"`);
    }
  });

  it("parses to six bytes and formats back", () => {
    const bytes = parseHardwareAddress("d4:2d:c5:14:c5:70");
    expect([...bytes]).toEqual([0xd4, 0x2d, 0xc5, 0x14, 0xc5, 0x70]);
    expect(formatHardwareAddress(bytes)).toBe("d4:2d:c5:14:c5:70");
  });
});

describe("IPv4 addresses", () => {
  it("parses dotted quads", () => {
    expect([...parseIpv4("192.168.1.101")]).toEqual([192, 168, 1, 101]);
  });

  it("rejects out-of-range and malformed octets", () => {
    for (const raw of ["256.1.1.1", "1.2.3", "1.2.3.4.5", "a.b.c.d", "1.2.3.-4"]) {
      expect(() => parseIpv4(raw)).toThrow(`invalid IPv4 address "${raw}"`);
    }
  });

  it("orders numerically and puts unparsable values last", () => {
    const ips = ["192.168.1.20", "Unknown", "192.168.1.3", "10.0.0.1"];
    expect([...ips].sort((a, b) => ipv4SortKey(a) - ipv4SortKey(b))).toEqual([
      "10.0.0.1",
      "192.168.1.3",
      "192.168.1.20",
      "Unknown",
    ]);
  });
});
