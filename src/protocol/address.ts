import { TrackerError } from "../infra/errors.js";

const HARDWARE_ADDRESS_RE = /^[0-9a-f]{2}([:-]?)[0-9a-f]{2}(?:\1[0-9a-f]{2}){4}$/i;

export function formatHardwareAddress(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(":");
}

/** Canonical form used as registry key: lower-case, colon separated. */
export function normalizeHardwareAddress(raw: string): string {
  const trimmed = raw.trim();
  if (!HARDWARE_ADDRESS_RE.test(trimmed)) {
    throw new TrackerError("INVALID_ADDRESS", `invalid hardware address "${raw}"`);
  }
  const hex = trimmed.replace(/[:-]/g, "").toLowerCase();
  return hex.match(/../g)?.join(":") ?? hex;
}

export function parseHardwareAddress(raw: string): Buffer {
  return Buffer.from(normalizeHardwareAddress(raw).replace(/:/g, ""), "hex");
}

export function formatIpv4(bytes: Uint8Array): string {
  return Array.from(bytes).join(".");
}

export function parseIpv4(raw: string): Buffer {
  const parts = raw.trim().split(".");
  if (parts.length !== 4) {
    throw new TrackerError("INVALID_ADDRESS", `invalid IPv4 address "${raw}"`);
  }
  const octets = parts.map((part) => (/^\d{1,3}$/.test(part) ? Number(part) : Number.NaN));
  if (octets.some((octet) => !Number.isInteger(octet) || octet > 255)) {
    throw new TrackerError("INVALID_ADDRESS", `invalid IPv4 address "${raw}"`);
  }
  return Buffer.from(octets);
}

/** Sort key for dotted IPv4 strings; anything unparsable sorts last. */
export function ipv4SortKey(raw: string): number {
  try {
    return parseIpv4(raw).readUInt32BE(0);
  } catch {
    return 0x1_0000_0000;
  }
}
