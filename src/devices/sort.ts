import { ipv4SortKey } from "../protocol/address.js";
import type { DeviceDescriptor } from "./types.js";

export type DeviceSortKey = "ip" | "mac" | "serial" | "type";

export const DEVICE_SORT_KEYS: readonly DeviceSortKey[] = ["ip", "mac", "serial", "type"];

function compareIp(a: DeviceDescriptor, b: DeviceDescriptor): number {
  return ipv4SortKey(a.ipAddress) - ipv4SortKey(b.ipAddress);
}

function macKey(device: DeviceDescriptor): string {
  return device.hardwareAddress.replace(/[:-]/g, "").toUpperCase();
}

export function sortDevices(
  devices: readonly DeviceDescriptor[],
  key: DeviceSortKey = "ip",
): DeviceDescriptor[] {
  const sorted = [...devices];
  switch (key) {
    case "mac":
      return sorted.sort((a, b) => macKey(a).localeCompare(macKey(b)));
    case "serial":
      return sorted.sort((a, b) => a.serialNumber.localeCompare(b.serialNumber));
    case "type":
      // Cameras first, then recorders, each by address.
      return sorted.sort((a, b) => {
        if (a.kind !== b.kind) {
          return a.kind === "camera" ? -1 : 1;
        }
        return compareIp(a, b);
      });
    case "ip":
      return sorted.sort(compareIp);
  }
}

/**
 * IP addresses claimed by more than one responder, mapped to the identifiers
 * (serial number, or MAC when the serial is unknown) of the devices holding them.
 */
export function detectIpConflicts(devices: readonly DeviceDescriptor[]): Map<string, string[]> {
  const byIp = new Map<string, string[]>();
  for (const device of devices) {
    const identifier =
      device.serialNumber && device.serialNumber !== "Unknown"
        ? device.serialNumber
        : device.hardwareAddress;
    const holders = byIp.get(device.ipAddress) ?? [];
    holders.push(identifier);
    byIp.set(device.ipAddress, holders);
  }
  return new Map([...byIp].filter(([, holders]) => holders.length > 1));
}
