import type { DeviceRecord, DeviceStatus, LatestScan } from "./types.js";

export const HOUR_MS = 60 * 60 * 1000;
export const DEFAULT_MISSING_THRESHOLD_MS = 24 * HOUR_MS;

/**
 * Liveness of a record. Presence in the latest scan decides first; only absent
 * devices are split into offline and missing, and an address change seen by
 * the latest scan overrides active. The threshold comparison is strict.
 */
export function deriveStatus(
  record: Pick<DeviceRecord, "hardwareAddress" | "lastSeen">,
  now: Date,
  missingThresholdMs: number,
  scan: LatestScan | null,
): DeviceStatus {
  const inLatestScan = scan?.seen.includes(record.hardwareAddress) ?? false;
  if (!inLatestScan) {
    const sinceSeen = now.getTime() - Date.parse(record.lastSeen);
    return sinceSeen > missingThresholdMs ? "missing" : "offline";
  }
  return scan?.ipChanged.includes(record.hardwareAddress) ? "ip-changed" : "active";
}
