import type { DeviceDescriptor } from "../devices/types.js";

export type IpHistoryEntry = {
  ip: string;
  /** ISO-8601. */
  timestamp: string;
  previousIp: string | null;
};

type TrackingFields = {
  /** ISO-8601, set on first discovery and never changed. */
  firstSeen: string;
  /** ISO-8601, advanced by every scan that reports the device. */
  lastSeen: string;
  /** Chronological; the last entry always holds the current IP. */
  ipHistory: IpHistoryEntry[];
  totalDiscoveries: number;
};

/** Descriptor fields as of the last discovery, plus tracking state. */
export type DeviceRecord = DeviceDescriptor & TrackingFields;

/** Membership and change classification of the most recent reconciliation. */
export type LatestScan = {
  at: string;
  seen: string[];
  ipChanged: string[];
};

export type RegistrySnapshot = {
  version: 1;
  devices: Record<string, DeviceRecord>;
  latestScan: LatestScan | null;
};

export type DeviceStatus = "active" | "ip-changed" | "offline" | "missing";

export type ChangeEntry = {
  hardwareAddress: string;
  ipAddress: string;
};

export type ChangeSummary = {
  new: ChangeEntry[];
  updated: ChangeEntry[];
  ipChanged: Array<ChangeEntry & { previousIp: string }>;
};

export type RecordSortKey = "last-seen" | "first-seen" | "ip" | "mac" | "name";

export const RECORD_SORT_KEYS: readonly RecordSortKey[] = [
  "last-seen",
  "first-seen",
  "ip",
  "mac",
  "name",
];

export type RecordView = {
  record: DeviceRecord;
  status: DeviceStatus;
};

export type RegistryStats = {
  total: number;
  active: number;
  offline: number;
  missing: number;
  ipChanged: number;
  totalDiscoveries: number;
  avgDiscoveriesPerDevice: number;
  /** Devices whose history holds more than one address. */
  devicesWithIpChanges: number;
};
