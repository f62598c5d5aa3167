import type { DeviceDescriptor } from "../devices/types.js";
import { TrackerError, describeError } from "../infra/errors.js";
import { DEFAULT_LOGGER, type Logger } from "../infra/log.js";
import { ipv4SortKey, normalizeHardwareAddress } from "../protocol/address.js";
import { DEFAULT_MISSING_THRESHOLD_MS, deriveStatus } from "./status.js";
import type { RegistryStore } from "./store.js";
import type {
  ChangeSummary,
  DeviceRecord,
  LatestScan,
  RecordSortKey,
  RecordView,
  RegistrySnapshot,
  RegistryStats,
} from "./types.js";

export type DeviceRegistryOptions = {
  missingThresholdMs?: number;
  log?: Logger;
};

export type ListRecordsOptions = {
  now?: Date;
  /** Overrides the registry's threshold for this query only. */
  missingThresholdMs?: number;
};

/** Held by the one scan allowed to run against a registry at a time. */
export type ScanLease = {
  readonly startedAt: Date;
  release(): void;
};

function createRecord(descriptor: DeviceDescriptor, at: string): DeviceRecord {
  return {
    ...descriptor,
    firstSeen: at,
    lastSeen: at,
    ipHistory: [{ ip: descriptor.ipAddress, timestamp: at, previousIp: null }],
    totalDiscoveries: 1,
  };
}

function mergeRecord(existing: DeviceRecord, descriptor: DeviceDescriptor, at: string): DeviceRecord {
  const ipHistory =
    descriptor.ipAddress === existing.ipAddress
      ? existing.ipHistory
      : [
          ...existing.ipHistory,
          { ip: descriptor.ipAddress, timestamp: at, previousIp: existing.ipAddress },
        ];
  return {
    ...descriptor,
    firstSeen: existing.firstSeen,
    lastSeen: at,
    ipHistory,
    totalDiscoveries: existing.totalDiscoveries + 1,
  };
}

const compareRecords: Record<RecordSortKey, (a: DeviceRecord, b: DeviceRecord) => number> = {
  "last-seen": (a, b) => Date.parse(b.lastSeen) - Date.parse(a.lastSeen),
  "first-seen": (a, b) => Date.parse(b.firstSeen) - Date.parse(a.firstSeen),
  ip: (a, b) => ipv4SortKey(a.ipAddress) - ipv4SortKey(b.ipAddress),
  mac: (a, b) => a.hardwareAddress.localeCompare(b.hardwareAddress),
  name: (a, b) => a.deviceName.toLowerCase().localeCompare(b.deviceName.toLowerCase()),
};

/**
 * Every device ever discovered, keyed by hardware address. State changes only
 * through `reconcile`, which persists before it commits; all reads and writes
 * are serialized through one queue.
 */
export class DeviceRegistry {
  private records: Map<string, DeviceRecord>;
  private latestScan: LatestScan | null;
  private queue: Promise<unknown> = Promise.resolve();
  private activeScan: ScanLease | null = null;
  private readonly missingThresholdMs: number;
  private readonly log: Logger;

  private constructor(
    private readonly store: RegistryStore,
    snapshot: RegistrySnapshot | null,
    opts: DeviceRegistryOptions,
  ) {
    this.records = new Map(Object.entries(snapshot?.devices ?? {}));
    this.latestScan = snapshot?.latestScan ?? null;
    this.missingThresholdMs = opts.missingThresholdMs ?? DEFAULT_MISSING_THRESHOLD_MS;
    this.log = opts.log ?? DEFAULT_LOGGER;
  }

  static async open(store: RegistryStore, opts: DeviceRegistryOptions = {}): Promise<DeviceRegistry> {
    const snapshot = await store.load();
    const registry = new DeviceRegistry(store, snapshot, opts);
    registry.log.debug?.(`[registry] loaded ${registry.records.size} device records`);
    return registry;
  }

  get size(): number {
    return this.records.size;
  }

  get scanInProgress(): boolean {
    return this.activeScan !== null;
  }

  /**
   * Claim the registry for one scan. A second claim while the first is held is
   * rejected rather than queued.
   */
  beginScan(now: Date = new Date()): ScanLease {
    if (this.activeScan) {
      throw new TrackerError(
        "SCAN_IN_PROGRESS",
        `scan already in progress (started ${this.activeScan.startedAt.toISOString()})`,
      );
    }
    const lease: ScanLease = {
      startedAt: now,
      release: () => {
        if (this.activeScan === lease) {
          this.activeScan = null;
        }
      },
    };
    this.activeScan = lease;
    return lease;
  }

  /**
   * Merge one discovery batch. The whole batch is applied and persisted, or on
   * a failed save nothing changes and PERSISTENCE_FAILURE is thrown. Devices
   * absent from the batch are left as they are.
   */
  async reconcile(batch: readonly DeviceDescriptor[], now: Date = new Date()): Promise<ChangeSummary> {
    return await this.exclusive(async () => {
      // Keys are canonical MACs; a malformed address rejects the batch before any change.
      const canonical = batch.map((descriptor) => ({
        ...descriptor,
        hardwareAddress: normalizeHardwareAddress(descriptor.hardwareAddress),
      }));
      const at = now.toISOString();
      const draft = new Map(this.records);
      const summary: ChangeSummary = { new: [], updated: [], ipChanged: [] };
      const seen = new Set<string>();
      const ipChanged = new Set<string>();

      for (const descriptor of canonical) {
        const { hardwareAddress, ipAddress } = descriptor;
        seen.add(hardwareAddress);
        const existing = draft.get(hardwareAddress);
        if (!existing) {
          draft.set(hardwareAddress, createRecord(descriptor, at));
          summary.new.push({ hardwareAddress, ipAddress });
          continue;
        }
        draft.set(hardwareAddress, mergeRecord(existing, descriptor, at));
        if (ipAddress !== existing.ipAddress) {
          ipChanged.add(hardwareAddress);
          summary.ipChanged.push({ hardwareAddress, ipAddress, previousIp: existing.ipAddress });
        } else {
          summary.updated.push({ hardwareAddress, ipAddress });
        }
      }

      const latestScan: LatestScan = { at, seen: [...seen], ipChanged: [...ipChanged] };
      try {
        await this.store.save(toSnapshot(draft, latestScan));
      } catch (err) {
        this.log.error(`[registry] failed to persist reconciliation: ${describeError(err)}`);
        throw new TrackerError(
          "PERSISTENCE_FAILURE",
          `registry snapshot could not be written: ${describeError(err)}`,
          { cause: err },
        );
      }

      this.records = draft;
      this.latestScan = latestScan;
      this.log.info(
        `[registry] reconciled ${batch.length} devices: ${summary.new.length} new, ` +
          `${summary.updated.length} updated, ${summary.ipChanged.length} ip-changed`,
      );
      return summary;
    });
  }

  async getRecord(hardwareAddress: string): Promise<DeviceRecord> {
    const record = await this.findRecord(hardwareAddress);
    if (!record) {
      throw new TrackerError("NOT_FOUND", `no device with hardware address ${hardwareAddress}`);
    }
    return record;
  }

  async findRecord(hardwareAddress: string): Promise<DeviceRecord | null> {
    const key = normalizeHardwareAddress(hardwareAddress);
    return await this.exclusive(async () => {
      const record = this.records.get(key);
      return record ? structuredClone(record) : null;
    });
  }

  async listRecords(
    sortKey: RecordSortKey = "last-seen",
    opts: ListRecordsOptions = {},
  ): Promise<RecordView[]> {
    const now = opts.now ?? new Date();
    const threshold = opts.missingThresholdMs ?? this.missingThresholdMs;
    return await this.exclusive(async () =>
      [...this.records.values()].sort(compareRecords[sortKey]).map((record) => ({
        record: structuredClone(record),
        status: deriveStatus(record, now, threshold, this.latestScan),
      })),
    );
  }

  async stats(now: Date = new Date()): Promise<RegistryStats> {
    return await this.exclusive(async () => {
      const stats: RegistryStats = {
        total: this.records.size,
        active: 0,
        offline: 0,
        missing: 0,
        ipChanged: 0,
        totalDiscoveries: 0,
        avgDiscoveriesPerDevice: 0,
        devicesWithIpChanges: 0,
      };
      for (const record of this.records.values()) {
        switch (deriveStatus(record, now, this.missingThresholdMs, this.latestScan)) {
          case "active":
            stats.active += 1;
            break;
          case "ip-changed":
            stats.ipChanged += 1;
            break;
          case "offline":
            stats.offline += 1;
            break;
          case "missing":
            stats.missing += 1;
            break;
        }
        stats.totalDiscoveries += record.totalDiscoveries;
        if (record.ipHistory.length > 1) {
          stats.devicesWithIpChanges += 1;
        }
      }
      if (stats.total > 0) {
        stats.avgDiscoveriesPerDevice = Math.round((stats.totalDiscoveries / stats.total) * 10) / 10;
      }
      return stats;
    });
  }

  async snapshot(): Promise<RegistrySnapshot> {
    return await this.exclusive(async () =>
      structuredClone(toSnapshot(this.records, this.latestScan)),
    );
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.queue.then(fn, fn);
    this.queue = result.catch(() => undefined);
    return await result;
  }
}

function toSnapshot(records: Map<string, DeviceRecord>, latestScan: LatestScan | null): RegistrySnapshot {
  return { version: 1, devices: Object.fromEntries(records), latestScan };
}
