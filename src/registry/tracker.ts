import {
  DiscoverySession,
  type DiscoveryRunOptions,
  type DiscoveryRunResult,
} from "../discovery/session.js";
import { DEFAULT_LOGGER, type Logger } from "../infra/log.js";
import type { DeviceRegistry } from "./registry.js";
import type { ChangeSummary } from "./types.js";

export type DeviceTrackerOptions = {
  registry: DeviceRegistry;
  session?: DiscoverySession;
  now?: () => Date;
  log?: Logger;
};

export type ScanOutcome = DiscoveryRunResult & {
  summary: ChangeSummary;
  /** False when a run cancelled before anything arrived was not reconciled. */
  reconciled: boolean;
};

/**
 * Runs discovery into a registry, one scan at a time. Overlapping calls are
 * rejected with SCAN_IN_PROGRESS; the registry lock is only taken for the
 * reconciliation, never across the network wait.
 */
export class DeviceTracker {
  readonly registry: DeviceRegistry;
  private session: DiscoverySession;
  private now: () => Date;
  private log: Logger;

  constructor(opts: DeviceTrackerOptions) {
    this.registry = opts.registry;
    this.log = opts.log ?? DEFAULT_LOGGER;
    this.session = opts.session ?? new DiscoverySession({ log: this.log });
    this.now = opts.now ?? (() => new Date());
  }

  async scan(opts: DiscoveryRunOptions = {}): Promise<ScanOutcome> {
    const lease = this.registry.beginScan(this.now());
    try {
      const result = await this.session.run(opts);
      if (result.cancelled && result.devices.length === 0) {
        this.log.info("[registry] scan cancelled before any device answered, registry unchanged");
        return { ...result, summary: { new: [], updated: [], ipChanged: [] }, reconciled: false };
      }
      const summary = await this.registry.reconcile(result.devices, this.now());
      return { ...result, summary, reconciled: true };
    } finally {
      lease.release();
    }
  }
}
