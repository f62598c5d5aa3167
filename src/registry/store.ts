import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { resolveRegistryPath } from "../config/paths.js";
import { TrackerError, describeError } from "../infra/errors.js";
import { withFileLock } from "../infra/file-lock.js";
import { readJsonFileWithFallback, writeJsonFileAtomically } from "../infra/json-store.js";
import type { RegistrySnapshot } from "./types.js";

/** Persistence backend of a registry: load once at start, save after each reconciliation. */
export interface RegistryStore {
  load(): Promise<RegistrySnapshot | null>;
  save(snapshot: RegistrySnapshot): Promise<void>;
}

const STORE_LOCK_OPTIONS = {
  retries: {
    retries: 10,
    factor: 2,
    minTimeout: 100,
    maxTimeout: 10_000,
    randomize: true,
  },
  stale: 30_000,
} as const;

const IpHistoryEntrySchema = z
  .object({
    ip: z.string(),
    timestamp: z.string().datetime(),
    previousIp: z.string().nullable(),
  })
  .strict();

const deviceFields = {
  hardwareAddress: z.string().regex(/^[0-9a-f]{2}(?::[0-9a-f]{2}){5}$/),
  serialNumber: z.string(),
  modelName: z.string(),
  deviceName: z.string(),
  firmwareVersion: z.string(),
  ipAddress: z.string(),
  subnetMask: z.string(),
  gateway: z.string(),
  httpPort: z.number().int().min(0).max(65_535),
  networkMode: z.enum(["dhcp", "static", "auto-ip", "auto-advanced", "unknown"]),
  deviceTypeCode: z.number().int().nullable(),
  firstSeen: z.string().datetime(),
  lastSeen: z.string().datetime(),
  ipHistory: z.array(IpHistoryEntrySchema).min(1),
  totalDiscoveries: z.number().int().min(1),
};

const DeviceRecordSchema = z.discriminatedUnion("kind", [
  z.object({ ...deviceFields, kind: z.literal("camera") }).strict(),
  z
    .object({
      ...deviceFields,
      kind: z.literal("recorder"),
      recorder: z
        .object({ channels: z.number().int().nullable(), capacity: z.number().int().nullable() })
        .strict(),
    })
    .strict(),
]);

export const RegistrySnapshotSchema = z
  .object({
    version: z.literal(1),
    devices: z.record(DeviceRecordSchema),
    latestScan: z
      .object({
        at: z.string().datetime(),
        seen: z.array(z.string()),
        ipChanged: z.array(z.string()),
      })
      .strict()
      .nullable(),
  })
  .strict()
  .superRefine((snapshot, ctx) => {
    for (const [key, record] of Object.entries(snapshot.devices)) {
      if (key !== record.hardwareAddress) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["devices", key],
          message: `keyed under ${key} but carries ${record.hardwareAddress}`,
        });
      }
      if (record.ipHistory.at(-1)?.ip !== record.ipAddress) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["devices", key, "ipHistory"],
          message: "last history entry does not match the current address",
        });
      }
    }
  });

export const EMPTY_SNAPSHOT: RegistrySnapshot = { version: 1, devices: {}, latestScan: null };

export function parseSnapshot(raw: unknown, source = "registry snapshot"): RegistrySnapshot {
  const parsed = RegistrySnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new TrackerError("PERSISTENCE_FAILURE", `${source} is invalid: ${issues}`);
  }
  return parsed.data;
}

/** JSON snapshot under the state dir, rewritten atomically while holding a file lock. */
export class FileRegistryStore implements RegistryStore {
  constructor(readonly filePath: string = resolveRegistryPath()) {}

  async load(): Promise<RegistrySnapshot | null> {
    return await this.withStore(async () => {
      let raw: unknown;
      try {
        ({ value: raw } = await readJsonFileWithFallback(this.filePath, EMPTY_SNAPSHOT));
      } catch (err) {
        throw new TrackerError(
          "PERSISTENCE_FAILURE",
          `cannot read ${this.filePath}: ${describeError(err)}`,
          { cause: err },
        );
      }
      return parseSnapshot(raw, this.filePath);
    });
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    await this.withStore(async () => {
      await writeJsonFileAtomically(this.filePath, snapshot);
    });
  }

  private async ensureFile(): Promise<void> {
    try {
      await fs.promises.access(this.filePath);
    } catch {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await writeJsonFileAtomically(this.filePath, EMPTY_SNAPSHOT);
    }
  }

  private async withStore<T>(fn: () => Promise<T>): Promise<T> {
    await this.ensureFile();
    return await withFileLock(this.filePath, STORE_LOCK_OPTIONS, fn);
  }
}
