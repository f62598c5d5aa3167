import { beforeEach, describe, expect, it, vi } from "vitest";
import { createCamera, createRecorder } from "../../test/helpers/devices.js";
import { MemoryRegistryStore } from "../../test/helpers/memory-store.js";
import { DeviceRegistry } from "./registry.js";
import { parseSnapshot } from "./store.js";

const T0 = new Date("2026-03-01T00:00:00.000Z");
const T1 = new Date("2026-03-02T10:00:00.000Z");
const T2 = new Date("2026-03-02T11:00:00.000Z");

const quietLog = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe("DeviceRegistry", () => {
  let store: MemoryRegistryStore;
  let registry: DeviceRegistry;

  beforeEach(async () => {
    store = new MemoryRegistryStore();
    registry = await DeviceRegistry.open(store, { log: quietLog });
  });

  describe("reconcile()", () => {
    it("creates a record for a device never seen before", async () => {
      const summary = await registry.reconcile([createCamera()], T1);

      expect(summary).toEqual({
        new: [{ hardwareAddress: "d4:2d:c5:14:c5:70", ipAddress: "192.168.1.101" }],
        updated: [],
        ipChanged: [],
      });
      const record = await registry.getRecord("d4:2d:c5:14:c5:70");
      expect(record.firstSeen).toBe("2026-03-02T10:00:00.000Z");
      expect(record.lastSeen).toBe(record.firstSeen);
      expect(record.totalDiscoveries).toBe(1);
      expect(record.ipHistory).toEqual([
        { ip: "192.168.1.101", timestamp: "2026-03-02T10:00:00.000Z", previousIp: null },
      ]);
      expect(store.saves).toBe(1);
    });

    it("only counts discoveries when the same batch is applied twice", async () => {
      const batch = [createCamera(), createRecorder()];
      await registry.reconcile(batch, T1);
      const second = await registry.reconcile(batch, T1);

      expect(second.new).toEqual([]);
      expect(second.updated).toHaveLength(2);
      for (const mac of ["d4:2d:c5:14:c5:70", "d4:2d:c5:00:00:01"]) {
        const record = await registry.getRecord(mac);
        expect(record.ipHistory).toHaveLength(1);
        expect(record.firstSeen).toBe(T1.toISOString());
        expect(record.totalDiscoveries).toBe(2);
      }
    });

    it("keys records by the canonical hardware address", async () => {
      const first = await registry.reconcile([createCamera({ hardwareAddress: "D4-2D-C5-14-C5-70" })], T1);
      const second = await registry.reconcile([createCamera({ hardwareAddress: "d4:2d:c5:14:c5:70" })], T2);

      expect(first.new).toEqual([{ hardwareAddress: "d4:2d:c5:14:c5:70", ipAddress: "192.168.1.101" }]);
      expect(second.updated).toEqual([
        { hardwareAddress: "d4:2d:c5:14:c5:70", ipAddress: "192.168.1.101" },
      ]);
      expect(registry.size).toBe(1);
      expect((await registry.getRecord("D4:2D:C5:14:C5:70")).totalDiscoveries).toBe(2);
      expect(Object.keys(parseSnapshot(store.snapshot).devices)).toEqual(["d4:2d:c5:14:c5:70"]);
    });

    it("rejects a batch holding a malformed hardware address", async () => {
      await expect(
        registry.reconcile([createRecorder(), createCamera({ hardwareAddress: "not-a-mac" })], T1),
      ).rejects.toMatchObject({ code: "INVALID_ADDRESS" });

      expect(registry.size).toBe(0);
      expect(store.saves).toBe(0);
    });

    it("advances lastSeen and copies changed fields", async () => {
      await registry.reconcile([createCamera()], T1);
      await registry.reconcile([createCamera({ firmwareVersion: "3.20", deviceName: "Lobby East" })], T2);

      const record = await registry.getRecord("d4:2d:c5:14:c5:70");
      expect(record.lastSeen).toBe(T2.toISOString());
      expect(record.firstSeen).toBe(T1.toISOString());
      expect(record.firmwareVersion).toBe("3.20");
      expect(record.deviceName).toBe("Lobby East");
    });

    it("appends to the history when the address changes", async () => {
      await registry.reconcile([createCamera({ ipAddress: "192.168.1.101" })], T1);
      const summary = await registry.reconcile([createCamera({ ipAddress: "192.168.1.150" })], T2);

      expect(summary.ipChanged).toEqual([
        {
          hardwareAddress: "d4:2d:c5:14:c5:70",
          ipAddress: "192.168.1.150",
          previousIp: "192.168.1.101",
        },
      ]);
      const record = await registry.getRecord("d4:2d:c5:14:c5:70");
      expect(record.ipAddress).toBe("192.168.1.150");
      expect(record.ipHistory).toHaveLength(2);
      expect(record.ipHistory[1]).toEqual({
        ip: "192.168.1.150",
        timestamp: T2.toISOString(),
        previousIp: "192.168.1.101",
      });

      const [view] = await registry.listRecords("mac", { now: T2 });
      expect(view.status).toBe("ip-changed");
    });

    it("reports active again once the new address is stable", async () => {
      await registry.reconcile([createCamera({ ipAddress: "192.168.1.101" })], T1);
      await registry.reconcile([createCamera({ ipAddress: "192.168.1.150" })], T2);
      await registry.reconcile([createCamera({ ipAddress: "192.168.1.150" })], T2);

      const [view] = await registry.listRecords("mac", { now: T2 });
      expect(view.status).toBe("active");
      expect(view.record.ipHistory).toHaveLength(2);
    });

    it("leaves devices absent from the batch untouched", async () => {
      await registry.reconcile([createCamera(), createRecorder()], T1);
      await registry.reconcile([createCamera()], T2);

      const recorder = await registry.getRecord("d4:2d:c5:00:00:01");
      expect(recorder.lastSeen).toBe(T1.toISOString());
      expect(recorder.totalDiscoveries).toBe(1);

      const statuses = (await registry.listRecords("mac", { now: T2 })).map((v) => [
        v.record.hardwareAddress,
        v.status,
      ]);
      expect(statuses).toEqual([
        ["d4:2d:c5:00:00:01", "offline"],
        ["d4:2d:c5:14:c5:70", "active"],
      ]);
    });

    it("rolls back the whole batch when the snapshot cannot be written", async () => {
      await registry.reconcile([createCamera()], T1);
      store.failSaves = new Error("disk full");

      await expect(
        registry.reconcile(
          [createCamera({ ipAddress: "192.168.1.150" }), createRecorder()],
          T2,
        ),
      ).rejects.toMatchObject({
        code: "PERSISTENCE_FAILURE",
        message: "registry snapshot could not be written: disk full",
      });

      const camera = await registry.getRecord("d4:2d:c5:14:c5:70");
      expect(camera.ipAddress).toBe("192.168.1.101");
      expect(camera.ipHistory).toHaveLength(1);
      expect(camera.totalDiscoveries).toBe(1);
      expect(await registry.findRecord("d4:2d:c5:00:00:01")).toBeNull();
      expect(registry.size).toBe(1);

      store.failSaves = null;
      const summary = await registry.reconcile([createRecorder()], T2);
      expect(summary.new).toHaveLength(1);
    });

    it("serializes overlapping reconciliations", async () => {
      await Promise.all([
        registry.reconcile([createCamera()], T1),
        registry.reconcile([createCamera()], T2),
      ]);

      const record = await registry.getRecord("d4:2d:c5:14:c5:70");
      expect(record.totalDiscoveries).toBe(2);
      expect(record.lastSeen).toBe(T2.toISOString());
      expect(store.saves).toBe(2);
    });

    it("switches the variant when a device starts reporting as a recorder", async () => {
      await registry.reconcile([createCamera({ modelName: "WJ-NX100" })], T1);
      await registry.reconcile(
        [createRecorder({ hardwareAddress: "d4:2d:c5:14:c5:70", ipAddress: "192.168.1.101" })],
        T2,
      );

      const record = await registry.getRecord("d4:2d:c5:14:c5:70");
      expect(record.kind).toBe("recorder");
      expect(record.kind === "recorder" ? record.recorder : null).toEqual({
        channels: 16,
        capacity: 4000,
      });
    });
  });

  describe("getRecord()", () => {
    it("accepts any separator or case", async () => {
      await registry.reconcile([createCamera()], T1);
      const record = await registry.getRecord("D4-2D-C5-14-C5-70");
      expect(record.hardwareAddress).toBe("d4:2d:c5:14:c5:70");
    });

    it("throws NOT_FOUND for an unknown device", async () => {
      await expect(registry.getRecord("d4:2d:c5:ff:ff:ff")).rejects.toMatchObject({
        code: "NOT_FOUND",
      });
    });

    it("hands out copies", async () => {
      await registry.reconcile([createCamera()], T1);
      const record = await registry.getRecord("d4:2d:c5:14:c5:70");
      record.ipHistory.push({ ip: "10.0.0.1", timestamp: T2.toISOString(), previousIp: null });
      record.deviceName = "tampered";

      const again = await registry.getRecord("d4:2d:c5:14:c5:70");
      expect(again.ipHistory).toHaveLength(1);
      expect(again.deviceName).toBe("Lobby");
    });
  });

  describe("listRecords()", () => {
    beforeEach(async () => {
      await registry.reconcile(
        [createCamera({ hardwareAddress: "d4:2d:c5:14:c5:72", ipAddress: "192.168.1.3", deviceName: "yard" })],
        T0,
      );
      await registry.reconcile(
        [
          createCamera({ ipAddress: "192.168.1.101", deviceName: "Lobby" }),
          createRecorder({ ipAddress: "192.168.1.20", deviceName: "Rack NVR" }),
        ],
        T1,
      );
    });

    const order = async (key: Parameters<DeviceRegistry["listRecords"]>[0]) =>
      (await registry.listRecords(key, { now: T1 })).map((v) => v.record.hardwareAddress);

    it("sorts by address numerically", async () => {
      expect(await order("ip")).toEqual([
        "d4:2d:c5:14:c5:72",
        "d4:2d:c5:00:00:01",
        "d4:2d:c5:14:c5:70",
      ]);
    });

    it("sorts by name without regard to case", async () => {
      expect(await order("name")).toEqual([
        "d4:2d:c5:14:c5:70",
        "d4:2d:c5:00:00:01",
        "d4:2d:c5:14:c5:72",
      ]);
    });

    it("puts the oldest first sighting last", async () => {
      expect((await order("first-seen")).at(-1)).toBe("d4:2d:c5:14:c5:72");
      expect((await order("last-seen")).at(-1)).toBe("d4:2d:c5:14:c5:72");
    });

    it("applies a per-query missing threshold", async () => {
      const views = await registry.listRecords("mac", { now: T1, missingThresholdMs: 60 * 60 * 1000 });
      expect(views.map((v) => v.status)).toEqual(["active", "active", "missing"]);
    });
  });

  describe("stats()", () => {
    it("counts statuses, discoveries and devices with address changes", async () => {
      await registry.reconcile(
        [createCamera({ hardwareAddress: "d4:2d:c5:14:c5:72", ipAddress: "192.168.1.103" })],
        T0,
      );
      await registry.reconcile([createCamera(), createRecorder()], T1);
      await registry.reconcile([createCamera({ ipAddress: "192.168.1.150" })], T2);

      expect(await registry.stats(T2)).toEqual({
        total: 3,
        active: 0,
        offline: 1,
        missing: 1,
        ipChanged: 1,
        totalDiscoveries: 4,
        avgDiscoveriesPerDevice: 1.3,
        devicesWithIpChanges: 1,
      });
    });

    it("reports zeros for an empty registry", async () => {
      expect(await registry.stats(T2)).toMatchObject({ total: 0, avgDiscoveriesPerDevice: 0 });
    });
  });

  describe("beginScan()", () => {
    it("rejects a second scan while one is held", () => {
      const lease = registry.beginScan(T1);
      expect(registry.scanInProgress).toBe(true);
      expect(() => registry.beginScan()).toThrow(
        "scan already in progress (started 2026-03-02T10:00:00.000Z)",
      );

      lease.release();
      expect(registry.scanInProgress).toBe(false);
      const next = registry.beginScan();
      lease.release();
      expect(registry.scanInProgress).toBe(true);
      next.release();
    });
  });

  it("restores records and the latest scan from its store", async () => {
    await registry.reconcile([createCamera(), createRecorder()], T1);
    await registry.reconcile([createCamera({ ipAddress: "192.168.1.150" })], T2);

    const reopened = await DeviceRegistry.open(store, { log: quietLog });
    const views = await reopened.listRecords("mac", { now: T2 });
    expect(views.map((v) => [v.record.hardwareAddress, v.status])).toEqual([
      ["d4:2d:c5:00:00:01", "offline"],
      ["d4:2d:c5:14:c5:70", "ip-changed"],
    ]);
    expect(views[1].record.ipHistory.map((e) => e.ip)).toEqual(["192.168.1.101", "192.168.1.150"]);
  });
});
