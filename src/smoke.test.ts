import { describe, expect, it } from "vitest";

describe("easyip smoke test", () => {
  it("imports the package entry cleanly", async () => {
    const mod = await import("./index.js");
    expect(typeof mod.DiscoverySession).toBe("function");
    expect(typeof mod.DeviceRegistry).toBe("function");
    expect(typeof mod.DeviceTracker).toBe("function");
    expect(typeof mod.createEasyIpCli).toBe("function");
  });

  it("imports codec functions cleanly", async () => {
    const mod = await import("./protocol/packet-codec.js");
    expect(mod.encodeDiscoveryRequest).toBeDefined();
    expect(mod.decodeResponseFrame).toBeDefined();
  });

  it("imports the registry store cleanly", async () => {
    const mod = await import("./registry/store.js");
    expect(mod.FileRegistryStore).toBeDefined();
    expect(mod.EMPTY_SNAPSHOT).toEqual({ version: 1, devices: {}, latestScan: null });
  });
});
