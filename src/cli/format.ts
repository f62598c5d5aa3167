import type { DeviceDescriptor } from "../devices/types.js";
import type { NetworkInterfaceChoice } from "../discovery/interfaces.js";
import type {
  ChangeSummary,
  DeviceRecord,
  DeviceStatus,
  RecordView,
  RegistryStats,
} from "../registry/types.js";

const STATUS_LABELS: Record<DeviceStatus, string> = {
  active: "Active",
  "ip-changed": "IP Changed",
  offline: "Offline",
  missing: "Missing",
};

export function formatStatus(status: DeviceStatus): string {
  return STATUS_LABELS[status];
}

/** `2026-03-02T10:00:00.000Z` → `2026-03-02 10:00:00` (UTC). */
export function formatTimestamp(iso: string): string {
  return /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/.test(iso) ? iso.slice(0, 19).replace("T", " ") : iso;
}

/** Boxed ASCII table; each column is as wide as its widest cell. */
export function renderTable(headers: readonly string[], rows: readonly string[][]): string[] {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? "").length)),
  );
  const separator = `+-${widths.map((w) => "-".repeat(w)).join("-+-")}-+`;
  const line = (cells: readonly string[]) =>
    `| ${widths.map((w, i) => (cells[i] ?? "").padEnd(w)).join(" | ")} |`;
  return [separator, line(headers), separator, ...rows.map(line), separator];
}

export function formatDeviceTable(
  devices: readonly DeviceDescriptor[],
  conflicts: ReadonlyMap<string, string[]>,
): string[] {
  if (devices.length === 0) {
    return ["No devices discovered."];
  }
  const table = renderTable(
    ["Type", "MAC Address", "IP Address", "Port", "Device Name", "Model", "Serial Number"],
    devices.map((d) => [
      d.kind === "recorder" ? "Recorder" : "Camera",
      d.hardwareAddress,
      d.ipAddress,
      String(d.httpPort),
      d.deviceName,
      d.modelName,
      d.serialNumber,
    ]),
  );
  const cameras = devices.filter((d) => d.kind === "camera").length;
  const recorders = devices.length - cameras;
  const lines = [...table, "", `Total devices discovered: ${devices.length}`];
  if (cameras > 0) {
    lines.push(`  Cameras: ${cameras}`);
  }
  if (recorders > 0) {
    lines.push(`  Recorders: ${recorders}`);
  }
  if (conflicts.size > 0) {
    lines.push("", "WARNING: IP address conflicts detected");
    for (const [ip, holders] of conflicts) {
      lines.push(`  IP ${ip} is assigned to ${holders.length} devices:`);
      lines.push(...holders.map((holder) => `    - ${holder}`));
    }
  }
  return lines;
}

export function formatChangeSummary(summary: ChangeSummary): string[] {
  const lines = [
    `New: ${summary.new.length} | Updated: ${summary.updated.length} | IP changed: ${summary.ipChanged.length}`,
  ];
  if (summary.new.length > 0) {
    lines.push("", "New devices:");
    lines.push(...summary.new.map((e) => `  - ${e.hardwareAddress} at ${e.ipAddress}`));
  }
  if (summary.ipChanged.length > 0) {
    lines.push("", "IP address changes:");
    lines.push(
      ...summary.ipChanged.map((e) => `  - ${e.hardwareAddress}: ${e.previousIp} -> ${e.ipAddress}`),
    );
  }
  return lines;
}

export function formatRecordTable(views: readonly RecordView[]): string[] {
  const table = renderTable(
    ["MAC Address", "Device Name", "IP Address", "Model", "First Seen", "Last Seen", "Discoveries", "Status"],
    views.map(({ record, status }) => [
      record.hardwareAddress,
      record.deviceName,
      record.ipAddress,
      record.modelName,
      formatTimestamp(record.firstSeen),
      formatTimestamp(record.lastSeen),
      String(record.totalDiscoveries),
      formatStatus(status),
    ]),
  );
  const count = (status: DeviceStatus) => views.filter((v) => v.status === status).length;
  return [
    ...table,
    "",
    `Total devices: ${views.length}`,
    `Active: ${count("active")} | IP Changed: ${count("ip-changed")} | Offline: ${count("offline")} | Missing: ${count("missing")}`,
  ];
}

export function formatHistory(record: DeviceRecord): string[] {
  return [
    `IP history: ${record.deviceName} (${record.hardwareAddress})`,
    `Current IP: ${record.ipAddress}`,
    `First seen: ${formatTimestamp(record.firstSeen)}`,
    `Last seen: ${formatTimestamp(record.lastSeen)}`,
    `Total discoveries: ${record.totalDiscoveries}`,
    "",
    ...record.ipHistory.map((entry, i) =>
      entry.previousIp
        ? `  [${i + 1}] ${formatTimestamp(entry.timestamp)}: ${entry.previousIp} -> ${entry.ip}`
        : `  [${i + 1}] ${formatTimestamp(entry.timestamp)}: ${entry.ip} (first discovery)`,
    ),
  ];
}

export function formatStats(stats: RegistryStats): string[] {
  return [
    `Total devices tracked: ${stats.total}`,
    `Active: ${stats.active} | IP Changed: ${stats.ipChanged} | Offline: ${stats.offline} | Missing: ${stats.missing}`,
    `Total discoveries: ${stats.totalDiscoveries}`,
    `Average discoveries per device: ${stats.avgDiscoveriesPerDevice.toFixed(1)}`,
    `Devices with IP changes: ${stats.devicesWithIpChanges}`,
  ];
}

export function formatInterfaces(choices: readonly NetworkInterfaceChoice[]): string[] {
  return choices.map((choice) => `${choice.address.padEnd(15)}  ${choice.name}`);
}
