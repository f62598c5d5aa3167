export { createEasyIpCli, type CliIo, type EasyIpCliDeps } from "./cli/easyip-cli.js";
export { DEFAULT_CONFIG, loadConfig, parseConfig, resolveConfig } from "./config/config.js";
export { resolveConfigPath, resolveRegistryPath, resolveStateDir } from "./config/paths.js";
export type { DiscoveryConfig, EasyIpConfig, RegistryConfig, ResolvedConfig } from "./config/types.js";
export { classifyDevice } from "./devices/classifier.js";
export { DEVICE_SORT_KEYS, detectIpConflicts, sortDevices, type DeviceSortKey } from "./devices/sort.js";
export type {
  CameraDescriptor,
  DeviceDescriptor,
  DeviceKind,
  NetworkMode,
  RecorderDescriptor,
  RecorderInfo,
} from "./devices/types.js";
export {
  listNetworkInterfaces,
  resolveSourceAddress,
  type NetworkInterfaceChoice,
  type SourceAddress,
} from "./discovery/interfaces.js";
export {
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DiscoverySession,
  runDiscovery,
  type DiscoveryRunOptions,
  type DiscoveryRunResult,
  type DiscoverySessionOptions,
  type DiscoverySocket,
} from "./discovery/session.js";
export { TrackerError, isTrackerError, type TrackerErrorCode } from "./infra/errors.js";
export { DEFAULT_LOGGER, createStderrLogger, type Logger } from "./infra/log.js";
export {
  formatHardwareAddress,
  formatIpv4,
  normalizeHardwareAddress,
  parseHardwareAddress,
  parseIpv4,
} from "./protocol/address.js";
export {
  decodeResponseFrame,
  encodeDiscoveryRequest,
  encodeResponseFrame,
  isDiscoveryRequest,
  type AttributeSet,
  type DecodedFrame,
  type FrameHeader,
} from "./protocol/packet-codec.js";
export {
  DeviceRegistry,
  type DeviceRegistryOptions,
  type ListRecordsOptions,
  type ScanLease,
} from "./registry/registry.js";
export { DEFAULT_MISSING_THRESHOLD_MS, deriveStatus } from "./registry/status.js";
export { FileRegistryStore, parseSnapshot, type RegistryStore } from "./registry/store.js";
export { DeviceTracker, type DeviceTrackerOptions, type ScanOutcome } from "./registry/tracker.js";
export {
  RECORD_SORT_KEYS,
  type ChangeEntry,
  type ChangeSummary,
  type DeviceRecord,
  type DeviceStatus,
  type IpHistoryEntry,
  type LatestScan,
  type RecordSortKey,
  type RecordView,
  type RegistrySnapshot,
  type RegistryStats,
} from "./registry/types.js";
