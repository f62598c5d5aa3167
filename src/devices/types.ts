export type NetworkMode = "dhcp" | "static" | "auto-ip" | "auto-advanced" | "unknown";

export type DeviceKind = "camera" | "recorder";

type DeviceFields = {
  /** Lower-case colon-hex MAC; the only identity that survives address changes. */
  hardwareAddress: string;
  serialNumber: string;
  modelName: string;
  deviceName: string;
  firmwareVersion: string;
  ipAddress: string;
  subnetMask: string;
  gateway: string;
  httpPort: number;
  networkMode: NetworkMode;
  /** Raw value of tag 0xa6. Not a reliable kind indicator, kept for diagnostics. */
  deviceTypeCode: number | null;
};

export type RecorderInfo = {
  channels: number | null;
  capacity: number | null;
};

export type CameraDescriptor = DeviceFields & { kind: "camera" };

export type RecorderDescriptor = DeviceFields & {
  kind: "recorder";
  recorder: RecorderInfo;
};

/** One responder as seen by a single scan. */
export type DeviceDescriptor = CameraDescriptor | RecorderDescriptor;
