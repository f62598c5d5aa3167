import { TrackerError } from "../infra/errors.js";
import { formatIpv4 } from "../protocol/address.js";
import { RECORDER_MODEL_PREFIXES, Tag } from "../protocol/constants.js";
import type { AttributeSet, DecodedFrame } from "../protocol/packet-codec.js";
import type { DeviceDescriptor, NetworkMode, RecorderInfo } from "./types.js";

const NETWORK_MODES: Record<number, NetworkMode> = {
  0: "dhcp",
  2: "static",
  4: "auto-ip",
  5: "auto-advanced",
};

const NO_HARDWARE_ADDRESS = "00:00:00:00:00:00";

function readString(attributes: AttributeSet, tag: number, fallback: string): string {
  const raw = attributes.get(tag);
  if (!raw) {
    return fallback;
  }
  const end = raw.indexOf(0);
  const text = raw.subarray(0, end === -1 ? raw.length : end).toString("utf8").trim();
  return text || fallback;
}

function readIpv4(attributes: AttributeSet, tag: number): string | null {
  const raw = attributes.get(tag);
  return raw && raw.length === 4 ? formatIpv4(raw) : null;
}

function readUInt16(attributes: AttributeSet, tag: number): number | null {
  const raw = attributes.get(tag);
  return raw && raw.length === 2 ? raw.readUInt16BE(0) : null;
}

function readNetworkMode(attributes: AttributeSet): NetworkMode {
  const raw = attributes.get(Tag.networkMode);
  if (!raw || raw.length < 1) {
    return "unknown";
  }
  return NETWORK_MODES[raw[0]] ?? "unknown";
}

function hasRecorderFlag(attributes: AttributeSet): boolean {
  const raw = attributes.get(Tag.channels);
  return raw !== undefined && raw.some((byte) => byte !== 0);
}

function isRecorderModel(modelName: string): boolean {
  return RECORDER_MODEL_PREFIXES.some((prefix) => modelName.startsWith(prefix));
}

/**
 * Turn a decoded response into a typed descriptor.
 *
 * Kind is decided here and nowhere else: a non-zero channel-count tag marks a
 * recorder; firmware that omits the tag is caught by the model-family prefix.
 */
export function classifyDevice(frame: DecodedFrame): DeviceDescriptor {
  const { attributes } = frame;

  const hardwareAddress = frame.header.hardwareAddress;
  if (hardwareAddress === NO_HARDWARE_ADDRESS) {
    throw new TrackerError("INCOMPLETE_ATTRIBUTES", "response carries no hardware address");
  }
  const ipAddress = readIpv4(attributes, Tag.ipAddress);
  if (!ipAddress) {
    throw new TrackerError(
      "INCOMPLETE_ATTRIBUTES",
      `response from ${hardwareAddress} carries no IP address`,
    );
  }

  const modelName = readString(attributes, Tag.modelName, "Unknown");
  const typeCode = attributes.get(Tag.deviceTypeCode);

  const fields = {
    hardwareAddress,
    serialNumber: readString(attributes, Tag.serialNumber, "Unknown"),
    modelName,
    deviceName: readString(attributes, Tag.deviceName, "Device"),
    firmwareVersion: readString(attributes, Tag.firmwareVersion, "Unknown"),
    ipAddress,
    subnetMask: readIpv4(attributes, Tag.subnetMask) ?? "255.255.255.0",
    gateway: readIpv4(attributes, Tag.gateway) ?? "0.0.0.0",
    httpPort: readUInt16(attributes, Tag.httpPort) ?? 80,
    networkMode: readNetworkMode(attributes),
    deviceTypeCode: typeCode && typeCode.length >= 1 ? typeCode[0] : null,
  };

  if (hasRecorderFlag(attributes) || isRecorderModel(modelName)) {
    const recorder: RecorderInfo = {
      channels: readUInt16(attributes, Tag.channels),
      capacity: readUInt16(attributes, Tag.capacity),
    };
    return { ...fields, kind: "recorder", recorder };
  }
  return { ...fields, kind: "camera" };
}
