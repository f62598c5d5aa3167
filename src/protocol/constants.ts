/** UDP port the requester binds to. Devices answer to this port. */
export const SOURCE_PORT = 10669;
/** UDP port devices listen on for discovery requests. */
export const DISCOVERY_PORT = 10670;
export const BROADCAST_ADDRESS = "255.255.255.255";
export const WILDCARD_ADDRESS = "0.0.0.0";

export const PROTOCOL_ID = 0x0001;
export const SEARCH_REQUEST_TYPE = 0x002a;

export const REQUEST_LENGTH = 94;
/** Responses carry a fixed preamble before the first TLV record. */
export const RESPONSE_PREAMBLE_LENGTH = 0x30;

export const TLV_TERMINATOR = 0xffff;

/**
 * Offsets of the request frame. The response preamble shares the header and the
 * requester address block; the responder's own MAC sits inside the command block.
 */
export const FrameOffset = {
  header: 0,
  command: 4,
  responderHardwareAddress: 6,
  sourceHardwareAddress: 12,
  sourceIp: 18,
  flags: 22,
  filter: 33,
  zeroPad: 37,
  category: 48,
  requestedTags: 50,
  listTerminator: 90,
  trailer: 92,
} as const;

export const REQUEST_HEADER = [0x00, 0x01, 0x00, 0x2a] as const;
export const REQUEST_COMMAND = [0x00, 0x0d, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00] as const;
export const REQUEST_FLAGS = [
  0x00, 0x00, 0x20, 0x11, 0x1e, 0x11, 0x23, 0x1f, 0x1e, 0x19, 0x13,
] as const;
/** Third byte is the device-class filter. 0x02 lets recorders answer too. */
export const REQUEST_FILTER = [0x00, 0x00, 0x02, 0x01] as const;
export const DEVICE_CLASS_FILTER_ALL = 0x02;
export const REQUEST_ZERO_PAD_LENGTH = 11;
export const REQUEST_CATEGORY_ALL = 0xfff0;
export const REQUEST_TRAILER = 0x1170;

export const Tag = {
  networkMode: 0x00,
  ipAddress: 0x20,
  subnetMask: 0x21,
  gateway: 0x22,
  httpPort: 0x25,
  deviceTypeCode: 0xa6,
  deviceName: 0xa7,
  modelName: 0xa8,
  firmwareVersion: 0xa9,
  channels: 0xc0,
  capacity: 0xc1,
  serialNumber: 0xd1,
} as const;

/** Tags listed in the request, in wire order. */
export const REQUESTED_TAGS = [
  0x0026, 0x0020, 0x0021, 0x0022, 0x0023, 0x0025, 0x0028, 0x0040, 0x0041, 0x0042, 0x0044,
  0x00a5, 0x00a6, 0x00a7, 0x00a8, 0x00ad, 0x00b3, 0x00b4, 0x00b7, 0x00b8,
] as const;

/** Model-family prefixes of recorders whose firmware omits the channel tag. */
export const RECORDER_MODEL_PREFIXES = ["NX", "WJ"] as const;
