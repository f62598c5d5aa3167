import { TrackerError } from "../infra/errors.js";
import { formatHardwareAddress, formatIpv4 } from "./address.js";
import {
  FrameOffset,
  PROTOCOL_ID,
  REQUEST_CATEGORY_ALL,
  REQUEST_COMMAND,
  REQUEST_FILTER,
  REQUEST_FLAGS,
  REQUEST_HEADER,
  REQUEST_LENGTH,
  REQUEST_TRAILER,
  REQUEST_ZERO_PAD_LENGTH,
  REQUESTED_TAGS,
  RESPONSE_PREAMBLE_LENGTH,
  SEARCH_REQUEST_TYPE,
  TLV_TERMINATOR,
} from "./constants.js";

/** Raw TLV values keyed by tag code. Unknown tags are kept as-is. */
export type AttributeSet = Map<number, Buffer>;

export type FrameHeader = {
  protocolId: number;
  messageType: number;
  /** Responder MAC as carried in the preamble (all zeros in a request). */
  hardwareAddress: string;
  /** Requester address block, echoed back by responders. */
  requester: {
    hardwareAddress: string;
    ip: string;
  };
};

export type DecodedFrame = {
  header: FrameHeader;
  attributes: AttributeSet;
};

/**
 * Build the 94-byte search request. Multi-byte fields are big-endian.
 */
export function encodeDiscoveryRequest(sourceMac: Uint8Array, sourceIp: Uint8Array): Buffer {
  if (sourceMac.length !== 6) {
    throw new TrackerError(
      "INVALID_ADDRESS",
      `source hardware address must be 6 bytes (got ${sourceMac.length})`,
    );
  }
  if (sourceIp.length !== 4) {
    throw new TrackerError("INVALID_ADDRESS", `source IP must be 4 bytes (got ${sourceIp.length})`);
  }

  const frame = Buffer.alloc(REQUEST_LENGTH);
  frame.set(REQUEST_HEADER, FrameOffset.header);
  frame.set(REQUEST_COMMAND, FrameOffset.command);
  frame.set(sourceMac, FrameOffset.sourceHardwareAddress);
  frame.set(sourceIp, FrameOffset.sourceIp);
  frame.set(REQUEST_FLAGS, FrameOffset.flags);
  frame.set(REQUEST_FILTER, FrameOffset.filter);
  frame.fill(0, FrameOffset.zeroPad, FrameOffset.zeroPad + REQUEST_ZERO_PAD_LENGTH);
  frame.writeUInt16BE(REQUEST_CATEGORY_ALL, FrameOffset.category);
  REQUESTED_TAGS.forEach((tag, i) => {
    frame.writeUInt16BE(tag, FrameOffset.requestedTags + i * 2);
  });
  frame.writeUInt16BE(TLV_TERMINATOR, FrameOffset.listTerminator);
  frame.writeUInt16BE(REQUEST_TRAILER, FrameOffset.trailer);
  return frame;
}

function malformed(message: string): TrackerError {
  return new TrackerError("MALFORMED_FRAME", message);
}

/**
 * Parse one response datagram. Throws MALFORMED_FRAME on short frames, a foreign
 * protocol id, or a TLV record that runs past the end of the frame.
 */
export function decodeResponseFrame(data: Uint8Array): DecodedFrame {
  if (data.length < RESPONSE_PREAMBLE_LENGTH) {
    throw malformed(
      `frame too short: ${data.length} bytes (preamble is ${RESPONSE_PREAMBLE_LENGTH})`,
    );
  }
  const frame = Buffer.from(data.buffer, data.byteOffset, data.byteLength);

  const protocolId = frame.readUInt16BE(0);
  if (protocolId !== PROTOCOL_ID) {
    throw malformed(`unexpected protocol id 0x${protocolId.toString(16).padStart(4, "0")}`);
  }

  const header: FrameHeader = {
    protocolId,
    messageType: frame.readUInt16BE(2),
    hardwareAddress: formatHardwareAddress(
      frame.subarray(FrameOffset.responderHardwareAddress, FrameOffset.responderHardwareAddress + 6),
    ),
    requester: {
      hardwareAddress: formatHardwareAddress(
        frame.subarray(FrameOffset.sourceHardwareAddress, FrameOffset.sourceHardwareAddress + 6),
      ),
      ip: formatIpv4(frame.subarray(FrameOffset.sourceIp, FrameOffset.sourceIp + 4)),
    },
  };

  const attributes: AttributeSet = new Map();
  let offset = RESPONSE_PREAMBLE_LENGTH;
  while (offset + 2 <= frame.length) {
    const tag = frame.readUInt16BE(offset);
    if (tag === TLV_TERMINATOR) {
      break;
    }
    // Trailing bytes too short for a record header are padding.
    if (offset + 4 > frame.length) {
      break;
    }
    const length = frame.readUInt16BE(offset + 2);
    const valueStart = offset + 4;
    if (valueStart + length > frame.length) {
      throw malformed(
        `TLV 0x${tag.toString(16)} declares ${length} bytes at offset ${offset}, frame has ${frame.length - valueStart}`,
      );
    }
    // Copy so the attribute set does not alias the socket buffer.
    attributes.set(tag, Buffer.from(frame.subarray(valueStart, valueStart + length)));
    offset = valueStart + length;
  }

  return { header, attributes };
}

/** True for our own search request echoed back by the broadcast. */
export function isDiscoveryRequest(frame: DecodedFrame): boolean {
  return frame.header.messageType === SEARCH_REQUEST_TYPE;
}

/**
 * Serialize a response frame. Used by tests and local simulators to stand in for
 * real devices.
 */
export function encodeResponseFrame(params: {
  messageType?: number;
  hardwareAddress: Uint8Array;
  requester?: { hardwareAddress: Uint8Array; ip: Uint8Array };
  attributes: Iterable<[number, Uint8Array]>;
  terminate?: boolean;
}): Buffer {
  const preamble = Buffer.alloc(RESPONSE_PREAMBLE_LENGTH);
  preamble.writeUInt16BE(PROTOCOL_ID, 0);
  preamble.writeUInt16BE(params.messageType ?? 0x0012, 2);
  preamble.set(params.hardwareAddress.subarray(0, 6), FrameOffset.responderHardwareAddress);
  if (params.requester) {
    preamble.set(params.requester.hardwareAddress.subarray(0, 6), FrameOffset.sourceHardwareAddress);
    preamble.set(params.requester.ip.subarray(0, 4), FrameOffset.sourceIp);
  }
  const records: Buffer[] = [preamble];
  for (const [tag, value] of params.attributes) {
    const head = Buffer.alloc(4);
    head.writeUInt16BE(tag, 0);
    head.writeUInt16BE(value.length, 2);
    records.push(head, Buffer.from(value));
  }
  if (params.terminate ?? true) {
    records.push(Buffer.from([0xff, 0xff]));
  }
  return Buffer.concat(records);
}
