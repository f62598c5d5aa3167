import dgram, { type RemoteInfo } from "node:dgram";
import { classifyDevice } from "../devices/classifier.js";
import type { DeviceDescriptor } from "../devices/types.js";
import { TrackerError, describeError } from "../infra/errors.js";
import { DEFAULT_LOGGER, type Logger } from "../infra/log.js";
import { parseHardwareAddress, parseIpv4 } from "../protocol/address.js";
import {
  BROADCAST_ADDRESS,
  DISCOVERY_PORT,
  SOURCE_PORT,
  WILDCARD_ADDRESS,
} from "../protocol/constants.js";
import {
  decodeResponseFrame,
  encodeDiscoveryRequest,
  isDiscoveryRequest,
} from "../protocol/packet-codec.js";
import { resolveSourceAddress, type SourceAddress } from "./interfaces.js";

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 3_000;

/** The slice of a dgram socket a session uses. */
export interface DiscoverySocket {
  on(event: "message", listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  off(event: "message", listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  off(event: "error", listener: (err: Error) => void): unknown;
  bind(port: number, address: string, callback: () => void): unknown;
  setBroadcast(flag: boolean): void;
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback: (err: Error | null, bytes: number) => void,
  ): void;
  close(): unknown;
}

export type DiscoveryRunOptions = {
  /** Local address to bind; the wildcard broadcasts on every interface. */
  interfaceAddress?: string;
  timeoutMs?: number;
  /** Aborting ends the run early with whatever was collected. */
  signal?: AbortSignal;
  /** Overrides the source block normally taken from the host interfaces. */
  source?: SourceAddress;
};

export type DiscoveryRunResult = {
  devices: DeviceDescriptor[];
  /** Datagrams that failed to decode or classify. */
  errorCount: number;
  responseCount: number;
  durationMs: number;
  cancelled: boolean;
};

export type DiscoverySessionOptions = {
  createSocket?: () => DiscoverySocket;
  resolveSource?: (interfaceAddress: string) => SourceAddress;
  log?: Logger;
};

function errorCode(err: unknown): string | undefined {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
}

function emptyResult(cancelled: boolean): DiscoveryRunResult {
  return { devices: [], errorCount: 0, responseCount: 0, durationMs: 0, cancelled };
}

/**
 * One broadcast search: send the request, then collect answers until the
 * timeout (an absolute ceiling) or the abort signal. At most one descriptor per
 * hardware address; the first one that classifies wins.
 */
export class DiscoverySession {
  private readonly createSocket: () => DiscoverySocket;
  private readonly resolveSource: (interfaceAddress: string) => SourceAddress;
  private readonly log: Logger;

  constructor(opts: DiscoverySessionOptions = {}) {
    this.createSocket =
      opts.createSocket ?? (() => dgram.createSocket({ type: "udp4", reuseAddr: true }));
    this.resolveSource = opts.resolveSource ?? ((address) => resolveSourceAddress(address));
    this.log = opts.log ?? DEFAULT_LOGGER;
  }

  async run(opts: DiscoveryRunOptions = {}): Promise<DiscoveryRunResult> {
    const interfaceAddress = opts.interfaceAddress ?? WILDCARD_ADDRESS;
    const timeoutMs = opts.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
    if (opts.signal?.aborted) {
      return emptyResult(true);
    }

    const source = opts.source ?? this.resolveSource(interfaceAddress);
    const request = encodeDiscoveryRequest(parseHardwareAddress(source.mac), parseIpv4(source.ip));
    const socket = await this.bindSocket(interfaceAddress);

    this.log.info(
      `[discovery] searching from ${interfaceAddress} (source ${source.ip}, timeout ${timeoutMs}ms)`,
    );
    return await this.collect(socket, request, timeoutMs, opts.signal);
  }

  private collect(
    socket: DiscoverySocket,
    request: Buffer,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<DiscoveryRunResult> {
    const startedAt = Date.now();
    const devices = new Map<string, DeviceDescriptor>();
    let errorCount = 0;
    let responseCount = 0;

    return new Promise<DiscoveryRunResult>((resolve) => {
      let finished = false;

      const finish = (cancelled: boolean) => {
        if (finished) {
          return;
        }
        finished = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        socket.off("message", onMessage);
        socket.off("error", onSocketError);
        this.closeSocket(socket);

        const result: DiscoveryRunResult = {
          devices: [...devices.values()],
          errorCount,
          responseCount,
          durationMs: Date.now() - startedAt,
          cancelled,
        };
        this.log.info(
          `[discovery] ${cancelled ? "cancelled" : "complete"}: ${result.devices.length} devices, ` +
            `${responseCount} responses, ${errorCount} rejected in ${result.durationMs}ms`,
        );
        resolve(result);
      };

      const onMessage = (msg: Buffer, rinfo: RemoteInfo) => {
        let descriptor: DeviceDescriptor;
        try {
          const frame = decodeResponseFrame(msg);
          if (isDiscoveryRequest(frame)) {
            this.log.debug?.(`[discovery] ignoring request echo from ${rinfo.address}`);
            return;
          }
          descriptor = classifyDevice(frame);
        } catch (err) {
          responseCount += 1;
          errorCount += 1;
          this.log.debug?.(
            `[discovery] dropped datagram from ${rinfo.address}:${rinfo.port}: ${describeError(err)}`,
          );
          return;
        }
        responseCount += 1;
        if (devices.has(descriptor.hardwareAddress)) {
          this.log.debug?.(`[discovery] duplicate response from ${descriptor.hardwareAddress}`);
          return;
        }
        devices.set(descriptor.hardwareAddress, descriptor);
        this.log.debug?.(
          `[discovery] found ${descriptor.kind} ${descriptor.modelName} (${descriptor.hardwareAddress}) at ${descriptor.ipAddress}`,
        );
      };

      const onSocketError = (err: Error) => {
        this.log.warn(`[discovery] socket error, ending scan early: ${err.message}`);
        finish(true);
      };

      const onAbort = () => finish(true);

      const timer = setTimeout(() => finish(false), timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });
      socket.on("message", onMessage);
      socket.on("error", onSocketError);
      // The signal may have fired while the socket was binding.
      if (signal?.aborted) {
        finish(true);
        return;
      }

      socket.send(request, DISCOVERY_PORT, BROADCAST_ADDRESS, (err) => {
        if (err) {
          // Not retried; the window still runs so late answers can arrive.
          this.log.warn(`[discovery] failed to send search request: ${err.message}`);
        }
      });
    });
  }

  private async bindSocket(interfaceAddress: string): Promise<DiscoverySocket> {
    try {
      return await this.tryBind(interfaceAddress, SOURCE_PORT);
    } catch (err) {
      if (errorCode(err) === "EADDRINUSE") {
        this.log.warn(`[discovery] port ${SOURCE_PORT} in use, binding an ephemeral port`);
        try {
          return await this.tryBind(interfaceAddress, 0);
        } catch (retryErr) {
          throw this.socketError(interfaceAddress, retryErr);
        }
      }
      throw this.socketError(interfaceAddress, err);
    }
  }

  private tryBind(address: string, port: number): Promise<DiscoverySocket> {
    const socket = this.createSocket();
    return new Promise<DiscoverySocket>((resolve, reject) => {
      const onError = (err: Error) => {
        this.closeSocket(socket);
        reject(err);
      };
      socket.once("error", onError);
      socket.bind(port, address, () => {
        socket.off("error", onError);
        try {
          socket.setBroadcast(true);
        } catch (err) {
          this.closeSocket(socket);
          reject(err);
          return;
        }
        resolve(socket);
      });
    });
  }

  private socketError(address: string, err: unknown): TrackerError {
    return new TrackerError(
      "SOCKET_ERROR",
      `cannot open discovery socket on ${address}: ${describeError(err)}`,
      { cause: err },
    );
  }

  private closeSocket(socket: DiscoverySocket): void {
    try {
      socket.close();
    } catch (err) {
      this.log.debug?.(`[discovery] socket already closed: ${describeError(err)}`);
    }
  }
}

/** One-shot helper: run a fresh session with the given options. */
export async function runDiscovery(
  opts: DiscoveryRunOptions & DiscoverySessionOptions = {},
): Promise<DiscoveryRunResult> {
  const { createSocket, resolveSource, log, ...runOpts } = opts;
  return await new DiscoverySession({ createSocket, resolveSource, log }).run(runOpts);
}
