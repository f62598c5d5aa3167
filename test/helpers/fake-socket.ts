import type { RemoteInfo } from "node:dgram";
import { EventEmitter } from "node:events";
import type { DiscoverySocket } from "../../src/discovery/session.js";

export type ScriptedReply = {
  afterMs: number;
  data: Buffer;
  from?: string;
};

export type FakeSocketOptions = {
  replies?: ScriptedReply[];
  bindError?: NodeJS.ErrnoException;
  sendError?: Error;
};

export function errnoError(code: string, message = code): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(message);
  err.code = code;
  return err;
}

/**
 * In-process stand-in for a dgram socket. Replies are delivered on the (fake)
 * timer clock once the request has been sent, until the socket is closed.
 */
export class FakeDiscoverySocket extends EventEmitter implements DiscoverySocket {
  bound: { port: number; address: string } | null = null;
  broadcast = false;
  closed = false;
  readonly sent: Array<{ msg: Buffer; port: number; address: string }> = [];

  constructor(private readonly opts: FakeSocketOptions = {}) {
    super();
  }

  bind(port: number, address: string, callback: () => void): this {
    const { bindError } = this.opts;
    if (bindError) {
      queueMicrotask(() => this.emit("error", bindError));
      return this;
    }
    this.bound = { port, address };
    queueMicrotask(callback);
    return this;
  }

  setBroadcast(flag: boolean): void {
    this.broadcast = flag;
  }

  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback: (err: Error | null, bytes: number) => void,
  ): void {
    this.sent.push({ msg: Buffer.from(msg), port, address });
    queueMicrotask(() => callback(this.opts.sendError ?? null, msg.length));
    for (const reply of this.opts.replies ?? []) {
      setTimeout(() => this.deliver(reply.data, reply.from), reply.afterMs);
    }
  }

  deliver(data: Buffer, from = "192.168.1.50"): void {
    if (this.closed) {
      return;
    }
    const rinfo: RemoteInfo = { address: from, family: "IPv4", port: 10670, size: data.length };
    this.emit("message", data, rinfo);
  }

  close(): this {
    this.closed = true;
    return this;
  }
}

export function socketFactory(sockets: FakeDiscoverySocket[]): () => FakeDiscoverySocket {
  const queue = [...sockets];
  return () => {
    const next = queue.shift();
    if (!next) {
      throw new Error("no fake sockets left");
    }
    return next;
  };
}
