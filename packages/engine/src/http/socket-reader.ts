import type { ITcpSocket } from "../interfaces/socket.js";
import { concat } from "../utils/buffer.js";

export interface SocketReaderOptions {
  /** Buffered bytes at which the socket is paused. */
  highWaterMark?: number;
}

/**
 * Pull-style reads over a push-style socket.
 *
 * Incoming data is buffered until `read()` asks for it. A read returns at
 * most `maxBytes` and never waits once something is buffered. After the
 * peer ends or closes, buffered bytes are still handed out; then reads
 * return an empty array. There is no timeout.
 *
 * Sockets that support it are paused while `highWaterMark` bytes or more
 * are waiting, and resumed once reads drain the buffer below it.
 */
export class SocketReader {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private paused = false;
  private finished = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  private readonly highWaterMark: number;

  constructor(
    private readonly socket: ITcpSocket,
    options: SocketReaderOptions = {},
  ) {
    this.highWaterMark = options.highWaterMark ?? 1024;

    socket.onData((data) => {
      this.chunks.push(data);
      this.buffered += data.length;
      if (!this.paused && this.buffered >= this.highWaterMark && socket.pause) {
        this.paused = true;
        socket.pause();
      }
      this.notifyWaiters();
    });

    socket.onEnd(() => this.finish());
    socket.onClose(() => this.finish());

    socket.onError((err) => {
      this.socketError = err;
      this.finish();
    });
  }

  /** True once the peer has ended, closed or failed. */
  get isClosed(): boolean {
    return this.finished;
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    if (!Number.isInteger(maxBytes) || maxBytes <= 0) {
      throw new RangeError(`maxBytes must be a positive integer: ${maxBytes}`);
    }

    while (true) {
      if (this.buffered > 0) {
        return this.take(maxBytes);
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.finished) {
        return new Uint8Array(0);
      }

      await this.waitForActivity();
    }
  }

  private take(maxBytes: number): Uint8Array {
    const parts: Uint8Array[] = [];
    let remaining = maxBytes;

    while (remaining > 0 && this.chunks.length > 0) {
      const head = this.chunks[0];
      if (head.length <= remaining) {
        parts.push(head);
        this.chunks.shift();
        remaining -= head.length;
      } else {
        parts.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }

    this.buffered -= maxBytes - remaining;
    if (this.paused && this.buffered < this.highWaterMark) {
      this.paused = false;
      this.socket.resume?.();
    }
    return concat(parts);
  }

  private finish(): void {
    this.finished = true;
    this.notifyWaiters();
  }

  private waitForActivity(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
