import { readSync, writeSync } from "node:fs";

/** Pull-based byte input. `undefined` means the input is exhausted. */
export interface ByteSource {
  read(): number | undefined;
}

/** Append-only byte output, written in call order. */
export interface ByteSink {
  write(bytes: Uint8Array): void;
  flush?(): void;
}

export class BufferSource implements ByteSource {
  private readonly bytes: Uint8Array;
  private offset = 0;

  constructor(input: string | Uint8Array = new Uint8Array(0)) {
    this.bytes = typeof input === "string" ? Buffer.from(input, "utf8") : input;
  }

  read(): number | undefined {
    if (this.offset >= this.bytes.length) return undefined;
    return this.bytes[this.offset++];
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }
}

export class BufferSink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];

  write(bytes: Uint8Array): void {
    // Callers may reuse their buffer, so keep a copy.
    this.chunks.push(Uint8Array.from(bytes));
  }

  bytes(): Uint8Array {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

export class NullSink implements ByteSink {
  write(): void {}
}

/**
 * Blocking reader over a file descriptor (stdin by default).
 * A failed read ends the input; the error stays available in `lastError`.
 */
export class FdSource implements ByteSource {
  private readonly buffer = Buffer.alloc(4096);
  private length = 0;
  private offset = 0;
  private exhausted = false;
  lastError: unknown = undefined;

  constructor(private readonly fd: number = 0) {}

  read(): number | undefined {
    if (this.offset < this.length) return this.buffer[this.offset++];
    if (this.exhausted) return undefined;
    try {
      this.length = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    } catch (e) {
      this.lastError = e;
      this.length = 0;
    }
    this.offset = 0;
    if (this.length === 0) {
      this.exhausted = true;
      return undefined;
    }
    return this.buffer[this.offset++];
  }
}

export type FdSinkOptions = {
  /** Flush whenever a newline byte is written. */
  lineBuffered?: boolean;
  highWaterMark?: number;
};

/** Buffered writer over a file descriptor; bytes leave on flush(). */
export class FdSink implements ByteSink {
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private readonly lineBuffered: boolean;
  private readonly highWaterMark: number;

  constructor(private readonly fd: number, opts: FdSinkOptions = {}) {
    this.lineBuffered = opts.lineBuffered ?? false;
    this.highWaterMark = opts.highWaterMark ?? 8192;
  }

  write(bytes: Uint8Array): void {
    // Callers may reuse their buffer, so keep a copy.
    this.pending.push(Uint8Array.from(bytes));
    this.pendingBytes += bytes.length;
    if (
      this.pendingBytes >= this.highWaterMark ||
      (this.lineBuffered && bytes.includes(10))
    ) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pendingBytes === 0) return;
    const chunk = Buffer.concat(this.pending);
    this.pending = [];
    this.pendingBytes = 0;
    let written = 0;
    while (written < chunk.length) {
      written += writeSync(this.fd, chunk, written, chunk.length - written);
    }
  }
}

export const textBytes = (text: string): Uint8Array =>
  Buffer.from(text, "utf8");
