import { closeSync, openSync, writeSync } from "node:fs";
import { SinkError, errorMessage } from "@vellum/core";

/**
 * Synchronous output target of a backend. `rewind` is present only when the
 * sink can start over from the beginning.
 */
export interface Sink {
  write(chunk: string): void;
  rewind?(): void;
  flush?(): void;
  close?(): void;
}

/** In-memory sink. */
export class BufferSink implements Sink {
  private parts: string[] = [];

  write(chunk: string): void {
    this.parts.push(chunk);
  }

  rewind(): void {
    this.parts = [];
  }

  toString(): string {
    return this.parts.join("");
  }
}

/** File sink, truncated on open and on rewind. */
export class FileSink implements Sink {
  private fd: number | null = null;

  constructor(readonly path: string) {
    this.open();
  }

  private open(): void {
    try {
      this.fd = openSync(this.path, "w");
    } catch (err) {
      throw new SinkError(`Cannot open "${this.path}" for writing: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  write(chunk: string): void {
    if (this.fd === null) {
      throw new SinkError(`"${this.path}" is closed`);
    }
    // writeSync may accept only part of the buffer
    const bytes = Buffer.from(chunk, "utf-8");
    let offset = 0;
    while (offset < bytes.length) {
      offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
    }
  }

  rewind(): void {
    this.close();
    this.open();
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

/** Wrap a caller-owned writable. It cannot be rewound. */
export function streamSink(writable: { write(chunk: string): unknown }): Sink {
  return {
    write(chunk: string): void {
      writable.write(chunk);
    },
  };
}
