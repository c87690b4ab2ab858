/**
 * Opt-in interception of stdout/stderr.
 *
 * While capturing, every write still reaches the original stream; the
 * text is also split into lines and reported to listeners. Captured
 * output can contain anything a library prints, so only enable this
 * while debugging.
 */

import { StringDecoder } from "node:string_decoder";

import { Listeners, type Listener, type LogEntry, type Unsubscribe } from "@appshell/core";

import type { LogBuffer } from "./buffer.js";

/** The part of a writable stream that capture needs. */
export interface CaptureStream {
  write(chunk: string | Uint8Array, ...rest: unknown[]): boolean;
}

export interface CapturedOutput {
  text: string;
  isError: boolean;
}

export interface StdioCaptureOptions {
  stdout?: CaptureStream;
  stderr?: CaptureStream;
}

/** Accumulates partial writes until a newline arrives. */
class LineSplitter {
  private pending = "";
  private decoder = new StringDecoder("utf8");

  constructor(private readonly emit: (line: string) => void) {}

  push(chunk: string | Uint8Array): void {
    this.pending += typeof chunk === "string" ? chunk : this.decoder.write(Buffer.from(chunk));

    let newline = this.pending.indexOf("\n");
    while (newline !== -1) {
      this.flushLine(this.pending.slice(0, newline));
      this.pending = this.pending.slice(newline + 1);
      newline = this.pending.indexOf("\n");
    }
  }

  end(): void {
    const rest = this.pending + this.decoder.end();
    this.pending = "";
    this.decoder = new StringDecoder("utf8");
    this.flushLine(rest);
  }

  private flushLine(raw: string): void {
    const line = raw.replace(/\r/g, "");
    if (line) this.emit(line);
  }
}

interface Patch {
  stream: CaptureStream;
  splitter: LineSplitter;
  /** Own `write` property before patching, if the stream had one. */
  own: PropertyDescriptor | undefined;
}

export class StdioCapture {
  private readonly stdout: CaptureStream;
  private readonly stderr: CaptureStream;
  private readonly output = new Listeners<CapturedOutput>();
  private patches: Patch[] = [];
  /** Set while listeners run, so their own writes are not captured again. */
  private emitting = false;

  constructor(options: StdioCaptureOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  get isCapturing(): boolean {
    return this.patches.length > 0;
  }

  /** Begin intercepting. Calling it again while capturing does nothing. */
  start(): void {
    if (this.isCapturing) return;
    this.patches = [this.patch(this.stdout, false), this.patch(this.stderr, true)];
  }

  /** Restore the streams and report any unterminated last line. */
  stop(): void {
    if (!this.isCapturing) return;
    const patches = this.patches;
    this.patches = [];
    for (const { stream, own } of patches) {
      if (own) {
        Object.defineProperty(stream, "write", own);
      } else {
        Reflect.deleteProperty(stream, "write");
      }
    }
    for (const { splitter } of patches) {
      splitter.end();
    }
  }

  onOutput(listener: Listener<CapturedOutput>): Unsubscribe {
    return this.output.add(listener);
  }

  private patch(stream: CaptureStream, isError: boolean): Patch {
    const own = Object.getOwnPropertyDescriptor(stream, "write");
    const original = stream.write;
    const splitter = new LineSplitter((text) => this.report({ text, isError }));

    const write = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
      const result = original.call(stream, chunk, ...rest);
      if (!this.emitting) splitter.push(chunk);
      return result;
    };
    Object.defineProperty(stream, "write", {
      value: write,
      configurable: true,
      writable: true,
      enumerable: own?.enumerable ?? false,
    });

    return { stream, splitter, own };
  }

  private report(captured: CapturedOutput): void {
    this.emitting = true;
    try {
      this.output.emit(captured);
    } finally {
      this.emitting = false;
    }
  }
}

/**
 * Route captured lines into a buffer: stdout as info under "stdout",
 * stderr as error under "stderr".
 */
export function pipeToBuffer(
  capture: StdioCapture,
  buffer: LogBuffer,
  clock: () => Date = () => new Date(),
): Unsubscribe {
  return capture.onOutput(({ text, isError }) => {
    const entry: LogEntry = {
      timestamp: clock(),
      level: isError ? "error" : "info",
      category: isError ? "stderr" : "stdout",
      message: text,
    };
    buffer.addEntry(entry);
  });
}
