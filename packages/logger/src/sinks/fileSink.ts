import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir, readdir, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { shouldLog, type LogLevel, type StructuredLogEvent } from "@gto-broker/shared";
import type { LogSink } from "./types";

interface FileSinkOptions {
  sessionId: string;
  level: LogLevel;
  outputDir: string;
  maxFileSizeMb?: number;
  maxFiles?: number;
  logger?: Pick<Console, "warn" | "error">;
}

export function createFileSink(options: FileSinkOptions): LogSink {
  const sink = new RotatingFileSink(options);
  return {
    name: "file",
    level: options.level,
    start: () => sink.start(),
    stop: () => sink.stop(),
    flush: () => sink.flush(),
    publish: event => sink.publish(event)
  };
}

function endStream(stream: WriteStream): Promise<void> {
  return new Promise<void>(resolve => {
    stream.end(() => resolve());
  });
}

/**
 * Appends JSON lines to `<outputDir>/<sessionId>-<epochMs>.jsonl`, starting a
 * new file once the current one would exceed maxFileSizeMb and keeping the
 * newest maxFiles files.
 */
class RotatingFileSink {
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private stream: WriteStream | null = null;
  private bytesWritten = 0;
  private rotations = 0;
  private readonly queue: StructuredLogEvent[] = [];
  private draining = false;
  private started = false;

  constructor(private readonly options: FileSinkOptions) {
    this.maxBytes = Math.max(0.001, options.maxFileSizeMb ?? 25) * 1024 * 1024;
    this.maxFiles = Math.max(1, options.maxFiles ?? 10);
  }

  async start() {
    if (this.started) {
      return;
    }
    await mkdir(this.options.outputDir, { recursive: true });
    await this.rotate();
    this.started = true;
  }

  async stop() {
    if (this.stream) {
      await endStream(this.stream);
      this.stream = null;
    }
    this.started = false;
  }

  async flush() {
    const stream = this.stream;
    if (!stream || !stream.writableNeedDrain) {
      return;
    }
    await new Promise<void>(resolve => {
      stream.once("drain", () => resolve());
    });
  }

  async publish(event: StructuredLogEvent) {
    if (!shouldLog(event.level, this.options.level)) {
      return;
    }
    this.queue.push(event);
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        await this.write(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private async write(event: StructuredLogEvent) {
    if (!this.started) {
      await this.start();
    }
    const payload = JSON.stringify(event) + "\n";
    const size = Buffer.byteLength(payload);
    if (this.bytesWritten > 0 && this.bytesWritten + size > this.maxBytes) {
      await this.rotate();
    }
    const stream = this.stream;
    if (!stream) {
      throw new Error("File sink has no open stream");
    }
    await new Promise<void>((resolve, reject) => {
      stream.write(payload, error => {
        if (error) {
          this.options.logger?.error("File sink write failed", error);
          reject(error);
          return;
        }
        this.bytesWritten += size;
        resolve();
      });
    });
  }

  private async rotate() {
    if (this.stream) {
      await endStream(this.stream);
    }
    // Counter suffix keeps names unique when two rotations land in the same millisecond.
    this.rotations += 1;
    const fileName = `${this.options.sessionId}-${Date.now()}-${this.rotations}.jsonl`;
    this.stream = createWriteStream(path.join(this.options.outputDir, fileName), { flags: "a" });
    this.bytesWritten = 0;
    await this.pruneOldFiles();
  }

  private async pruneOldFiles() {
    try {
      const entries = await readdir(this.options.outputDir);
      const files = await Promise.all(
        entries
          .filter(entry => entry.endsWith(".jsonl"))
          .map(async entry => {
            const fullPath = path.join(this.options.outputDir, entry);
            const info = await stat(fullPath);
            return { fullPath, mtime: info.mtimeMs };
          })
      );
      if (files.length <= this.maxFiles) {
        return;
      }
      const toDelete = files.sort((a, b) => b.mtime - a.mtime).slice(this.maxFiles);
      await Promise.allSettled(
        toDelete.map(file =>
          unlink(file.fullPath).catch((error: unknown) => {
            this.options.logger?.warn("Failed to remove old log file", error);
          })
        )
      );
    } catch (error) {
      this.options.logger?.warn("Failed to prune log files", error);
    }
  }
}
