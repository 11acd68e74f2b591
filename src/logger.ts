import fs from "fs";
import path from "path";
import { isNotFound } from "./errors";

export interface LogSink {
  log(message: string): void;
}

const pad = (n: number) => n.toString().padStart(2, "0");

/**
 * `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function compactTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface FileLoggerOptions {
  // echo every line to stdout
  echo?: boolean;
  clock?: () => Date;
}

/**
 * Line-oriented event log. A log file left by a previous run is moved
 * aside to `<name>_YYYYMMDD_HHMMSS.log` when the logger opens.
 */
export class FileLogger implements LogSink {
  private constructor(
    readonly file: string,
    private readonly stream: fs.WriteStream,
    private readonly echo: boolean,
    private readonly clock: () => Date
  ) {}

  static async open(
    dir: string,
    name: string,
    options: FileLoggerOptions = {}
  ): Promise<FileLogger> {
    const clock = options.clock ?? (() => new Date());
    const file = path.join(dir, `${name}.log`);
    await fs.promises.mkdir(dir, { recursive: true });
    try {
      await fs.promises.rename(
        file,
        path.join(dir, `${name}_${compactTimestamp(clock())}.log`)
      );
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
    }

    const stream = fs.createWriteStream(file, { flags: "a", encoding: "utf8" });
    await new Promise<void>((resolve, reject) => {
      stream.once("open", () => {
        stream.off("error", reject);
        resolve();
      });
      stream.once("error", reject);
    });
    stream.on("error", (err) => {
      console.log("log file error:", err);
    });
    return new FileLogger(file, stream, options.echo ?? true, clock);
  }

  log(message: string) {
    const line = `[${formatTimestamp(this.clock())}] ${message}`;
    if (this.echo) {
      console.log(line);
    }
    if (!this.stream.writableEnded) {
      this.stream.write(line + "\n");
    }
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.stream.writableFinished) {
        resolve();
        return;
      }
      this.stream.end(() => resolve());
    });
  }
}
