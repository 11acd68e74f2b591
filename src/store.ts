import fs from "fs";
import { errorMessage, isNotFound } from "./errors";
import type { LogSink } from "./logger";

/**
 * Where the allow-list lives between runs. `save` always receives the
 * full list and replaces whatever was stored before.
 */
export interface AllowListStore {
  readonly location: string;
  load(): Promise<string[]>;
  save(entries: readonly string[]): Promise<void>;
}

/**
 * Allow-list kept as a JSON array of CIDR strings.
 */
export class AllowListFile implements AllowListStore {
  constructor(readonly location: string, private readonly logger: LogSink) {}

  async load(): Promise<string[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.location, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.log(
          `Allowed IPs file ${this.location} not found, starting with an empty list`
        );
      } else {
        this.logger.log(`Error loading allowed IPs: ${errorMessage(err)}`);
      }
      return [];
    }

    try {
      const data: unknown = JSON.parse(text);
      if (
        !Array.isArray(data) ||
        !data.every((entry): entry is string => typeof entry === "string")
      ) {
        throw new Error("expected a JSON array of strings");
      }
      return data.map((entry) => entry.trim());
    } catch (err) {
      this.logger.log(`Error loading allowed IPs: ${errorMessage(err)}`);
      return [];
    }
  }

  async save(entries: readonly string[]): Promise<void> {
    // write aside then rename, so a crash never leaves a torn file
    const tmp = `${this.location}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(entries, null, 2), "utf8");
    await fs.promises.rename(tmp, this.location);
  }
}

