import { PersistenceError } from "./errors";
import { Lock } from "./lock";
import type { LogSink } from "./logger";
import { NetworkEntry, parseAddress } from "./network";
import type { AllowListStore } from "./store";

export type AddResult = "added" | "already-present" | "invalid-format";
export type RemoveResult = "removed" | "not-found" | "invalid-format";

/**
 * The set of networks allowed to open a forwarded connection.
 *
 * Every operation runs under one lock, persistence included: a mutation
 * changes the in-memory list and then overwrites the store with the whole
 * list. The two steps are not atomic; if the save fails the mutation stays
 * applied in memory, a PersistenceError is thrown, and the stored copy is
 * stale until the next successful mutation.
 */
export class AccessRegistry {
  private readonly lock = new Lock();
  private readonly entries: NetworkEntry[] = [];

  constructor(
    private readonly store: AllowListStore,
    entries: Iterable<NetworkEntry> = []
  ) {
    for (const entry of entries) {
      if (!this.entries.some((e) => e.equals(entry))) {
        this.entries.push(entry);
      }
    }
  }

  /**
   * Build a registry from the store. A list holding anything that is not
   * a network is discarded as a whole.
   */
  static async load(
    store: AllowListStore,
    logger: LogSink
  ): Promise<AccessRegistry> {
    const texts = await store.load();
    const entries: NetworkEntry[] = [];
    for (const text of texts) {
      const entry = NetworkEntry.parse(text);
      if (!entry) {
        logger.log(`Error loading allowed IPs: invalid network "${text}"`);
        return new AccessRegistry(store);
      }
      entries.push(entry);
    }
    return new AccessRegistry(store, entries);
  }

  checkAllowed(ip: string): Promise<boolean> {
    const address = parseAddress(ip);
    return this.lock.run(
      () =>
        address !== undefined &&
        this.entries.some((entry) => entry.contains(address))
    );
  }

  async addNetwork(cidr: string): Promise<AddResult> {
    const entry = NetworkEntry.parse(cidr);
    if (!entry) {
      return "invalid-format";
    }
    return this.lock.run(async (): Promise<AddResult> => {
      if (this.entries.some((e) => e.equals(entry))) {
        return "already-present";
      }
      this.entries.push(entry);
      await this.persist();
      return "added";
    });
  }

  async removeNetwork(cidr: string): Promise<RemoveResult> {
    const entry = NetworkEntry.parse(cidr);
    if (!entry) {
      return "invalid-format";
    }
    return this.lock.run(async (): Promise<RemoveResult> => {
      const index = this.entries.findIndex((e) => e.equals(entry));
      if (index === -1) {
        return "not-found";
      }
      this.entries.splice(index, 1);
      await this.persist();
      return "removed";
    });
  }

  /**
   * Current entries in insertion order.
   */
  listNetworks(): Promise<NetworkEntry[]> {
    return this.lock.run(() => [...this.entries]);
  }

  private async persist() {
    try {
      await this.store.save(this.entries.map((entry) => entry.toString()));
    } catch (err) {
      throw new PersistenceError(this.store.location, err);
    }
  }
}
