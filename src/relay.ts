import type net from "net";
import type { RelayConfig } from "./config";
import { ConnectionForwarder } from "./forwarder";
import { Listener } from "./listener";
import type { LogSink } from "./logger";
import { AccessRegistry } from "./registry";
import type { ShutdownCoordinator } from "./shutdown";
import { AllowListFile } from "./store";

export { parseConfig, type RelayConfig } from "./config";
export { ControlConsole, parseCommand, type Command } from "./console";
export { PersistenceError } from "./errors";
export {
  ConnectionForwarder,
  type ConnectionOutcome,
  type Endpoint,
  type PumpResult,
  type TerminationCause,
} from "./forwarder";
export { Listener } from "./listener";
export { FileLogger, formatTimestamp, type LogSink } from "./logger";
export { NetworkEntry, parseAddress } from "./network";
export { AccessRegistry, type AddResult, type RemoveResult } from "./registry";
export { ShutdownCoordinator } from "./shutdown";
export { AllowListFile, type AllowListStore } from "./store";

export interface Relay {
  registry: AccessRegistry;
  listener: Listener;
  address: net.AddressInfo;
}

/**
 * Load the allow-list and start accepting on the configured endpoint.
 * Rejects when the listen address cannot be bound.
 */
export async function startRelay(
  config: RelayConfig,
  logger: LogSink,
  shutdown: ShutdownCoordinator
): Promise<Relay> {
  const registry = await AccessRegistry.load(
    new AllowListFile(config.allowList, logger),
    logger
  );
  const backend = { host: config.backendHost, port: config.backendPort };
  const forwarder = new ConnectionForwarder({ registry, backend, logger });
  const listener = new Listener({
    host: config.listenHost,
    port: config.listenPort,
    backlog: config.backlog,
    backend,
    forwarder,
    logger,
    shutdown,
  });
  const address = await listener.start();
  return { registry, listener, address };
}
