import net from "net";
import { errorMessage } from "./errors";
import type { ConnectionForwarder, Endpoint } from "./forwarder";
import type { LogSink } from "./logger";
import type { ShutdownCoordinator } from "./shutdown";

export interface ListenerOptions {
  host: string;
  port: number;
  backlog: number;
  backend: Endpoint;
  forwarder: ConnectionForwarder;
  logger: LogSink;
  shutdown: ShutdownCoordinator;
}

/**
 * Accepts clients on the public endpoint and hands each one to the
 * forwarder without waiting for it. A shutdown request closes the
 * listening socket at once; connections already handed off keep running.
 */
export class Listener {
  private readonly server = net.createServer({ keepAlive: true });
  private readonly stopped: Promise<void>;
  private readonly pending = new Set<Promise<unknown>>();

  constructor(private readonly options: ListenerOptions) {
    const { logger, shutdown } = options;
    // server.close() only emits "close" once every connection has ended,
    // so stopping is tracked from the shutdown signal instead
    this.stopped = new Promise((resolve) => {
      shutdown.signal.addEventListener(
        "abort",
        () => {
          logger.log("Stopped accepting connections");
          resolve();
        },
        { once: true }
      );
    });
    this.server.on("connection", (socket) => this.dispatch(socket));
  }

  /**
   * Bind and start accepting. Rejects if the address cannot be bound.
   */
  start(): Promise<net.AddressInfo> {
    const { host, port, backlog, backend, logger, shutdown } = this.options;
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        this.server.off("error", onError);
        this.server.on("error", (err) => {
          logger.log(`Listener error: ${errorMessage(err)}`);
        });
        const address = this.address();
        logger.log(
          `Proxy listening on ${address.address}:${address.port} -> ${backend.host}:${backend.port}`
        );
        resolve(address);
      };
      this.server.once("error", onError);
      this.server.once("listening", onListening);
      this.server.listen({ host, port, backlog, signal: shutdown.signal });
    });
  }

  address(): net.AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("listener is not bound to a TCP address");
    }
    return address;
  }

  /**
   * Resolves once the listener has stopped accepting.
   */
  closed(): Promise<void> {
    return this.stopped;
  }

  /**
   * Connections handed to the forwarder that have not finished yet.
   */
  get active(): number {
    return this.pending.size;
  }

  private dispatch(socket: net.Socket) {
    const { forwarder, logger } = this.options;
    const task = forwarder
      .handle(socket)
      .catch((err) => {
        logger.log(`Unexpected error handling connection: ${errorMessage(err)}`);
        socket.destroy();
      })
      .finally(() => this.pending.delete(task));
    this.pending.add(task);
  }
}
