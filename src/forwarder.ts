import net from "net";
import { errorCode, errorMessage } from "./errors";
import type { LogSink } from "./logger";
import type { AccessRegistry } from "./registry";

export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Why a pump stopped: the source ended cleanly, the peer reset the
 * connection, the other half of the pair was closed, or some other I/O error.
 */
export type TerminationCause = "eof" | "reset" | "closed" | "error";

export interface PumpResult {
  label: string;
  bytes: number;
  durationMs: number;
  cause: TerminationCause;
  error?: Error;
}

export type ConnectionOutcome =
  | { kind: "rejected"; remote: string }
  | { kind: "unreachable"; remote: string; error: Error }
  | { kind: "abandoned"; remote: string }
  | { kind: "forwarded"; remote: string; pumps: [PumpResult, PumpResult] };

export interface ForwarderOptions {
  registry: AccessRegistry;
  backend: Endpoint;
  logger: LogSink;
}

const resetCodes = new Set(["ECONNRESET", "EPIPE", "ECONNABORTED"]);

// how long a clean close may spend flushing to a peer that stopped reading
export const flushTimeoutMs = 5_000;

export function classifyError(err: Error): TerminationCause {
  const code = errorCode(err);
  return code !== undefined && resetCodes.has(code) ? "reset" : "error";
}

/**
 * Connect to the backend. Resolves once the socket is connected.
 */
export function dial(target: Endpoint): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = new net.Socket()
      .connect(target.port, target.host)
      .setKeepAlive(true);
    const onError = (err: Error) => {
      socket.destroy();
      reject(err);
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(socket);
    });
  });
}

// flush what is queued, then close; errors skip the flush
function closeSocket(socket: net.Socket, graceful: boolean, timeoutMs: number) {
  if (socket.destroyed) {
    return;
  }
  if (!graceful || socket.writableFinished) {
    socket.destroy();
    return;
  }
  const timer = setTimeout(() => socket.destroy(), timeoutMs).unref();
  socket.once("close", () => clearTimeout(timer));
  socket.once("finish", () => socket.destroy());
  if (!socket.writableEnded) {
    socket.end();
  }
}

/**
 * Relay bytes from `source` to `destination` until the source ends or
 * either socket fails or closes. Whatever the cause, both sockets are
 * closed, which in turn stops the pump running the other way. A clean end
 * lets queued bytes drain for up to `timeoutMs` before the socket is
 * destroyed.
 */
export function pump(
  source: net.Socket,
  destination: net.Socket,
  label: string,
  timeoutMs = flushTimeoutMs
): Promise<PumpResult> {
  return new Promise((resolve) => {
    const startedAt = Date.now();
    let bytes = 0;
    let done = false;

    const finish = (cause: TerminationCause, error?: Error) => {
      if (done) {
        return;
      }
      done = true;
      const graceful = cause === "eof" || cause === "closed";
      closeSocket(source, graceful, timeoutMs);
      closeSocket(destination, graceful, timeoutMs);
      resolve({
        label,
        bytes,
        durationMs: Date.now() - startedAt,
        cause,
        error,
      });
    };

    source.on("data", (data: Buffer) => {
      if (done) {
        return;
      }
      bytes += data.length;
      if (!destination.write(data)) {
        // wait for the destination to catch up
        source.pause();
        destination.once("drain", () => source.resume());
      }
    });
    source.on("end", () => finish("eof"));
    // listeners stay attached after finish so late errors are still handled
    source.on("error", (err) => finish(classifyError(err), err));
    destination.on("error", (err) => finish(classifyError(err), err));
    source.on("close", () => finish("closed"));
    destination.on("close", () => finish("closed"));

    if (source.destroyed || destination.destroyed) {
      finish("closed");
    }
  });
}

export function formatPumpResult(result: PumpResult): string {
  const seconds = (result.durationMs / 1000).toFixed(2);
  let line = `${result.label} closed | Bytes: ${result.bytes} | Duration: ${seconds}s | Cause: ${result.cause}`;
  if (result.error) {
    line += ` (${result.error.message})`;
  }
  return line;
}

/**
 * Decides what happens to each accepted client: reject it, or pair it
 * with a fresh backend connection and relay both directions.
 */
export class ConnectionForwarder {
  private readonly registry: AccessRegistry;
  private readonly backend: Endpoint;
  private readonly logger: LogSink;

  constructor(options: ForwarderOptions) {
    this.registry = options.registry;
    this.backend = options.backend;
    this.logger = options.logger;
  }

  async handle(client: net.Socket): Promise<ConnectionOutcome> {
    const ip = client.remoteAddress ?? "unknown";
    const port = client.remotePort ?? 0;
    const remote = `${ip}:${port}`;
    this.logger.log(`Connection attempt from ${remote}`);

    // errors before the pumps take over
    let earlyError: Error | undefined;
    const onEarlyError = (err: Error) => {
      earlyError = err;
    };
    client.on("error", onEarlyError);

    if (!(await this.registry.checkAllowed(ip))) {
      this.logger.log(`Rejected: ${ip} is not in the allowed list`);
      client.destroy();
      return { kind: "rejected", remote };
    }

    let server: net.Socket;
    try {
      server = await dial(this.backend);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      this.logger.log(`Error connecting to destination: ${error.message}`);
      client.destroy();
      return { kind: "unreachable", remote, error };
    }

    client.off("error", onEarlyError);
    const backend = `${this.backend.host}:${this.backend.port}`;
    if (client.destroyed || earlyError) {
      const reason = earlyError ? `: ${earlyError.message}` : "";
      this.logger.log(`Client ${remote} went away before forwarding${reason}`);
      client.destroy();
      server.destroy();
      return { kind: "abandoned", remote };
    }

    this.logger.log(`Connection from ${ip} accepted and forwarded`);
    this.logger.log(`${remote} connected -> ${backend}`);

    const pumps = await Promise.all([
      pump(client, server, `${remote} -> ${backend}`).then((result) =>
        this.report(result)
      ),
      pump(server, client, `${backend} -> ${remote}`).then((result) =>
        this.report(result)
      ),
    ]);
    return { kind: "forwarded", remote, pumps };
  }

  private report(result: PumpResult): PumpResult {
    this.logger.log(formatPumpResult(result));
    return result;
  }
}
