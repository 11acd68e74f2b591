import net from "node:net";
import type { LogSink } from "../src/logger";
import type { AllowListStore } from "../src/store";

export class MemoryLogger implements LogSink {
  readonly lines: string[] = [];

  log(message: string) {
    this.lines.push(message);
  }
}

export class MemoryAllowListStore implements AllowListStore {
  readonly location = "memory";
  saves = 0;
  failWith: Error | undefined;

  constructor(public saved: string[] = []) {}

  async load(): Promise<string[]> {
    return [...this.saved];
  }

  async save(entries: readonly string[]): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.saves++;
    this.saved = [...entries];
  }
}

export async function waitFor(
  predicate: () => boolean,
  message: string,
  timeoutMs = 3_000
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`timed out waiting for ${message}`);
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

export interface EchoServer {
  port: number;
  sockets: net.Socket[];
  closedSockets: number;
  close(): Promise<void>;
}

/**
 * Loopback backend that echoes every byte back.
 */
export function startEchoServer(): Promise<EchoServer> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    const echo: EchoServer = {
      port: 0,
      sockets: [],
      closedSockets: 0,
      close: () =>
        new Promise<void>((done) => {
          for (const socket of echo.sockets) {
            socket.destroy();
          }
          server.close(() => done());
        }),
    };
    server.on("connection", (socket) => {
      echo.sockets.push(socket);
      socket.on("data", (data) => socket.write(data));
      socket.on("error", () => socket.destroy());
      socket.on("close", () => {
        echo.closedSockets++;
      });
    });
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("unexpected server address"));
        return;
      }
      echo.port = address.port;
      resolve(echo);
    });
  });
}

/**
 * A loopback port with nothing listening on it.
 */
export function unusedPort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("unexpected server address"));
        return;
      }
      server.close(() => resolve(address.port));
    });
  });
}

export function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: "127.0.0.1", port });
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
  });
}

/**
 * Resolves with everything the socket receives until it closes.
 */
export function collect(socket: net.Socket): Promise<Buffer> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    socket.on("data", (data: Buffer) => chunks.push(data));
    socket.on("error", () => undefined);
    socket.on("close", () => resolve(Buffer.concat(chunks)));
  });
}

export function readExactly(socket: net.Socket, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    const onData = (data: Buffer) => {
      chunks.push(data);
      received += data.length;
      if (received >= length) {
        socket.off("data", onData);
        socket.off("close", onClose);
        resolve(Buffer.concat(chunks));
      }
    };
    const onClose = () => reject(new Error("socket closed early"));
    socket.on("data", onData);
    socket.once("close", onClose);
  });
}
