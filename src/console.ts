import readline from "readline";
import { PersistenceError, errorMessage } from "./errors";
import type { LogSink } from "./logger";
import { NetworkEntry } from "./network";
import type { AccessRegistry } from "./registry";
import type { ShutdownCoordinator } from "./shutdown";

export type Command =
  | { kind: "add"; network: string }
  | { kind: "remove"; network: string }
  | { kind: "list" }
  | { kind: "stop" }
  | { kind: "unknown"; input: string };

export const usage =
  "Available commands: add [ip or cidr], remove [ip or cidr], list, stop";

export function parseCommand(line: string): Command {
  const input = line.trim();
  const match = /^(\S+)(?:\s+(.*))?$/.exec(input);
  if (!match) {
    return { kind: "unknown", input };
  }
  const word = match[1].toLowerCase();
  const argument = match[2]?.trim() ?? "";
  if (word === "add" && argument) {
    return { kind: "add", network: argument };
  }
  if (word === "remove" && argument) {
    return { kind: "remove", network: argument };
  }
  if (argument === "") {
    if (word === "list") {
      return { kind: "list" };
    }
    if (word === "exit" || word === "quit" || word === "stop") {
      return { kind: "stop" };
    }
  }
  return { kind: "unknown", input };
}

export interface ConsoleOptions {
  registry: AccessRegistry;
  shutdown: ShutdownCoordinator;
  logger: LogSink;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  prompt?: string;
  // let readline handle line editing and Ctrl+C
  terminal?: boolean;
}

/**
 * Line-based operator console on the process's standard streams.
 */
export class ControlConsole {
  private readonly prompt: string;

  constructor(private readonly options: ConsoleOptions) {
    this.prompt = options.prompt ?? "> ";
  }

  /**
   * Read and run commands until a stop command, end of input, an
   * interrupt, or a shutdown requested elsewhere.
   */
  async run(): Promise<void> {
    const { input, output, shutdown, logger } = this.options;
    if (shutdown.requested) {
      return;
    }
    const rl = readline.createInterface({
      input,
      output,
      prompt: this.prompt,
      terminal: this.options.terminal ?? false,
      signal: shutdown.signal,
    });
    // created before the first await so no line is missed
    const lines = rl[Symbol.asyncIterator]();
    let closed = false;
    rl.once("close", () => {
      closed = true;
    });
    rl.on("SIGINT", () => {
      if (shutdown.request("interrupt")) {
        logger.log("Stopped by Ctrl+C");
      }
    });

    try {
      rl.prompt();
      while (!shutdown.requested) {
        const next = await lines.next();
        if (next.done) {
          shutdown.request("end of input");
          break;
        }
        const keepGoing = await this.execute(parseCommand(next.value));
        if (!keepGoing) {
          break;
        }
        rl.prompt();
      }
    } finally {
      if (!closed) {
        rl.close();
      }
    }
  }

  /**
   * Run one command. Returns false once the console should stop reading.
   */
  async execute(command: Command): Promise<boolean> {
    const { registry, shutdown, logger } = this.options;
    try {
      switch (command.kind) {
        case "add": {
          const result = await registry.addNetwork(command.network);
          const network = canonical(command.network);
          if (result === "invalid-format") {
            this.print(`Invalid IP or network format: ${command.network}`);
          } else if (result === "already-present") {
            this.print(`${network} is already in the allowed list`);
          } else {
            logger.log(`${network} added to allowed list`);
            this.print(`${network} added`);
          }
          return true;
        }
        case "remove": {
          const result = await registry.removeNetwork(command.network);
          const network = canonical(command.network);
          if (result === "invalid-format") {
            this.print(`Invalid IP or network format: ${command.network}`);
          } else if (result === "not-found") {
            this.print(`${network} not found in allowed list`);
          } else {
            logger.log(`${network} removed from allowed list`);
            this.print(`${network} removed`);
          }
          return true;
        }
        case "list": {
          const entries = await registry.listNetworks();
          this.print("Allowed IPs / Networks:");
          for (const entry of entries) {
            this.print(` - ${entry.toString()}`);
          }
          return true;
        }
        case "stop":
          logger.log("Stopping server via command");
          shutdown.request("stop command");
          return false;
        case "unknown":
          this.print(usage);
          return true;
      }
    } catch (err) {
      if (err instanceof PersistenceError) {
        logger.log(`Failed to save allowed list: ${err.message}`);
        this.print(`Failed to save allowed list: ${err.message}`);
        return true;
      }
      this.print(`Command failed: ${errorMessage(err)}`);
      return true;
    }
  }

  private print(line: string) {
    this.options.output.write(line + "\n");
  }
}

function canonical(text: string): string {
  return NetworkEntry.parse(text)?.toString() ?? text.trim();
}
