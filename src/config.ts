import yargs from "yargs";

export interface RelayConfig {
  listenHost: string;
  listenPort: number;
  backendHost: string;
  backendPort: number;
  backlog: number;
  allowList: string;
  logDir: string;
  logName: string;
}

const isPort = (value: number, allowZero: boolean) =>
  Number.isInteger(value) && value >= (allowZero ? 0 : 1) && value <= 65535;

/**
 * Read the relay configuration from command line arguments, falling back
 * to `ALLOWLIST_RELAY_*` environment variables and then to defaults.
 */
export async function parseConfig(argv: string[]): Promise<RelayConfig> {
  const args = await yargs(argv)
    .scriptName("allowlist-relay")
    .env("ALLOWLIST_RELAY")
    .option("listen-host", {
      string: true,
      default: "0.0.0.0",
      description: "listen ip address",
    })
    .option("listen-port", {
      number: true,
      default: 25565,
      description: "listen port",
    })
    .option("backend-host", {
      string: true,
      default: "127.0.0.1",
      description: "backend ip address or host name",
    })
    .option("backend-port", {
      number: true,
      default: 25566,
      description: "backend port",
    })
    .option("backlog", {
      number: true,
      default: 5,
      description: "max length of the pending connection queue",
    })
    .option("allow-list", {
      string: true,
      default: "allowed_ips.json",
      description: "JSON file holding the allowed networks",
    })
    .option("log-dir", {
      string: true,
      default: "logs",
      description: "directory for the connection log",
    })
    .option("log-name", {
      string: true,
      default: "proxy",
      description: "log file name, without extension",
    })
    .check((args) => {
      if (!isPort(args["listen-port"], true)) {
        throw new Error(`invalid listen port: ${args["listen-port"]}`);
      }
      if (!isPort(args["backend-port"], false)) {
        throw new Error(`invalid backend port: ${args["backend-port"]}`);
      }
      if (!Number.isInteger(args.backlog) || args.backlog < 1) {
        throw new Error(`invalid backlog: ${args.backlog}`);
      }
      return true;
    })
    .strict()
    .fail((message, err) => {
      throw err ?? new Error(message);
    })
    .parse();

  return {
    listenHost: args.listenHost,
    listenPort: args.listenPort,
    backendHost: args.backendHost,
    backendPort: args.backendPort,
    backlog: args.backlog,
    allowList: args.allowList,
    logDir: args.logDir,
    logName: args.logName,
  };
}
