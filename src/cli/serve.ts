import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { applyLogConfig, createServices } from "../pipeline/run";
import { info } from "../pipeline/log";
import { startServer } from "../api/server";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("port", { type: "number", default: ENV.port })
    .option("host", { type: "string", default: ENV.host })
    .option("prefix", { type: "string", default: ENV.apiPrefix })
    .parse();

  applyLogConfig(ENV);
  const services = createServices(ENV);
  const server = await startServer(services, {
    port: argv.port,
    host: argv.host,
    apiPrefix: argv.prefix,
    corsOrigin: ENV.corsOrigin,
  });

  const shutdown = (signal: string) => {
    info("api.shutdown", { signal, activeSessions: services.store.size });
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
