import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { applyLogConfig, createServices, summarizeVideo } from "../pipeline/run";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true })
    .parse();

  applyLogConfig(ENV);
  const services = createServices(ENV);
  const res = await summarizeVideo(services, argv.video);
  console.log(JSON.stringify(res, null, 2));
}

main().catch((e) => {
  console.error(String(e));
  process.exit(1);
});
