import readline from "readline/promises";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { applyLogConfig, askQuestion, createServices, summarizeVideo } from "../pipeline/run";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true })
    .option("show-sources", { type: "boolean", default: false })
    .parse();

  applyLogConfig(ENV);
  const services = createServices(ENV);
  const res = await summarizeVideo(services, argv.video);
  console.log(`\n${res.summary}\n`);
  console.log(`Session ${res.sessionId} ready. Ask about the video; empty line or "exit" quits.\n`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const question = (await rl.question("> ")).trim();
      if (!question || question === "exit") break;
      try {
        const { answer, sources } = await askQuestion(services, res.sessionId, question);
        console.log(`\n${answer}\n`);
        if (argv["show-sources"]) {
          for (const s of sources) console.log(`  [${s.index}] ${s.score.toFixed(3)} ${s.text.slice(0, 80)}...`);
          console.log("");
        }
      } catch (e) {
        // A failed turn leaves the session usable
        console.error(String(e));
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((e) => {
  console.error(String(e));
  process.exit(1);
});
