import { hideBin } from "yargs/helpers";
import { loadConfig } from "../node/config.ts";
import { NodeFileStore } from "../node/file-store.ts";
import { log } from "../node/log.ts";
import { parseArguments } from "./args.ts";
import { runHeadless } from "./run.ts";

async function main(): Promise<number> {
  const args = await parseArguments(hideBin(process.argv));
  const config = args.config === undefined ? loadConfig() : loadConfig(args.config);
  log.debug("config", config);

  const result = runHeadless(
    {
      files: args.files,
      keys: args.keys,
      bytesPerLine: args.bytesPerLine ?? config.bytesPerLine,
      historyLimit: config.historyLimit,
      dump: args.dump,
    },
    new NodeFileStore(),
    (line) => {
      process.stdout.write(`${line}\n`);
    },
  );
  return result.exitCode;
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error("hexmodal failed:", error);
    process.exitCode = 1;
  });
