import yargs from "yargs/yargs";

export interface CliArgs {
  files: string[];
  keys: string;
  config: string | undefined;
  bytesPerLine: number | undefined;
  dump: boolean;
}

export async function parseArguments(argv: string[]): Promise<CliArgs> {
  const parsed = await yargs(argv)
    .scriptName("hexmodal")
    .usage("Usage: $0 [files..]\n\nOpen files, replay keys, print the resulting state.")
    .option("keys", {
      alias: "k",
      type: "string",
      default: "",
      description: "Keys to replay, in <Esc>/<CR>/<A-s> notation.",
    })
    .option("config", {
      alias: "c",
      type: "string",
      description: "Config file to use instead of $HEXMODAL_HOME/config.jsonc.",
    })
    .option("bytes-per-line", {
      type: "number",
      description: "Row width for up/down movement. Overrides the config file.",
    })
    .option("dump", {
      type: "boolean",
      default: false,
      description: "Print the bytes of every selection.",
    })
    .help()
    .alias("h", "help")
    .strict()
    .parseAsync();

  return {
    files: parsed._.map(String),
    keys: parsed.keys,
    config: parsed.config,
    bytesPerLine: parsed["bytes-per-line"],
    dump: parsed.dump,
  };
}
