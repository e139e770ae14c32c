export { createTempDir, removeDir, withTempDir, writeDictionary } from "./fs.js";
export { runCli } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { SAMPLE_VOCABULARY } from "./fixtures.js";
