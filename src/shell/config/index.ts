export { parseArgs, parseCLIArgs, USAGE } from "./cli.js";
export { DEFAULT_CONFIG_FILE, loadLinterConfig } from "./loader.js";
