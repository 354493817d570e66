// CHANGE: Configuration entry point for the shell layer

export { parseCLIArgs, USAGE } from "./cli.js";
export {
	CONFIG_FILE_NAME,
	DEFAULT_CONFIG,
	DEFAULT_HEADER_LINES,
	loadCensusConfig,
} from "./loader.js";
