export { parseConfig, loadConfig, resolveCheckerOptions } from "./loader.js";
export {
  CONFIG_FILE,
  DEFAULT_OPTIONS,
  DEFAULT_FILTERED_PREFIXES,
  DEFAULT_FILTERED_SUFFIXES,
} from "./defaults.js";
