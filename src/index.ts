export { extractImports, matchImport, readImports } from "./imports/index.js";
export {
  ImportChecker,
  createSourceChecker,
  createGeneralChecker,
  umbrellaHeaderName,
  frameworkUmbrellaHeaderName,
  prefixSuffixFilter,
  ownUmbrellaGuard,
  sameModuleFilter,
  nonUmbrellaCheck,
} from "./rules/index.js";
export { checkComponent, checkModule, findModuleFiles, isSubmoduleDirectory } from "./walker/index.js";
export { parseConfig, loadConfig, resolveCheckerOptions, DEFAULT_OPTIONS } from "./config/index.js";
export type {
  CheckContext,
  CheckRule,
  CheckerOptions,
  ComponentReport,
  Config,
  RuleDecision,
  Violation,
} from "./types/index.js";
