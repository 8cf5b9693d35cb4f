export {
  ImportChecker,
  createSourceChecker,
  createGeneralChecker,
  umbrellaHeaderName,
  frameworkUmbrellaHeaderName,
} from "./checker.js";
export {
  prefixSuffixFilter,
  ownUmbrellaGuard,
  sameModuleFilter,
  nonUmbrellaCheck,
} from "./rules.js";
