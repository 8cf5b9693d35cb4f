import type { CheckRule, RuleDecision } from "../types/index.js";

const CONTINUE: RuleDecision = { kind: "continue" };
const SUPPRESS: RuleDecision = { kind: "suppress" };

function fail(message: string): RuleDecision {
  return { kind: "fail", message };
}

/**
 * Exempt system, third-party and other known headers from the remaining rules
 */
export function prefixSuffixFilter(filters: {
  prefixes: readonly string[];
  suffixes: readonly string[];
}): CheckRule {
  return {
    name: "prefix-suffix-filter",
    evaluate(importPath) {
      if (
        filters.prefixes.some((prefix) => importPath.startsWith(prefix)) ||
        filters.suffixes.some((suffix) => importPath.endsWith(suffix))
      ) {
        return SUPPRESS;
      }
      return CONTINUE;
    },
  };
}

/**
 * Reject a component importing its own umbrella header.
 * Must run before sameModuleFilter so a sibling file that happens to carry
 * the umbrella name is still reported.
 */
export function ownUmbrellaGuard(umbrellaHeader: string): CheckRule {
  return {
    name: `own-umbrella-guard(${umbrellaHeader})`,
    evaluate(importPath, context) {
      if (importPath === umbrellaHeader) {
        return fail(`${context.checkedFile} imports its own umbrella header: ${importPath}`);
      }
      return CONTINUE;
    },
  };
}

/**
 * Allow files of the same module to import each other directly
 */
export function sameModuleFilter(): CheckRule {
  return {
    name: "same-module-filter",
    evaluate(importPath, context) {
      if (context.moduleFiles.some((file) => file.endsWith(importPath))) {
        return SUPPRESS;
      }
      return CONTINUE;
    },
  };
}

/**
 * Terminal rule: anything still unresolved must start with the umbrella
 * prefix, which covers both MaterialButtons.h and MaterialComponents/MaterialButtons.h
 */
export function nonUmbrellaCheck(umbrella: { umbrellaPrefix: string }): CheckRule {
  return {
    name: "non-umbrella-check",
    evaluate(importPath, context) {
      if (!importPath.startsWith(umbrella.umbrellaPrefix)) {
        return fail(`${context.checkedFile} imports a non-umbrella header: ${importPath}`);
      }
      return SUPPRESS;
    },
  };
}
