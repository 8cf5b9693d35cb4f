import { readFile } from "node:fs/promises";
import type { CheckContext, CheckRule, CheckerOptions, Violation } from "../types/index.js";
import { extractImports } from "../imports/index.js";
import {
  prefixSuffixFilter,
  ownUmbrellaGuard,
  sameModuleFilter,
  nonUmbrellaCheck,
} from "./rules.js";

/**
 * ImportChecker evaluates an ordered rule chain against import strings.
 * The first rule that fails or suppresses decides; the rest are skipped.
 */
export class ImportChecker {
  private readonly rules: readonly CheckRule[];

  constructor(rules: readonly CheckRule[]) {
    this.rules = Object.freeze([...rules]);
  }

  get ruleNames(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  /**
   * Returns the error message of the first failing rule, or undefined
   * when a rule suppresses the import or no rule objects to it.
   */
  checkImport(importPath: string, context: CheckContext): string | undefined {
    for (const rule of this.rules) {
      const decision = rule.evaluate(importPath, context);

      if (decision.kind === "fail") {
        return decision.message;
      }
      if (decision.kind === "suppress") {
        break;
      }
    }

    return undefined;
  }

  /**
   * Check every import in a file's text
   */
  checkSource(filePath: string, text: string, moduleFiles: readonly string[]): Violation[] {
    const context: CheckContext = Object.freeze({ checkedFile: filePath, moduleFiles });
    const violations: Violation[] = [];

    for (const importPath of extractImports(text)) {
      const message = this.checkImport(importPath, context);
      if (message !== undefined) {
        violations.push({ file: filePath, importPath, message });
      }
    }

    return violations;
  }

  async checkFile(filePath: string, moduleFiles: readonly string[]): Promise<Violation[]> {
    const text = await readFile(filePath, "utf-8");
    return this.checkSource(filePath, text, moduleFiles);
  }
}

export function umbrellaHeaderName(componentName: string, options: CheckerOptions): string {
  return `${options.umbrellaPrefix}${componentName}.h`;
}

export function frameworkUmbrellaHeaderName(
  componentName: string,
  options: CheckerOptions
): string {
  return `${options.frameworkName}/${umbrellaHeaderName(componentName, options)}`;
}

function filterRule(options: CheckerOptions): CheckRule {
  return prefixSuffixFilter({
    prefixes: options.filteredPrefixes,
    suffixes: options.filteredSuffixes,
  });
}

/**
 * Rule chain for a component's own src/ tree
 */
export function createSourceChecker(componentName: string, options: CheckerOptions): ImportChecker {
  return new ImportChecker([
    filterRule(options),
    ownUmbrellaGuard(umbrellaHeaderName(componentName, options)),
    ownUmbrellaGuard(frameworkUmbrellaHeaderName(componentName, options)),
    sameModuleFilter(),
    nonUmbrellaCheck(options),
  ]);
}

/**
 * Rule chain for auxiliary code such as examples, which may import the
 * component's own umbrella header
 */
export function createGeneralChecker(options: CheckerOptions): ImportChecker {
  return new ImportChecker([filterRule(options), sameModuleFilter(), nonUmbrellaCheck(options)]);
}
