import { z } from "zod/v4";

// Optional per-component configuration (.umbrella-check.yaml)
export const ConfigSchema = z.strictObject({
  // Umbrella headers are named <umbrellaPrefix><Component>.h
  umbrellaPrefix: z.string().min(1).optional(),
  // Framework qualifier, e.g. "MaterialComponents" in MaterialComponents/MaterialButtons.h
  frameworkName: z.string().min(1).optional(),
  // Appended to the built-in filter lists
  filteredPrefixes: z.array(z.string().min(1)).optional(),
  filteredSuffixes: z.array(z.string().min(1)).optional(),
  // File extensions scanned for imports
  extensions: z.array(z.string().startsWith(".")).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Fully resolved settings shared by every rule chain in a run */
export interface CheckerOptions {
  umbrellaPrefix: string;
  frameworkName: string;
  filteredPrefixes: readonly string[];
  filteredSuffixes: readonly string[];
  extensions: readonly string[];
}

/** Per-file context handed to every rule */
export interface CheckContext {
  /** Path of the file whose imports are being checked */
  readonly checkedFile: string;
  /** Every file of the same module, the checked file included */
  readonly moduleFiles: readonly string[];
}

/**
 * Outcome of a single rule:
 * - continue: fall through to the next rule
 * - suppress: stop checking this import, no error
 * - fail: stop checking this import and report `message`
 */
export type RuleDecision =
  | { kind: "continue" }
  | { kind: "suppress" }
  | { kind: "fail"; message: string };

export interface CheckRule {
  name: string;
  evaluate(importPath: string, context: CheckContext): RuleDecision;
}

/** A rejected import */
export interface Violation {
  file: string;
  importPath: string;
  message: string;
}

/** Aggregated result of checking a component and its submodules */
export interface ComponentReport {
  component: string;
  filesChecked: number;
  violations: Violation[];
}
