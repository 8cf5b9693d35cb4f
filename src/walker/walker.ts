import { existsSync } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type { CheckerOptions, ComponentReport, Violation } from "../types/index.js";
import { createGeneralChecker, createSourceChecker, type ImportChecker } from "../rules/index.js";

const SOURCE_DIR = "src";
const EXAMPLES_DIR = "examples";

/**
 * Directories under src/ whose name starts with an upper-case letter are
 * nested components, checked on their own
 */
export function isSubmoduleDirectory(name: string): boolean {
  return /^[A-Z]/.test(name);
}

export interface FindModuleFilesOptions {
  extensions: readonly string[];
  /** Leave out upper-case child directories of the starting directory */
  splitSubmodules?: boolean;
}

/**
 * Recursively find all source files of a module, sorted
 */
export async function findModuleFiles(
  dir: string,
  options: FindModuleFilesOptions
): Promise<string[]> {
  const files: string[] = [];

  async function walk(currentDir: string, isRoot: boolean): Promise<void> {
    const entries = (await readdir(currentDir)).sort();

    for (const entry of entries) {
      // Skip node_modules and hidden entries
      if (entry === "node_modules" || entry.startsWith(".")) continue;

      const fullPath = join(currentDir, entry);
      const stats = await stat(fullPath);

      if (stats.isDirectory()) {
        if (isRoot && options.splitSubmodules && isSubmoduleDirectory(entry)) continue;
        await walk(fullPath, false);
      } else if (options.extensions.some((ext) => entry.endsWith(ext))) {
        files.push(fullPath);
      }
    }
  }

  await walk(dir, true);
  return files;
}

/**
 * Check every file against the module made up of all of them
 */
export async function checkModule(
  files: readonly string[],
  checker: ImportChecker
): Promise<Violation[]> {
  const violations: Violation[] = [];

  for (const file of files) {
    violations.push(...(await checker.checkFile(file, files)));
  }

  return violations;
}

/**
 * Check a component: its src/ tree with the source rule chain, each nested
 * component recursively, and its optional examples/ tree with the general
 * rule chain. A missing src/ directory rejects.
 */
export async function checkComponent(
  componentPath: string,
  options: CheckerOptions
): Promise<ComponentReport> {
  const component = basename(resolve(componentPath));
  const srcDir = join(componentPath, SOURCE_DIR);
  const report: ComponentReport = { component, filesChecked: 0, violations: [] };

  const entries = (await readdir(srcDir, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory() && isSubmoduleDirectory(entry.name))
    .map((entry) => entry.name)
    .sort();

  for (const submodule of entries) {
    const nested = await checkComponent(join(srcDir, submodule), options);
    report.filesChecked += nested.filesChecked;
    report.violations.push(...nested.violations);
  }

  const sourceFiles = await findModuleFiles(srcDir, {
    extensions: options.extensions,
    splitSubmodules: true,
  });
  report.filesChecked += sourceFiles.length;
  report.violations.push(
    ...(await checkModule(sourceFiles, createSourceChecker(component, options)))
  );

  const examplesDir = join(componentPath, EXAMPLES_DIR);
  if (existsSync(examplesDir)) {
    const exampleFiles = await findModuleFiles(examplesDir, { extensions: options.extensions });
    report.filesChecked += exampleFiles.length;
    report.violations.push(...(await checkModule(exampleFiles, createGeneralChecker(options))));
  }

  return report;
}
