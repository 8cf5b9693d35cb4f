import { readFile } from "node:fs/promises";

// Matches: #import "MDCButton.h"
const QUOTED_IMPORT_REGEX = /^\s*#import\s+"([^"]+)"/;

// Matches: #import <UIKit/UIKit.h>
const BRACKETED_IMPORT_REGEX = /^\s*#import\s+<([^>]+)>/;

/**
 * Match a single line against the two recognized import forms.
 * Returns the import target without its quotes or brackets.
 */
export function matchImport(line: string): string | undefined {
  const match = line.match(QUOTED_IMPORT_REGEX) ?? line.match(BRACKETED_IMPORT_REGEX);
  return match?.[1];
}

/**
 * Lazily extract import targets from source text, in file order.
 * Each iteration rescans the text from the first line.
 */
export function extractImports(text: string): Iterable<string> {
  return {
    *[Symbol.iterator]() {
      for (const line of text.split("\n")) {
        const importPath = matchImport(line);
        if (importPath !== undefined) {
          yield importPath;
        }
      }
    },
  };
}

/**
 * Read a file and extract its import targets
 */
export async function readImports(filePath: string): Promise<string[]> {
  const content = await readFile(filePath, "utf-8");
  return [...extractImports(content)];
}
