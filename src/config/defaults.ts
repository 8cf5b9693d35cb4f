import type { CheckerOptions } from "../types/index.js";

export const CONFIG_FILE = ".umbrella-check.yaml";

// System frameworks and third-party libraries that have no umbrella header
export const DEFAULT_FILTERED_PREFIXES: readonly string[] = [
  "UIKit/",
  "Foundation/",
  "CoreGraphics/",
  "CoreText/",
  "QuartzCore/",
  "objc/",
  "MDFInternationalization",
  "MDFTextAccessibility",
  "MotionAnimator",
  "MotionInterchange",
  "MotionTransitioning",
];

// Themer extensions live outside their component's umbrella
export const DEFAULT_FILTERED_SUFFIXES: readonly string[] = ["Themer.h"];

export const DEFAULT_OPTIONS: CheckerOptions = Object.freeze({
  umbrellaPrefix: "Material",
  frameworkName: "MaterialComponents",
  filteredPrefixes: DEFAULT_FILTERED_PREFIXES,
  filteredSuffixes: DEFAULT_FILTERED_SUFFIXES,
  extensions: [".h", ".m", ".mm"],
});
