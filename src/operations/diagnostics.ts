/**
 * Diagnostics: warning and info text for a finished conversion
 *
 * Reads the final counts only; nothing here changes the matrix.
 */

import type { ExclusionCategory } from "../types";
import { BALANCE_TOLERANCE } from "./recode";
import type { Diagnostics, DiagnosticsInput, SiteMode } from "./types";

function plural(count: number): string {
  return count === 1 ? "" : "s";
}

/**
 * Warning text per exclusion category, in reporting order
 */
const EXCLUSION_WARNINGS: readonly (readonly [ExclusionCategory, (count: number) => string])[] = [
  ["missing", (n) => `WARNING: Excluded ${n} site${plural(n)} with only missing data.`],
  [
    "speciesIncomplete",
    (n) => `WARNING: Excluded ${n} site${plural(n)} with only missing data in one or more species.`,
  ],
  ["monomorphic", (n) => `WARNING: Excluded ${n} monomorphic site${plural(n)}.`],
  ["excludedTransition", (n) => `WARNING: Excluded ${n} transition site${plural(n)}.`],
  ["excludedTransversion", (n) => `WARNING: Excluded ${n} transversion site${plural(n)}.`],
  ["triAllelic", (n) => `WARNING: Excluded ${n} tri-allelic site${plural(n)}.`],
  ["tetraAllelic", (n) => `WARNING: Excluded ${n} tetra-allelic site${plural(n)}.`],
  ["indel", (n) => `WARNING: Excluded ${n} indel site${plural(n)}.`],
];

const MODE_QUALIFIERS: Readonly<Record<SiteMode, string>> = {
  all: "",
  transversions: "transversion ",
  transitions: "transition ",
};

/**
 * Build the warnings and the closing info line for a run
 *
 * @example
 * ```typescript
 * const { warnings, info } = buildDiagnostics({ tally, halfCalledSites: 0, mode: "all", cap, retainedSites: 12 });
 * info; // "INFO: Retained 12 bi-allelic sites."
 * ```
 */
export function buildDiagnostics(input: DiagnosticsInput): Diagnostics {
  const warnings: string[] = [];

  if (input.halfCalledSites > 0) {
    const n = input.halfCalledSites;
    warnings.push(
      `WARNING: Found ${n} site${plural(n)} with genotypes that were half missing. These genotypes were ignored.`
    );
  }

  if (input.balance?.deviates === true) {
    warnings.push(
      "WARNING: The number of '0' and '2' in the data set is expected to be similar, however,\n" +
        `    they differ by more than ${Math.round(BALANCE_TOLERANCE * 100)} percent.`
    );
  }

  if (input.cap.capExceedsAvailable && input.maxSites !== undefined) {
    warnings.push(
      `WARNING: The maximum number of SNPs has been set to ${input.maxSites}, which is not smaller\n` +
        `    than the number of bi-allelic SNPs with sufficient information for SNAPP (${input.retainedSites}).`
    );
  }

  for (const [category, message] of EXCLUSION_WARNINGS) {
    const count = input.tally[category];
    if (count > 0) {
      warnings.push(message(count));
    }
  }

  const info = input.cap.capApplied
    ? `INFO: Removed ${input.cap.overCap} bi-allelic sites due to specified maximum number of ${input.maxSites ?? 0} sites.`
    : `INFO: Retained ${input.retainedSites} bi-allelic ${MODE_QUALIFIERS[input.mode]}sites.`;

  return { warnings, info };
}
