/**
 * Tests for run diagnostics
 */

import { describe, expect, test } from "vitest";
import { buildDiagnostics } from "../../src/operations/diagnostics";
import { createTally } from "../../src/types";

const NO_CAP = { overCap: 0, capApplied: false, capExceedsAvailable: false };

describe("buildDiagnostics", () => {
  test("clean run has no warnings", () => {
    const diagnostics = buildDiagnostics({
      tally: createTally(),
      halfCalledSites: 0,
      mode: "all",
      cap: NO_CAP,
      retainedSites: 12,
    });

    expect(diagnostics).toEqual({ warnings: [], info: "INFO: Retained 12 bi-allelic sites." });
  });

  test("reports every nonzero category in order", () => {
    const diagnostics = buildDiagnostics({
      tally: createTally({
        indel: 1,
        tetraAllelic: 2,
        triAllelic: 1,
        excludedTransition: 1,
        monomorphic: 3,
        speciesIncomplete: 2,
        missing: 1,
      }),
      halfCalledSites: 2,
      mode: "transversions",
      cap: NO_CAP,
      retainedSites: 5,
    });

    expect(diagnostics.warnings).toEqual([
      "WARNING: Found 2 sites with genotypes that were half missing. These genotypes were ignored.",
      "WARNING: Excluded 1 site with only missing data.",
      "WARNING: Excluded 2 sites with only missing data in one or more species.",
      "WARNING: Excluded 3 monomorphic sites.",
      "WARNING: Excluded 1 transition site.",
      "WARNING: Excluded 1 tri-allelic site.",
      "WARNING: Excluded 2 tetra-allelic sites.",
      "WARNING: Excluded 1 indel site.",
    ]);
    expect(diagnostics.info).toBe("INFO: Retained 5 bi-allelic transversion sites.");
  });

  test("transition mode names excluded transversions", () => {
    const diagnostics = buildDiagnostics({
      tally: createTally({ excludedTransversion: 4 }),
      halfCalledSites: 1,
      mode: "transitions",
      cap: NO_CAP,
      retainedSites: 1,
    });

    expect(diagnostics.warnings).toEqual([
      "WARNING: Found 1 site with genotypes that were half missing. These genotypes were ignored.",
      "WARNING: Excluded 4 transversion sites.",
    ]);
    expect(diagnostics.info).toBe("INFO: Retained 1 bi-allelic transition sites.");
  });

  test("warns about unbalanced binary input", () => {
    const diagnostics = buildDiagnostics({
      tally: createTally(),
      halfCalledSites: 0,
      balance: { zeros: 3, twos: 1, proportion: 0.75, deviates: true },
      mode: "all",
      cap: NO_CAP,
      retainedSites: 2,
    });

    expect(diagnostics.warnings).toEqual([
      "WARNING: The number of '0' and '2' in the data set is expected to be similar, however,\n" +
        "    they differ by more than 1 percent.",
    ]);
  });

  test("balanced input gives no warning", () => {
    const diagnostics = buildDiagnostics({
      tally: createTally(),
      halfCalledSites: 0,
      balance: { zeros: 2, twos: 2, proportion: 0.5, deviates: false },
      mode: "all",
      cap: NO_CAP,
      retainedSites: 2,
    });

    expect(diagnostics.warnings).toEqual([]);
  });

  test("applied cap is reported as removed sites", () => {
    const diagnostics = buildDiagnostics({
      tally: createTally({ overCap: 7 }),
      halfCalledSites: 0,
      mode: "all",
      maxSites: 10,
      cap: { overCap: 7, capApplied: true, capExceedsAvailable: false },
      retainedSites: 10,
    });

    expect(diagnostics.warnings).toEqual([]);
    expect(diagnostics.info).toBe("INFO: Removed 7 bi-allelic sites due to specified maximum number of 10 sites.");
  });

  test("warns when the cap is not smaller than the usable sites", () => {
    const diagnostics = buildDiagnostics({
      tally: createTally({ monomorphic: 1 }),
      halfCalledSites: 0,
      mode: "all",
      maxSites: 50,
      cap: { overCap: 0, capApplied: false, capExceedsAvailable: true },
      retainedSites: 12,
    });

    expect(diagnostics.warnings).toEqual([
      "WARNING: The maximum number of SNPs has been set to 50, which is not smaller\n" +
        "    than the number of bi-allelic SNPs with sufficient information for SNAPP (12).",
      "WARNING: Excluded 1 monomorphic site.",
    ]);
    expect(diagnostics.info).toBe("INFO: Retained 12 bi-allelic sites.");
  });
});
