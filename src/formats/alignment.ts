/**
 * Alignment assembly shared by the PHYLIP and VCF parsers
 */

import { SequenceLengthError } from "../errors";
import { createTally } from "../types";
import type { Alignment, ExclusionTally, InputFormat, Sample, SiteFormat } from "../types";

interface AlignmentExtras {
  format?: SiteFormat;
  tally?: ExclusionTally;
  halfCalledSites?: number;
}

/**
 * Build an alignment, requiring every sequence to have the first one's length
 *
 * @throws {SequenceLengthError} On the first sequence of a different length
 */
export function buildAlignment(
  source: InputFormat,
  samples: readonly Sample[],
  extras: AlignmentExtras = {}
): Alignment {
  const length = samples[0]?.sequence.length ?? 0;

  for (const sample of samples) {
    if (sample.sequence.length !== length) {
      throw new SequenceLengthError(sample.id, length, sample.sequence.length);
    }
  }

  return {
    source,
    samples,
    length,
    tally: extras.tally ?? createTally(),
    halfCalledSites: extras.halfCalledSites ?? 0,
    ...(extras.format !== undefined ? { format: extras.format } : {}),
  };
}

/**
 * Specimen identifiers in input order
 */
export function specimenIds(alignment: Alignment): string[] {
  return alignment.samples.map((sample) => sample.id);
}
