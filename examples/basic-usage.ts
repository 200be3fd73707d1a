/**
 * Walkthrough of the peakset API on in-memory data
 *
 * Builds a union peak set from three samples, finds the union peaks that
 * fall in promoter windows and annotates every union peak.
 */

import {
  annotatePeaks,
  buildPromoters,
  createGene,
  findGenomicOverlaps,
  membershipKey,
  type Gene,
  type GenomicInterval,
  partitionByChromosome,
  unionPeaks,
} from "../src";

const samples: Record<string, GenomicInterval[]> = {
  sampleA: [
    { chromosome: "chr1", start: 100, end: 180 },
    { chromosome: "chr1", start: 300, end: 330 },
    { chromosome: "chr2", start: 50, end: 100 },
  ],
  sampleB: [
    { chromosome: "chr1", start: 150, end: 220 },
    { chromosome: "chr1", start: 320, end: 350 },
  ],
  sampleC: [
    { chromosome: "chr1", start: 200, end: 260 },
    { chromosome: "chr2", start: 10, end: 40 },
  ],
};

const genes: Gene[] = [
  createGene({ chromosome: "chr1", start: 150, end: 900, strand: "+", geneId: "G1", geneName: "GENE1" }),
  createGene({ chromosome: "chr2", start: 500, end: 2000, strand: "-", geneId: "G2" }),
];

// ============================================================================
// Example 1: Union peaks with sample membership
// ============================================================================

function example1_unionPeaks(): GenomicInterval[] {
  console.log("\n=== Example 1: Union peaks ===\n");

  const { peaks, membership } = unionPeaks(samples, { membership: true });
  for (const peak of peaks) {
    const members = membership.get(membershipKey(peak)) ?? [];
    console.log(`  ${peak.chromosome}:${peak.start}-${peak.end}  ${members.join(",")}`);
  }
  return peaks;
}

// ============================================================================
// Example 2: Union peaks in promoter windows
// ============================================================================

function example2_promoterOverlaps(peaks: GenomicInterval[]): void {
  console.log("\n=== Example 2: Promoter overlaps ===\n");

  const promoters = buildPromoters(genes, 2000, 200);
  for (const [i, j] of findGenomicOverlaps(peaks, promoters)) {
    const peak = peaks[i];
    const promoter = promoters[j];
    if (peak === undefined || promoter === undefined) continue;
    console.log(`  ${peak.chromosome}:${peak.start}-${peak.end} -> ${promoter.geneName}`);
  }

  const byChromosome = partitionByChromosome(promoters);
  console.log(`  promoter windows on ${byChromosome.size} chromosomes`);
}

// ============================================================================
// Example 3: Annotation
// ============================================================================

function example3_annotate(peaks: GenomicInterval[]): void {
  console.log("\n=== Example 3: Annotation ===\n");

  for (const record of annotatePeaks(peaks, genes)) {
    console.log(
      `  ${record.peakId}\t${record.annotation}\t${record.gene || "-"}\t${record.distanceToTss}`
    );
  }
}

const union = example1_unionPeaks();
example2_promoterOverlaps(union);
example3_annotate(union);
