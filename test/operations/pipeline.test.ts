import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { BedWriter } from "../../src/formats/bed";
import { readToString } from "../../src/io/file-reader";
import {
  annotateBedFile,
  readBedPeaks,
  readGtfGenes,
  unionBedFiles,
} from "../../src/operations/pipeline";
import { membershipKey } from "../../src/operations/union";

describe("file workflows", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "peakset-pipeline-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function fixture(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content, "utf8");
    return path;
  }

  test("annotates a BED file against a GTF and writes the TSV", async () => {
    const peaksBed = await fixture(
      "peaks.bed",
      "track name=peaks\nchr1\t100\t180\nchr1\t5000\t5100\nchr2\t10\t20\n"
    );
    const gtf = await fixture(
      "genes.gtf",
      [
        "#!genome-build test",
        'chr1\ttest\tgene\t151\t900\t.\t+\t.\tgene_id "G1"; gene_name "GENE1";',
        'chr1\ttest\ttranscript\t151\t900\t.\t+\t.\tgene_id "G1"; transcript_id "T1";',
        "",
      ].join("\n")
    );
    const outTsv = join(dir, "annotated.tsv");

    const records = await annotateBedFile({ peaksBed, gtf, outTsv });

    expect(records).toHaveLength(3);
    expect(await readToString(outTsv)).toBe(
      [
        "peak_id\tchrom\tstart\tend\tannotation\tgene\tdistance_to_TSS",
        "peak_0\tchr1\t100\t180\tpromoter\tGENE1\t-10",
        "peak_1\tchr1\t5000\t5100\tintergenic\tGENE1\t4900",
        "peak_2\tchr2\t10\t20\tintergenic\t\t0",
        "",
      ].join("\n")
    );
  });

  test("applies promoter sizes from options", async () => {
    const peaksBed = await fixture("peaks.bed", "chr1\t100\t180\n");
    const gtf = await fixture(
      "genes.gtf",
      'chr1\ttest\tgene\t151\t900\t.\t+\t.\tgene_id "G1"; gene_name "GENE1";\n'
    );

    const [record] = await annotateBedFile({
      peaksBed,
      gtf,
      promoterUpstream: 0,
      promoterDownstream: 0,
    });

    expect(record?.annotation).toBe("gene_body");
    expect(record?.distanceToTss).toBe(-10);
  });

  test("reads genes with 0-based coordinates", async () => {
    const gtf = await fixture(
      "genes.gtf",
      'chr3\ttest\tgene\t1\t100\t.\t-\t.\tgene_id "G7";\n'
    );

    expect(await readGtfGenes(gtf)).toEqual([
      {
        chromosome: "chr3",
        start: 0,
        end: 100,
        strand: "-",
        geneId: "G7",
        geneName: "G7",
        tss: 99,
      },
    ]);
  });

  test("builds union peaks from per-sample BED files", async () => {
    const a = await fixture("a.bed", "chr1\t100\t180\n");
    const b = await fixture("b.bed", "chr1\t500\t600\nchr1\t150\t220\n");

    const result = await unionBedFiles({ A: a, B: b }, { membership: true });

    expect(result.peaks).toEqual([
      { chromosome: "chr1", start: 100, end: 220 },
      { chromosome: "chr1", start: 500, end: 600 },
    ]);
    expect(result.peaks.map((p) => result.membership?.get(membershipKey(p)))).toEqual([
      ["A", "B"],
      ["B"],
    ]);
  });

  test("looks up membership for union peaks read back from BED", async () => {
    const a = await fixture("a.bed", "chr1\t100\t180\nchr2\t5\t50\n");
    const b = await fixture("b.bed", "chr1\t150\t220\n");
    const { peaks, membership } = await unionBedFiles({ A: a, B: b }, { membership: true });

    const saved = join(dir, "union.bed");
    await new BedWriter().writeFile(saved, peaks);
    const reread = await readBedPeaks(saved);

    expect(reread.map((p) => membership?.get(membershipKey(p)))).toEqual([["A", "B"], ["A"]]);
  });

  test("fails with a FileError for a missing input", async () => {
    await expect(unionBedFiles({ A: join(dir, "missing.bed") })).rejects.toBeInstanceOf(FileError);
  });
});
