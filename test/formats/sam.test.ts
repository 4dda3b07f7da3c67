/**
 * Tests for SAM alignment parsing
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  FileError,
  SamError,
  SAMParser,
  writeString,
  type AlignmentRecord,
} from "../../src/index";

const SEQ = "ACGTACGT";
const QUAL = "IIIIIIII";

function alignment(qname: string, flag: number | string, mapq: number | string): string {
  return [qname, flag, "chr1", 100, mapq, "8M", "*", 0, 0, SEQ, QUAL].join("\t");
}

async function parseAll(parser: SAMParser, data: string): Promise<AlignmentRecord[]> {
  const records: AlignmentRecord[] = [];
  for await (const record of parser.parseString(data)) {
    records.push(record);
  }
  return records;
}

async function parseFileAll(parser: SAMParser, path: string): Promise<AlignmentRecord[]> {
  const records: AlignmentRecord[] = [];
  for await (const record of parser.parseFile(path)) {
    records.push(record);
  }
  return records;
}

describe("SAMParser", () => {
  const parser = new SAMParser();

  describe("Alignment parsing", () => {
    test("extracts QNAME, FLAG and MAPQ", async () => {
      const records = await parseAll(parser, alignment("read1", 99, 60));

      expect(records).toEqual([{ qname: "read1", flag: 99, mapq: 60, lineNumber: 1 }]);
    });

    test("skips header lines and keeps file order", async () => {
      const sam = [
        "@HD\tVN:1.6\tSO:unsorted",
        "@SQ\tSN:chr1\tLN:248956422",
        "@PG\tID:bowtie2\tPN:bowtie2",
        alignment("r1", 0, 42),
        alignment("r2", 16, 42),
        alignment("r3", 4, 0),
      ].join("\n");

      const records = await parseAll(parser, sam);

      expect(records.map((r) => r.qname)).toEqual(["r1", "r2", "r3"]);
      expect(records.map((r) => r.lineNumber)).toEqual([4, 5, 6]);
    });

    test("accepts optional tags after the mandatory fields", async () => {
      const records = await parseAll(parser, `${alignment("r1", 256, 1)}\tAS:i:-5\tNM:i:1`);
      expect(records[0]?.flag).toBe(256);
      expect(records[0]?.mapq).toBe(1);
    });

    test("skips blank lines", async () => {
      const records = await parseAll(parser, `\n${alignment("r1", 0, 42)}\n\n`);
      expect(records).toHaveLength(1);
    });
  });

  describe("Validation", () => {
    test("rejects lines with too few fields", async () => {
      await expect(parseAll(parser, "r1\t0\tchr1\t100\t60")).rejects.toThrow(
        "Alignment line has 5 fields, expected at least 11"
      );
    });

    test("rejects a non-numeric FLAG", async () => {
      await expect(parseAll(parser, alignment("r1", "0x10", 60))).rejects.toThrow("Invalid FLAG: not a number: 0x10");
    });

    test("rejects a FLAG above 4095", async () => {
      await expect(parseAll(parser, alignment("r1", 4096, 60))).rejects.toThrow(SamError);
    });

    test("rejects a MAPQ above 255", async () => {
      await expect(parseAll(parser, alignment("r1", 0, 256))).rejects.toThrow("Invalid MAPQ");
    });

    test("errors carry the line number", async () => {
      try {
        await parseAll(parser, `${alignment("r1", 0, 60)}\n${alignment("r2", "x", 60)}`);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SamError);
        expect(error instanceof SamError && error.lineNumber).toBe(2);
      }
    });

    test("skipInvalid drops bad lines and warns", async () => {
      const warnings: Array<[string, number | undefined]> = [];
      const tolerant = new SAMParser({
        skipInvalid: true,
        onWarning: (warning, lineNumber) => warnings.push([warning, lineNumber]),
      });

      const records = await parseAll(
        tolerant,
        [alignment("r1", 0, 60), "truncated\t0", alignment("r3", 16, 60)].join("\n")
      );

      expect(records.map((r) => r.qname)).toEqual(["r1", "r3"]);
      expect(warnings).toEqual([["Alignment line has 2 fields, expected at least 11; line skipped", 2]]);
    });

    test("maxLineLength rejects oversized lines", async () => {
      const strict = new SAMParser({ maxLineLength: 20 });
      await expect(parseAll(strict, alignment("r1", 0, 60))).rejects.toThrow("Line too long");
    });
  });

  describe("File parsing", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "strandcheck-sam-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    const sam = ["@HD\tVN:1.6", alignment("r1", 0, 60), alignment("r2", 16, 60)].join("\n") + "\n";

    test("reads a plain SAM file", async () => {
      const path = join(dir, "sample.sam");
      writeFileSync(path, sam);

      const records = await parseFileAll(parser, path);
      expect(records.map((r) => r.flag)).toEqual([0, 16]);
    });

    test("reads a gzipped SAM file", async () => {
      const path = join(dir, "sample.sam.gz");
      await writeString(path, sam);

      const records = await parseFileAll(parser, path);
      expect(records.map((r) => r.qname)).toEqual(["r1", "r2"]);
    });

    test("a missing file raises FileError", async () => {
      await expect(parseFileAll(parser, join(dir, "absent.sam"))).rejects.toThrow(FileError);
    });
  });
});
