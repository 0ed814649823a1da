import { existsSync } from "fs";
import * as fs from "fs/promises";
import { MissingInputError } from "../lib/errors";
import type { BoundingBox } from "./alignment/geometry";

export const ANALYSIS_FILE = "analysis.txt";
export const NO_PERSON = "none";

export type AnalysisRecord = {
  frameFileName: string;
  personLabel: string | null;
  box: BoundingBox | null;
};

/**
 * One line of analysis output:
 * `<frameFileName> <personLabelOrNone> [left top bottom right]`.
 */
export function parseAnalysisLine(line: string): AnalysisRecord | null {
  const fields = line.trim().split(/\s+/);
  if (fields.length < 2 || fields[0] === "") {
    return null;
  }
  const [frameFileName, label] = fields;

  if (label === NO_PERSON) {
    return { frameFileName, personLabel: null, box: null };
  }
  if (fields.length < 6) {
    return null;
  }

  const [left, top, bottom, right] = fields.slice(2, 6).map(Number);
  if (![left, top, bottom, right].every(Number.isInteger)) {
    return null;
  }
  return {
    frameFileName,
    personLabel: label,
    box: { left, top, bottom, right },
  };
}

export function parseAnalysis(content: string): AnalysisRecord[] {
  const records: AnalysisRecord[] = [];
  content.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === "") {
      return;
    }
    const record = parseAnalysisLine(line);
    if (!record) {
      console.warn(`[Adjust] Skipping malformed analysis line ${i + 1}: ${line}`);
      return;
    }
    records.push(record);
  });
  return records;
}

/** Boxes for the frames where `person` was recognized, keyed by frame file. */
export function boxesForPerson(
  records: AnalysisRecord[],
  person: string,
): Map<string, BoundingBox> {
  const boxes = new Map<string, BoundingBox>();
  for (const record of records) {
    if (record.personLabel === person && record.box) {
      boxes.set(record.frameFileName, record.box);
    }
  }
  return boxes;
}

export async function readAnalysis(analysisPath: string): Promise<AnalysisRecord[]> {
  if (!existsSync(analysisPath)) {
    throw new MissingInputError("Analysis file", analysisPath);
  }
  return parseAnalysis(await fs.readFile(analysisPath, "utf8"));
}
