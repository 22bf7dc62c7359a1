/**
 * Case Reader
 *
 * Loads incident cases from a JSONL file. Lines that are blank are ignored;
 * lines that fail to parse or validate are logged and skipped.
 */

import { readFile } from "node:fs/promises";
import { getLogger, type Logger } from "@faultline/shared";
import { IncidentCaseSchema, type IncidentCase } from "./schemas";

export interface SkippedLine {
  line: number;
  reason: string;
}

export interface ParsedCases {
  cases: IncidentCase[];
  skipped: SkippedLine[];
}

function parseLine(text: string): IncidentCase | string {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return `invalid JSON: ${error instanceof Error ? error.message : String(error)}`;
  }

  const result = IncidentCaseSchema.safeParse(raw);
  if (!result.success) {
    return result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
  }
  return result.data;
}

export function parseCases(content: string, logger: Logger = getLogger()): ParsedCases {
  const cases: IncidentCase[] = [];
  const skipped: SkippedLine[] = [];

  content.split(/\r?\n/).forEach((text, index) => {
    if (text.trim() === "") return;

    const parsed = parseLine(text);
    if (typeof parsed === "string") {
      skipped.push({ line: index + 1, reason: parsed });
      logger.warn("[cases] Skipping malformed line", { line: index + 1, reason: parsed });
      return;
    }
    cases.push(parsed);
  });

  return { cases, skipped };
}

export async function readCases(
  path: string,
  logger: Logger = getLogger()
): Promise<ParsedCases> {
  const content = await readFile(path, "utf8");
  return parseCases(content, logger);
}
