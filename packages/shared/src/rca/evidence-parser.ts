/**
 * Evidence Parser
 *
 * Extracts a service/operation identifier from free-text log evidence.
 * Rules run in priority order and the first match wins. A text that matches no
 * rule yields an empty ParsedEvidence; parsing never throws.
 */

import type { ParsedEvidence } from "./types";

// ============================================
// Types
// ============================================

export interface EvidenceRule {
  name: string;
  /** Returns null when the rule does not apply */
  apply(text: string): ParsedEvidence | null;
}

export const EMPTY_EVIDENCE: Readonly<ParsedEvidence> = Object.freeze({
  serviceName: "",
  operation: "",
  rawMatch: "",
});

// ============================================
// Patterns
// ============================================

/** Quoted or bare value following `key=` or `"key":` */
const VALUE = String.raw`(?:"([^"]*)"|'([^']*)'|([^\s,;|)\]}"']+))`;

const SERVICE_NAME_KEY = new RegExp(String.raw`\bserviceName["']?\s*[=:]\s*${VALUE}`);
const SERVICE_KEY = new RegExp(
  String.raw`\bservice(?:\.name|_name)?["']?\s*[=:]\s*${VALUE}`
);
const OPERATION_KEY = new RegExp(
  String.raw`\b(?:spanName|operation|op)["']?\s*[=:]\s*${VALUE}`
);
const DOTTED = /(^|[\s"'(\[,;=])([A-Za-z][\w-]*)\.([A-Za-z]\w*)(?=$|[\s"'),;:\]])/g;
const BRACKET_PREFIX = /^\s*\[([A-Za-z][\w.-]*)\]/;

/** `name.ext` tokens that are file names rather than service.operation */
const FILE_EXTENSIONS = new Set([
  "ts", "tsx", "js", "jsx", "mjs", "cjs", "py", "go", "rb", "java", "cs",
  "sql", "yml", "yaml", "json", "conf", "ini", "log", "txt", "html",
]);

const LOG_LEVEL_TAGS = new Set(["trace", "debug", "info", "warn", "warning", "error", "fatal"]);

// ============================================
// Helpers
// ============================================

function valueOf(match: RegExpExecArray): string {
  return (match[1] ?? match[2] ?? match[3] ?? "").trim();
}

function findOperation(text: string): string {
  const match = OPERATION_KEY.exec(text);
  return match ? valueOf(match) : "";
}

function keyValueRule(name: string, pattern: RegExp): EvidenceRule {
  return {
    name,
    apply(text) {
      const match = pattern.exec(text);
      if (!match) return null;

      const serviceName = valueOf(match);
      if (!serviceName) return null;

      return { serviceName, operation: findOperation(text), rawMatch: match[0] };
    },
  };
}

// ============================================
// Rules
// ============================================

const dottedRule: EvidenceRule = {
  name: "service.Operation",
  apply(text) {
    for (const match of text.matchAll(DOTTED)) {
      const serviceName = match[2] ?? "";
      const operation = match[3] ?? "";
      if (FILE_EXTENSIONS.has(operation.toLowerCase())) continue;
      return { serviceName, operation, rawMatch: `${serviceName}.${operation}` };
    }
    return null;
  },
};

const bracketRule: EvidenceRule = {
  name: "[service]",
  apply(text) {
    const match = BRACKET_PREFIX.exec(text);
    const serviceName = match?.[1] ?? "";
    if (!match || LOG_LEVEL_TAGS.has(serviceName.toLowerCase())) return null;
    return { serviceName, operation: findOperation(text), rawMatch: match[0].trim() };
  },
};

/**
 * Default rules, most specific first.
 */
export const DEFAULT_EVIDENCE_RULES: readonly EvidenceRule[] = [
  keyValueRule("serviceName=", SERVICE_NAME_KEY),
  keyValueRule("service=", SERVICE_KEY),
  dottedRule,
  bracketRule,
];

// ============================================
// Parser
// ============================================

export class EvidenceParser {
  private readonly rules: readonly EvidenceRule[];

  constructor(rules: readonly EvidenceRule[] = DEFAULT_EVIDENCE_RULES) {
    this.rules = rules;
  }

  parse(evidenceText: string | null | undefined): ParsedEvidence {
    if (typeof evidenceText !== "string" || evidenceText.trim() === "") {
      return { ...EMPTY_EVIDENCE };
    }

    for (const rule of this.rules) {
      const parsed = rule.apply(evidenceText);
      if (parsed) return parsed;
    }

    return { ...EMPTY_EVIDENCE };
  }
}

const defaultParser = new EvidenceParser();

/**
 * Parse evidence text with the default rules.
 *
 * @example
 * parseEvidence("payment.Timeout")
 * // { serviceName: "payment", operation: "Timeout", rawMatch: "payment.Timeout" }
 */
export function parseEvidence(evidenceText: string | null | undefined): ParsedEvidence {
  return defaultParser.parse(evidenceText);
}
