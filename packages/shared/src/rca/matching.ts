/**
 * Candidate Matching & Ranking
 *
 * Maps parsed evidence onto caller-supplied candidate labels and orders the
 * candidates by how much evidence supports them.
 */

import { ValidationError } from "../errors";
import type { FaultKinds } from "./schemas";
import type { ParsedEvidence, RankedCause, SignalKind } from "./types";

// ============================================
// Candidates
// ============================================

/**
 * Deduplicate candidates keeping first-seen order.
 *
 * @throws ValidationError for a bare string, or non-string or blank labels
 */
export function normalizeCandidates(candidates: Iterable<unknown>): string[] {
  if (typeof candidates === "string") {
    throw new ValidationError("Invalid candidate set: expected a list of labels, got a string", [
      "candidates: must be a list, not a string",
    ]);
  }

  const seen = new Set<string>();
  const issues: string[] = [];
  let index = 0;

  for (const candidate of candidates) {
    if (typeof candidate !== "string" || candidate.trim() === "") {
      issues.push(`candidates[${index}]: must be a non-empty string`);
    } else {
      seen.add(candidate);
    }
    index++;
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid candidate set: ${issues.join(", ")}`, issues);
  }

  return Array.from(seen);
}

// ============================================
// Matching
// ============================================

/**
 * Pick the single best candidate for one record, or undefined.
 *
 * Order: `service.operation`, then `service`, then `service.<faultKind>`
 * following the fault kinds configured for the record's signal.
 * Comparison is case-sensitive.
 */
export function matchCandidate(
  evidence: ParsedEvidence,
  candidates: ReadonlySet<string>,
  signal: SignalKind,
  faultKinds: FaultKinds
): string | undefined {
  const service = evidence.serviceName;
  if (!service) return undefined;

  const attempts: string[] = [];
  if (evidence.operation) attempts.push(`${service}.${evidence.operation}`);
  attempts.push(service);
  for (const kind of faultKinds[signal]) {
    attempts.push(`${service}.${kind}`);
  }

  return attempts.find((label) => candidates.has(label));
}

// ============================================
// Tally & Ranking
// ============================================

export interface CandidateTally {
  error: number;
  latency: number;
}

/**
 * Accumulates per-candidate evidence counts.
 */
export class EvidenceTally {
  private readonly counts = new Map<string, CandidateTally>();
  private matched = 0;

  add(candidate: string, signal: SignalKind): void {
    const tally = this.counts.get(candidate) ?? { error: 0, latency: 0 };
    tally[signal]++;
    this.counts.set(candidate, tally);
    this.matched++;
  }

  get matchedRecords(): number {
    return this.matched;
  }

  get(candidate: string): CandidateTally | undefined {
    return this.counts.get(candidate);
  }
}

/**
 * Rank candidates with evidence: count descending, ties by input order.
 * Candidates without evidence are dropped.
 */
export function rankCandidates(
  candidates: readonly string[],
  tally: EvidenceTally
): RankedCause[] {
  const total = tally.matchedRecords;

  return candidates
    .map((candidate, order) => {
      const counts = tally.get(candidate) ?? { error: 0, latency: 0 };
      const evidenceCount = counts.error + counts.latency;
      return {
        order,
        cause: {
          candidate,
          evidenceCount,
          errorEvidence: counts.error,
          latencyEvidence: counts.latency,
          confidence: total > 0 ? evidenceCount / total : 0,
        },
      };
    })
    .filter(({ cause }) => cause.evidenceCount > 0)
    .sort(
      (a, b) => b.cause.evidenceCount - a.cause.evidenceCount || a.order - b.order
    )
    .map(({ cause }) => cause);
}
