/**
 * Incident Case Schemas
 *
 * Zod schemas for one line of the case input file and one line of output.
 */

import { z } from "zod";

export const IncidentCaseSchema = z.object({
  problem_id: z.string().min(1),
  /** "YYYY-MM-DD HH:MM:SS ~ YYYY-MM-DD HH:MM:SS", local time */
  time_range: z.string().min(1),
  candidate_root_causes: z.array(z.string()),
  /** Selects the signal to analyze, see analysisFocus */
  alarm_rules: z.array(z.string()).optional(),
});

export type IncidentCase = z.infer<typeof IncidentCaseSchema>;

export interface CaseOutput {
  problem_id: string;
  root_causes: string[];
  /** Error code when the case could not be analyzed */
  error?: string;
}
