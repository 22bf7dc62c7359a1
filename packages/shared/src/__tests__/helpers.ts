import { ERROR_SPANS_QUERY } from "../rca/constants";
import { resolveAnalysisConfig, type AnalysisConfigInput } from "../rca/schemas";
import type {
  LogRecord,
  QueryClient,
  QueryOptions,
  QueryScope,
  TimeWindow,
} from "../rca/types";

export const TEST_SCOPE: QueryScope = {
  project: "test-project",
  logstore: "test-logstore",
  region: "cn-test",
};

export const TEST_WINDOW: TimeWindow = Object.freeze({
  start: Date.UTC(2025, 7, 28, 7, 8, 3),
  end: Date.UTC(2025, 7, 28, 7, 13, 3),
});

export function record(evidence: string, fields: Record<string, string> = {}): LogRecord {
  return { evidence, timestamp: TEST_WINDOW.start, fields };
}

export function repeat<T>(count: number, make: (i: number) => T): T[] {
  return Array.from({ length: count }, (_, i) => make(i));
}

export function testConfig(overrides: Omit<AnalysisConfigInput, "scope"> = {}) {
  return resolveAnalysisConfig({ scope: TEST_SCOPE, ...overrides });
}

export interface RecordedQuery {
  expression: string;
  window: TimeWindow;
  scope: QueryScope;
  options?: QueryOptions;
}

type Response = LogRecord[] | Error;

/**
 * In-memory query client: error-span queries get `errors`, everything else
 * gets `latency`. A response that is an Error is thrown.
 */
export class FakeQueryClient implements QueryClient {
  readonly calls: RecordedQuery[] = [];

  constructor(private readonly responses: { errors?: Response; latency?: Response } = {}) {}

  async query(
    expression: string,
    window: TimeWindow,
    scope: QueryScope,
    options?: QueryOptions
  ): Promise<LogRecord[]> {
    this.calls.push({ expression, window, scope, options });
    const response =
      expression === ERROR_SPANS_QUERY ? this.responses.errors : this.responses.latency;
    if (response instanceof Error) throw response;
    return response ?? [];
  }
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected promise to reject");
}
