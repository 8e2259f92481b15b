/**
 * Model usage metrics
 *
 * One record per model call, appended in call order and frozen on append.
 */

export type CallPurpose = "initial" | "retry" | "rerank";

export interface AttemptValidation {
  readonly passed: boolean;
  readonly errors: readonly string[];
}

export interface GenerationAttempt {
  /** 1-based position in its call sequence (generation or rerank) */
  readonly attempt: number;
  readonly purpose: CallPurpose;
  readonly model: string;
  readonly tokensIn: number;
  readonly tokensOut: number;
  readonly durationMs: number;
  /** null when the reply was not validated (rerank, failed call) */
  readonly validation: AttemptValidation | null;
  /** Set when the call itself failed */
  readonly error?: string;
}

export class GenerationMetrics {
  private readonly records: GenerationAttempt[] = [];
  private retriesExhausted = false;

  constructor(readonly ticketKey: string) {}

  record(attempt: GenerationAttempt): GenerationAttempt {
    const frozen = Object.freeze({
      ...attempt,
      validation: attempt.validation
        ? Object.freeze({
            passed: attempt.validation.passed,
            errors: Object.freeze([...attempt.validation.errors]),
          })
        : null,
    });
    this.records.push(frozen);
    return frozen;
  }

  markMaxRetriesHit(): void {
    this.retriesExhausted = true;
  }

  get maxRetriesHit(): boolean {
    return this.retriesExhausted;
  }

  get attempts(): readonly GenerationAttempt[] {
    return this.records;
  }

  get totalTokensIn(): number {
    return this.records.reduce((sum, r) => sum + r.tokensIn, 0);
  }

  get totalTokensOut(): number {
    return this.records.reduce((sum, r) => sum + r.tokensOut, 0);
  }

  get retryCount(): number {
    return this.records.filter((r) => r.purpose === "retry").length;
  }

  get validationAttempts(): number {
    return this.records.filter((r) => r.validation !== null).length;
  }

  get validationFailures(): number {
    return this.records.filter((r) => r.validation !== null && !r.validation.passed).length;
  }
}

function validationLabel(attempt: GenerationAttempt): string {
  if (attempt.error) return "CALL FAILED";
  if (!attempt.validation) return "N/A";
  return attempt.validation.passed ? "PASSED" : "FAILED";
}

function duration(ms: number): string {
  return ms > 0 ? `${(ms / 1000).toFixed(1)}s` : "N/A";
}

/**
 * Render metrics as markdown
 */
export function formatMetrics(metrics: GenerationMetrics, generatedAt: string): string {
  const lines = [
    `# Model Metrics: ${metrics.ticketKey}`,
    "",
    `Generated: ${generatedAt}`,
    "",
    "## Summary",
    "",
    "| Metric | Value |",
    "|--------|-------|",
    `| Total Tokens In | ${metrics.totalTokensIn} |`,
    `| Total Tokens Out | ${metrics.totalTokensOut} |`,
    `| Total Tokens | ${metrics.totalTokensIn + metrics.totalTokensOut} |`,
    `| Validation Attempts | ${metrics.validationAttempts} |`,
    `| Validation Failures | ${metrics.validationFailures} |`,
    `| Retries Used | ${metrics.retryCount} |`,
    `| Max Retries Hit | ${metrics.maxRetriesHit ? "Yes" : "No"} |`,
    "",
    "## Call Log",
    "",
    "| # | Purpose | Attempt | Tokens In | Tokens Out | Validation | Duration |",
    "|---|---------|---------|-----------|------------|------------|----------|",
  ];

  metrics.attempts.forEach((a, i) => {
    lines.push(
      `| ${i + 1} | ${a.purpose} | ${a.attempt} | ${a.tokensIn} | ${a.tokensOut} | ${validationLabel(a)} | ${duration(a.durationMs)} |`,
    );
  });

  const failed = metrics.attempts.filter(
    (a) => a.error !== undefined || (a.validation !== null && a.validation.errors.length > 0),
  );
  if (failed.length > 0) {
    lines.push("", "## Errors", "");
    for (const a of failed) {
      lines.push(`### ${a.purpose} attempt ${a.attempt}`);
      if (a.error) lines.push(`- Call failed: ${a.error}`);
      for (const e of a.validation?.errors ?? []) lines.push(`- ${e}`);
      lines.push("");
    }
  }

  return lines.join("\n");
}
