// ============================================
// Bayes' theorem for a single diagnostic test
// ============================================

export type TestResult = "positive" | "negative";

export function isTestResult(value: string): value is TestResult {
  return value === "positive" || value === "negative";
}

/** Inputs for which no posterior exists */
export class InvalidProbabilityError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidProbabilityError";
  }
}

function assertProbability(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidProbabilityError(`${name} must be between 0 and 1. Got ${value}`);
  }
}

/**
 * P(D | result).
 *   positive: s·p / (s·p + fp·(1 − p))
 *   negative: (1 − s)·p / ((1 − s)·p + (1 − fp)·(1 − p))
 * Throws InvalidProbabilityError on inputs outside [0, 1] or a zero denominator.
 */
export function computePosterior(
  prior: number,
  sensitivity: number,
  falsePositive: number,
  testResult: TestResult = "positive"
): number {
  assertProbability("Prior probability", prior);
  assertProbability("Sensitivity", sensitivity);
  assertProbability("False positive rate", falsePositive);

  if (!isTestResult(testResult)) {
    throw new InvalidProbabilityError('testResult must be either "positive" or "negative"');
  }

  const specificity = 1 - falsePositive;
  const numerator = testResult === "positive" ? sensitivity * prior : (1 - sensitivity) * prior;
  const denominator =
    testResult === "positive"
      ? numerator + falsePositive * (1 - prior)
      : numerator + specificity * (1 - prior);

  if (denominator === 0) {
    throw new InvalidProbabilityError("Invalid inputs caused division by zero");
  }

  return numerator / denominator;
}

export type RiskLevel = "Low" | "Moderate" | "High" | "Critical";

/** Risk band of a posterior probability */
export function riskLevel(posterior: number): RiskLevel {
  const percent = posterior * 100;
  if (percent < 10) return "Low";
  if (percent < 30) return "Moderate";
  if (percent < 60) return "High";
  return "Critical";
}
