export type ScanStatus = "pass" | "fixed" | "blocked";

export interface ScanStep {
  name: string;
  passed: boolean;
  details?: Record<string, unknown>;
}

export interface ScanResult<F> {
  status: ScanStatus;
  text: string;
  flagged: F[];
  steps: ScanStep[];
  reasons: string[];
}

export function noopResult<F>(text: string): ScanResult<F> {
  return {
    status: "pass",
    text,
    flagged: [],
    steps: [{ name: "noop", passed: true }],
    reasons: ["Empty text"],
  };
}
