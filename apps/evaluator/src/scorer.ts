import {
  ProviderError,
  ProvisioningError,
  HostingError,
  TimeoutError,
  type ErrorKind,
  type Scenario,
  type TestResult,
} from "@reviewloop/core";

// Passed iff the post-fix run is clean and reaches the expected number of passing tests
export function isScenarioPassed(scenario: Scenario, postFix: TestResult | null): boolean {
  return (
    postFix !== null &&
    postFix.executionError === null &&
    postFix.failedCount === 0 &&
    postFix.passedCount >= scenario.expectedTests
  );
}

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof TimeoutError) {
    return "timeout";
  }
  if (error instanceof ProviderError) {
    return "provider";
  }
  if (error instanceof ProvisioningError) {
    return "provisioning";
  }
  if (error instanceof HostingError) {
    return "hosting";
  }
  return "unknown";
}
