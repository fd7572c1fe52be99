import type { FeatureGate } from "../ports/feature-gate.js";

export class StaticFeatureGate implements FeatureGate {
  constructor(private readonly restoreEnabled: boolean) {}

  isRestoreFeatureEnabled(): boolean {
    return this.restoreEnabled;
  }
}
