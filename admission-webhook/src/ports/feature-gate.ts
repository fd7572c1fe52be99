export interface FeatureGate {
  isRestoreFeatureEnabled(): boolean;
}
