import { parseLogLevel, type LogLevel } from "./observability/logger.js";

export const DEFAULT_KUBE_TOKEN_FILE =
  "/var/run/secrets/kubernetes.io/serviceaccount/token";

export interface AdmissionWebhookConfig {
  readonly port: number;
  readonly tlsCertFile?: string;
  readonly tlsKeyFile?: string;
  readonly restoreFeatureEnabled: boolean;
  readonly admissionTimeoutMs: number;
  readonly kubeApiUrl?: string;
  readonly kubeTokenFile: string;
  readonly kubeApiTimeoutMs: number;
  readonly jsonBodyLimit: string;
  readonly logLevel: LogLevel;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): AdmissionWebhookConfig {
  const tlsCertFile = nonEmpty(env.TLS_CERT_FILE);
  const tlsKeyFile = nonEmpty(env.TLS_KEY_FILE);

  return {
    port: parsePositiveInteger(env.PORT, 8443),
    // TLS is only served when both halves are present.
    tlsCertFile: tlsCertFile && tlsKeyFile ? tlsCertFile : undefined,
    tlsKeyFile: tlsCertFile && tlsKeyFile ? tlsKeyFile : undefined,
    restoreFeatureEnabled: parseBoolean(env.RESTORE_FEATURE_ENABLED, true),
    admissionTimeoutMs: parsePositiveInteger(env.ADMISSION_TIMEOUT_MS, 10_000),
    kubeApiUrl: nonEmpty(env.KUBE_API_URL),
    kubeTokenFile: nonEmpty(env.KUBE_TOKEN_FILE) ?? DEFAULT_KUBE_TOKEN_FILE,
    kubeApiTimeoutMs: parsePositiveInteger(env.KUBE_API_TIMEOUT_MS, 5_000),
    jsonBodyLimit: nonEmpty(env.JSON_BODY_LIMIT) ?? "2mb",
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? "info",
  };
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  switch (raw?.trim().toLowerCase()) {
    case "1":
    case "true":
      return true;
    case "0":
    case "false":
      return false;
    default:
      return fallback;
  }
}
