import { fingerprintUrl, FingerprintOptions } from "../capture/fingerprint";
import { probeRemoteMetadata } from "../capture/probe";
import type { CheckMode } from "../types/runRecord";

export interface PriorState {
  fingerprint: string | null;
  contentUpdatedAt: Date | null;
}

export interface DetectOptions {
  quickMode: boolean;
  fingerprint?: FingerprintOptions;
  probeTimeoutMs?: number;
}

export interface DetectionResult {
  fingerprint: string;
  remoteModifiedAt: Date | null;
  changed: boolean;
  checkMode: CheckMode;
  byteSize: number | null;
  /** Why quick mode fell through to a full fetch, when it did. */
  probeNote: string | null;
}

export async function detectChange(
  url: string,
  prior: PriorState | null,
  options: DetectOptions
): Promise<DetectionResult> {
  const priorFingerprint = prior?.fingerprint ?? null;
  let probeNote: string | null = null;

  if (options.quickMode && priorFingerprint !== null) {
    const probe = await probeRemoteMetadata(url, prior, {
      fetchImpl: options.fingerprint?.fetchImpl,
      timeoutMs: options.probeTimeoutMs
    });
    if (probe.kind === "unchanged") {
      return {
        fingerprint: priorFingerprint,
        remoteModifiedAt: probe.remoteModifiedAt,
        changed: false,
        checkMode: "probe",
        byteSize: null,
        probeNote: null
      };
    }
    probeNote = probe.reason;
  }

  const result = await fingerprintUrl(url, options.fingerprint);
  return {
    fingerprint: result.fingerprint,
    remoteModifiedAt: result.remoteModifiedAt,
    changed: priorFingerprint === null || result.fingerprint !== priorFingerprint,
    checkMode: "fetch",
    byteSize: result.byteSize,
    probeNote
  };
}
