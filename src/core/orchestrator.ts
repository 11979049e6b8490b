import type { Logger } from "pino";
import {
  NoCertificatesFoundError,
  PfxNotFoundError,
  RuntimeUnavailableError,
  ScriptNotFoundError,
  SignRequestFailedError,
} from "../types/errors.js";
import {
  type Certificate,
  type SignatureDetails,
  type SigningRequest,
  VALID_STATUS,
  type VerifyResult,
} from "../types/signing.js";
import { getLogger } from "../utils/diagnostics.js";
import { canonicalFilePath } from "../utils/paths.js";
import type { SigningService } from "./signing-client.js";

// =============================================================================
// Types
// =============================================================================

export type SigningState =
  | "start"
  | "path-resolved"
  | "service-checked"
  | "cert-resolved"
  | "choice-required"
  | "signed"
  | "verified"
  | "aborted";

/**
 * What the operator asked for. Paths may be relative.
 */
export interface SignOptions {
  scriptPath: string;
  certThumbprint?: string;
  pfxPath?: string;
  pfxPassword?: string;
  timestampServer?: string;
}

export interface CertificateSelection {
  certThumbprint?: string;
  pfxPath?: string;
}

export type CertificateDecision =
  | { kind: "explicit"; certThumbprint?: string; pfxPath?: string }
  | { kind: "choice-required"; certificates: Certificate[] }
  | { kind: "none-available" };

export type VerificationReport =
  | { ok: true; status: string }
  | { ok: false; status?: string; reason: string };

export type SigningOutcome =
  | {
      kind: "signed";
      scriptPath: string;
      signature?: SignatureDetails;
      verification: VerificationReport;
    }
  | {
      kind: "certificate-choice-required";
      scriptPath: string;
      certificates: Certificate[];
    };

export interface OrchestratorOptions {
  logger?: Logger;
}

// =============================================================================
// Certificate decision
// =============================================================================

/**
 * Decide which identity to sign with. The inventory is only loaded when
 * nothing was given, and even a single listed certificate is never picked
 * on the operator's behalf.
 */
export async function decideCertificate(
  selection: CertificateSelection,
  loadInventory: () => Promise<Certificate[]>,
): Promise<CertificateDecision> {
  if (selection.certThumbprint || selection.pfxPath) {
    return {
      kind: "explicit",
      certThumbprint: selection.certThumbprint,
      pfxPath: selection.pfxPath,
    };
  }

  const certificates = await loadInventory();
  if (certificates.length === 0) {
    return { kind: "none-available" };
  }
  return { kind: "choice-required", certificates };
}

/**
 * Interpret a verify response. Anything but a successful call reporting
 * a Valid status is not ok.
 */
export function toVerificationReport(result: VerifyResult): VerificationReport {
  const status = result.data?.Status;

  if (!result.success) {
    return { ok: false, status, reason: result.error ?? "signing service reported failure" };
  }
  if (!status) {
    return { ok: false, reason: "signing service returned no signature status" };
  }
  if (status !== VALID_STATUS) {
    return { ok: false, status, reason: `signature status is ${status}` };
  }
  return { ok: true, status };
}

// =============================================================================
// SigningOrchestrator Class
// =============================================================================

/**
 * Runs the sign-then-verify workflow against a signing service:
 * start → path-resolved → service-checked → cert-resolved → signed → verified,
 * or service-checked → choice-required when no certificate was given, with
 * aborted reachable from every step.
 */
export class SigningOrchestrator {
  private state: SigningState = "start";
  private readonly logger: Logger;

  constructor(
    private readonly service: SigningService,
    options: OrchestratorOptions = {},
  ) {
    this.logger = options.logger ?? getLogger();
  }

  getState(): SigningState {
    return this.state;
  }

  /**
   * Sign a script and re-verify it. Aborts are thrown as ScriptSignError
   * subclasses; needing a certificate choice is an outcome.
   */
  async run(options: SignOptions): Promise<SigningOutcome> {
    this.state = "start";
    try {
      return await this.execute(options);
    } catch (error) {
      this.transition("aborted", { from: this.state, reason: errorMessage(error) });
      throw error;
    }
  }

  /**
   * Check an existing signature without signing
   */
  async verifyExisting(scriptPath: string): Promise<{ scriptPath: string; result: VerifyResult }> {
    const resolved = await resolveScript(scriptPath);
    await this.ensureServiceReady();
    return { scriptPath: resolved, result: await this.service.verifySignature(resolved) };
  }

  /**
   * List the service's certificate inventory after a liveness check
   */
  async listCertificates(): Promise<Certificate[]> {
    await this.ensureServiceReady();
    return this.service.listCertificates();
  }

  private async execute(options: SignOptions): Promise<SigningOutcome> {
    const scriptPath = await resolveScript(options.scriptPath);
    const pfxPath = options.pfxPath ? await resolvePfx(options.pfxPath) : undefined;
    this.transition("path-resolved", { scriptPath });

    await this.ensureServiceReady();
    this.transition("service-checked", { baseUrl: this.service.baseUrl });

    const decision = await decideCertificate(
      { certThumbprint: options.certThumbprint, pfxPath },
      () => this.service.listCertificates(),
    );

    if (decision.kind === "none-available") {
      throw new NoCertificatesFoundError();
    }
    if (decision.kind === "choice-required") {
      this.transition("choice-required", { count: decision.certificates.length });
      return { kind: "certificate-choice-required", scriptPath, certificates: decision.certificates };
    }
    this.transition("cert-resolved", {
      certThumbprint: decision.certThumbprint,
      pfxPath: decision.pfxPath,
    });

    const request = buildSigningRequest(scriptPath, decision, options);
    const signed = await this.service.signScript(request);
    if (!signed.success) {
      throw new SignRequestFailedError(
        signed.error
          ? { kind: "structured", message: signed.error }
          : { kind: "raw", text: "signing service reported failure without detail" },
      );
    }
    this.transition("signed", { status: signed.data?.Status });

    const verification = await this.verifyAfterSigning(scriptPath);
    this.transition("verified", { ok: verification.ok, status: verification.status });

    return { kind: "signed", scriptPath, signature: signed.data ?? undefined, verification };
  }

  /**
   * Liveness probe; no stateful call is made without it passing
   */
  private async ensureServiceReady(): Promise<void> {
    const liveness = await this.service.checkLiveness();
    if (!liveness?.available) {
      throw new RuntimeUnavailableError(this.service.baseUrl);
    }
  }

  /**
   * Verification after signing only ever produces a report; its failure
   * does not undo or fail the signing.
   */
  private async verifyAfterSigning(scriptPath: string): Promise<VerificationReport> {
    try {
      return toVerificationReport(await this.service.verifySignature(scriptPath));
    } catch (error) {
      this.logger.debug({ err: error }, "verification request failed");
      return { ok: false, reason: errorMessage(error) };
    }
  }

  private transition(state: SigningState, details: Record<string, unknown>): void {
    this.logger.debug({ ...details, state }, `signing workflow: ${state}`);
    this.state = state;
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function resolveScript(path: string): Promise<string> {
  const resolved = await canonicalFilePath(path);
  if (!resolved) {
    throw new ScriptNotFoundError(path);
  }
  return resolved;
}

async function resolvePfx(path: string): Promise<string> {
  const resolved = await canonicalFilePath(path);
  if (!resolved) {
    throw new PfxNotFoundError(path);
  }
  return resolved;
}

function buildSigningRequest(
  scriptPath: string,
  decision: Extract<CertificateDecision, { kind: "explicit" }>,
  options: SignOptions,
): SigningRequest {
  const request: SigningRequest = { scriptPath };
  if (decision.certThumbprint) request.certThumbprint = decision.certThumbprint;
  if (decision.pfxPath) request.pfxPath = decision.pfxPath;
  if (options.pfxPassword !== undefined) request.pfxPassword = options.pfxPassword;
  if (options.timestampServer) request.timestampServer = options.timestampServer;
  return request;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
