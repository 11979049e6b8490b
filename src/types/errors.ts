import { describeServiceError, type ServiceError } from "./service-error.js";

/**
 * Base error for all scriptsign errors
 */
export class ScriptSignError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "ScriptSignError";
  }

  /**
   * Suggested fix for the error (optional)
   */
  help?(): string;
}

/**
 * Configuration errors
 */
export class ConfigError extends ScriptSignError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/**
 * Local file preconditions
 */
export class ScriptNotFoundError extends ScriptSignError {
  constructor(public path: string) {
    super(`Script not found: ${path}`, "SCRIPT_NOT_FOUND");
    this.name = "ScriptNotFoundError";
  }
}

export class PfxNotFoundError extends ScriptSignError {
  constructor(public path: string) {
    super(`PFX file not found: ${path}`, "PFX_NOT_FOUND");
    this.name = "PfxNotFoundError";
  }

  override help() {
    return "Check the --pfx path, or sign with a keystore certificate via --thumbprint";
  }
}

/**
 * Signing service errors
 */
export class ServiceUnreachableError extends ScriptSignError {
  constructor(
    public baseUrl: string,
    reason?: string,
  ) {
    super(
      `Signing service unreachable at ${baseUrl}${reason ? `: ${reason}` : ""}`,
      "SERVICE_UNREACHABLE",
    );
    this.name = "ServiceUnreachableError";
  }

  override help() {
    return `Start the signing service so it listens on ${this.baseUrl}, or point at it with --service-url`;
  }
}

export class RuntimeUnavailableError extends ScriptSignError {
  constructor(public baseUrl: string) {
    super(
      `Signing service at ${baseUrl} reports the signing runtime is unavailable`,
      "RUNTIME_UNAVAILABLE",
    );
    this.name = "RuntimeUnavailableError";
  }

  override help() {
    return "Install or enable the signing runtime on the service host, then restart the signing service";
  }
}

export class NoCertificatesFoundError extends ScriptSignError {
  constructor() {
    super("No code-signing certificates found", "NO_CERTIFICATES");
    this.name = "NoCertificatesFoundError";
  }

  override help() {
    return "Create a code-signing certificate in the certificate store, or sign with --pfx <path>";
  }
}

export class CertificateInventoryError extends ScriptSignError {
  constructor(public detail: ServiceError) {
    super(`Failed to list certificates: ${describeServiceError(detail)}`, "CERT_INVENTORY_FAILED");
    this.name = "CertificateInventoryError";
  }
}

export class SignRequestFailedError extends ScriptSignError {
  constructor(public detail: ServiceError) {
    super(`Signing failed: ${describeServiceError(detail)}`, "SIGN_FAILED");
    this.name = "SignRequestFailedError";
  }
}

export class VerifyRequestFailedError extends ScriptSignError {
  constructor(public detail: ServiceError) {
    super(`Verification failed: ${describeServiceError(detail)}`, "VERIFY_FAILED");
    this.name = "VerifyRequestFailedError";
  }
}

/**
 * Port scan errors
 */
export class InvalidPortRangeError extends ScriptSignError {
  constructor(reason: string) {
    super(`Invalid port range: ${reason}`, "INVALID_PORT_RANGE");
    this.name = "InvalidPortRangeError";
  }

  override help() {
    return "Ports must be whole numbers between 1 and 65535";
  }
}
