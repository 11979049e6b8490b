import type { Logger } from "pino";
import type { z } from "zod";
import { normalizeBaseUrl, type ServiceConfig } from "../types/config.js";
import {
  CertificateInventoryError,
  ServiceUnreachableError,
  SignRequestFailedError,
  VerifyRequestFailedError,
  type ScriptSignError,
} from "../types/errors.js";
import {
  describeServiceError,
  parseJson,
  parseServiceError,
  transportError,
  type ServiceError,
} from "../types/service-error.js";
import {
  type Certificate,
  CertificateListResponseSchema,
  type LivenessResponse,
  LivenessResponseSchema,
  type SigningRequest,
  type SignResult,
  SignResultSchema,
  type VerifyResult,
  VerifyResultSchema,
} from "../types/signing.js";
import { getLogger } from "../utils/diagnostics.js";

// =============================================================================
// Types
// =============================================================================

/**
 * The four calls the orchestrator makes against the signing service
 */
export interface SigningService {
  readonly baseUrl: string;
  /** GET /api/check-powershell; throws ServiceUnreachableError */
  checkLiveness(): Promise<LivenessResponse | null>;
  /** GET /api/list-certificates; throws CertificateInventoryError */
  listCertificates(): Promise<Certificate[]>;
  /** POST /api/sign-script; throws SignRequestFailedError on transport failure */
  signScript(request: SigningRequest): Promise<SignResult>;
  /** POST /api/verify-signature; throws VerifyRequestFailedError on transport failure */
  verifySignature(scriptPath: string): Promise<VerifyResult>;
}

export interface SigningClientOptions {
  fetch?: typeof fetch;
  logger?: Logger;
}

type FailureFactory = (detail: ServiceError) => ScriptSignError;

// =============================================================================
// SigningClient Class
// =============================================================================

/**
 * HTTP+JSON client for the local signing service
 */
export class SigningClient implements SigningService {
  readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly config: ServiceConfig,
    options: SigningClientOptions = {},
  ) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Liveness probe with the short timeout.
   * @returns the parsed body, or null when the body is not a liveness response
   */
  async checkLiveness(): Promise<LivenessResponse | null> {
    const body = await this.request(
      "GET",
      "/api/check-powershell",
      undefined,
      this.config.livenessTimeoutMs,
      (detail) => new ServiceUnreachableError(this.baseUrl, describeServiceError(detail)),
    );
    const parsed = LivenessResponseSchema.safeParse(body);
    return parsed.success ? parsed.data : null;
  }

  async listCertificates(): Promise<Certificate[]> {
    const body = await this.request(
      "GET",
      "/api/list-certificates",
      undefined,
      this.config.requestTimeoutMs,
      (detail) => new CertificateInventoryError(detail),
    );
    return this.validate(
      CertificateListResponseSchema,
      body,
      (detail) => new CertificateInventoryError(detail),
    ).certificates;
  }

  async signScript(request: SigningRequest): Promise<SignResult> {
    this.logger.debug({ request }, "submitting sign request");
    const body = await this.request(
      "POST",
      "/api/sign-script",
      request,
      this.config.requestTimeoutMs,
      (detail) => new SignRequestFailedError(detail),
    );
    return this.validate(SignResultSchema, body, (detail) => new SignRequestFailedError(detail));
  }

  async verifySignature(scriptPath: string): Promise<VerifyResult> {
    const body = await this.request(
      "POST",
      "/api/verify-signature",
      { scriptPath },
      this.config.requestTimeoutMs,
      (detail) => new VerifyRequestFailedError(detail),
    );
    return this.validate(VerifyResultSchema, body, (detail) => new VerifyRequestFailedError(detail));
  }

  /**
   * Issue one request. Transport failures, timeouts and non-2xx responses are
   * turned into the caller's error type with the resolved ServiceError.
   * @returns the parsed JSON body (undefined when it is not JSON)
   */
  private async request(
    method: "GET" | "POST",
    path: string,
    payload: unknown,
    timeoutMs: number,
    fail: FailureFactory,
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const started = Date.now();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: payload === undefined ? undefined : { "Content-Type": "application/json" },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      this.logger.debug({ method, path, err: error }, "request failed before a response");
      throw fail(transportError(error));
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw fail(transportError(error));
    }

    this.logger.debug(
      { method, path, status: response.status, durationMs: Date.now() - started },
      "signing service responded",
    );

    if (!response.ok) {
      throw fail(parseServiceError(response.status, text));
    }
    return parseJson(text);
  }

  private validate<T extends z.ZodTypeAny>(
    schema: T,
    body: unknown,
    fail: FailureFactory,
  ): z.infer<T> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw fail({ kind: "raw", text: `unexpected response from signing service${where}` });
    }
    return result.data;
  }
}

