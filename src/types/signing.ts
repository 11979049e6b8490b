import { z } from "zod";

// =============================================================================
// Service response schemas
// =============================================================================

/**
 * Certificate as listed by the signing service inventory
 */
export const CertificateSchema = z.object({
  Subject: z.string(),
  Thumbprint: z.string(),
  /** Expiry; the service serializes dates as strings or epoch numbers */
  NotAfter: z.union([z.string(), z.number()]),
});

export type Certificate = z.infer<typeof CertificateSchema>;

export const LivenessResponseSchema = z.object({
  available: z.boolean(),
});

export type LivenessResponse = z.infer<typeof LivenessResponseSchema>;

export const CertificateListResponseSchema = z.object({
  certificates: z.array(CertificateSchema),
});

export const SignatureDetailsSchema = z.object({
  Status: z.string(),
  SignedBy: z.string().nullish(),
  TimeStamper: z.string().nullish(),
  SignatureType: z.string().nullish(),
});

export type SignatureDetails = z.infer<typeof SignatureDetailsSchema>;

export const SignResultSchema = z.object({
  success: z.boolean(),
  data: SignatureDetailsSchema.nullish(),
  error: z.string().nullish(),
});

export type SignResult = z.infer<typeof SignResultSchema>;

export const VerifyResultSchema = z.object({
  success: z.boolean(),
  data: z.object({ Status: z.string() }).passthrough().nullish(),
  error: z.string().nullish(),
});

export type VerifyResult = z.infer<typeof VerifyResultSchema>;

// =============================================================================
// Requests
// =============================================================================

/**
 * Body of POST /api/sign-script. Paths are absolute and canonical.
 */
export interface SigningRequest {
  scriptPath: string;
  certThumbprint?: string;
  pfxPath?: string;
  pfxPassword?: string;
  timestampServer?: string;
}

/**
 * Status the service reports for an intact, trusted signature
 */
export const VALID_STATUS = "Valid";
