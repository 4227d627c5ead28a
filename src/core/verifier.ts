import type { VerificationReport } from "./types.js";

/**
 * Checks that text is well-formed UTF-8 and reports script statistics.
 *
 * Informational only: a failed check is reported through `valid`, never thrown.
 */
export interface TextVerifier {
  verify(input: string | Uint8Array): VerificationReport;
}
