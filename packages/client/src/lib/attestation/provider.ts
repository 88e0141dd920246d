/**
 * Attestation provider contract.
 *
 * Implemented by the platform provider (secure hardware behind a
 * PlatformAttestationService) and the simulator provider (unverifiable mock
 * payloads). The HTTP client only sees this interface.
 */

export type AttestationKind = "platform" | "simulator";

export interface AttestationProvider {
  readonly kind: AttestationKind;

  isSupported(): boolean;

  /**
   * Stored key id, or null before the first key is generated.
   */
  getKeyId(): Promise<string | null>;

  /**
   * Return the stored key id, generating and persisting one on first call.
   */
  ensureKeyExists(): Promise<string>;

  /**
   * Attest the key against a base64 server challenge; returns base64.
   */
  attestKey(challenge: string): Promise<string>;

  /**
   * Counter-bound proof over one request body; returns base64.
   */
  generateAssertion(body: Uint8Array, counter: number): Promise<string>;

  /**
   * Forget the local key reference. Nothing is revoked upstream.
   */
  clearAttestation(): Promise<void>;
}
