/**
 * Attestation provider selection.
 * The provider is chosen once, when the client is built; nothing downstream
 * inspects which variant it got.
 */

import { ApiError } from "@attested-chat/shared";

import {
  AttestationKeyStore,
  PLATFORM_KEY_ID,
  SIMULATOR_KEY_ID,
} from "../attestation-key-store.js";
import type { KeyStore } from "../store/interface.js";
import { PlatformAttestationProvider } from "./platform-attestation.js";
import type { PlatformAttestationService } from "./platform-attestation.js";
import type { AttestationProvider } from "./provider.js";
import { SimulatorAttestationProvider } from "./simulator-attestation.js";

export type AttestationMode = "platform" | "simulator" | "none";

export interface AttestationOptions {
  /** Force a variant; "auto" selection applies when omitted. */
  mode?: AttestationMode;
  /** Native binding; required for "platform". */
  service?: PlatformAttestationService;
  /** Fall back to the simulator when no supported service exists. Default true. */
  allowSimulator?: boolean;
}

export function createAttestationProvider(
  options: AttestationOptions,
  store: KeyStore,
  bundleId: string,
): AttestationProvider | null {
  const { mode, service, allowSimulator = true } = options;

  const platform = (svc: PlatformAttestationService) =>
    new PlatformAttestationProvider(svc, new AttestationKeyStore(store, PLATFORM_KEY_ID));
  const simulator = () =>
    new SimulatorAttestationProvider(
      new AttestationKeyStore(store, SIMULATOR_KEY_ID),
      bundleId,
    );

  switch (mode) {
    case "none":
      return null;
    case "platform":
      if (!service) {
        throw new ApiError(
          "ATTESTATION_NOT_SUPPORTED",
          "Platform attestation requested but no attestation service was provided",
        );
      }
      return platform(service);
    case "simulator":
      return simulator();
    case undefined:
      if (service?.isSupported()) {
        return platform(service);
      }
      return allowSimulator ? simulator() : null;
  }
}

export type { AttestationProvider, AttestationKind } from "./provider.js";
export type { PlatformAttestationService } from "./platform-attestation.js";
export { PlatformAttestationProvider } from "./platform-attestation.js";
export { SimulatorAttestationProvider } from "./simulator-attestation.js";
export type {
  SimulatorAttestationPayload,
  SimulatorAssertionPayload,
} from "./simulator-attestation.js";
