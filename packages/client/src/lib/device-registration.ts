/**
 * Device Registration
 * Challenge-response enrollment of the attestation key with the server
 *
 * FLOW:
 * 1. POST /v1/attestation/challenge with the bundle id → challenge
 * 2. ensureKeyExists() then attestKey(challenge)
 * 3. POST /v1/attestation/register with the attestation object → deviceId
 *
 * Concurrent callers share one in-flight run. A reset while a run is in
 * flight supersedes it: the run ends with ATTESTATION_FAILED and records
 * nothing.
 */

import { arch, platform, release, type } from "node:os";
import { ApiError, createLogger } from "@attested-chat/shared";
import type {
  AppIdentity,
  ChallengeResponse,
  RegistrationRequest,
  RegistrationResponse,
} from "@attested-chat/shared";

import type { AttestationProvider } from "./attestation/provider.js";
import type { KeyStore } from "./store/interface.js";

const logger = createLogger("client:registration");

export const REGISTRATION_KEY = "attest-registration";

interface RegistrationRecord {
  keyId: string;
  deviceId: string;
}

function parseRecord(raw: string | null): RegistrationRecord | null {
  if (raw === null) {
    return null;
  }
  try {
    const value: unknown = JSON.parse(raw);
    if (
      typeof value === "object" &&
      value !== null &&
      "keyId" in value &&
      "deviceId" in value &&
      typeof value.keyId === "string" &&
      typeof value.deviceId === "string"
    ) {
      return { keyId: value.keyId, deviceId: value.deviceId };
    }
  } catch (error) {
    logger.warn("Stored registration is not valid JSON; ignoring", {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
  logger.warn("Stored registration has an unexpected shape; ignoring");
  return null;
}

export type RegistrationState =
  | "unregistered"
  | "attesting"
  | "registering"
  | "registered"
  | "failed";

const TRANSITIONS: Record<RegistrationState, readonly RegistrationState[]> = {
  unregistered: ["attesting", "registered", "failed"],
  attesting: ["registering", "unregistered", "failed"],
  registering: ["registered", "unregistered", "failed"],
  registered: ["attesting", "unregistered", "failed"],
  failed: ["attesting", "unregistered", "failed"],
};

/**
 * The two registration requests. Implementations must not route these
 * through the auto-registration retry.
 */
export interface RegistrationTransport {
  requestChallenge(bundleId: string): Promise<ChallengeResponse>;
  submitRegistration(request: RegistrationRequest): Promise<RegistrationResponse>;
}

export interface DeviceInfo {
  deviceModel: string;
  osVersion: string;
}

export function localDeviceInfo(): DeviceInfo {
  return {
    deviceModel: `${platform()}-${arch()}`,
    osVersion: `${type()} ${release()}`,
  };
}

export class DeviceRegistration {
  private state: RegistrationState = "unregistered";
  private inFlight: Promise<void> | null = null;
  private deviceId: string | null = null;
  private generation = 0;

  /**
   * With a store, a successful registration is recorded against the key id
   * so that `restore()` in a later process can pick it up.
   */
  constructor(
    private readonly provider: AttestationProvider | null,
    private readonly transport: RegistrationTransport,
    private readonly identity: AppIdentity,
    private readonly device: DeviceInfo = localDeviceInfo(),
    private readonly store: KeyStore | null = null,
  ) {}

  getState(): RegistrationState {
    return this.state;
  }

  getDeviceId(): string | null {
    return this.deviceId;
  }

  /**
   * Run the registration flow, or join the one already running.
   */
  register(): Promise<void> {
    if (!this.provider) {
      return Promise.reject(
        new ApiError(
          "ATTESTATION_NOT_SUPPORTED",
          "Device registration requires an attestation provider",
        ),
      );
    }
    if (this.inFlight) {
      logger.debug("Joining in-flight registration");
      return this.inFlight;
    }
    const running = this.run(this.provider).finally(() => {
      if (this.inFlight === running) {
        this.inFlight = null;
      }
    });
    this.inFlight = running;
    return running;
  }

  /**
   * Adopt a registration recorded by an earlier process, if it belongs to the
   * provider's current key. Only applies while unregistered.
   */
  async restore(): Promise<void> {
    if (!this.provider || !this.store || this.state !== "unregistered") {
      return;
    }
    const record = parseRecord(await this.store.load(REGISTRATION_KEY));
    const keyId = await this.provider.getKeyId();
    if (!record || record.keyId !== keyId || this.state !== "unregistered") {
      return;
    }
    this.deviceId = record.deviceId;
    this.transition("registered");
  }

  /**
   * Forget the registration after local attestation state was cleared.
   */
  async reset(): Promise<void> {
    this.generation += 1;
    this.inFlight = null;
    if (this.state !== "unregistered") {
      this.transition("unregistered");
    }
    this.deviceId = null;
    if (this.store) {
      await this.store.remove(REGISTRATION_KEY);
    }
  }

  private async run(provider: AttestationProvider): Promise<void> {
    const { bundleId, teamId } = this.identity;
    const generation = this.generation;
    try {
      this.transition("attesting");
      logger.debug("Requesting challenge", { operation: "challenge", bundleId });
      const { challenge } = await this.transport.requestChallenge(bundleId);
      this.ensureCurrent(generation);

      const keyId = await provider.ensureKeyExists();
      const attestationObject = await provider.attestKey(challenge);
      this.ensureCurrent(generation);

      this.transition("registering");
      logger.debug("Submitting attestation", { operation: "register", keyId });
      const response = await this.transport.submitRegistration({
        keyId,
        attestationObject,
        bundleId,
        teamId: teamId ?? null,
        deviceModel: this.device.deviceModel,
        osVersion: this.device.osVersion,
      });

      this.ensureCurrent(generation);

      if (!response.success) {
        throw new ApiError("ATTESTATION_FAILED", "Server rejected device registration");
      }

      if (this.store) {
        const record: RegistrationRecord = { keyId, deviceId: response.deviceId };
        await this.store.save(REGISTRATION_KEY, JSON.stringify(record));
        this.ensureCurrent(generation);
      }
      this.deviceId = response.deviceId;
      this.transition("registered");
      logger.info("Device registered", { deviceId: response.deviceId, keyId });
    } catch (error) {
      if (generation !== this.generation) {
        logger.info("Registration superseded by reset");
        throw error;
      }
      this.transition("failed");
      logger.error(
        "Device registration failed",
        error instanceof Error ? error : new Error(String(error)),
      );
      throw error;
    }
  }

  private ensureCurrent(generation: number): void {
    if (generation !== this.generation) {
      throw new ApiError(
        "ATTESTATION_FAILED",
        "Device registration was superseded by an attestation reset",
      );
    }
  }

  private transition(next: RegistrationState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid registration transition ${this.state} -> ${next}`);
    }
    logger.debug("Registration state", { from: this.state, to: next });
    this.state = next;
  }
}
