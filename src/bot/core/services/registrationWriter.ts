import type { Profile, RegistrationPayload } from "../../state.js";
import { PersistenceFailure, describeError } from "../errors.js";
import { log } from "../helpers/logging.js";
import type { RegisterAttempt } from "./backendApi.js";
import type { ProfileStore } from "./profileDirectory.js";

export interface RegistrationApi {
  registerProfile(payload: RegistrationPayload): Promise<RegisterAttempt>;
}

export type SavedRegistration = {
  profile: Profile;
  via: "primary" | "fallback";
};

/**
 * Commits a finalized registration: registration API first, direct store insert
 * only when the API did not confirm. Exactly one path writes.
 */
export class PersistenceFallbackWriter {
  constructor(
    private readonly api: RegistrationApi,
    private readonly store: ProfileStore
  ) {}

  async save(payload: RegistrationPayload): Promise<SavedRegistration> {
    const sessionId = payload.telegram_chat_id;
    const primary = await this.api.registerProfile(payload);
    if (primary.ok) {
      return { profile: primary.profile, via: "primary" };
    }

    log({ level: "warn", component: "registration", message: `Backend register failed: ${primary.reason}`, sessionId });
    try {
      const profile = await this.store.insertProfile(payload);
      return { profile, via: "fallback" };
    } catch (error) {
      throw new PersistenceFailure(`Registration save failed via store: ${describeError(error)}`, { cause: error });
    }
  }
}
