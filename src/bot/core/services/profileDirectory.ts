import type { SupabaseClient } from "@supabase/supabase-js";
import * as z from "zod";
import { ProfileSchema, type Profile, type RegistrationPayload } from "../../state.js";
import { RemoteUnavailableError, describeError } from "../errors.js";
import { TABLES } from "./supabase.js";

export interface ProfileDirectory {
  /** Profiles owned by a chat, oldest first. Empty when none are registered. */
  listProfiles(sessionKey: string): Promise<Profile[]>;
}

export interface ProfileStore {
  /** Direct insert used when the registration API is unavailable. */
  insertProfile(payload: RegistrationPayload): Promise<Profile>;
}

const ProfileRowsSchema = z.array(z.unknown());

/** Keep the rows that validate; one malformed row must not hide the others. */
export function parseProfileRows(rows: unknown): Profile[] {
  const parsed = ProfileRowsSchema.safeParse(rows ?? []);
  if (!parsed.success) return [];
  const profiles: Profile[] = [];
  for (const row of parsed.data) {
    const result = ProfileSchema.safeParse(row);
    if (result.success) profiles.push(result.data);
  }
  return profiles;
}

export class SupabaseProfileDirectory implements ProfileDirectory, ProfileStore {
  constructor(
    private readonly client: () => SupabaseClient,
    private readonly timeoutMs: number
  ) {}

  async listProfiles(sessionKey: string): Promise<Profile[]> {
    try {
      const { data, error } = await this.client()
        .from(TABLES.mothers)
        .select("*")
        .eq("telegram_chat_id", sessionKey)
        .order("created_at", { ascending: true })
        .abortSignal(AbortSignal.timeout(this.timeoutMs));
      if (error) throw error;
      return parseProfileRows(data);
    } catch (error) {
      throw new RemoteUnavailableError("profile_directory", describeError(error), { cause: error });
    }
  }

  async insertProfile(payload: RegistrationPayload): Promise<Profile> {
    const { data, error } = await this.client()
      .from(TABLES.mothers)
      .insert(payload)
      .select()
      .abortSignal(AbortSignal.timeout(this.timeoutMs))
      .single();
    if (error) throw error;
    return ProfileSchema.parse(data);
  }
}
