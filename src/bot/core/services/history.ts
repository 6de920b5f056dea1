import type { SupabaseClient } from "@supabase/supabase-js";
import { TABLES } from "./supabase.js";

export type HistoryKind = "document";

export interface HistorySink {
  appendHistory(profileId: string, kind: HistoryKind, text: string, sessionKey: string): Promise<void>;
}

export class SupabaseHistorySink implements HistorySink {
  constructor(private readonly client: () => SupabaseClient) {}

  async appendHistory(profileId: string, kind: HistoryKind, text: string, sessionKey: string): Promise<void> {
    const { error } = await this.client().from(TABLES.chatHistory).insert({
      mother_id: profileId,
      message_type: kind,
      message: text,
      telegram_chat_id: sessionKey,
      created_at: new Date().toISOString(),
    });
    if (error) throw error;
  }
}
