import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let client: SupabaseClient | undefined;

/**
 * Shared Supabase client factory.
 * Reused by the profile, upload and history repositories.
 */
export function getSupabaseClient(): SupabaseClient {
  if (client) return client;
  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY || process.env.SUPABASE_ANON_KEY;
  if (!url || !key) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY) are required.");
  }
  client = createClient(url, key, { auth: { persistSession: false } });
  return client;
}

export const TABLES = {
  mothers: "mothers",
  medicalReports: "medical_reports",
  chatHistory: "chat_history",
} as const;
