import type { SupabaseClient } from "@supabase/supabase-js";
import * as z from "zod";
import { UploadRecordSchema, type NewUploadRecord, type UploadRecord } from "../../state.js";
import { RemoteUnavailableError, describeError } from "../errors.js";
import { TABLES } from "./supabase.js";

export interface UploadStore {
  insertUpload(record: NewUploadRecord): Promise<void>;
  /** Most recent uploads first. */
  listRecentUploads(profileId: string, limit: number): Promise<UploadRecord[]>;
}

const UploadRowsSchema = z.array(z.unknown());

export function parseUploadRows(rows: unknown): UploadRecord[] {
  const parsed = UploadRowsSchema.safeParse(rows ?? []);
  if (!parsed.success) return [];
  const records: UploadRecord[] = [];
  for (const row of parsed.data) {
    const result = UploadRecordSchema.safeParse(row);
    if (result.success) records.push(result.data);
  }
  return records;
}

export class SupabaseUploadStore implements UploadStore {
  constructor(
    private readonly client: () => SupabaseClient,
    private readonly timeoutMs: number
  ) {}

  async insertUpload(record: NewUploadRecord): Promise<void> {
    const { error } = await this.client()
      .from(TABLES.medicalReports)
      .insert(record)
      .abortSignal(AbortSignal.timeout(this.timeoutMs));
    if (error) throw error;
  }

  async listRecentUploads(profileId: string, limit: number): Promise<UploadRecord[]> {
    try {
      const { data, error } = await this.client()
        .from(TABLES.medicalReports)
        .select("*")
        .eq("mother_id", profileId)
        .order("uploaded_at", { ascending: false })
        .limit(limit)
        .abortSignal(AbortSignal.timeout(this.timeoutMs));
      if (error) throw error;
      return parseUploadRows(data);
    } catch (error) {
      throw new RemoteUnavailableError("upload_store", describeError(error), { cause: error });
    }
  }
}
