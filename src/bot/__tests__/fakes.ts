import { jest } from "@jest/globals";
import { ProfileSchema, UploadRecordSchema, type Profile, type UploadRecord } from "../state.js";
import type { ProfileDirectory } from "../core/services/profileDirectory.js";
import type { UploadStore } from "../core/services/reports.js";
import type { HistorySink } from "../core/services/history.js";
import type { RegistrationWriter } from "../flows/registrationFlow.js";
import type { ChatNotifier, FileUrlResolver, ReportAnalyzer } from "../documentIngestion.js";
import type { SummarySource } from "../summary.js";

export const NOW = new Date("2024-06-01T00:00:00Z");
export const now = () => NOW;

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

/** ISO date `weeks` from NOW (negative for the past). */
export function isoDateFromNow(weeks: number): string {
  return new Date(NOW.getTime() + weeks * WEEK_MS).toISOString().slice(0, 10);
}

export function makeProfile(fields: Partial<Profile> & { id: string }): Profile {
  return ProfileSchema.parse({ telegram_chat_id: "chat-1", ...fields });
}

export function makeUpload(fields: Partial<UploadRecord> & { id: string; mother_id: string }): UploadRecord {
  return UploadRecordSchema.parse(fields);
}

export function fakeDirectory(profiles: Profile[] = []) {
  return {
    listProfiles: jest.fn<ProfileDirectory["listProfiles"]>().mockResolvedValue(profiles),
  };
}

export function fakeWriter() {
  return {
    save: jest.fn<RegistrationWriter["save"]>(),
  };
}

export function fakeUploadStore(recent: UploadRecord[] = []) {
  return {
    insertUpload: jest.fn<UploadStore["insertUpload"]>().mockResolvedValue(undefined),
    listRecentUploads: jest.fn<UploadStore["listRecentUploads"]>().mockResolvedValue(recent),
  };
}

export function fakeHistory() {
  return {
    appendHistory: jest.fn<HistorySink["appendHistory"]>().mockResolvedValue(undefined),
  };
}

export function fakeFiles(url = "https://files.test/f1") {
  return {
    resolveFileUrl: jest.fn<FileUrlResolver["resolveFileUrl"]>().mockResolvedValue(url),
  };
}

export function fakeNotifier() {
  return {
    notify: jest.fn<ChatNotifier["notify"]>().mockResolvedValue(undefined),
  };
}

export function fakeAnalyzer() {
  return {
    analyzeReport: jest.fn<ReportAnalyzer["analyzeReport"]>(),
  };
}

export function fakeSummarySource() {
  return {
    fetchSummary: jest.fn<SummarySource["fetchSummary"]>(),
  };
}
