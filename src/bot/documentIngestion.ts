import { randomUUID } from "node:crypto";
import type { InboundAttachment } from "./actions.js";
import type { NewUploadRecord, Profile } from "./state.js";
import type { AnalysisOutcome, AnalysisRequest } from "./core/services/backendApi.js";
import type { UploadStore } from "./core/services/reports.js";
import type { HistorySink } from "./core/services/history.js";
import { reply, type OutboundMessage } from "./messages.js";
import { fileExtension } from "./core/helpers/parsing.js";
import { escapeMarkdown } from "./core/helpers/text.js";
import { describeError } from "./core/errors.js";
import { log, logError } from "./core/helpers/logging.js";

export const ALLOWED_FILE_TYPES = ["pdf", "jpg", "jpeg", "png", "webp"] as const;
const MAX_CONCERNS = 3;

export interface FileUrlResolver {
  /** Durable download URL for a transport file id. */
  resolveFileUrl(fileId: string): Promise<string>;
}

/** Sends messages to a chat outside of a turn's replies. */
export interface ChatNotifier {
  notify(sessionKey: string, messages: OutboundMessage[]): Promise<void>;
}

export interface ReportAnalyzer {
  analyzeReport(request: AnalysisRequest): Promise<AnalysisOutcome>;
}

export type IncomingFile = {
  fileId: string;
  fileName: string;
  fileType: string;
};

export type IngestionResult =
  | { status: "rejected"; replies: OutboundMessage[] }
  | { status: "failed"; replies: OutboundMessage[] }
  | { status: "stored"; record: NewUploadRecord; replies: OutboundMessage[]; analysis: Promise<void> };

/** Document as sent, or the largest photo variant as a jpg. */
export function describeAttachment(attachment: InboundAttachment): IncomingFile | null {
  if (attachment.kind === "document") {
    const fileName = attachment.fileName || `document_${attachment.fileId}`;
    return { fileId: attachment.fileId, fileName, fileType: fileExtension(fileName) };
  }
  if (!attachment.variants.length) return null;
  const largest = attachment.variants.reduce((best, variant) => ((variant.fileSize ?? 0) > (best.fileSize ?? 0) ? variant : best));
  return { fileId: largest.fileId, fileName: `photo_${largest.fileId}.jpg`, fileType: "jpg" };
}

export function isAllowedFileType(fileType: string): boolean {
  return (ALLOWED_FILE_TYPES as readonly string[]).includes(fileType);
}

export function analysisMessage(fileName: string, analysis: AnalysisOutcome | null): string {
  if (!analysis) {
    return "✅ Document uploaded!\n\nAnalysis is running in the background.";
  }
  if (analysis.outcome === "pending") {
    return "✅ Document uploaded!\n\nAnalysis will continue in the background. Check back in a minute.";
  }
  const lines = [
    "✅ *Document uploaded & analyzed!*",
    "",
    `📄 File: ${escapeMarkdown(fileName)}`,
    `📊 Risk Level: ${escapeMarkdown(analysis.riskLevel)}`,
  ];
  const concerns = analysis.concerns.slice(0, MAX_CONCERNS);
  if (concerns.length) {
    lines.push("⚠️ Concerns:", ...concerns.map((concern) => `• ${escapeMarkdown(concern)}`));
  }
  lines.push("", "Use /start to refresh your dashboard.");
  return lines.join("\n");
}

/**
 * Accepts an uploaded file for a profile: validates the type and records it as
 * `processing`. The upload counts as done once the record is written; the
 * analysis runs afterwards and its outcome reaches the chat through the notifier.
 */
export class DocumentIngestionPipeline {
  constructor(
    private readonly files: FileUrlResolver,
    private readonly uploads: UploadStore,
    private readonly analyzer: ReportAnalyzer,
    private readonly history: HistorySink,
    private readonly notifier: ChatNotifier,
    private readonly now: () => Date = () => new Date()
  ) {}

  async ingest(profile: Profile, sessionKey: string, attachment: InboundAttachment): Promise<IngestionResult> {
    const file = describeAttachment(attachment);
    if (!file) {
      return { status: "rejected", replies: [reply("Please send a PDF or image to upload.")] };
    }
    if (!isAllowedFileType(file.fileType)) {
      return {
        status: "rejected",
        replies: [reply(`❌ Unsupported file type: ${file.fileType}. Please upload PDF or image files.`)],
      };
    }

    const replies: OutboundMessage[] = [
      reply(`📄 Received *${escapeMarkdown(file.fileName)}*\n⏳ Uploading to your health records...`, { parseMode: "Markdown" }),
    ];

    let record: NewUploadRecord;
    try {
      const fileUrl = await this.files.resolveFileUrl(file.fileId);
      const timestamp = this.now().toISOString();
      record = {
        id: randomUUID(),
        mother_id: profile.id,
        telegram_chat_id: sessionKey,
        file_name: file.fileName,
        file_type: file.fileType,
        file_url: fileUrl,
        file_path: fileUrl,
        uploaded_at: timestamp,
        analysis_status: "processing",
        created_at: timestamp,
      };
      await this.uploads.insertUpload(record);
    } catch (error) {
      logError("upload", error, sessionKey);
      replies.push(reply(`❌ Error uploading document: ${describeError(error)}\nPlease try again.`));
      return { status: "failed", replies };
    }

    log({ level: "info", component: "upload", message: `Stored report ${record.id} (${record.file_type})`, sessionId: sessionKey });
    this.appendHistory(profile.id, file.fileName, sessionKey);

    const analysis = this.analyzeInBackground(profile.id, sessionKey, record);
    return { status: "stored", record, replies, analysis };
  }

  // Settles once the follow-up is sent; never rejects.
  private async analyzeInBackground(profileId: string, sessionKey: string, record: NewUploadRecord): Promise<void> {
    let analysis: AnalysisOutcome | null = null;
    try {
      analysis = await this.analyzer.analyzeReport({
        mother_id: profileId,
        report_id: record.id,
        file_url: record.file_url,
        file_type: record.file_type,
      });
    } catch (error) {
      logError("upload", error, sessionKey);
    }
    try {
      await this.notifier.notify(sessionKey, [reply(analysisMessage(record.file_name, analysis), { parseMode: "Markdown" })]);
    } catch (error) {
      logError("upload", error, sessionKey);
    }
  }

  // Fire-and-forget; its outcome never changes the reply.
  private appendHistory(profileId: string, fileName: string, sessionKey: string): void {
    void this.history
      .appendHistory(profileId, "document", `Uploaded document ${fileName}`, sessionKey)
      .catch((error: unknown) => logError("history", error, sessionKey));
  }
}
