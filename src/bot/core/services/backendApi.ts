import * as z from "zod";
import { ProfileSchema, type Profile, type RegistrationPayload } from "../../state.js";
import { RemoteUnavailableError, describeError } from "../errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type BackendTimeouts = {
  summaryMs: number;
  registrationMs: number;
  analysisMs: number;
};

export type BackendApiOptions = {
  baseUrl: string;
  timeouts: BackendTimeouts;
  fetchImpl?: FetchLike;
};

const LooseRecordSchema = z.record(z.string(), z.unknown());

export const SummaryPayloadSchema = z.object({
  recent_timeline: z.array(LooseRecordSchema).catch([]),
  key_memories: z.array(LooseRecordSchema).catch([]),
  summary: LooseRecordSchema.nullable().catch(null),
});
export type SummaryPayload = z.infer<typeof SummaryPayloadSchema>;

const RegisterResponseSchema = z.object({
  status: z.string().optional(),
  data: z.unknown().optional(),
});

const AnalysisResponseSchema = z.object({
  risk_level: z.string().nullable().optional(),
  concerns: z.array(z.unknown()).nullable().optional(),
});

export type RegisterAttempt = { ok: true; profile: Profile } | { ok: false; reason: string };

export type AnalysisRequest = {
  mother_id: string;
  report_id: string;
  file_url: string;
  file_type: string;
};

export type AnalysisOutcome =
  | { outcome: "analyzed"; riskLevel: string; concerns: string[] }
  | { outcome: "pending"; httpStatus: number };

/**
 * HTTP client for the analysis/summary backend. Every call carries a timeout;
 * a timeout is reported the same way as a non-success response.
 */
export class BackendApiClient {
  private readonly baseUrl: string;
  private readonly timeouts: BackendTimeouts;
  private readonly fetchImpl: FetchLike;

  constructor(options: BackendApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeouts = options.timeouts;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchSummary(profileId: string): Promise<SummaryPayload> {
    const url = `${this.baseUrl}/api/v1/summary/${encodeURIComponent(profileId)}`;
    let body: unknown;
    try {
      const response = await this.fetchImpl(url, { method: "GET", signal: AbortSignal.timeout(this.timeouts.summaryMs) });
      if (response.status !== 200) {
        throw new Error(`Summary API returned ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw new RemoteUnavailableError("summary_api", describeError(error), { cause: error });
    }
    const parsed = SummaryPayloadSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteUnavailableError("summary_api", "Summary API returned a malformed body");
    }
    return parsed.data;
  }

  /** Primary registration write. Never throws; failures come back as `ok: false`. */
  async registerProfile(payload: RegistrationPayload): Promise<RegisterAttempt> {
    const url = `${this.baseUrl}/mothers/register`;
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeouts.registrationMs),
      });
      const text = await response.text();
      if (response.status !== 200 && response.status !== 201) {
        return { ok: false, reason: `status=${response.status} body=${text.slice(0, 200)}` };
      }
      const body = RegisterResponseSchema.safeParse(parseJson(text));
      if (!body.success || body.data.status !== "success") {
        return { ok: false, reason: `unexpected body ${text.slice(0, 200)}` };
      }
      const profile = ProfileSchema.safeParse(body.data.data);
      if (!profile.success) {
        return { ok: false, reason: "success body without a valid profile" };
      }
      return { ok: true, profile: profile.data };
    } catch (error) {
      return { ok: false, reason: describeError(error) };
    }
  }

  async analyzeReport(request: AnalysisRequest): Promise<AnalysisOutcome> {
    const url = `${this.baseUrl}/analyze-report`;
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeouts.analysisMs),
      });
      if (response.status !== 200) {
        return { outcome: "pending", httpStatus: response.status };
      }
      const parsed = AnalysisResponseSchema.parse(await response.json());
      const concerns = (parsed.concerns ?? []).map((concern) => String(concern));
      return { outcome: "analyzed", riskLevel: (parsed.risk_level || "normal").toUpperCase(), concerns };
    } catch (error) {
      throw new RemoteUnavailableError("analysis_api", describeError(error), { cause: error });
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
