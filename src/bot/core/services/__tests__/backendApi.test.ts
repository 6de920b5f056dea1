import { jest } from "@jest/globals";
import { BackendApiClient, type FetchLike } from "../backendApi.js";
import { RemoteUnavailableError } from "../../errors.js";
import { buildRegistrationPayload } from "../../../flows/registrationFlow.js";

const timeouts = { summaryMs: 1000, registrationMs: 1000, analysisMs: 1000 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function setup() {
  const fetchImpl = jest.fn<FetchLike>();
  const client = new BackendApiClient({ baseUrl: "http://backend.test/", timeouts, fetchImpl });
  return { fetchImpl, client };
}

describe("BackendApiClient.fetchSummary", () => {
  it("reads the summary for a profile", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(
      jsonResponse({ recent_timeline: [{ summary: "Visit" }], key_memories: "oops", summary: { recommendations: ["Rest"] } })
    );

    await expect(client.fetchSummary("m 1")).resolves.toEqual({
      recent_timeline: [{ summary: "Visit" }],
      key_memories: [],
      summary: { recommendations: ["Rest"] },
    });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://backend.test/api/v1/summary/m%201");
  });

  it("treats a non-200 status as unavailable", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(jsonResponse({ detail: "nope" }, 503));

    const fetching = client.fetchSummary("m-1");
    await expect(fetching).rejects.toBeInstanceOf(RemoteUnavailableError);
    await expect(fetching).rejects.toMatchObject({ source: "summary_api" });
  });

  it("treats a network error as unavailable", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    await expect(client.fetchSummary("m-1")).rejects.toThrow("summary_api: connect ECONNREFUSED");
  });
});

describe("BackendApiClient.registerProfile", () => {
  const payload = buildRegistrationPayload({ name: "Asha" }, "chat-1");

  it("returns the created profile on success", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(jsonResponse({ status: "success", data: { id: 7, name: "Asha" } }, 201));

    const result = await client.registerProfile(payload);

    expect(result).toMatchObject({ ok: true, profile: { id: "7", name: "Asha", preferred_language: "en" } });
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://backend.test/mothers/register");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual(payload);
  });

  it("reports a non-success body", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(jsonResponse({ status: "error" }));
    await expect(client.registerProfile(payload)).resolves.toEqual({
      ok: false,
      reason: 'unexpected body {"status":"error"}',
    });
  });

  it("reports a failing status", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(new Response("boom", { status: 500 }));
    await expect(client.registerProfile(payload)).resolves.toEqual({ ok: false, reason: "status=500 body=boom" });
  });

  it("never throws on network errors", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockRejectedValueOnce(new Error("timeout"));
    await expect(client.registerProfile(payload)).resolves.toEqual({ ok: false, reason: "timeout" });
  });
});

describe("BackendApiClient.analyzeReport", () => {
  const request = { mother_id: "m-1", report_id: "r-1", file_url: "https://files.test/a.pdf", file_type: "pdf" };

  it("upper-cases the risk level", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(jsonResponse({ risk_level: "high", concerns: ["Low iron", 3] }));
    await expect(client.analyzeReport(request)).resolves.toEqual({
      outcome: "analyzed",
      riskLevel: "HIGH",
      concerns: ["Low iron", "3"],
    });
  });

  it("defaults the risk level to NORMAL", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(jsonResponse({}));
    await expect(client.analyzeReport(request)).resolves.toEqual({ outcome: "analyzed", riskLevel: "NORMAL", concerns: [] });
  });

  it("reports a non-200 status as pending", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValueOnce(jsonResponse({}, 202));
    await expect(client.analyzeReport(request)).resolves.toEqual({ outcome: "pending", httpStatus: 202 });
  });

  it("throws when the call fails", async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockRejectedValueOnce(new Error("timeout"));
    await expect(client.analyzeReport(request)).rejects.toMatchObject({ source: "analysis_api" });
  });
});
