import { toBotAction, type InboundEvent } from "./actions.js";
import type { OutboundMessage } from "./messages.js";
import { SessionStore } from "./sessionStore.js";
import { ActionDispatcher } from "./dispatcher.js";
import { RegistrationFlow } from "./flows/registrationFlow.js";
import { SummaryAggregator } from "./summary.js";
import { DocumentIngestionPipeline, type ChatNotifier, type FileUrlResolver } from "./documentIngestion.js";
import { BackendApiClient, type FetchLike } from "./core/services/backendApi.js";
import { PersistenceFallbackWriter } from "./core/services/registrationWriter.js";
import { SupabaseProfileDirectory, type ProfileDirectory, type ProfileStore } from "./core/services/profileDirectory.js";
import { SupabaseUploadStore, type UploadStore } from "./core/services/reports.js";
import { SupabaseHistorySink, type HistorySink } from "./core/services/history.js";
import { getSupabaseClient } from "./core/services/supabase.js";
import { logTiming } from "./core/helpers/logging.js";
import type { ResolvedAppConfig } from "../config/appConfig.js";

export type TurnResult = {
  sessionKey: string;
  replies: OutboundMessage[];
};

/**
 * Entry point for inbound chat events. Events for one chat are handled one at
 * a time, in arrival order.
 */
export class MaternalCareBot {
  constructor(
    private readonly dispatcher: ActionDispatcher,
    readonly sessions: SessionStore = new SessionStore()
  ) {}

  async handleEvent(sessionKey: string, event: InboundEvent): Promise<TurnResult> {
    const action = toBotAction(event);
    const t0 = Date.now();
    const replies = await this.sessions.runExclusive(sessionKey, (session) => this.dispatcher.dispatch(session, action));
    logTiming("bot", `Handled ${action.type} (${replies.length} replies)`, t0, sessionKey);
    return { sessionKey, replies };
  }
}

export type BotCollaborators = {
  directory: ProfileDirectory;
  profileStore: ProfileStore;
  uploads: UploadStore;
  history: HistorySink;
  files: FileUrlResolver;
  notifier: ChatNotifier;
  fetchImpl?: FetchLike;
  now?: () => Date;
};

export function buildBot(config: ResolvedAppConfig, collaborators: BotCollaborators): MaternalCareBot {
  const { directory, profileStore, uploads, history, files, notifier, fetchImpl, now } = collaborators;
  const backend = new BackendApiClient({
    baseUrl: config.backendApiBaseUrl,
    timeouts: {
      summaryMs: config.timeouts.summaryMs,
      registrationMs: config.timeouts.registrationMs,
      analysisMs: config.timeouts.analysisMs,
    },
    fetchImpl,
  });
  const writer = new PersistenceFallbackWriter(backend, profileStore);
  const dispatcher = new ActionDispatcher({
    registration: new RegistrationFlow(writer, directory, now),
    summaries: new SummaryAggregator(backend, uploads),
    uploads: new DocumentIngestionPipeline(files, uploads, backend, history, notifier, now),
    directory,
    now,
  });
  return new MaternalCareBot(dispatcher);
}

/** Bot wired to Supabase; the transport resolves file URLs and carries follow-up messages. */
export function createSupabaseBot(config: ResolvedAppConfig, transport: FileUrlResolver & ChatNotifier): MaternalCareBot {
  const profiles = new SupabaseProfileDirectory(getSupabaseClient, config.timeouts.profileFetchMs);
  return buildBot(config, {
    directory: profiles,
    profileStore: profiles,
    uploads: new SupabaseUploadStore(getSupabaseClient, config.timeouts.storeMs),
    history: new SupabaseHistorySink(getSupabaseClient),
    files: transport,
    notifier: transport,
  });
}
