import { isLockExempt, isWizardInput, type BotAction, type InboundAttachment } from "./actions.js";
import { activeProfile, findProfile, setActiveProfile, type Profile, type Session } from "./state.js";
import { answerCallback, reply, type DeliveryMode, type OutboundMessage } from "./messages.js";
import { dashboardMessage, renderDashboard, welcomeMessage } from "./dashboard.js";
import type { RegistrationFlow } from "./flows/registrationFlow.js";
import type { SummaryAggregator } from "./summary.js";
import type { DocumentIngestionPipeline } from "./documentIngestion.js";
import type { ProfileDirectory } from "./core/services/profileDirectory.js";
import { RemoteUnavailableError } from "./core/errors.js";
import { configString } from "./core/config/messaging.js";
import { log, logError } from "./core/helpers/logging.js";

export type DispatcherDeps = {
  registration: RegistrationFlow;
  summaries: SummaryAggregator;
  uploads: DocumentIngestionPipeline;
  directory: ProfileDirectory;
  now?: () => Date;
};

export const LOCK_NOTICE = "Finish registration first or send /cancel.";
export const PROFILE_NOT_FOUND_NOTICE = "⚠️ Could not find that profile. Please try again.";

const notices = {
  lock: () => configString("lock.notice", LOCK_NOTICE),
  help: () => configString("help.text", "I’m here to help. Use the menu buttons or type /start."),
  notFound: () => configString("switch.notFound", PROFILE_NOT_FOUND_NOTICE),
  noActiveProfile: () => configString("summary.noProfile", "⚠️ No active mother profile. Please register first."),
  noLinkedProfile: () =>
    configString("dashboard.noProfile", "It looks like no mother profile is linked to this chat yet. Use /register to create one."),
  noUploadProfile: () =>
    configString("upload.noProfile", "⚠️ No mother profile found. Use /register to add one before uploading reports."),
  profilesUnavailable: () =>
    configString("profiles.unavailable", "⚠️ Couldn't load your profiles right now. Please try again in a moment with /start."),
  unexpected: () => configString("error.unexpected", "⚠️ Something went wrong. Please try again or send /start."),
};

/**
 * Routes one action for one session. While a registration holds the lock,
 * only wizard input, begin and cancel get through.
 */
export class ActionDispatcher {
  private readonly now: () => Date;

  constructor(private readonly deps: DispatcherDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async dispatch(session: Session, action: BotAction): Promise<OutboundMessage[]> {
    if (session.registration_lock && !isLockExempt(action) && !isWizardInput(action)) {
      log({ level: "info", component: "dispatcher", message: `Blocked ${action.type} during registration`, sessionId: session.session_key });
      return [reply(notices.lock())];
    }

    try {
      return await this.route(session, action);
    } catch (error) {
      if (error instanceof RemoteUnavailableError) {
        logError("dispatcher", error, session.session_key);
        return [reply(notices.profilesUnavailable())];
      }
      logError("dispatcher", error, session.session_key);
      return [reply(notices.unexpected())];
    }
  }

  private async route(session: Session, action: BotAction): Promise<OutboundMessage[]> {
    const { registration } = this.deps;
    switch (action.type) {
      case "begin_registration":
        return registration.begin(session);
      case "cancel_registration":
        return registration.cancel(session);
      case "select_language":
      case "confirm_registration":
        return registration.handleInput(session, action);
      case "text":
        if (session.registration_lock) return registration.handleInput(session, action);
        return [reply(notices.help())];
      case "show_home":
        return this.showHome(session);
      case "show_summary":
        return this.showSummary(session);
      case "open_switch_panel":
        return this.toggleSwitchPanel(session, true);
      case "close_switch_panel":
        return this.toggleSwitchPanel(session, false);
      case "upload_hint":
        return [answerCallback("Upload a PDF/image as a message.", true)];
      case "switch_profile":
        return this.switchProfile(session, action.profileId);
      case "upload":
        return this.upload(session, action.attachment);
      case "ignored":
        log({ level: "trace", component: "dispatcher", message: `Ignored: ${action.reason}`, sessionId: session.session_key });
        return [];
      default: {
        const unreachable: never = action;
        return unreachable;
      }
    }
  }

  private async showHome(session: Session): Promise<OutboundMessage[]> {
    const profiles = await this.deps.directory.listProfiles(session.session_key);
    if (!profiles.length) {
      session.profile_list = [];
      session.active_profile_id = null;
      session.switch_panel_visible = false;
      return [welcomeMessage(session.session_key)];
    }
    const active = findProfile(profiles, session.active_profile_id) ?? profiles[0];
    setActiveProfile(session, active, profiles);
    return [this.dashboard(session, active, "send")];
  }

  private async showSummary(session: Session): Promise<OutboundMessage[]> {
    const profile = activeProfile(session);
    if (!profile) {
      return [answerCallback(), reply(notices.noActiveProfile())];
    }
    const report = await this.deps.summaries.buildReport(profile, { sessionId: session.session_key, now: this.now() });
    return [answerCallback("Fetching summary…"), reply(report, { parseMode: "HTML" })];
  }

  private async toggleSwitchPanel(session: Session, visible: boolean): Promise<OutboundMessage[]> {
    const profile = await this.resolveActiveProfile(session);
    if (!profile) return [answerCallback(), reply(notices.noLinkedProfile())];
    session.switch_panel_visible = visible;
    const answer = visible ? "Choose a profile to make it active." : "Hiding switch panel.";
    return [answerCallback(answer), this.dashboard(session, profile, "edit")];
  }

  private async switchProfile(session: Session, profileId: string): Promise<OutboundMessage[]> {
    const profiles = session.profile_list.length ? session.profile_list : await this.deps.directory.listProfiles(session.session_key);
    const target = findProfile(profiles, profileId);
    if (!target) {
      log({ level: "warn", component: "dispatcher", message: `Switch target ${profileId} not found`, sessionId: session.session_key });
      return [answerCallback(), reply(notices.notFound())];
    }
    setActiveProfile(session, target, profiles);
    return [answerCallback(), this.dashboard(session, target, "edit")];
  }

  private async upload(session: Session, attachment: InboundAttachment): Promise<OutboundMessage[]> {
    const profile = await this.resolveActiveProfile(session);
    if (!profile) return [reply(notices.noUploadProfile())];
    const result = await this.deps.uploads.ingest(profile, session.session_key, attachment);
    return result.replies;
  }

  /** Active profile, falling back to the first cached (or freshly listed) profile. */
  private async resolveActiveProfile(session: Session): Promise<Profile | null> {
    const current = activeProfile(session);
    if (current) return current;
    const profiles = session.profile_list.length ? session.profile_list : await this.deps.directory.listProfiles(session.session_key);
    const first = profiles[0];
    if (!first) return null;
    setActiveProfile(session, first, profiles);
    return first;
  }

  private dashboard(session: Session, profile: Profile, mode: DeliveryMode): OutboundMessage {
    const view = renderDashboard({
      activeProfile: profile,
      profiles: session.profile_list,
      switchPanelVisible: session.switch_panel_visible,
      chatId: session.session_key,
      now: this.now(),
    });
    return dashboardMessage(view, mode);
  }
}
