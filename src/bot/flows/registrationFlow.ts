import type { BotAction } from "../actions.js";
import { CALLBACK, isAffirmative } from "../actions.js";
import type { ProfileDirectory } from "../core/services/profileDirectory.js";
import type { SavedRegistration } from "../core/services/registrationWriter.js";
import {
  resetRegistration,
  setActiveProfile,
  type Profile,
  type RegistrationDraft,
  type RegistrationPayload,
  type Session,
} from "../state.js";
import { button, reply, type InlineKeyboard, type OutboundMessage } from "../messages.js";
import { dashboardMessage, renderDashboard } from "../dashboard.js";
import { configString, confirmBeforeSave } from "../core/config/messaging.js";
import { isSkipToken } from "../core/helpers/text.js";
import { parseFloatField, parseIntegerField } from "../core/helpers/parsing.js";
import { log, logError } from "../core/helpers/logging.js";
import {
  DEFAULT_LANGUAGE,
  DEFAULT_NAME,
  DEFAULT_PHONE,
  languageOptions,
  nextStep,
  resolveLanguage,
  stepDefinition,
  stepPrompt,
  type StepDefinition,
} from "./registrationFlowConfig.js";

export interface RegistrationWriter {
  save(payload: RegistrationPayload): Promise<SavedRegistration>;
}

export type WizardInput = Extract<BotAction, { type: "text" | "select_language" | "confirm_registration" }>;

function textValue(raw: string): string | null {
  const text = raw.trim();
  return !text || isSkipToken(text) ? null : text;
}

/**
 * Draft with one field step's answer applied. "skip" and unparseable numbers
 * both become null; the wizard never re-asks a typed field.
 */
export function applyFieldAnswer(draft: RegistrationDraft, def: StepDefinition, raw: string): RegistrationDraft {
  switch (def.kind) {
    case "text":
      return { ...draft, [def.field]: textValue(raw) };
    case "integer":
      return { ...draft, [def.field]: textValue(raw) === null ? null : parseIntegerField(raw) };
    case "float":
      return { ...draft, [def.field]: textValue(raw) === null ? null : parseFloatField(raw) };
    case "language":
      return { ...draft, preferred_language: resolveLanguage(raw) };
  }
}

export function buildRegistrationPayload(draft: RegistrationDraft, sessionKey: string): RegistrationPayload {
  return {
    name: draft.name || DEFAULT_NAME,
    age: draft.age ?? null,
    phone: draft.phone || DEFAULT_PHONE,
    due_date: draft.due_date ?? null,
    location: draft.location ?? null,
    gravida: draft.gravida ?? null,
    parity: draft.parity ?? null,
    bmi: draft.bmi ?? null,
    preferred_language: draft.preferred_language ?? DEFAULT_LANGUAGE,
    telegram_chat_id: sessionKey,
  };
}

export function languageKeyboard(): InlineKeyboard {
  return [languageOptions().map((option) => button(option.label, `${CALLBACK.languagePrefix}${option.code}`))];
}

function promptFor(session: Session): OutboundMessage {
  const step = session.registration_step;
  if (!step) return reply(configString("registration.notActive", "There is no registration in progress. Use /register to start one."));
  if (step === "CONFIRM_REGISTRATION") return confirmationPrompt(session.registration_draft);
  if (step === "AWAITING_LANGUAGE") return reply(stepPrompt(step), { keyboard: languageKeyboard() });
  return reply(stepPrompt(step));
}

function confirmationPrompt(draft: RegistrationDraft): OutboundMessage {
  const show = (value: string | number | null | undefined) => (value === null || value === undefined ? "—" : String(value));
  const text = [
    configString("registration.confirmTitle", "Please confirm your details:"),
    `• Name: ${show(draft.name)}`,
    `• Age: ${show(draft.age)}`,
    `• Phone: ${show(draft.phone)}`,
    `• Due date: ${show(draft.due_date)}`,
    `• Location: ${show(draft.location)}`,
    `• Gravida: ${show(draft.gravida)}`,
    `• Parity: ${show(draft.parity)}`,
    `• BMI: ${show(draft.bmi)}`,
    `• Language: ${show(draft.preferred_language)}`,
  ].join("\n");
  return reply(text, {
    keyboard: [[button("✅ Confirm", `${CALLBACK.confirmPrefix}yes`), button("❌ Cancel", `${CALLBACK.confirmPrefix}no`)]],
  });
}

/**
 * Registration wizard. Walks the session through the field steps in order,
 * then saves the draft through the writer and makes the new profile active.
 */
export class RegistrationFlow {
  constructor(
    private readonly writer: RegistrationWriter,
    private readonly directory: ProfileDirectory,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Start (or restart) the wizard at the name step. */
  begin(session: Session): OutboundMessage[] {
    session.registration_lock = true;
    session.registration_step = "AWAITING_NAME";
    session.registration_draft = {};
    log({ level: "info", component: "registration", message: "Registration started", sessionId: session.session_key });
    return [promptFor(session)];
  }

  cancel(session: Session): OutboundMessage[] {
    if (!session.registration_lock) {
      return [reply(configString("registration.nothingToCancel", "There is no registration in progress. Use /register to add a profile."))];
    }
    resetRegistration(session);
    log({ level: "info", component: "registration", message: "Registration cancelled", sessionId: session.session_key });
    return [reply(configString("registration.cancelled", "Registration cancelled. You can start again anytime with /start."))];
  }

  async handleInput(session: Session, input: WizardInput): Promise<OutboundMessage[]> {
    const step = session.registration_step;
    if (!session.registration_lock || !step) {
      return [reply(configString("registration.notActive", "There is no registration in progress. Use /register to start one."))];
    }

    if (step === "CONFIRM_REGISTRATION") {
      if (input.type === "select_language") return [promptFor(session)];
      const accepted = input.type === "confirm_registration" ? input.accepted : isAffirmative(input.text);
      if (!accepted) {
        resetRegistration(session);
        return [reply(configString("registration.notConfirmed", "Registration not confirmed. You can restart with /register or go home with /start."))];
      }
      return this.finalize(session);
    }

    if (step === "AWAITING_LANGUAGE") {
      if (input.type === "confirm_registration") return [promptFor(session)];
      const raw = input.type === "text" ? input.text : input.code;
      const language = resolveLanguage(raw);
      if (!language) {
        return [
          reply(configString("registration.languageRetry", "Please choose a valid language: English, Hindi, or Marathi."), {
            keyboard: languageKeyboard(),
          }),
        ];
      }
      session.registration_draft = { ...session.registration_draft, preferred_language: language };
      if (confirmBeforeSave()) {
        session.registration_step = "CONFIRM_REGISTRATION";
        return [promptFor(session)];
      }
      return this.finalize(session);
    }

    // Field steps only take typed text; buttons from older prompts re-ask the current question.
    if (input.type !== "text") return [promptFor(session)];
    const def = stepDefinition(step);
    if (!def || def.kind === "language") return [promptFor(session)];

    const draft = applyFieldAnswer(session.registration_draft, def, input.text);
    if (draft[def.field] === null && textValue(input.text) !== null) {
      log({ level: "trace", component: "registration", message: `Unparseable ${def.field}; stored as skipped`, sessionId: session.session_key });
    }
    session.registration_draft = draft;
    session.registration_step = nextStep(step);
    return [promptFor(session)];
  }

  private async finalize(session: Session): Promise<OutboundMessage[]> {
    const sessionKey = session.session_key;
    const payload = buildRegistrationPayload(session.registration_draft, sessionKey);
    const replies: OutboundMessage[] = [reply(configString("registration.processing", "Processing your registration..."))];

    let saved: SavedRegistration;
    try {
      saved = await this.writer.save(payload);
    } catch (error) {
      logError("registration", error, sessionKey);
      resetRegistration(session);
      replies.push(reply(configString("registration.failed", "⚠️ Could not save registration right now. Please try again later with /register.")));
      return replies;
    }

    resetRegistration(session);
    const profiles = await this.refreshProfiles(session);
    setActiveProfile(session, saved.profile, profiles);
    log({ level: "info", component: "registration", message: `Registration saved via ${saved.via} (${saved.profile.id})`, sessionId: sessionKey });

    const view = renderDashboard({
      activeProfile: saved.profile,
      profiles: session.profile_list,
      switchPanelVisible: false,
      chatId: sessionKey,
      now: this.now(),
    });
    replies.push(
      reply(configString("registration.saved", "✅ Registration saved! Loading your dashboard...")),
      dashboardMessage(view, "send")
    );
    return replies;
  }

  // The saved profile is appended by setActiveProfile when the directory misses it.
  private async refreshProfiles(session: Session): Promise<Profile[]> {
    try {
      return await this.directory.listProfiles(session.session_key);
    } catch (error) {
      logError("registration", error, session.session_key);
      return session.profile_list;
    }
  }
}
