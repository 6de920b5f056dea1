/** Attachment as delivered by the chat transport. */
export type InboundAttachment =
  | { kind: "document"; fileId: string; fileName?: string | null }
  | { kind: "photo"; variants: Array<{ fileId: string; fileSize?: number | null }> };

export type InboundEvent =
  | { kind: "command"; command: string }
  | { kind: "text"; text: string }
  | { kind: "callback"; data: string }
  | { kind: "attachment"; attachment: InboundAttachment };

// Closed set of things a user can ask the bot to do.
export type BotAction =
  | { type: "show_home" }
  | { type: "begin_registration" }
  | { type: "cancel_registration" }
  | { type: "show_summary" }
  | { type: "open_switch_panel" }
  | { type: "close_switch_panel" }
  | { type: "upload_hint" }
  | { type: "switch_profile"; profileId: string }
  | { type: "select_language"; code: string }
  | { type: "confirm_registration"; accepted: boolean }
  | { type: "text"; text: string }
  | { type: "upload"; attachment: InboundAttachment }
  | { type: "ignored"; reason: string };

export type BotActionType = BotAction["type"];

export const CALLBACK = {
  summary: "action_summary",
  openSwitch: "action_open_switch",
  closeSwitch: "action_close_switch",
  uploadHint: "action_upload_hint",
  registerAnother: "action_register",
  registerNew: "register_new",
  switchPrefix: "switch_mother_",
  languagePrefix: "lang_",
  confirmPrefix: "confirm_",
} as const;

const AFFIRMATIVE_TOKENS = new Set(["yes", "accept", "ok", "confirm", "y"]);

/** Free-text or button confirmation tokens collapse to a boolean. */
export function isAffirmative(token: string): boolean {
  return AFFIRMATIVE_TOKENS.has(token.trim().toLowerCase());
}

export function parseCallbackData(data: string): BotAction {
  const value = data.trim();
  switch (value) {
    case CALLBACK.summary:
      return { type: "show_summary" };
    case CALLBACK.openSwitch:
      return { type: "open_switch_panel" };
    case CALLBACK.closeSwitch:
      return { type: "close_switch_panel" };
    case CALLBACK.uploadHint:
      return { type: "upload_hint" };
    case CALLBACK.registerAnother:
    case CALLBACK.registerNew:
      return { type: "begin_registration" };
  }
  if (value.startsWith(CALLBACK.switchPrefix)) {
    const profileId = value.slice(CALLBACK.switchPrefix.length);
    return profileId ? { type: "switch_profile", profileId } : { type: "ignored", reason: "empty switch target" };
  }
  if (value.startsWith(CALLBACK.languagePrefix)) {
    return { type: "select_language", code: value.slice(CALLBACK.languagePrefix.length) };
  }
  if (value.startsWith(CALLBACK.confirmPrefix)) {
    return { type: "confirm_registration", accepted: isAffirmative(value.slice(CALLBACK.confirmPrefix.length)) };
  }
  return { type: "ignored", reason: `unknown callback ${value}` };
}

export function parseCommand(command: string): BotAction {
  // "/start@SomeBot args" -> "start"
  const name = command.trim().replace(/^\//, "").split(/[\s@]/)[0]?.toLowerCase() ?? "";
  switch (name) {
    case "start":
      return { type: "show_home" };
    case "register":
      return { type: "begin_registration" };
    case "cancel":
      return { type: "cancel_registration" };
    default:
      return { type: "ignored", reason: `unknown command /${name}` };
  }
}

export function toBotAction(event: InboundEvent): BotAction {
  switch (event.kind) {
    case "command":
      return parseCommand(event.command);
    case "callback":
      return parseCallbackData(event.data);
    case "attachment":
      return { type: "upload", attachment: event.attachment };
    case "text": {
      const text = event.text.trim();
      if (text.startsWith("/")) return parseCommand(text);
      return { type: "text", text };
    }
  }
}

// Actions that stay available while a registration holds the lock.
const LOCK_EXEMPT: ReadonlySet<BotActionType> = new Set<BotActionType>(["begin_registration", "cancel_registration"]);

// Wizard input consumed by the registration state machine.
const WIZARD_INPUT: ReadonlySet<BotActionType> = new Set<BotActionType>(["text", "select_language", "confirm_registration"]);

export function isLockExempt(action: BotAction): boolean {
  return LOCK_EXEMPT.has(action.type);
}

export function isWizardInput(action: BotAction): boolean {
  return WIZARD_INPUT.has(action.type);
}
