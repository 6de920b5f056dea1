export type InlineButton = {
  text: string;
  callbackData: string;
};

export type InlineKeyboard = InlineButton[][];

export type ParseMode = "Markdown" | "HTML";

/**
 * A reply produced by one turn.
 * "edit" rewrites the message whose button triggered the turn; "send" posts a new one.
 */
export type OutboundMessage =
  | { kind: "send"; text: string; parseMode?: ParseMode; keyboard?: InlineKeyboard }
  | { kind: "edit"; text: string; parseMode?: ParseMode; keyboard?: InlineKeyboard }
  | { kind: "callback_answer"; text?: string; showAlert?: boolean };

export type DeliveryMode = "send" | "edit";

export function reply(text: string, options: { parseMode?: ParseMode; keyboard?: InlineKeyboard } = {}): OutboundMessage {
  return { kind: "send", text, ...options };
}

export function answerCallback(text?: string, showAlert?: boolean): OutboundMessage {
  return showAlert ? { kind: "callback_answer", text, showAlert } : { kind: "callback_answer", text };
}

export function button(text: string, callbackData: string): InlineButton {
  return { text, callbackData };
}
