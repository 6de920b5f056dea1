import type { LanguageCode, RegistrationStep } from "../state.js";
import type { LanguageOption } from "../schema/flowDslTypes.js";
import { configString, getBotMessagingConfig } from "../core/config/messaging.js";

export type TextField = "name" | "phone" | "due_date" | "location";
export type IntegerField = "age" | "gravida" | "parity";
export type FloatField = "bmi";

export type StepDefinition = { step: RegistrationStep; prompt: string } & (
  | { kind: "text"; field: TextField }
  | { kind: "integer"; field: IntegerField }
  | { kind: "float"; field: FloatField }
  | { kind: "language"; field: "preferred_language" }
);

// Steps that collect one draft field each, in wizard order.
export const FIELD_STEPS: readonly StepDefinition[] = [
  { step: "AWAITING_NAME", field: "name", kind: "text", prompt: "Please enter your full name:" },
  { step: "AWAITING_AGE", field: "age", kind: "integer", prompt: "Please enter your age (or type 'skip')." },
  { step: "AWAITING_PHONE", field: "phone", kind: "text", prompt: "Please enter your phone number (or type 'skip')." },
  { step: "AWAITING_DUE_DATE", field: "due_date", kind: "text", prompt: "Please enter your due date in YYYY-MM-DD (or 'skip')." },
  { step: "AWAITING_LOCATION", field: "location", kind: "text", prompt: "Please enter your city/location (or 'skip')." },
  { step: "AWAITING_GRAVIDA", field: "gravida", kind: "integer", prompt: "Please enter gravida (number of pregnancies, or 'skip')." },
  { step: "AWAITING_PARITY", field: "parity", kind: "integer", prompt: "Please enter parity (number of births, or 'skip')." },
  { step: "AWAITING_BMI", field: "bmi", kind: "float", prompt: "Please enter BMI (e.g., 22.5, or 'skip')." },
  {
    step: "AWAITING_LANGUAGE",
    field: "preferred_language",
    kind: "language",
    prompt: "Choose your preferred language: English, Hindi, or Marathi. You can type the language name.",
  },
];

export const DEFAULT_LANGUAGES: readonly LanguageOption[] = [
  { code: "en", label: "English", aliases: ["english", "en"] },
  { code: "hi", label: "Hindi", aliases: ["hindi", "hi"] },
  { code: "mr", label: "Marathi", aliases: ["marathi", "mr"] },
];

export const DEFAULT_NAME = "Unknown";
export const DEFAULT_PHONE = "0000000000";
export const DEFAULT_LANGUAGE: LanguageCode = "en";

export function stepDefinition(step: RegistrationStep): StepDefinition | null {
  return FIELD_STEPS.find((def) => def.step === step) ?? null;
}

/** Step after `step`, or null when the language step is the last one. */
export function nextStep(step: RegistrationStep): RegistrationStep | null {
  const index = FIELD_STEPS.findIndex((def) => def.step === step);
  if (index < 0) return null;
  return FIELD_STEPS[index + 1]?.step ?? null;
}

export function stepPrompt(step: RegistrationStep): string {
  const def = stepDefinition(step);
  return configString(`registration.prompt.${step}`, def?.prompt ?? "");
}

export function languageOptions(): readonly LanguageOption[] {
  const configured = getBotMessagingConfig()?.languages ?? [];
  return configured.length ? configured : DEFAULT_LANGUAGES;
}

/** Map a typed language name or a button code onto a language code. */
export function resolveLanguage(input: string): LanguageCode | null {
  const key = input.trim().toLowerCase();
  if (!key) return null;
  for (const option of languageOptions()) {
    if (option.code === key || option.aliases.some((alias) => alias.toLowerCase() === key)) {
      return option.code;
    }
  }
  return null;
}
