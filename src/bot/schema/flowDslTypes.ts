import * as z from "zod";
import { LanguageCodeSchema } from "../state.js";

// ── Config sub-schemas ──────────────────────────────────────────────

export const LanguageOptionSchema = z.object({
  code: LanguageCodeSchema,
  label: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
});

export const RegistrationConfigSchema = z.object({
  confirmBeforeSave: z.boolean().default(false),
});

export const BotMessagingConfigSchema = z.object({
  registration: RegistrationConfigSchema.default({}),
  languages: z.array(LanguageOptionSchema).default([]),
  strings: z.record(z.string(), z.string()).default({}),
});

// ── Flow file ───────────────────────────────────────────────────────

export const FlowDslSchema = z.object({
  flow: z.object({
    flowId: z.string().min(1),
    version: z.string().min(1),
    description: z.string().optional(),
  }),
  config: BotMessagingConfigSchema.default({}),
});

export type FlowDsl = z.infer<typeof FlowDslSchema>;
export type BotMessagingConfig = z.infer<typeof BotMessagingConfigSchema>;
export type LanguageOption = z.infer<typeof LanguageOptionSchema>;
