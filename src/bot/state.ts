import * as z from "zod";

export const LANGUAGE_CODES = ["en", "hi", "mr"] as const;
export type LanguageCode = (typeof LANGUAGE_CODES)[number];
export const LanguageCodeSchema = z.enum(LANGUAGE_CODES);

// Supabase and the backend return numeric or string ids depending on the table.
const IdSchema = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const OptionalText = z.string().nullable().optional().transform((value) => value ?? null);
const OptionalInt = z.number().int().nullable().optional().transform((value) => value ?? null);
const OptionalNumber = z.number().nullable().optional().transform((value) => value ?? null);

// A registered person; read-only to the bot once created.
export const ProfileSchema = z.object({
  id: IdSchema,
  name: OptionalText,
  age: OptionalInt,
  phone: OptionalText,
  due_date: OptionalText,
  location: OptionalText,
  gravida: OptionalInt,
  parity: OptionalInt,
  bmi: OptionalNumber,
  preferred_language: LanguageCodeSchema.catch("en").default("en"),
  telegram_chat_id: z
    .union([z.string(), z.number()])
    .nullable()
    .optional()
    .transform((value) => (value === null || value === undefined ? null : String(value))),
});
export type Profile = z.infer<typeof ProfileSchema>;

export const ANALYSIS_STATUSES = ["processing", "done", "failed"] as const;
export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number];

export const UploadRecordSchema = z.object({
  id: IdSchema,
  mother_id: IdSchema,
  telegram_chat_id: OptionalText,
  file_name: OptionalText,
  file_type: OptionalText,
  file_url: OptionalText,
  uploaded_at: OptionalText,
  created_at: OptionalText,
  analysis_status: z.enum(ANALYSIS_STATUSES).catch("processing").default("processing"),
  analysis_summary: z.unknown().optional(),
});
export type UploadRecord = z.infer<typeof UploadRecordSchema>;

/** Row written when an upload is accepted. */
export type NewUploadRecord = {
  id: string;
  mother_id: string;
  telegram_chat_id: string;
  file_name: string;
  file_type: string;
  file_url: string;
  file_path: string;
  uploaded_at: string;
  analysis_status: "processing";
  created_at: string;
};

// Wizard states in the only order they may be visited.
export const REGISTRATION_STEPS = [
  "AWAITING_NAME",
  "AWAITING_AGE",
  "AWAITING_PHONE",
  "AWAITING_DUE_DATE",
  "AWAITING_LOCATION",
  "AWAITING_GRAVIDA",
  "AWAITING_PARITY",
  "AWAITING_BMI",
  "AWAITING_LANGUAGE",
  "CONFIRM_REGISTRATION",
] as const;
export type RegistrationStep = (typeof REGISTRATION_STEPS)[number];

export const RegistrationDraftSchema = z.object({
  name: z.string().nullable().optional(),
  age: z.number().int().nullable().optional(),
  phone: z.string().nullable().optional(),
  due_date: z.string().nullable().optional(),
  location: z.string().nullable().optional(),
  gravida: z.number().int().nullable().optional(),
  parity: z.number().int().nullable().optional(),
  bmi: z.number().nullable().optional(),
  preferred_language: LanguageCodeSchema.nullable().optional(),
});
export type RegistrationDraft = z.infer<typeof RegistrationDraftSchema>;

/** Finalized registration as sent to the backend or inserted directly. */
export type RegistrationPayload = {
  name: string;
  age: number | null;
  phone: string;
  due_date: string | null;
  location: string | null;
  gravida: number | null;
  parity: number | null;
  bmi: number | null;
  preferred_language: LanguageCode;
  telegram_chat_id: string;
};

// Per-chat state. One chat may own several profiles.
export const SessionSchema = z.object({
  session_key: z.string().min(1),
  active_profile_id: z.string().nullable().default(null),
  profile_list: z.array(ProfileSchema).default([]),
  switch_panel_visible: z.boolean().default(false),
  registration_lock: z.boolean().default(false),
  registration_step: z.enum(REGISTRATION_STEPS).nullable().default(null),
  registration_draft: RegistrationDraftSchema.default({}),
});
export type Session = z.infer<typeof SessionSchema>;

export function createSession(sessionKey: string): Session {
  return SessionSchema.parse({ session_key: sessionKey });
}

export function findProfile(profiles: Profile[], profileId: string | null): Profile | null {
  if (!profileId) return null;
  return profiles.find((profile) => profile.id === profileId) ?? null;
}

export function activeProfile(session: Session): Profile | null {
  return findProfile(session.profile_list, session.active_profile_id);
}

export function setActiveProfile(session: Session, profile: Profile, profiles: Profile[]): void {
  const list = profiles.some((item) => item.id === profile.id) ? profiles : [...profiles, profile];
  session.profile_list = list;
  session.active_profile_id = profile.id;
  session.switch_panel_visible = false;
}

export function resetRegistration(session: Session): void {
  session.registration_lock = false;
  session.registration_step = null;
  session.registration_draft = {};
}
