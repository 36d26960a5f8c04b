import { z } from "zod";
import { CATEGORIES, SENSITIVITIES } from "./categories";
import { ACTIONS } from "./common";

export const CategoryEnum = z.enum(CATEGORIES);
export const SensitivityEnum = z.enum(SENSITIVITIES);
export const ActionEnum = z.enum(ACTIONS);
export const PlaybackActionEnum = ActionEnum.exclude(["none"]);

// ---- Preferences ----

export const PreferencesSchema = z.object({
  language_filter: z.boolean(),
  sexual_content_filter: z.boolean(),
  violence_filter: z.boolean(),
  language_sensitivity: SensitivityEnum,
  sexual_content_sensitivity: SensitivityEnum,
  violence_sensitivity: SensitivityEnum,
});

/** Partial update; at least one known field must be present. Unknown keys are dropped. */
export const PreferencesUpdateSchema = PreferencesSchema.partial().refine(
  (patch) => Object.values(patch).some((v) => v !== undefined),
  { message: "at least one preference field is required" },
);

export const DEFAULT_PREFERENCES: Preferences = {
  language_filter: true,
  sexual_content_filter: true,
  violence_filter: true,
  language_sensitivity: "medium",
  sexual_content_sensitivity: "medium",
  violence_sensitivity: "medium",
};

// ---- Request bodies ----

export const CreateUserBodySchema = z.object({
  username: z.string().trim().min(1, "username is required").max(64),
});

/** Callers send numeric ids either as numbers or as strings. */
export const UserIdInputSchema = z.union([z.number(), z.string()]);

export const AnalyzeBodySchema = z.object({
  user_id: UserIdInputSchema,
  text: z.string(),
});

export const EventBodySchema = z.object({
  user_id: UserIdInputSchema,
  text: z.string(),
  confidence: z.number().min(0).max(1).optional(),
});

// ---- Rules document (data/rules.json) ----

export const SignalGroupSchema = z
  .object({
    name: z.string().min(1),
    terms: z.array(z.string().trim().min(1)).default([]),
    patterns: z.array(z.string().min(1)).default([]),
  })
  .refine((g) => g.terms.length + g.patterns.length > 0, {
    message: "signal group needs at least one term or pattern",
  });

export const RampStepSchema = z.object({
  min_severity: z.number().int().min(1),
  action: PlaybackActionEnum,
  duration_seconds: z.number().int().positive(),
});

/** Steps ordered by strictly increasing min_severity, starting at 1. */
export const RampSchema = z
  .array(RampStepSchema)
  .min(1)
  .refine((steps) => steps.length === 0 || steps[0].min_severity === 1, {
    message: "first ramp step must start at min_severity 1",
  })
  .refine((steps) => steps.every((s, i) => i === 0 || s.min_severity > steps[i - 1].min_severity), {
    message: "ramp steps must have strictly increasing min_severity",
  });

/** Adjustments to the profanity filter's built-in word list. */
export const ProfanityWordsSchema = z
  .object({
    add: z.array(z.string().trim().min(1)).default([]),
    remove: z.array(z.string().trim().min(1)).default([]),
  })
  .default({});

const SensitivityRampsSchema = z.object({
  low: RampSchema,
  medium: RampSchema,
  high: RampSchema,
});

export const ThresholdsSchema = z
  .object({
    low: z.number().int().min(1),
    medium: z.number().int().min(1),
    high: z.number().int().min(1),
  })
  .refine((t) => t.low >= t.medium && t.medium >= t.high, {
    message: "thresholds must satisfy low >= medium >= high",
  });

export const RulesDocumentSchema = z.object({
  thresholds: ThresholdsSchema,
  profanity: ProfanityWordsSchema,
  signals: z.object({
    language: z.array(SignalGroupSchema).default([]),
    sexual: z.array(SignalGroupSchema).min(1),
    violence: z.array(SignalGroupSchema).min(1),
  }),
  actions: z.object({
    language: SensitivityRampsSchema,
    sexual: SensitivityRampsSchema,
    violence: SensitivityRampsSchema,
  }),
});

export type Preferences = z.infer<typeof PreferencesSchema>;
export type PreferencesUpdate = z.infer<typeof PreferencesUpdateSchema>;
export type EventBody = z.infer<typeof EventBodySchema>;
export type UserIdInput = z.infer<typeof UserIdInputSchema>;
export type SignalGroup = z.infer<typeof SignalGroupSchema>;
export type ProfanityWords = z.infer<typeof ProfanityWordsSchema>;
export type RampStep = z.infer<typeof RampStepSchema>;
export type Thresholds = z.infer<typeof ThresholdsSchema>;
export type RulesDocument = z.infer<typeof RulesDocumentSchema>;
