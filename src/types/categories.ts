export const CATEGORIES = ["language", "sexual", "violence"] as const;

export type Category = (typeof CATEGORIES)[number];

/** Reporting order when several categories fire: first wins. */
export const CATEGORY_PRIORITY: readonly Category[] = ["sexual", "violence", "language"];

export const SENSITIVITIES = ["low", "medium", "high"] as const;

export type Sensitivity = (typeof SENSITIVITIES)[number];

export type CategorySeverities = Record<Category, number>;

export const EMPTY_SEVERITIES: CategorySeverities = Object.fromEntries(
  CATEGORIES.map((c) => [c, 0]),
) as CategorySeverities;

/** Which preference fields drive each category. */
export const CATEGORY_PREFERENCE_FIELDS = {
  language: { enabled: "language_filter", sensitivity: "language_sensitivity" },
  sexual: { enabled: "sexual_content_filter", sensitivity: "sexual_content_sensitivity" },
  violence: { enabled: "violence_filter", sensitivity: "violence_sensitivity" },
} as const satisfies Record<Category, { enabled: string; sensitivity: string }>;

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((c) => c === value);
}

export function isSensitivity(value: string): value is Sensitivity {
  return SENSITIVITIES.some((s) => s === value);
}
