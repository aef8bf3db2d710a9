export const GENDERS = ['M', 'F', 'Other'] as const;
export type Gender = (typeof GENDERS)[number];

export const EVENT_TYPES = ['once', 'repeat'] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export const REPEAT_PATTERNS = ['weekly', 'monthly', 'custom_days'] as const;
export type RepeatPattern = (typeof REPEAT_PATTERNS)[number];

export const PAYMENT_MODES = ['cash', 'upi', 'bank_transfer', 'card', 'cheque'] as const;

/** Patterns that recur on explicit days of the week and need repeat days stored. */
export const DAY_BASED_PATTERNS: readonly RepeatPattern[] = ['weekly', 'custom_days'];
