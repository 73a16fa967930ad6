/**
 * Guildwarden — src/lib/features.ts
 * WHAT: The closed set of feature names that commands may guard on.
 * WHY: config.ini sections are validated against this list at load time, so a typo in
 *      either place surfaces at startup instead of as a silent "permission denied".
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const FEATURES = ["hr_tool", "settings", "reminders"] as const;

export type FeatureName = (typeof FEATURES)[number];

export function isFeatureName(value: string): value is FeatureName {
  return FEATURES.some((feature) => feature === value);
}
