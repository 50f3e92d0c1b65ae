import { ValidationError } from "../../shared/errors/InputErrors";

/**
 * Supported translations and their Bible Gateway version codes
 */
export const TRANSLATIONS = {
  NRSVue: "NRSVUE",
  NIV: "NIV",
  CEB: "CEB",
  NLT: "NLT",
  MSG: "MSG",
} as const;

export type Translation = keyof typeof TRANSLATIONS;

export const TRANSLATION_NAMES: readonly Translation[] = [
  "NRSVue",
  "NIV",
  "CEB",
  "NLT",
  "MSG",
];

/**
 * Match a user-supplied translation name case-insensitively
 */
export function parseTranslation(value: string): Translation {
  const match = TRANSLATION_NAMES.find(
    (name) => name.toLowerCase() === value.trim().toLowerCase(),
  );

  if (!match) {
    throw new ValidationError(
      `Translation "${value}" not supported. Choose from: ${TRANSLATION_NAMES.join(", ")}`,
      "translation",
    );
  }

  return match;
}

export function versionCode(translation: Translation): string {
  return TRANSLATIONS[translation];
}
