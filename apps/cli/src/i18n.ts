import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

export const LOCALES = ["en_US", "pl_PL", "nb_NO", "es_ES"] as const;
export type Locale = (typeof LOCALES)[number];
export const DEFAULT_LOCALE: Locale = "en_US";

/** `locales/` beside `src/` (and beside `dist/` once bundled) */
export const LOCALES_DIR = fileURLToPath(new URL("../locales/", import.meta.url));

export type Messages = Readonly<Record<string, string>>;
export type Catalogs = Readonly<Record<Locale, Messages>>;
export type Params = Record<string, string | number>;

export function isLocale(value: unknown): value is Locale {
  return LOCALES.some((locale) => locale === value);
}

/** The locale after `current` in LOCALES, wrapping around */
export function nextLocale(current: string): Locale {
  const index = LOCALES.findIndex((locale) => locale === current);
  return LOCALES[(index + 1) % LOCALES.length];
}

export async function loadMessages(locale: Locale, dir: string = LOCALES_DIR): Promise<Messages> {
  const path = join(dir, `${locale}.json`);
  const parsed: unknown = JSON.parse(await readFile(path, "utf-8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${path} must hold a JSON object`);
  }

  const messages: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new Error(`${path}: "${key}" must be a string`);
    }
    messages[key] = value;
  }
  return messages;
}

export async function loadCatalogs(dir: string = LOCALES_DIR): Promise<Catalogs> {
  const [en_US, pl_PL, nb_NO, es_ES] = await Promise.all(LOCALES.map((locale) => loadMessages(locale, dir)));
  return { en_US, pl_PL, nb_NO, es_ES };
}

export interface Translator {
  readonly locale: Locale;
  readonly t: (key: string, params?: Params) => string;
}

/**
 * Looks keys up in `locale`, then in the default locale, then gives the key
 * back. `{name}` placeholders are filled from `params`. An unknown locale
 * translates as the default one.
 */
export function createTranslator(catalogs: Catalogs, locale: string): Translator {
  const resolved = isLocale(locale) ? locale : DEFAULT_LOCALE;
  const primary = catalogs[resolved];
  const fallback = catalogs[DEFAULT_LOCALE];

  return {
    locale: resolved,
    t: (key, params = {}) => {
      const template = primary[key] ?? fallback[key] ?? key;
      return template.replace(/\{(\w+)\}/g, (match, name: string) =>
        Object.prototype.hasOwnProperty.call(params, name) ? String(params[name]) : match,
      );
    },
  };
}
