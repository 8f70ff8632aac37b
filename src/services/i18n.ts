import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { logWarn } from "./logger";

export type LanguageCode = "en" | "ru";

const SUPPORTED_LANGS: LanguageCode[] = ["en", "ru"];
const FALLBACK_LANG: LanguageCode = "en";

const catalogPath = (lang: LanguageCode) =>
  fileURLToPath(new URL(`../i18n/${lang}.json`, import.meta.url));

const decodeJson = (raw: string) => {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return {};
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") result[key] = value;
    }
    return result;
  } catch (err) {
    logWarn("[i18n] catalog is not valid JSON", err);
    return {};
  }
};

const loadMessagesSync = (lang: LanguageCode) => {
  try {
    return decodeJson(readFileSync(catalogPath(lang), "utf-8"));
  } catch (err) {
    logWarn("[i18n] read failed", err);
    return {};
  }
};

const loadMessages = async (lang: LanguageCode) => {
  try {
    return decodeJson(await readFile(catalogPath(lang), "utf-8"));
  } catch (err) {
    logWarn("[i18n] read failed", err);
    return {};
  }
};

let currentLang: LanguageCode = FALLBACK_LANG;
let fallbackMessages: Record<string, string> = loadMessagesSync(FALLBACK_LANG);
let messages: Record<string, string> = fallbackMessages;
let pluralRules: Intl.PluralRules | null = null;

export const isSupportedLanguage = (value: string | null | undefined): value is LanguageCode => {
  if (!value) return false;
  return SUPPORTED_LANGS.some((lang) => lang === value);
};

export const initI18n = async (lang: LanguageCode) => {
  if (Object.keys(fallbackMessages).length === 0) {
    fallbackMessages = await loadMessages(FALLBACK_LANG);
  }
  const current = lang === FALLBACK_LANG ? fallbackMessages : await loadMessages(lang);
  messages = Object.keys(current).length > 0 ? current : fallbackMessages;
  currentLang = lang;
  pluralRules = new Intl.PluralRules(currentLang);
};

export const getCurrentLanguage = () => currentLang;

export const t = (key: string, vars?: Record<string, string | number>) => {
  const template = messages[key] ?? fallbackMessages[key] ?? key;
  if (!vars) return template;
  return template.replace(/\{(\w+)\}/g, (match, token: string) => {
    const value = vars[token];
    return value === undefined ? match : String(value);
  });
};

export const tCount = (baseKey: string, count: number, vars?: Record<string, string | number>) => {
  const rules = pluralRules ?? new Intl.PluralRules(currentLang);
  const category = rules.select(count);
  const key = `${baseKey}.${category}`;
  return t(key, { count, ...vars });
};
