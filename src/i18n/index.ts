import { createRequire } from 'module';
import i18next from 'i18next';
import { config } from '../config.js';

const _require = createRequire(import.meta.url);
const zhCN = _require('./locales/zh-CN.json');
const enUS = _require('./locales/en-US.json');

export const SUPPORTED_LANGS = ['en-US', 'zh-CN'] as const;
export type SupportedLang = (typeof SUPPORTED_LANGS)[number];

export function is_supported_lang(value: string): value is SupportedLang {
  return SUPPORTED_LANGS.some(lang => lang === value);
}

/** Falls back to the configured default, then to en-US. */
export function resolve_lang(value: string | null | undefined): SupportedLang {
  if (value && is_supported_lang(value)) return value;
  return is_supported_lang(config.default_locale) ? config.default_locale : 'en-US';
}

// Initialise with all resources bundled; resolves synchronously (no async backend)
await i18next.init({
  resources: {
    'zh-CN': { translation: zhCN },
    'en-US': { translation: enUS },
  },
  lng: resolve_lang(config.default_locale),
  fallbackLng: 'en-US',
  interpolation: { escapeValue: false },
});

export function t(key: string, lng: string, vars?: Record<string, unknown>): string {
  return i18next.t(key, { lng, ...vars }) as string;
}
