import { createRequire } from 'module';
import i18next from 'i18next';

const _require = createRequire(import.meta.url);
const zhCN = _require('./locales/zh-CN.json');
const enUS = _require('./locales/en-US.json');

export const SUPPORTED_LANGS = ['en-US', 'zh-CN'] as const;

// Initialise with all resources bundled — resolves synchronously (no async backend)
await i18next.init({
  resources: {
    'en-US': { translation: enUS },
    'zh-CN': { translation: zhCN },
  },
  lng: 'en-US',
  fallbackLng: 'en-US',
  interpolation: { escapeValue: false },
});

export function t(key: string, lng: string, vars?: Record<string, unknown>): string {
  return String(i18next.t(key, { lng, ...vars }));
}
