/**
 * i18n configuration
 * Uses i18next for user-facing messages (without React bindings)
 */

import i18n from 'i18next';
import enUS from './locales/en-US.json';

void i18n.init({
  resources: {
    'en-US': { translation: enUS },
  },
  lng: 'en-US',
  fallbackLng: 'en-US',
  initImmediate: false,
  interpolation: {
    escapeValue: false,
  },
});

export const t = i18n.t.bind(i18n);
export const changeLanguage = i18n.changeLanguage.bind(i18n);
export default i18n;
