/**
 * Crowdin locale code → app locale code
 *
 * Maintained by hand: when a language is enabled in Crowdin, add its code
 * here before regenerating the Dart catalog.
 */

import { MissingMappingError } from "../errors.js";

export type LocaleMap = Readonly<Record<string, string>>;

export const LOCALE_MAP: LocaleMap = Object.freeze({
  ar: "ar-ar",
  ast: "ast-es",
  bg: "bul-bg",
  cs: "cs-cz",
  de: "de-de",
  el: "el-gr",
  "es-ES": "es-es",
  fa: "fa-ir",
  fil: "fil-ph",
  fr: "fr-fr",
  he: "he-il",
  hi: "hi-in",
  hr: "hr-hr",
  hu: "hu-hu",
  id: "id-id",
  it: "it-it",
  ko: "ko-ko",
  nl: "nl-nl",
  pl: "pl-pl",
  "pt-BR": "pt-br",
  ro: "ro-ro",
  ru: "ru-ru",
  sk: "sk-sk",
  sl: "sl-sl",
  tr: "tr-tr",
  uk: "uk-ua",
  "ur-PK": "ur-pk",
  vi: "vi-vi",
  "zh-CN": "zh-cn",
});

/**
 * Look up the app locale for a vendor locale
 * @returns The app locale or null if the vendor code is not mapped
 */
export function lookupAppLocale(
  vendorLocale: string,
  map: LocaleMap = LOCALE_MAP
): string | null {
  return Object.hasOwn(map, vendorLocale) ? map[vendorLocale] : null;
}

/**
 * Map a vendor locale to its app locale
 * @throws MissingMappingError if the vendor code is not mapped
 */
export function mapVendorLocale(
  vendorLocale: string,
  map: LocaleMap = LOCALE_MAP
): string {
  const appLocale = lookupAppLocale(vendorLocale, map);
  if (appLocale === null) {
    throw new MissingMappingError(vendorLocale);
  }
  return appLocale;
}

export function listVendorLocales(map: LocaleMap = LOCALE_MAP): string[] {
  return Object.keys(map);
}

/**
 * Find every vendor locale that maps onto an app locale
 */
export function findVendorLocales(
  appLocale: string,
  map: LocaleMap = LOCALE_MAP
): string[] {
  return Object.entries(map)
    .filter(([, app]) => app === appLocale)
    .map(([vendor]) => vendor);
}
