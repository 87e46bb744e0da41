/**
 * Locale Names
 *
 * Builds the ordered list of locale names used to pick translated
 * desktop entry keys, from most to least specific.
 *
 * @module @filemeta/core/locale
 */

const LOCALE_PATTERN = /^([^_.@]+)(?:_([^.@]+))?(?:\.([^@]+))?(?:@(.+))?$/;

/**
 * Variants of a POSIX locale name in preference order, codeset dropped:
 * `lang_COUNTRY@MODIFIER`, `lang_COUNTRY`, `lang@MODIFIER`, `lang`.
 *
 * @example
 * expandLocale('sr_RS.UTF-8@latin')
 * // → ['sr_RS@latin', 'sr_RS', 'sr@latin', 'sr']
 */
export function expandLocale(locale: string): string[] {
  const match = locale.match(LOCALE_PATTERN);
  if (!match) {
    return [];
  }
  const [, lang, country, , modifier] = match;
  const variants: string[] = [];
  if (country && modifier) variants.push(`${lang}_${country}@${modifier}`);
  if (country) variants.push(`${lang}_${country}`);
  if (modifier) variants.push(`${lang}@${modifier}`);
  variants.push(lang);
  return variants;
}

/**
 * Environment variables consulted by `languageNames`.
 */
export interface LocaleEnvironment {
  LANGUAGE?: string;
  LC_ALL?: string;
  LC_MESSAGES?: string;
  LANG?: string;
}

/**
 * Preferred locale names for message lookup, always ending in `C`.
 *
 * `LANGUAGE` (a colon-separated list) comes first, then the first of
 * `LC_ALL`, `LC_MESSAGES` and `LANG` that is set.
 */
export function languageNames(env: LocaleEnvironment): string[] {
  const requested: string[] = [];
  if (env.LANGUAGE) {
    requested.push(...env.LANGUAGE.split(':').filter(Boolean));
  }
  const category = env.LC_ALL || env.LC_MESSAGES || env.LANG;
  if (category) {
    requested.push(category);
  }
  return normalizeLocales(requested);
}

/**
 * Expand each of `locales`, drop duplicates and the `C`/`POSIX`
 * pseudo-locales, and append a single trailing `C`.
 */
export function normalizeLocales(locales: readonly string[]): string[] {
  const names: string[] = [];
  for (const locale of locales) {
    if (locale === 'C' || locale === 'POSIX') continue;
    for (const variant of expandLocale(locale)) {
      if (variant !== 'C' && !names.includes(variant)) names.push(variant);
    }
  }
  names.push('C');
  return names;
}
