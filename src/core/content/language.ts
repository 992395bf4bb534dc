/**
 * Pages in the default language live at the site root; pages in any other
 * language live under `<code>/`.
 */
export function languagePrefix(language: string, defaultLanguage: string): string {
  return language === defaultLanguage ? "" : `${language}/`;
}

/**
 * Upper-cases the first letter and turns dashes/underscores into spaces.
 */
export function humanize(value: string): string {
  return value.replace(/[-_]+/g, " ").replace(/^\w/, (c) => c.toUpperCase());
}
