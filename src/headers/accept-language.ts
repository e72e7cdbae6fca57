import { InvalidLanguageTagError } from '../errors.js';
import { QVALUE_DECREMENT_TENTHS, QVALUE_MAX_TENTHS } from '../specs.js';
import { containsLWS, trimLWS } from '../utils/chars.js';

function splitLanguageList(prefs: string): string[] {
  return prefs.split(',').map(trimLWS).filter((tag) => tag !== '');
}

const getBaseLanguage = (tag: string): string => {
  const hyphen = tag.indexOf('-');
  return hyphen < 0 ? tag : tag.slice(0, hyphen);
};

/**
 * Adds the base language after each regional tag, e.g. `en-US,fr` becomes
 * `en-US,en,fr`. Variants that follow one another share one base entry,
 * placed after the last of them.
 */
export function expandLanguageList(prefs: string): string {
  const tags = splitLanguageList(prefs);
  for (const tag of tags) {
    if (tag.includes(';') || containsLWS(tag)) {
      throw new InvalidLanguageTagError(`invalid language tag: ${tag}`);
    }
  }

  const expanded = new Set<string>();

  tags.forEach((tag, index) => {
    expanded.add(tag);
    const base = getBaseLanguage(tag);
    const next = tags[index + 1];
    if (next === undefined || getBaseLanguage(next) !== base) {
      expanded.add(base);
    }
  });

  return [...expanded].join(',');
}

/**
 * Weights each entry by its position. Entries are written out as given.
 */
export function generateAcceptLanguageHeader(prefs: string): string {
  let qvalueTenths = QVALUE_MAX_TENTHS;
  const entries: string[] = [];

  for (const tag of splitLanguageList(prefs)) {
    entries.push(qvalueTenths === QVALUE_MAX_TENTHS ? tag : `${tag};q=0.${qvalueTenths}`);
    // q=0 would mean "not acceptable"
    if (qvalueTenths > QVALUE_DECREMENT_TENTHS) {
      qvalueTenths -= QVALUE_DECREMENT_TENTHS;
    }
  }

  return entries.join(',');
}
