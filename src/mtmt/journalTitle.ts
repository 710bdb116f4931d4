const ISSN_RUN = /\s+\d{4}-\d{3}[\dXx](\s+\d{4}-\d{3}[\dXx])*/g;

/**
 * Upper-cases the first letter of every run of letters and lower-cases the rest,
 * so "IEEE ACCESS" becomes "Ieee Access" and "3D" stays "3D".
 */
export function toTitleCase(text: string): string {
  return text.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Cleans a journal title as MTMT reports it: trailing ISSNs ("2061-2079 2061-2125")
 * are dropped and all-caps titles longer than five characters are title-cased.
 * Only journal titles go through here; book titles are used as they are.
 */
export function cleanJournalTitle(rawTitle: string): string {
  const cleaned = rawTitle.replace(ISSN_RUN, '').trim();

  if (cleaned === cleaned.toUpperCase() && cleaned.length > 5) {
    return toTitleCase(cleaned);
  }
  return cleaned;
}
