import { bookOf, extractDoi } from './extract.js';
import type { PublisherLabel, RawPublication } from './types.js';

export interface PublisherRule {
  name: string;
  /** `undefined` means "no opinion"; an empty label is a definite answer. */
  apply: (pub: RawPublication) => PublisherLabel | undefined;
}

function doiRule(name: string, prefixes: string[], label: PublisherLabel): PublisherRule {
  return {
    name,
    apply: (pub) => {
      const doi = extractDoi(pub);
      return prefixes.some((prefix) => doi.includes(prefix)) ? label : undefined;
    },
  };
}

export const PUBLISHER_RULES: readonly PublisherRule[] = [
  {
    name: 'book-place',
    apply: (pub) => {
      const place = bookOf(pub)?.publishedAt?.[0];
      return place?.label?.includes('Piscataway') ? 'IEEE' : undefined;
    },
  },
  {
    name: 'identifier-url',
    apply: (pub) => {
      for (const ident of pub.identifiers ?? []) {
        const url = ident.realUrl ?? '';
        if (url.includes('ieeexplore')) return 'IEEE';
        if (url.includes('springer')) return 'Springer';
      }
      return undefined;
    },
  },
  doiRule('doi-ieee', ['10.1109', '10.23919'], 'IEEE'),
  doiRule('doi-springer', ['10.1007'], 'Springer'),
  // Suppressed on purpose, not "unknown".
  doiRule('doi-suppressed', ['10.36244'], ''),
];

export function inferPublisher(
  pub: RawPublication,
  rules: readonly PublisherRule[] = PUBLISHER_RULES
): PublisherLabel {
  for (const rule of rules) {
    const label = rule.apply(pub);
    if (label !== undefined) return label;
  }
  return '';
}
