import { journalOf } from './extract.js';
import type { PublicationType, RawPublication } from './types.js';

export interface ClassificationRule {
  name: string;
  apply: (pub: RawPublication) => PublicationType | undefined;
}

function mainTypeLabel(pub: RawPublication): string {
  return (pub.type?.label ?? '').toLowerCase();
}

function subTypeName(pub: RawPublication): string {
  return (pub.subType?.nameEng ?? '').toLowerCase();
}

// Order matters: journal detection must win over the book-chapter fallback.
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'journal',
    apply: (pub) => (mainTypeLabel(pub).includes('journal') || journalOf(pub) ? 'journal' : undefined),
  },
  {
    name: 'conference',
    apply: (pub) =>
      subTypeName(pub).includes('conference') || pub.conferencePublication === true ? 'conference' : undefined,
  },
  {
    name: 'book-chapter',
    apply: (pub) => {
      if (!mainTypeLabel(pub).includes('book')) return undefined;
      return subTypeName(pub).includes('conference') ? 'conference' : 'journal';
    },
  },
];

export const DEFAULT_PUBLICATION_TYPE: PublicationType = 'conference';

export function classifyPublication(
  pub: RawPublication,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): PublicationType {
  for (const rule of rules) {
    const type = rule.apply(pub);
    if (type) return type;
  }
  return DEFAULT_PUBLICATION_TYPE;
}
