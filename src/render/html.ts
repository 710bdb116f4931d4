import type { NormalizedPublication, PublicationType } from '../mtmt/types.js';
import { escapeHtml } from './escape.js';
import type { YearGroup } from './group.js';

export const DEFAULT_INDENT = ' '.repeat(12);
const STEP = '    ';

export interface RenderOptions {
  indent?: string;
}

const BADGES: Record<PublicationType, { className: string; label: string }> = {
  journal: { className: 'badge-journal', label: 'Journal' },
  conference: { className: 'badge-conference', label: 'Conference' },
};

export function renderTitle(pub: NormalizedPublication): string {
  if (!pub.link) return pub.title;
  return `<a href="${escapeHtml(pub.link)}" target="_blank" rel="noopener">${pub.title}</a>`;
}

export function renderMeta(pub: NormalizedPublication): string[] {
  const badge = BADGES[pub.type];
  const meta = [`<span class="pub-badge ${badge.className}">${badge.label}</span>`];
  if (pub.publisher) {
    meta.push(`<span>${pub.publisher}</span>`);
  }
  if (pub.citations > 0) {
    meta.push(`<span class="badge-citations">Cited by ${pub.citations}</span>`);
  }
  return meta;
}

function renderPublication(pub: NormalizedPublication, indent: string): string[] {
  const item = indent + STEP;
  const field = item + STEP;
  const inner = field + STEP;

  return [
    `${item}<div class="pub-item">`,
    `${field}<div class="pub-title">`,
    `${inner}${renderTitle(pub)}`,
    `${field}</div>`,
    `${field}<div class="pub-authors">${pub.authors}</div>`,
    `${field}<div class="pub-venue">${pub.venue}</div>`,
    `${field}<div class="pub-meta">`,
    ...renderMeta(pub).map((meta) => `${inner}${meta}`),
    `${field}</div>`,
    `${item}</div>`,
    '',
  ];
}

/**
 * Renders the year groups as the HTML block that sits between the markers.
 * Titles, authors and venues arrive already escaped from normalization.
 */
export function renderPublications(groups: readonly YearGroup[], opts: RenderOptions = {}): string {
  const { indent = DEFAULT_INDENT } = opts;
  const lines: string[] = [];

  for (const group of groups) {
    lines.push(`${indent}<div class="year-group">`);
    lines.push(`${indent}${STEP}<div class="year-label">${group.year}</div>`);
    lines.push('');

    for (const pub of group.publications) {
      lines.push(...renderPublication(pub, indent));
    }

    lines.push(`${indent}</div>`);
    lines.push('');
  }

  return lines.join('\n');
}
