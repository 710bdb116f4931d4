import fs from 'fs/promises';
import path from 'path';

export interface MarkerPair {
  start: string;
  end: string;
}

export interface PatchOptions {
  markers: MarkerPair;
  closingIndent?: string;
}

export interface PatchResult {
  content: string;
  changed: boolean;
}

export class MarkerNotFoundError extends Error {
  code = 'MARKERS_NOT_FOUND';
  constructor(public readonly markers: MarkerPair) {
    super(`Could not find publication markers. Looking for: ${markers.start} ... ${markers.end}`);
    this.name = 'MarkerNotFoundError';
  }
}

export class DuplicateMarkersError extends Error {
  code = 'DUPLICATE_MARKERS';
  constructor(public readonly markers: MarkerPair) {
    super(`Found more than one marker pair: ${markers.start} ... ${markers.end}`);
    this.name = 'DuplicateMarkersError';
  }
}

/**
 * Replaces the marker pair and everything between them with the fragment,
 * writing both markers back around it. Exactly one pair must be present.
 */
export function patchDocument(text: string, fragment: string, opts: PatchOptions): PatchResult {
  const { markers, closingIndent = ' '.repeat(8) } = opts;

  const start = text.indexOf(markers.start);
  const end = start === -1 ? -1 : text.indexOf(markers.end, start + markers.start.length);
  if (start === -1 || end === -1) {
    throw new MarkerNotFoundError(markers);
  }

  const after = end + markers.end.length;
  const nextStart = text.indexOf(markers.start, after);
  if (nextStart !== -1 && text.indexOf(markers.end, nextStart + markers.start.length) !== -1) {
    throw new DuplicateMarkersError(markers);
  }

  const replacement = `${markers.start}\n${fragment}\n${closingIndent}${markers.end}`;
  const content = text.slice(0, start) + replacement + text.slice(after);
  return { content, changed: content !== text };
}

/**
 * Patches the document on disk. Nothing is written unless the whole
 * replacement succeeded and changed something; the new content goes to a
 * sibling temp file first and is renamed over the target. A symlinked
 * document is written through to its target, and its permission bits are kept.
 */
export async function updateDocumentFile(filePath: string, fragment: string, opts: PatchOptions): Promise<boolean> {
  const targetPath = await fs.realpath(filePath);
  const text = await fs.readFile(targetPath, 'utf-8');
  const { content, changed } = patchDocument(text, fragment, opts);
  if (!changed) return false;

  const { mode } = await fs.stat(targetPath);
  const tempPath = path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.${process.pid}.tmp`);
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.chmod(tempPath, mode & 0o7777);
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
  return true;
}
