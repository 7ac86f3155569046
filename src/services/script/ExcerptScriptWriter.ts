import { WorkItem } from '../pipeline/types.js';

/**
 * Turns a work item into narration text
 */
export interface ScriptWriter {
  write(item: WorkItem, signal?: AbortSignal): Promise<string>;
}

/**
 * Collapse whitespace and cut `text` to at most `maxChars` characters at a
 * word boundary, marking the cut with "...".
 */
export function excerpt(text: string, maxChars: number): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }

  const cut = normalized.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  const trimmed = (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).replace(/[\s,;:.]+$/, '');
  return `${trimmed}...`;
}

/**
 * Narration made of the headline followed by the opening of the article
 */
export class ExcerptScriptWriter implements ScriptWriter {
  constructor(private readonly maxChars: number) {}

  async write(item: WorkItem): Promise<string> {
    const title = item.title.replace(/\s+/g, ' ').trim();
    const lead = title && !/[.!?]$/.test(title) ? `${title}.` : title;
    return [lead, excerpt(item.text, this.maxChars)].filter(Boolean).join(' ');
  }
}
