import { createHash } from 'node:crypto';

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&amp;': '&',
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:nbsp|lt|gt|quot|#39|amp);/g, entity => ENTITIES[entity] ?? entity);
}

/** Remove markup and decode the common entities, leaving the visible text */
export function stripHtml(html: string): string {
  const withoutMarkup = html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(style|script)\b[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<[^>]+>/g, '');
  return decodeEntities(withoutMarkup);
}

/** Like stripHtml, but images are replaced by their source filename */
export function stripHtmlPreservingMedia(html: string): string {
  return stripHtml(html.replace(/<img[^>]*?src=["']?([^"'>\s]+)["']?[^>]*>/gi, ' $1 '));
}

/**
 * Note checksum (notes.csum):
 * integer representation of first 8 digits of SHA-1 hash of the sort field,
 * with HTML stripped. Anki uses it for duplicate checking.
 */
export function fieldChecksum(sortField: string): number {
  const hex = createHash('sha1').update(stripHtmlPreservingMedia(sortField), 'utf8').digest('hex');
  return parseInt(hex.slice(0, 8), 16);
}
