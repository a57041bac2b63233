/**
 * Text re-encoding for exported and rendered fields
 */
import type { TextEncoding } from '../config/options.js';
import type { VideoNode } from '../youtube/types.js';

/** Typographic characters with a plain ASCII spelling. */
const SMART_REPLACEMENTS: Record<string, string> = {
  '‘': "'",
  '’': "'",
  '‚': "'",
  '′': "'",
  '“': '"',
  '”': '"',
  '„': '"',
  '″': '"',
  '«': '"',
  '»': '"',
  '–': '-',
  '—': '-',
  '―': '-',
  '−': '-',
  '…': '...',
  '\u00a0': ' ',
  '•': '*',
  'ß': 'ss',
  'æ': 'ae',
  'Æ': 'AE',
  'œ': 'oe',
  'Œ': 'OE',
  'ø': 'o',
  'Ø': 'O',
  'ł': 'l',
  'Ł': 'L',
  'đ': 'd',
  'Đ': 'D',
  'ð': 'd',
  'þ': 'th',
  'Þ': 'Th',
};

const SMART_PATTERN = new RegExp(`[${Object.keys(SMART_REPLACEMENTS).join('')}]`, 'g');
const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NON_ASCII = /[^\x00-\x7f]/g;

/**
 * Re-encode `text`:
 * - `utf-8`: unchanged apart from NFC composition
 * - `ascii`: every non-ASCII character dropped
 * - `smart`: typographic punctuation and accented letters mapped to ASCII
 *   first, then whatever has no ASCII spelling dropped
 */
export function filterText(text: string, encoding: TextEncoding): string {
  switch (encoding) {
    case 'utf-8':
      return text.normalize('NFC');
    case 'ascii':
      return text.replace(NON_ASCII, '');
    case 'smart':
      return text
        .replace(SMART_PATTERN, (ch) => SMART_REPLACEMENTS[ch] ?? '')
        .normalize('NFKD')
        .replace(COMBINING_MARKS, '')
        .replace(NON_ASCII, '');
  }
}

/** Copy of each node with every string field re-encoded. */
export function normalizeNodeText(
  nodes: readonly VideoNode[],
  encoding: TextEncoding
): VideoNode[] {
  return nodes.map((node) => ({
    ...node,
    id: filterText(node.id, encoding),
    title: filterText(node.title, encoding),
    description: filterText(node.description, encoding),
    channelId: filterText(node.channelId, encoding),
    channelTitle: filterText(node.channelTitle, encoding),
    publishedAt: filterText(node.publishedAt, encoding),
  }));
}
