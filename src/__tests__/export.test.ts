import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  edgesToCsv,
  escapeCsvField,
  exportToCsv,
  nodesToCsv,
} from '../export/csv-export.js';
import { filterText, normalizeNodeText } from '../export/text-encoding.js';
import { renderTree } from '../export/render.js';
import { videoNode } from './test-helpers.js';

const crawl = [
  videoNode('a', 0, 0, ['b', 'c'], { title: 'Intro, part 1' }),
  videoNode('b', 1, 0),
  videoNode('c', 1, 1, [], { description: 'Said "hi"\nthen left' }),
];

describe('export/csv-export', () => {
  describe('escapeCsvField', () => {
    it('leaves plain fields alone', () => {
      expect(escapeCsvField('plain text')).toBe('plain text');
      expect(escapeCsvField(3)).toBe('3');
    });

    it('quotes fields with delimiters, quotes or line breaks', () => {
      expect(escapeCsvField('a,b')).toBe('"a,b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField('one\ntwo')).toBe('"one\ntwo"');
    });
  });

  it('writes one row per node in traversal order', () => {
    expect(nodesToCsv(crawl)).toBe(
      'depth,rank,videoId,title,channelId,channelTitle,publishedAt,description,relatedVideos\n' +
        '0,0,a,"Intro, part 1",chan-1,Channel One,2024-01-01T00:00:00Z,,b|c\n' +
        '1,0,b,Video b,chan-1,Channel One,2024-01-01T00:00:00Z,,\n' +
        '1,1,c,Video c,chan-1,Channel One,2024-01-01T00:00:00Z,"Said ""hi""\nthen left",\n'
    );
  });

  it('writes one row per parent-child edge', () => {
    expect(edgesToCsv(crawl)).toBe('source,target,rank\na,b,0\na,c,1\n');
  });

  it('writes only headers for an empty crawl', () => {
    expect(edgesToCsv([])).toBe('source,target,rank\n');
  });

  describe('exportToCsv', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'tube-trail-export-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('creates the output directory and returns the written paths', () => {
      const outputDir = join(dir, 'out');
      const files = exportToCsv(crawl, outputDir);

      expect(files).toEqual([join(outputDir, 'videos.csv'), join(outputDir, 'edges.csv')]);
      expect(readFileSync(files[0], 'utf-8')).toBe(nodesToCsv(crawl));
      expect(readFileSync(files[1], 'utf-8')).toBe('source,target,rank\na,b,0\na,c,1\n');
    });
  });
});

describe('export/text-encoding', () => {
  describe('filterText', () => {
    it('composes text under utf-8', () => {
      expect(filterText('Café', 'utf-8')).toBe('Café');
      expect(filterText('東京 ok', 'utf-8')).toBe('東京 ok');
    });

    it('drops non-ASCII characters under ascii', () => {
      expect(filterText('Café “live”', 'ascii')).toBe('Caf live');
    });

    it('transliterates under smart before dropping the rest', () => {
      expect(filterText('“Café” – naïve…', 'smart')).toBe('"Cafe" - naive...');
      expect(filterText('Straße Œuvre', 'smart')).toBe('Strasse OEuvre');
      expect(filterText('東京 ok', 'smart')).toBe(' ok');
    });
  });

  it('re-encodes every text field of a node', () => {
    const [node] = normalizeNodeText(
      [videoNode('x', 2, 1, ['y'], { title: 'Résumé', channelTitle: 'Zoë' })],
      'smart'
    );

    expect(node).toEqual({
      id: 'x',
      title: 'Resume',
      description: '',
      channelId: 'chan-1',
      channelTitle: 'Zoe',
      publishedAt: '2024-01-01T00:00:00Z',
      depth: 2,
      rank: 1,
      relatedIds: ['y'],
    });
  });
});

describe('export/render', () => {
  it('indents each node by its depth', () => {
    expect(renderTree(crawl)).toBe(
      [
        'Depth: 0, Rank: 0, ID: a',
        '    Title: Intro, part 1',
        '    Related Videos: b, c',
        '    Depth: 1, Rank: 0, ID: b',
        '        Title: Video b',
        '        Related Videos: -',
        '    Depth: 1, Rank: 1, ID: c',
        '        Title: Video c',
        '        Related Videos: -',
      ].join('\n')
    );
  });

  it('renders an empty crawl as an empty string', () => {
    expect(renderTree([])).toBe('');
  });
});
