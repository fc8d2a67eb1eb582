/**
 * Test Suite for DependencyGraphBuilder
 */

import { describe, it, expect } from 'vitest';
import type { FileLinks, Link } from '@/types/hyperlink';
import { buildDependencies, toRootRelative } from '../DependencyGraphBuilder';

const ROOT = '/corpus';
const A = '/corpus/a.docx';
const B = '/corpus/b.docx';
const C = '/corpus/sub/c.docx';

function link(text: string, rawHref: string, normalizedTarget: string, type: Link['type']): Link {
  return { text, rawHref, normalizedTarget, type };
}

describe('toRootRelative', () => {
  it.each([
    ['b.docx', 'b.docx'],
    ['/corpus/sub/c.docx', 'sub/c.docx'],
    ['sub\\c.docx', 'sub/c.docx'],
    ['/elsewhere/x.docx', '/elsewhere/x.docx'],
    ['C:\\Docs\\a.docx', 'C:/Docs/a.docx'],
  ])('should map %s to %s', (value, expected) => {
    expect(toRootRelative(value, ROOT)).toBe(expected);
  });

  it('should relate drive paths with Windows rules', () => {
    expect(toRootRelative('C:/Docs/Sub/a.docx', 'C:\\Docs')).toBe('Sub/a.docx');
  });
});

describe('buildDependencies', () => {
  const hub = 'https://contoso.sharepoint.com/sites/hub/C';
  const linkData: FileLinks[] = [
    {
      path: A,
      links: [
        link('Beta', 'b.docx', 'b.docx', 'internal'),
        link('C', hub, hub, 'document'),
        link('B', 'https://www.example.com/b', 'https://www.example.com/b', 'external'),
        link('A', 'a.docx', 'a.docx', 'internal'),
        link('b', './b.docx', 'b.docx', 'internal'),
      ],
    },
    { path: B, links: [], error: 'Failed to open document' },
    { path: C, links: [link('Alpha', '../a.docx', 'a.docx', 'internal')] },
    { path: '/corpus/unscanned.docx', links: [link('Beta', 'b.docx', 'b.docx', 'internal')] },
  ];

  it('should produce one record per scanned file with distinct counts and every detail', () => {
    expect(buildDependencies(ROOT, [A, B, C], linkData)).toEqual([
      {
        path: A,
        relativePath: 'a.docx',
        outgoingFiles: 2,
        incomingFiles: 1,
        outgoingDetails: [
          { text: 'Beta', href: 'b.docx', target: 'b.docx' },
          { text: 'C', href: hub, target: 'sub/c.docx' },
          { text: 'b', href: './b.docx', target: 'b.docx' },
        ],
        incomingDetails: [{ from: 'sub/c.docx', text: 'Alpha', href: '../a.docx' }],
      },
      {
        path: B,
        relativePath: 'b.docx',
        outgoingFiles: 0,
        incomingFiles: 1,
        outgoingDetails: [],
        incomingDetails: [
          { from: 'a.docx', text: 'Beta', href: 'b.docx' },
          { from: 'a.docx', text: 'b', href: './b.docx' },
        ],
      },
      {
        path: C,
        relativePath: 'sub/c.docx',
        outgoingFiles: 1,
        incomingFiles: 1,
        outgoingDetails: [{ text: 'Alpha', href: '../a.docx', target: 'a.docx' }],
        incomingDetails: [{ from: 'a.docx', text: 'C', href: hub }],
      },
    ]);
  });

  it('should link every file sharing a base name', () => {
    const twins = ['/corpus/x/plan.docx', '/corpus/y/Plan.docx'];
    const records = buildDependencies(ROOT, [A, ...twins], [
      { path: A, links: [link(' PLAN ', 'https://contoso.sharepoint.com/plan', 'https://contoso.sharepoint.com/plan', 'document')] },
    ]);

    expect(records.map((r) => [r.outgoingFiles, r.incomingFiles])).toEqual([
      [2, 0],
      [0, 1],
      [0, 1],
    ]);
  });

  it('should be empty-handed for files without links', () => {
    expect(buildDependencies(ROOT, [A], [])).toEqual([
      {
        path: A,
        relativePath: 'a.docx',
        outgoingFiles: 0,
        incomingFiles: 0,
        outgoingDetails: [],
        incomingDetails: [],
      },
    ]);
  });
});
