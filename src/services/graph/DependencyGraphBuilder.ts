/**
 * DependencyGraphBuilder - directed document graph from internal links
 *
 * Nodes are the scanned files; an edge source -> target exists when a link of
 * type `internal` or `document` in the source resolves to the target, either
 * by its normalised target path or by its display text equalling the target's
 * file name without extension. The graph is rebuilt on every call.
 */

import * as path from 'path';
import type { DependencyRecord, FileRecord, IncomingDetail, OutgoingDetail } from '@/types/dependency';
import type { FileLinks, Link } from '@/types/hyperlink';
import { logger } from '@/utils/logger';
import { baseNameKey, isDrivePath, relativeTo, toPosix } from '@/utils/pathUtils';

const log = logger.namespace('DependencyGraphBuilder');

const EDGE_TYPES: ReadonlySet<Link['type']> = new Set(['internal', 'document']);

/**
 * Express a normalised link target relative to the scan root when it lies
 * inside it; anything else comes back unchanged (forward slashes).
 */
export function toRootRelative(normalized: string, root: string): string {
  const value = toPosix(normalized);
  const valueHasDrive = isDrivePath(value);
  if (process.platform !== 'win32' && valueHasDrive !== isDrivePath(root)) {
    return value;
  }
  const flavour = valueHasDrive ? path.win32 : path;

  const relative = flavour.relative(flavour.resolve(root), flavour.resolve(root, value));
  if (relative && !relative.startsWith('..') && !flavour.isAbsolute(relative)) {
    return toPosix(relative);
  }
  return value;
}

class DependencyGraph {
  private readonly byPath = new Map<string, FileRecord>();
  private readonly byBaseName = new Map<string, number[]>();
  private readonly records: FileRecord[] = [];
  private readonly outgoing = new Map<number, Set<number>>();
  private readonly incoming = new Map<number, Set<number>>();
  private readonly outgoingDetails = new Map<number, OutgoingDetail[]>();
  private readonly incomingDetails = new Map<number, IncomingDetail[]>();

  constructor(private readonly root: string, files: string[]) {
    files.forEach((absolutePath, index) => {
      const record: FileRecord = {
        id: index + 1,
        absolutePath,
        relativePath: relativeTo(root, absolutePath),
        baseName: baseNameKey(absolutePath),
      };
      this.records.push(record);
      this.byPath.set(absolutePath, record);

      const sameName = this.byBaseName.get(record.baseName) ?? [];
      sameName.push(record.id);
      this.byBaseName.set(record.baseName, sameName);

      this.outgoing.set(record.id, new Set());
      this.incoming.set(record.id, new Set());
      this.outgoingDetails.set(record.id, []);
      this.incomingDetails.set(record.id, []);
    });
  }

  private matchTargets(link: Link): Set<number> {
    const matches = new Set<number>();

    if (link.normalizedTarget) {
      const candidate = toRootRelative(link.normalizedTarget, this.root);
      for (const record of this.records) {
        if (record.relativePath === candidate) {
          matches.add(record.id);
        }
      }
    }

    const text = link.text.trim().toLowerCase();
    if (text) {
      for (const id of this.byBaseName.get(text) ?? []) {
        matches.add(id);
      }
    }
    return matches;
  }

  addLinks(entry: FileLinks): void {
    const source = this.byPath.get(entry.path);
    if (!source) {
      log.debug(`Ignoring links from unscanned file ${entry.path}`);
      return;
    }

    for (const link of entry.links) {
      if (!EDGE_TYPES.has(link.type)) continue;

      for (const targetId of this.matchTargets(link)) {
        if (targetId === source.id) continue;
        const target = this.records[targetId - 1];

        this.outgoing.get(source.id)?.add(targetId);
        this.outgoingDetails.get(source.id)?.push({
          text: link.text,
          href: link.rawHref,
          target: target.relativePath,
        });
        this.incoming.get(targetId)?.add(source.id);
        this.incomingDetails.get(targetId)?.push({
          from: source.relativePath,
          text: link.text,
          href: link.rawHref,
        });
      }
    }
  }

  toRecords(): DependencyRecord[] {
    return this.records.map((record) => ({
      path: record.absolutePath,
      relativePath: record.relativePath,
      outgoingFiles: this.outgoing.get(record.id)?.size ?? 0,
      incomingFiles: this.incoming.get(record.id)?.size ?? 0,
      outgoingDetails: this.outgoingDetails.get(record.id) ?? [],
      incomingDetails: this.incomingDetails.get(record.id) ?? [],
    }));
  }
}

/**
 * One record per file, in `files` order
 *
 * @param linkData - extraction results; entries for paths not in `files` are ignored
 */
export function buildDependencies(root: string, files: string[], linkData: FileLinks[]): DependencyRecord[] {
  const graph = new DependencyGraph(root, files);
  for (const entry of linkData) {
    graph.addLinks(entry);
  }
  return graph.toRecords();
}
