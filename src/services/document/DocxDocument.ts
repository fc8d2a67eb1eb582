/**
 * DocxDocument - structured access to a .docx package
 *
 * Loads the package with JSZip, parses the main document part, its
 * relationship table and settings with fast-xml-parser, and exposes the
 * capabilities the link and text engines need:
 * - readParagraphs / readTables (tables expose rows -> cells -> paragraphs)
 * - readRuns and text-node writes via ParagraphNode/TextNode
 * - readRelationships / createRelationship for hyperlink targets
 * - hasSetting for the presence of settings such as trackRevisions
 * - save back to disk
 *
 * A handle belongs to the call that opened it and is never shared.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import {
  DocumentOpenError,
  DocumentParseError,
  DocumentSaveError,
  MutationError,
} from '@/types/errors';
import { logger } from '@/utils/logger';
import { ParagraphNode, TableNode } from './DocumentNodes';
import {
  type XmlElement,
  type XmlNode,
  buildXml,
  childElements,
  createElement,
  firstChild,
  parseXml,
  rootElement,
} from './xml/OrderedXml';

const log = logger.namespace('DocxDocument');

const REL_BASE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
export const RELATIONSHIP_TYPES = {
  officeDocument: `${REL_BASE}/officeDocument`,
  hyperlink: `${REL_BASE}/hyperlink`,
  settings: `${REL_BASE}/settings`,
} as const;

const PACKAGE_RELS_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

export type RelationshipKind = keyof typeof RELATIONSHIP_TYPES;

export interface Relationship {
  id: string;
  type: string;
  target: string;
  /** TargetMode="External" */
  external: boolean;
}

interface XmlPart {
  name: string;
  nodes: XmlNode[];
}

function relsPartFor(partName: string): string {
  const dir = path.posix.dirname(partName);
  const file = path.posix.basename(partName);
  return dir === '.' ? `_rels/${file}.rels` : `${dir}/_rels/${file}.rels`;
}

function toRelationship(element: XmlElement): Relationship {
  return {
    id: element.attributes.Id ?? '',
    type: element.attributes.Type ?? '',
    target: element.attributes.Target ?? '',
    external: element.attributes.TargetMode === 'External',
  };
}

/** Internal relationship targets are relative to the source part's folder unless rooted */
function resolvePartTarget(sourcePart: string, target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return path.posix.normalize(path.posix.join(path.posix.dirname(sourcePart), target));
}

async function readPart(zip: JSZip, name: string): Promise<XmlPart | null> {
  const file = zip.file(name);
  if (!file) {
    return null;
  }
  const content = await file.async('string');
  try {
    return { name, nodes: parseXml(content) };
  } catch (error) {
    throw new DocumentParseError(name, error);
  }
}

function relationshipsOf(part: XmlPart | null): XmlElement[] {
  if (!part) return [];
  const root = rootElement(part.nodes, 'Relationships');
  return root ? childElements(root, 'Relationship') : [];
}

export class DocxDocument {
  private constructor(
    readonly filePath: string,
    private readonly zip: JSZip,
    private readonly main: XmlPart,
    private readonly body: XmlElement,
    private rels: XmlPart | null,
    private readonly relsName: string,
    private readonly settings: XmlPart | null
  ) {}

  /**
   * Open a document from disk
   *
   * @throws DocumentOpenError when the file is unreadable or not a zip package
   * @throws DocumentParseError when the main document part is missing or malformed
   */
  static async open(filePath: string): Promise<DocxDocument> {
    let zip: JSZip;
    try {
      const buffer = await fs.readFile(filePath);
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      throw new DocumentOpenError(filePath, error);
    }

    const packageRels = relationshipsOf(await readPart(zip, '_rels/.rels')).map(toRelationship);
    const officeDocument = packageRels.find((rel) => rel.type === RELATIONSHIP_TYPES.officeDocument);
    const mainName = officeDocument ? officeDocument.target.replace(/^\//, '') : 'word/document.xml';

    const main = await readPart(zip, mainName);
    if (!main) {
      throw new DocumentParseError(mainName, new Error('part not found in package'));
    }
    const documentRoot = rootElement(main.nodes, 'w:document');
    const body = documentRoot ? firstChild(documentRoot, 'w:body') : undefined;
    if (!body) {
      throw new DocumentParseError(mainName, new Error('missing <w:body>'));
    }

    const relsName = relsPartFor(mainName);
    const rels = await readPart(zip, relsName);

    const settingsRel = relationshipsOf(rels)
      .map(toRelationship)
      .find((rel) => rel.type === RELATIONSHIP_TYPES.settings);
    const settingsName = resolvePartTarget(mainName, settingsRel ? settingsRel.target : 'settings.xml');
    const settings = await readPart(zip, settingsName);

    log.debug(`Opened ${filePath} (main part ${mainName})`);
    return new DocxDocument(filePath, zip, main, body, rels, relsName, settings);
  }

  /** Top-level body paragraphs */
  readParagraphs(): ParagraphNode[] {
    return childElements(this.body, 'w:p').map((el) => new ParagraphNode(el));
  }

  /** Top-level body tables */
  readTables(): TableNode[] {
    return childElements(this.body, 'w:tbl').map((el) => new TableNode(el));
  }

  /** Body paragraphs followed by every table-cell paragraph (nested tables included) */
  allParagraphs(): ParagraphNode[] {
    const paragraphs = this.readParagraphs();
    for (const table of this.readTables()) {
      paragraphs.push(...table.allParagraphs());
    }
    return paragraphs;
  }

  readRelationships(kind: RelationshipKind = 'hyperlink'): Relationship[] {
    const type = RELATIONSHIP_TYPES[kind];
    return relationshipsOf(this.rels)
      .map(toRelationship)
      .filter((rel) => rel.type === type);
  }

  getRelationship(id: string): Relationship | undefined {
    return relationshipsOf(this.rels)
      .map(toRelationship)
      .find((rel) => rel.id === id);
  }

  /**
   * Add a hyperlink relationship and return its new id
   *
   * @throws MutationError when the target is empty
   */
  createRelationship(target: string, external: boolean): string {
    if (target.trim() === '') {
      throw new MutationError('Hyperlink target must not be empty', { target });
    }

    if (!this.rels) {
      this.rels = {
        name: this.relsName,
        nodes: [createElement('Relationships', { xmlns: PACKAGE_RELS_NS })],
      };
    }
    const root = rootElement(this.rels.nodes, 'Relationships');
    if (!root) {
      throw new MutationError(`${this.relsName} has no <Relationships> root`);
    }

    const used = childElements(root, 'Relationship').map((el) => el.attributes.Id ?? '');
    let next = 1;
    for (const id of used) {
      const match = /^rId(\d+)$/.exec(id);
      if (match) {
        next = Math.max(next, Number(match[1]) + 1);
      }
    }
    const id = `rId${next}`;

    const attributes: Record<string, string> = {
      Id: id,
      Type: RELATIONSHIP_TYPES.hyperlink,
      Target: target,
    };
    if (external) {
      attributes.TargetMode = 'External';
    }
    root.children.push(createElement('Relationship', attributes));
    return id;
  }

  /**
   * Whether a setting element is present; its w:val is not consulted
   */
  hasSetting(name: string): boolean {
    if (!this.settings) return false;
    const root = rootElement(this.settings.nodes, 'w:settings');
    return root !== undefined && firstChild(root, `w:${name}`) !== undefined;
  }

  /**
   * Write the package to disk (the original location by default)
   *
   * @throws DocumentSaveError on serialisation or I/O failure
   */
  async save(targetPath: string = this.filePath): Promise<void> {
    try {
      this.zip.file(this.main.name, serializePart(this.main));
      if (this.rels) {
        this.zip.file(this.rels.name, serializePart(this.rels));
      }
      const buffer = await this.zip.generateAsync({
        type: 'nodebuffer',
        compression: 'DEFLATE',
        compressionOptions: { level: 6 },
      });
      await fs.writeFile(targetPath, buffer);
      log.debug(`Saved ${targetPath}`);
    } catch (error) {
      throw new DocumentSaveError(targetPath, error);
    }
  }
}

function serializePart(part: XmlPart): string {
  const xml = buildXml(part.nodes);
  return xml.startsWith('<?xml') ? xml : XML_DECLARATION + xml;
}
