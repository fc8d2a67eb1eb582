/**
 * Views over WordprocessingML elements
 *
 * Each wrapper holds a live reference into the parsed document tree, so text
 * and relationship-id writes land directly in what DocxDocument.save() writes.
 */

import {
  type XmlElement,
  childElements,
  descendants,
  setTextContent,
  textContent,
} from './xml/OrderedXml';

// Text boxes carry their own paragraphs; they are not part of the host paragraph
const NESTED_CONTENT = ['w:p', 'w:txbxContent'];

/** A literal `w:t` text node */
export class TextNode {
  constructor(private readonly element: XmlElement) {}

  getText(): string {
    return textContent(this.element);
  }

  setText(value: string): void {
    setTextContent(this.element, value);
    if (value !== value.trim()) {
      this.element.attributes['xml:space'] = 'preserve';
    }
  }
}

function textNodesUnder(element: XmlElement): TextNode[] {
  return descendants(element, 'w:t', NESTED_CONTENT).map((el) => new TextNode(el));
}

function joinText(nodes: TextNode[]): string {
  return nodes.map((node) => node.getText()).join('');
}

export class RunNode {
  constructor(private readonly element: XmlElement) {}

  textNodes(): TextNode[] {
    return textNodesUnder(this.element);
  }

  getText(): string {
    return joinText(this.textNodes());
  }
}

/** `w:hyperlink` whose target lives in the part's relationship table */
export class HyperlinkNode {
  constructor(private readonly element: XmlElement) {}

  getRelationshipId(): string | undefined {
    return this.element.attributes['r:id'];
  }

  setRelationshipId(id: string): void {
    this.element.attributes['r:id'] = id;
  }

  textNodes(): TextNode[] {
    return textNodesUnder(this.element);
  }

  getText(): string {
    return joinText(this.textNodes());
  }
}

/**
 * Field instruction: either a `w:instrText` node of a complex field or the
 * `w:instr` attribute of a `w:fldSimple`.
 */
export class FieldInstruction {
  constructor(
    private readonly element: XmlElement,
    readonly kind: 'complex' | 'simple'
  ) {}

  getInstruction(): string {
    return this.kind === 'complex'
      ? textContent(this.element)
      : (this.element.attributes['w:instr'] ?? '');
  }

  setInstruction(value: string): void {
    if (this.kind === 'complex') {
      setTextContent(this.element, value);
    } else {
      this.element.attributes['w:instr'] = value;
    }
  }

  isHyperlink(): boolean {
    return this.getInstruction().includes('HYPERLINK');
  }
}

export class ParagraphNode {
  constructor(private readonly element: XmlElement) {}

  /** Every literal text node, including text inside hyperlinks and fields */
  textNodes(): TextNode[] {
    return textNodesUnder(this.element);
  }

  getText(): string {
    return joinText(this.textNodes());
  }

  /** Runs outside hyperlinks: direct runs plus runs of simple fields */
  readRuns(): RunNode[] {
    const runs: RunNode[] = [];
    for (const child of childElements(this.element)) {
      if (child.name === 'w:r') {
        runs.push(new RunNode(child));
      } else if (child.name === 'w:fldSimple') {
        runs.push(...childElements(child, 'w:r').map((run) => new RunNode(run)));
      }
    }
    return runs;
  }

  hyperlinks(): HyperlinkNode[] {
    return childElements(this.element, 'w:hyperlink').map((el) => new HyperlinkNode(el));
  }

  fieldInstructions(): FieldInstruction[] {
    const complex = descendants(this.element, 'w:instrText', NESTED_CONTENT).map(
      (el) => new FieldInstruction(el, 'complex')
    );
    const simple = descendants(this.element, 'w:fldSimple', NESTED_CONTENT).map(
      (el) => new FieldInstruction(el, 'simple')
    );
    return [...complex, ...simple];
  }
}

export class TableCellNode {
  constructor(private readonly element: XmlElement) {}

  paragraphs(): ParagraphNode[] {
    return childElements(this.element, 'w:p').map((el) => new ParagraphNode(el));
  }

  tables(): TableNode[] {
    return childElements(this.element, 'w:tbl').map((el) => new TableNode(el));
  }
}

export class TableRowNode {
  constructor(private readonly element: XmlElement) {}

  /** Physical cells; a horizontally merged cell appears once */
  cells(): TableCellNode[] {
    return childElements(this.element, 'w:tc').map((el) => new TableCellNode(el));
  }
}

export class TableNode {
  constructor(private readonly element: XmlElement) {}

  rows(): TableRowNode[] {
    return childElements(this.element, 'w:tr').map((el) => new TableRowNode(el));
  }

  /** Cell paragraphs in row order, descending into nested tables */
  allParagraphs(): ParagraphNode[] {
    const result: ParagraphNode[] = [];
    for (const row of this.rows()) {
      for (const cell of row.cells()) {
        result.push(...cell.paragraphs());
        for (const nested of cell.tables()) {
          result.push(...nested.allParagraphs());
        }
      }
    }
    return result;
  }
}
