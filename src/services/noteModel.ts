export type InlineStyle =
  | "bold"
  | "italic"
  | "strike"
  | "underline"
  | "superscript"
  | "subscript"
  | "highlight"
  | "color"
  | "fontFamily"
  | "fontSize";

export type StyleAttributes = {
  color?: string;
  highlight?: string;
  fontFamily?: string;
  fontSize?: string;
};

export type Alignment = "left" | "center" | "right";
export type ListKind = "bullet" | "numbered" | "checkbox";

export type TextNode = { kind: "text"; text: string };
export type LineBreakNode = { kind: "lineBreak" };
export type DividerNode = { kind: "divider" };

export type StyledNode = {
  kind: "styled";
  styles: ReadonlySet<InlineStyle>;
  attributes: StyleAttributes;
  linkColor: boolean;
  children: DocumentNode[];
};

export type LinkNode = {
  kind: "link";
  href: string;
  preview: boolean;
  children: DocumentNode[];
};

export type ListItemNode = {
  kind: "listItem";
  depth: number;
  checked?: boolean;
  children: DocumentNode[];
};

export type ListNode = {
  kind: "list";
  listKind: ListKind;
  depth: number;
  items: ListItemNode[];
};

export type TableCellNode = {
  kind: "tableCell";
  rowSpan: number;
  colSpan: number;
  align?: Alignment;
  header: boolean;
  children: DocumentNode[];
};

export type TableNode = {
  kind: "table";
  rows: TableCellNode[][];
  nested: boolean;
};

export type QuoteNode = { kind: "quote"; children: DocumentNode[] };
export type CodeBlockNode = { kind: "codeBlock"; language: string; literal: string };
export type CodeSpanNode = { kind: "codeSpan"; literal: string };

export type ResourceView = "inline" | "attachment" | "preview";
export type ImageAlignment = "center" | "right" | "fullWidth";

export type ResourceNode = {
  kind: "resource";
  hash: string;
  mime: string;
  width?: string;
  height?: string;
  view: ResourceView;
  align?: ImageAlignment;
};

export type ImageNode = { kind: "image"; src: string; alt: string; title: string };

export type HeadingNode = { kind: "heading"; level: number; children: DocumentNode[] };

export type ParagraphNode = {
  kind: "paragraph";
  align?: Alignment;
  indent: number;
  children: DocumentNode[];
};

export type CheckboxNode = { kind: "checkbox"; checked: boolean };
export type TaskGroupNode = { kind: "taskGroup"; groupId: string };
export type TableOfContentsNode = { kind: "tableOfContents" };

export type ForeignNode = {
  kind: "foreign";
  reason: "encrypted" | "htmlContent";
  html: string;
  children: DocumentNode[];
};

export type OpaqueNode = { kind: "opaque"; tag: string; html: string };

export type RootNode = { kind: "root"; children: DocumentNode[] };

export type DocumentNode =
  | TextNode
  | LineBreakNode
  | DividerNode
  | StyledNode
  | LinkNode
  | ListNode
  | ListItemNode
  | TableNode
  | TableCellNode
  | QuoteNode
  | CodeBlockNode
  | CodeSpanNode
  | ResourceNode
  | ImageNode
  | HeadingNode
  | ParagraphNode
  | CheckboxNode
  | TaskGroupNode
  | TableOfContentsNode
  | ForeignNode
  | OpaqueNode;

export const BLOCK_KINDS: ReadonlySet<DocumentNode["kind"]> = new Set([
  "paragraph",
  "heading",
  "list",
  "table",
  "quote",
  "codeBlock",
  "divider",
  "taskGroup",
  "tableOfContents",
  "foreign",
]);

export const isBlock = (node: DocumentNode) => BLOCK_KINDS.has(node.kind);

export const childrenOf = (node: DocumentNode | RootNode): DocumentNode[] => {
  switch (node.kind) {
    case "root":
    case "styled":
    case "link":
    case "listItem":
    case "tableCell":
    case "quote":
    case "heading":
    case "paragraph":
    case "foreign":
      return node.children;
    case "list":
      return node.items;
    case "table":
      return node.rows.flat();
    default:
      return [];
  }
};

export const walkNodes = (
  node: DocumentNode | RootNode,
  visit: (node: DocumentNode, parents: Array<DocumentNode | RootNode>) => void,
  parents: Array<DocumentNode | RootNode> = []
) => {
  const path = [...parents, node];
  for (const child of childrenOf(node)) {
    visit(child, path);
    walkNodes(child, visit, path);
  }
};

export const plainText = (nodes: DocumentNode[]): string =>
  nodes
    .map((node) => {
      switch (node.kind) {
        case "text":
          return node.text;
        case "lineBreak":
          return "\n";
        case "codeSpan":
        case "codeBlock":
          return node.literal;
        default:
          return plainText(childrenOf(node));
      }
    })
    .join("");
