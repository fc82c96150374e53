/** Atlassian Document Format, reduced to what plain-text comments need. */

export interface TextNode {
  type: "text";
  text: string;
}

export interface ParagraphNode {
  type: "paragraph";
  content: TextNode[];
}

export interface TextDocument {
  type: "doc";
  version: 1;
  content: ParagraphNode[];
}

export function textDocument(text: string): TextDocument {
  return {
    type: "doc",
    version: 1,
    content: [{ type: "paragraph", content: [{ type: "text", text }] }],
  };
}
