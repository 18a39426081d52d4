export type TextBlockData = { text?: string; textPath?: string };
export type ImageBlockData = { imagePath?: string; caption?: string; label?: string };
export type TableBlockData = { tableData?: string[][]; caption?: string; label?: string };
export type CodeBlockData = { code?: string; language?: string; caption?: string; label?: string };
export type EquationBlockData = { equation?: string; label?: string };

export type TextBlock = { type: "text"; data: TextBlockData };
export type ImageBlock = { type: "image"; data: ImageBlockData };
export type TableBlock = { type: "table"; data: TableBlockData };
export type CodeBlock = { type: "code"; data: CodeBlockData };
export type ListingBlock = { type: "listing"; data: CodeBlockData };
export type EquationBlock = { type: "equation"; data: EquationBlockData };

export type ContentBlock =
  | TextBlock
  | ImageBlock
  | TableBlock
  | CodeBlock
  | ListingBlock
  | EquationBlock;

export type ContentBlockType = ContentBlock["type"];

export const CONTENT_BLOCK_TYPES: readonly ContentBlockType[] = [
  "text",
  "image",
  "table",
  "code",
  "listing",
  "equation",
];

export function isContentBlockType(type: string): type is ContentBlockType {
  return (CONTENT_BLOCK_TYPES as readonly string[]).includes(type);
}

/** A block whose type the renderer does not know. It renders to nothing. */
export type UnsupportedBlock = { type: "unsupported"; originalType: string };

export type PageBlock = ContentBlock | UnsupportedBlock;

export type Reference = { id: string; citation: string };

export type Page = {
  title: string;
  sectionLevel: number;
  content: PageBlock[];
  references?: Reference[];
};

export type TextLoader = (textPath: string, baseDir: string) => string;

export type RenderContext = {
  /** Directory of the page JSON; relative text and image paths resolve against it. */
  pageDir: string;
  /** Directory the LaTeX sources are written to. */
  outputDir: string;
  loadText: TextLoader;
  warnings: string[];
};
