/**
 * Frontend AST contracts for LOLCODE-markdown documents.
 *
 * Types only; the parser builds these trees once and later passes read them.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file. */
  offset: number;
}

/**
 * Source span from the first character of a construct to the end of its closing token.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * `#HAI ... #KTHXBYE`.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  children: BodyNode[];
}

/**
 * `#MAEK HEAD ... #OIC`. Does not open a scope.
 */
export interface HeadSectionNode extends BaseNode {
  kind: 'HeadSection';
  children: TitleNode[];
}

/**
 * `#MAEK PARAGRAF ... #OIC`. Opens a scope.
 */
export interface ParagrafSectionNode extends BaseNode {
  kind: 'ParagrafSection';
  children: BodyNode[];
}

/**
 * `#MAEK LIST ... #OIC`. Opens a scope.
 */
export interface ListSectionNode extends BaseNode {
  kind: 'ListSection';
  children: ItemNode[];
}

export type SectionNode = HeadSectionNode | ParagrafSectionNode | ListSectionNode;

/**
 * `#I HAZ name`.
 */
export interface VariableDeclarationNode extends BaseNode {
  kind: 'VariableDeclaration';
  name: string;
}

/**
 * `#IT IZ value #MKAY`.
 *
 * The surface syntax never names the target; the parser fills `name` with the most recent
 * declaration not yet assigned, and leaves it unset when there is none.
 */
export interface VariableAssignmentNode extends BaseNode {
  kind: 'VariableAssignment';
  name?: string;
  value: string;
}

/**
 * `#LEMME SEE name #MKAY`.
 */
export interface VariableReferenceNode extends BaseNode {
  kind: 'VariableReference';
  name: string;
}

export interface TitleNode extends BaseNode {
  kind: 'Title';
  content: string;
}

export interface TextNode extends BaseNode {
  kind: 'Text';
  content: string;
}

export interface BoldNode extends BaseNode {
  kind: 'Bold';
  children: InlineNode[];
}

export interface ItalicsNode extends BaseNode {
  kind: 'Italics';
  children: InlineNode[];
}

export interface ItemNode extends BaseNode {
  kind: 'Item';
  children: InlineNode[];
}

/**
 * `#GIMMEH NEWLINE`.
 */
export interface NewlineNode extends BaseNode {
  kind: 'Newline';
}

export interface SoundNode extends BaseNode {
  kind: 'Sound';
  url: string;
}

export interface VideoNode extends BaseNode {
  kind: 'Video';
  url: string;
}

/**
 * Content permitted inside `BOLD`, `ITALICS` and list items.
 */
export type InlineNode = TextNode | VariableReferenceNode;

/**
 * Result of `#GIMMEH` outside a head or list section.
 */
export type StyledNode = BoldNode | ItalicsNode | NewlineNode | SoundNode | VideoNode;

/**
 * Content permitted at top level and inside paragraf sections.
 */
export type BodyNode =
  | SectionNode
  | VariableDeclarationNode
  | VariableAssignmentNode
  | VariableReferenceNode
  | StyledNode
  | TextNode;

export type AstNode = ProgramNode | BodyNode | TitleNode | ItemNode;
