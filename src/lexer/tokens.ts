export enum IdlTokenType {
  // Literals and names
  IDENTIFIER = 'IDENTIFIER',
  NUMBER = 'NUMBER',
  STRING = 'STRING',
  COMMENT = 'COMMENT',

  // Keywords
  PACKAGE = 'PACKAGE',
  IMPORT = 'IMPORT',
  AS = 'AS',
  STRUCT = 'STRUCT',
  ENUM = 'ENUM',
  UNION = 'UNION',
  SERVICE = 'SERVICE',
  STREAM = 'STREAM',
  MAP = 'MAP',
  ARRAY = 'ARRAY',
  OPTIONAL = 'OPTIONAL',

  // Punctuation
  EQUALS = 'EQUALS', // =
  SEMICOLON = 'SEMICOLON', // ;
  LPAREN = 'LPAREN', // (
  RPAREN = 'RPAREN', // )
  LBRACE = 'LBRACE', // {
  RBRACE = 'RBRACE', // }
  LT = 'LT', // <
  GT = 'GT', // >
  COMMA = 'COMMA', // ,
  AT = 'AT', // @
  DOT = 'DOT', // .
  ARROW = 'ARROW', // ->

  EOF = 'EOF',
}

// Keywords recognised by the lexer. Primitive type names are plain
// identifiers; they are reserved, but only the parser gives them meaning.
export const IDL_KEYWORDS: Record<string, IdlTokenType> = {
  package: IdlTokenType.PACKAGE,
  import: IdlTokenType.IMPORT,
  as: IdlTokenType.AS,
  struct: IdlTokenType.STRUCT,
  enum: IdlTokenType.ENUM,
  union: IdlTokenType.UNION,
  service: IdlTokenType.SERVICE,
  stream: IdlTokenType.STREAM,
  map: IdlTokenType.MAP,
  array: IdlTokenType.ARRAY,
  optional: IdlTokenType.OPTIONAL,
};

export const PUNCTUATION: Record<string, IdlTokenType> = {
  '=': IdlTokenType.EQUALS,
  ';': IdlTokenType.SEMICOLON,
  '(': IdlTokenType.LPAREN,
  ')': IdlTokenType.RPAREN,
  '{': IdlTokenType.LBRACE,
  '}': IdlTokenType.RBRACE,
  '<': IdlTokenType.LT,
  '>': IdlTokenType.GT,
  ',': IdlTokenType.COMMA,
  '@': IdlTokenType.AT,
  '.': IdlTokenType.DOT,
};

export interface Token {
  type: IdlTokenType;
  value: string;
  line: number;
  column: number;
}

export function isKeywordToken(type: IdlTokenType): boolean {
  return Object.values(IDL_KEYWORDS).includes(type);
}
