// types.d.ts

// Glyphs used to draw the tree connectors
interface Symbols {
  BRANCH: string;
  LAST_BRANCH: string;
  INDENT: string;
  INDENT_EMPTY: string;
}
