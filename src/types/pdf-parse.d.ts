/**
 * The package entry point runs a self-test when loaded from ESM, so the
 * parser is imported from its lib file. Types come from @types/pdf-parse.
 */

declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';

  export default pdfParse;
}
