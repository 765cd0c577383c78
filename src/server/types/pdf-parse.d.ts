// The library entry point without the package index's debug harness; same API as 'pdf-parse'
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';
  export default pdfParse;
}
