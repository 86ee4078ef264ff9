// The library file behind the pdf-parse entry point; same signature as the package itself.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import PdfParse = require('pdf-parse');
  export = PdfParse;
}
