// The package entry runs a self-test when loaded without a parent module,
// so the library file is imported directly. Its API is the package's own.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse = require('pdf-parse');
  export = pdfParse;
}
