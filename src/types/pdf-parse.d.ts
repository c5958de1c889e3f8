// The package entry point runs a debug self-test on import, so the code loads
// the library file directly; its typings are the package's own.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdf from "pdf-parse";
  export default pdf;
}
