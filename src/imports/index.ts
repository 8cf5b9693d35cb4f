export { matchImport, extractImports, readImports } from "./extractor.js";
