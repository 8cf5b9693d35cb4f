export {
  isSubmoduleDirectory,
  findModuleFiles,
  checkModule,
  checkComponent,
  type FindModuleFilesOptions,
} from "./walker.js";
