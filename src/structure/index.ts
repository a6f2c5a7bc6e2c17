export {
  DEFAULT_FOLDER_STRUCTURE,
  StructureDocumentSchema,
  loadFolderStructure,
  parseFolderStructure,
  toFolderStructure,
  type FolderEntry,
  type FolderNode,
  type FolderStructure,
  type StructureDocument,
} from "./schema.js";
export {
  ensureDirectory,
  ensureFile,
  materializeStructure,
  requireDirectory,
  type DirectoryRecord,
  type EntryStatus,
  type FileRecord,
} from "./materialize.js";
