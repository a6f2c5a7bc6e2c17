export {
  DEFAULT_ISA_LABELS,
  IsaDocumentSchema,
  README_FILE_NAME,
  README_KEY,
  interpolateDocument,
  interpolateLabels,
  toIsaStructure,
  type IsaDocument,
  type IsaEntry,
  type IsaLabels,
  type IsaNode,
  type IsaStructure,
} from "./schema.js";
export { loadIsaTemplate, parseIsaTemplate } from "./loader.js";
export {
  ISA_README_TEMPLATE,
  renderProjectReadme,
  structureOverview,
  type IsaReadmeInput,
} from "./readme.js";
export {
  createIsaStructure,
  type CreateIsaStructureOptions,
  type IsaRecord,
  type IsaStructureResult,
} from "./creator.js";
