export {
  POLICY_FILE_NAME,
  POLICY_TEMPLATE,
  formatAccessRows,
  renderPolicyDocument,
  securityLevelLabel,
  type PolicyDocumentInput,
} from "./document.js";
export {
  backupPathFor,
  writePolicyDocument,
  type PolicyWriteOutcome,
  type PolicyWriteStatus,
  type WritePolicyOptions,
} from "./writer.js";
