export * from "./store.js";
export * from "./reconciler.js";
export * from "./notebook-io.js";
export {
  decode,
  type DecodeOptions,
  type DecodeOutcome,
  type DecodedNotebook,
  type DecodedWindow,
  type NotebookInput,
} from "./codec/decode.js";
export {
  createExportStamp,
  encode,
  encodeCell,
  renderCellSource,
  serializeNotebook,
  type EncodeOptions,
} from "./codec/encode.js";
export {
  KIND_CELL_TYPE,
  importsFor,
  placeholderFor,
  renderBody,
  renderPrelude,
} from "./codec/templates.js";
