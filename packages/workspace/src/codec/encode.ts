import {
  DEFAULT_METADATA_NAMESPACE,
  NOTEBOOK_FORMAT,
  NOTEBOOK_FORMAT_MINOR,
  WINDOW_PAYLOAD_FIELD,
  splitCellSource,
  windowKindDisplayName,
  type ExportStamp,
  type NotebookCell,
  type NotebookDocument,
  type WindowRecord,
} from "@spatialnb/window-schema";
import { KIND_CELL_TYPE, renderBody, renderPrelude } from "./templates.js";

export const DEFAULT_CREATED_BY = "spatialnb";
export const DEFAULT_PLATFORM_VERSION = "0.1.0";

export interface EncodeOptions {
  namespace?: string;
  now?: () => Date;
  createdBy?: string;
  platformVersion?: string;
}

const sortedDistinct = (values: Iterable<string>) =>
  Array.from(new Set(values)).sort();

/** Full cell source for a window: prelude followed by its body. */
export const renderCellSource = (record: WindowRecord): string =>
  renderPrelude({
    id: record.id,
    kind: record.kind,
    position: record.position,
    createdAt: record.createdAt,
    exportTemplate: record.state.exportTemplate,
    customImports: record.state.customImports,
  }) + renderBody(record.kind, record.state);

const cellMetadata = (record: WindowRecord): Record<string, unknown> => {
  const { position, state } = record;
  const payloadField = WINDOW_PAYLOAD_FIELD[record.kind];
  const payload = payloadField ? state[payloadField] : undefined;
  return {
    ...record.extraMetadata,
    window_id: record.id,
    window_type: windowKindDisplayName(record.kind),
    export_template: state.exportTemplate,
    tags: [...state.tags],
    custom_imports: [...state.customImports],
    position: {
      x: position.x,
      y: position.y,
      z: position.z,
      width: position.width,
      height: position.height,
      ...(position.depth !== undefined ? { depth: position.depth } : {}),
    },
    state: {
      minimized: state.isMinimized,
      maximized: state.isMaximized,
      opacity: state.opacity,
    },
    timestamps: {
      created: record.createdAt,
      modified: record.lastModified,
    },
    ...(payload !== undefined ? { window_data: payload } : {}),
    ...(state.content === "" ? { generated_body: true } : {}),
  };
};

export const encodeCell = (record: WindowRecord): NotebookCell => {
  const cellType = KIND_CELL_TYPE[record.kind];
  const cell: NotebookCell = {
    id: `window-${record.id}`,
    cell_type: cellType,
    metadata: cellMetadata(record),
    source: splitCellSource(renderCellSource(record)),
  };
  if (cellType === "code") {
    cell.execution_count = null;
    cell.outputs = [];
  }
  return cell;
};

export const createExportStamp = (
  records: readonly WindowRecord[],
  options: EncodeOptions = {}
): ExportStamp => ({
  export_date: (options.now ?? (() => new Date()))().toISOString(),
  total_windows: records.length,
  window_types: sortedDistinct(
    records.map((record) => windowKindDisplayName(record.kind))
  ),
  export_templates: sortedDistinct(
    records.map((record) => record.state.exportTemplate)
  ),
  all_tags: sortedDistinct(records.flatMap((record) => record.state.tags)),
  created_by: options.createdBy ?? DEFAULT_CREATED_BY,
  platform_version: options.platformVersion ?? DEFAULT_PLATFORM_VERSION,
});

/** One cell per record in ascending id order, stamped with export metadata. */
export const encode = (
  records: readonly WindowRecord[],
  options: EncodeOptions = {}
): NotebookDocument => {
  const ordered = [...records].sort((a, b) => a.id - b.id);
  return {
    cells: ordered.map(encodeCell),
    metadata: {
      kernelspec: {
        display_name: "Python 3",
        language: "python",
        name: "python3",
      },
      language_info: {
        name: "python",
        file_extension: ".py",
        mimetype: "text/x-python",
      },
      [options.namespace ?? DEFAULT_METADATA_NAMESPACE]: createExportStamp(
        ordered,
        options
      ),
    },
    nbformat: NOTEBOOK_FORMAT,
    nbformat_minor: NOTEBOOK_FORMAT_MINOR,
  };
};

export const serializeNotebook = (document: NotebookDocument): string =>
  `${JSON.stringify(document, null, 1)}\n`;
