import { readFile, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import {
  FileReadError,
  fail,
  succeed,
  type DocumentParseError,
  type ExportStamp,
  type NotebookDocument,
  type Outcome,
  type WindowKind,
} from "@spatialnb/window-schema";
import { createLogger, loadWorkspaceConfig } from "@spatialnb/config";
import { decode, type NotebookInput } from "./codec/decode.js";
import { encode, serializeNotebook, type EncodeOptions } from "./codec/encode.js";
import {
  reconcile,
  summarizeImport,
  type ImportResult,
  type ReconcileOptions,
} from "./reconciler.js";
import type { WindowStore } from "./store.js";

const logger = createLogger("spatialnb:notebook-io");

/** A notebook file reachable by the host: its name plus a way to read its bytes. */
export interface NotebookSource {
  filename: string;
  read(): Promise<Uint8Array>;
}

export interface NotebookFileEntry {
  name: string;
  path: string;
  size: number;
  modifiedAt: Date;
}

/** Enumerates candidate `.ipynb` files; implemented by the host. */
export interface NotebookLister {
  list(): Promise<NotebookFileEntry[]>;
}

/** Lets the user pick one file; resolves undefined when cancelled. */
export interface DocumentPicker {
  pick(): Promise<NotebookSource | undefined>;
}

export interface ImportOptions extends ReconcileOptions {
  namespace?: string;
}

export type ExportOptions = EncodeOptions;

export const createFileSource = (path: string): NotebookSource => ({
  filename: basename(path),
  read: () => readFile(path),
});

/** An explicit namespace wins; otherwise the workspace configuration decides. */
const namespaceFor = (options: { namespace?: string }): string =>
  options.namespace ?? loadWorkspaceConfig().metadataNamespace;

const failedImport = (error: ImportResult["errors"][number]): ImportResult => ({
  restoredWindows: [],
  errors: [error],
  idMapping: new Map(),
});

/**
 * Decodes `input` and merges it into `store`. The merge runs behind the
 * store's exclusive queue; failures are reported in the result.
 */
export const importNotebook = (
  input: NotebookInput,
  store: WindowStore,
  options: ImportOptions = {}
): Promise<ImportResult> =>
  store.exclusive(() => {
    const decoded = decode(input, { namespace: namespaceFor(options) });
    if (!decoded.ok) {
      logger.warn({ err: decoded.error }, "Notebook could not be parsed");
      return failedImport(decoded.error);
    }
    const result = reconcile(decoded.value, store, options);
    logger.info(
      {
        restored: result.restoredWindows.length,
        errors: result.errors.length,
      },
      summarizeImport(result)
    );
    return result;
  });

const readAndImport = async (
  label: string,
  read: () => Promise<Uint8Array>,
  store: WindowStore,
  options: ImportOptions
): Promise<ImportResult> => {
  let bytes: Uint8Array;
  try {
    bytes = await read();
  } catch (error) {
    logger.warn({ err: error, file: label }, "Notebook read failed");
    return failedImport(new FileReadError(label, { cause: error }));
  }
  return importNotebook(bytes, store, options);
};

export const importNotebookSource = (
  source: NotebookSource,
  store: WindowStore,
  options: ImportOptions = {}
): Promise<ImportResult> =>
  readAndImport(source.filename, () => source.read(), store, options);

export const importNotebookFile = (
  path: string,
  store: WindowStore,
  options: ImportOptions = {}
): Promise<ImportResult> =>
  readAndImport(path, () => readFile(path), store, options);

/** Resolves undefined when the picker was cancelled. */
export const importPickedNotebook = async (
  picker: DocumentPicker,
  store: WindowStore,
  options: ImportOptions = {}
): Promise<ImportResult | undefined> => {
  const source = await picker.pick();
  return source ? importNotebookSource(source, store, options) : undefined;
};

export const exportNotebook = (
  store: WindowStore,
  options: ExportOptions = {}
): NotebookDocument =>
  encode(store.listAll(), { ...options, namespace: namespaceFor(options) });

/** Writes the store as a notebook to `path` and returns the written text. */
export const exportNotebookFile = async (
  path: string,
  store: WindowStore,
  options: ExportOptions = {}
): Promise<string> => {
  const text = serializeNotebook(exportNotebook(store, options));
  await writeFile(path, text, "utf8");
  logger.info({ path, windows: store.size }, "Notebook exported");
  return text;
};

export interface NotebookAnalysis {
  totalCells: number;
  windowCells: number;
  windowTypes: WindowKind[];
  exportTemplates: string[];
  metadata?: ExportStamp;
}

export const analyzeNotebook = (
  input: NotebookInput,
  options: { namespace?: string } = {}
): Outcome<NotebookAnalysis, DocumentParseError> => {
  const decoded = decode(input, { namespace: namespaceFor(options) });
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const { windows, exportStamp } = decoded.value;
  const owned = windows.filter((window) => window.origin === "window");
  return succeed({
    totalCells: windows.length,
    windowCells: owned.length,
    windowTypes: Array.from(new Set(owned.map((window) => window.kind))).sort(),
    exportTemplates: Array.from(
      new Set(owned.map((window) => window.state.exportTemplate))
    ).sort(),
    ...(exportStamp ? { metadata: exportStamp } : {}),
  });
};

/** True when the document carries this workspace's export stamp. */
export const isWorkspaceExport = (
  input: NotebookInput,
  options: { namespace?: string } = {}
): boolean => {
  const decoded = decode(input, { namespace: namespaceFor(options) });
  return decoded.ok && decoded.value.exportStamp !== undefined;
};
