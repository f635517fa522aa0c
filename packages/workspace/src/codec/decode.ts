import { z } from "zod";
import {
  DEFAULT_METADATA_NAMESPACE,
  DocumentParseError,
  ExportStampSchema,
  NotebookCellSchema,
  RequiredCellFieldsSchema,
  describeError,
  fail,
  joinCellSource,
  succeed,
  type ExportStamp,
  type Outcome,
  type WindowKind,
  type WindowPosition,
  type WindowState,
} from "@spatialnb/window-schema";
import {
  resolveExtraMetadata,
  resolveGeneratedBody,
  resolveKind,
  resolveMetadata,
  resolvePosition,
  resolveState,
  resolveTimestamps,
  resolveWindowId,
} from "./resolvers.js";
import { placeholderFor, renderPayload, renderPrelude } from "./templates.js";

/** A JSON string, UTF-8 bytes, or an already parsed document. */
export type NotebookInput = unknown;

export interface DecodedWindow {
  /** Zero-based position of the cell in the document. */
  cellIndex: number;
  candidateId: number;
  /** `window` when the cell carried a `window_id`, `foreign` otherwise. */
  origin: "window" | "foreign";
  kind: WindowKind;
  position: WindowPosition;
  state: WindowState;
  createdAt?: string;
  lastModified?: string;
  extraMetadata: Record<string, unknown>;
}

export interface DecodedNotebook {
  windows: DecodedWindow[];
  exportStamp?: ExportStamp;
  documentMetadata: Record<string, unknown>;
}

export type DecodeOutcome = Outcome<DecodedNotebook, DocumentParseError>;

export interface DecodeOptions {
  namespace?: string;
}

const DocumentShapeSchema = z.object({
  cells: z.array(z.unknown()),
  metadata: z.record(z.string(), z.unknown()).catch({}),
});

const parseJson = (text: string): Outcome<unknown, DocumentParseError> => {
  try {
    return succeed<unknown>(JSON.parse(text));
  } catch (error) {
    return fail(
      new DocumentParseError(`Invalid notebook JSON: ${describeError(error)}`, {
        cause: error,
      })
    );
  }
};

const readInput = (input: NotebookInput): Outcome<unknown, DocumentParseError> => {
  if (typeof input === "string") {
    return parseJson(input);
  }
  if (input instanceof Uint8Array) {
    return parseJson(new TextDecoder().decode(input));
  }
  return succeed(input);
};

/**
 * Content recovered from a cell the exporter wrote: the regenerated prelude
 * is stripped, and so is a body the exporter marked as generated. Sources
 * that do not start with the expected prelude are kept whole.
 */
const recoverContent = (
  source: string,
  generatedBody: boolean,
  id: number,
  kind: WindowKind,
  position: WindowPosition,
  createdAt: string | undefined,
  state: Omit<WindowState, "content">
): string => {
  const prelude = renderPrelude({
    id,
    kind,
    position,
    createdAt,
    exportTemplate: state.exportTemplate,
    customImports: state.customImports,
  });
  if (!source.startsWith(prelude)) {
    return source;
  }
  const body = source.slice(prelude.length);
  const generated = renderPayload(kind, { ...state, content: "" });
  if (
    generatedBody &&
    (body === generated || body === placeholderFor(kind, state.exportTemplate))
  ) {
    return "";
  }
  return body;
};

const decodeCells = (rawCells: readonly unknown[]): DecodedWindow[] => {
  const cells = rawCells.flatMap((raw, cellIndex) =>
    RequiredCellFieldsSchema.safeParse(raw).success
      ? [{ cellIndex, cell: NotebookCellSchema.parse(raw) }]
      : []
  );
  const metadataByCell = cells.map(({ cell }) => resolveMetadata(cell.metadata));
  const explicitIds = metadataByCell.map((metadata) =>
    resolveWindowId(metadata.window_id)
  );
  let nextSyntheticId =
    explicitIds.reduce<number>((max, id) => Math.max(max, id ?? 0), 0) + 1;

  return cells.map(({ cell, cellIndex }, index): DecodedWindow => {
    const metadata = metadataByCell[index] ?? {};
    const explicitId = explicitIds[index];
    const foreign = explicitId === undefined;
    const candidateId = explicitId ?? nextSyntheticId++;
    const kind = resolveKind(metadata.window_type) ?? "spatialEditor";
    const position = resolvePosition(metadata.position);
    const timestamps = resolveTimestamps(metadata.timestamps);
    const partialState = resolveState({
      kind,
      cellType: cell.cell_type,
      metadata,
      foreign,
    });
    const source = joinCellSource(cell.source);
    const content = foreign
      ? source
      : recoverContent(
          source,
          resolveGeneratedBody(metadata.generated_body),
          candidateId,
          kind,
          position,
          timestamps.created,
          partialState
        );

    return {
      cellIndex,
      candidateId,
      origin: foreign ? "foreign" : "window",
      kind,
      position,
      state: { ...partialState, content },
      ...(timestamps.created !== undefined
        ? { createdAt: timestamps.created }
        : {}),
      ...(timestamps.modified !== undefined
        ? { lastModified: timestamps.modified }
        : {}),
      extraMetadata: resolveExtraMetadata(metadata),
    };
  });
};

/**
 * Reads a notebook into window candidates. Individual fields degrade to
 * defaults and cells without a `cell_type` or `source` are skipped; only a
 * document that is not JSON or has no `cells` array fails.
 */
export const decode = (
  input: NotebookInput,
  options: DecodeOptions = {}
): DecodeOutcome => {
  const raw = readInput(input);
  if (!raw.ok) {
    return raw;
  }
  const parsed = DocumentShapeSchema.safeParse(raw.value);
  if (!parsed.success) {
    return fail(
      new DocumentParseError("Notebook document is missing a cells array", {
        cause: parsed.error,
      })
    );
  }
  const document = parsed.data;
  const stampValue =
    document.metadata[options.namespace ?? DEFAULT_METADATA_NAMESPACE];
  const stamp =
    stampValue !== undefined ? ExportStampSchema.safeParse(stampValue) : undefined;

  return succeed({
    windows: decodeCells(document.cells),
    ...(stamp?.success ? { exportStamp: stamp.data } : {}),
    documentMetadata: document.metadata,
  });
};
