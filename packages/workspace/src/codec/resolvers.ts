import { z } from "zod";
import {
  DEFAULT_WINDOW_HEIGHT,
  DEFAULT_WINDOW_WIDTH,
  DataFrameDataSchema,
  ExportTemplateSchema,
  Model3DDataSchema,
  PointCloudDataSchema,
  RESERVED_CELL_METADATA_KEYS,
  WINDOW_PAYLOAD_FIELD,
  normalizeTags,
  parseWindowKind,
  type CellType,
  type ExportTemplate,
  type WindowKind,
  type WindowPosition,
  type WindowState,
} from "@spatialnb/window-schema";

// Every fallback used when reading window metadata out of a cell lives here.

const lenientCoordinate = (fallback: number) =>
  z.number().finite().catch(fallback);

const PositionFieldsSchema = z
  .object({
    x: lenientCoordinate(0),
    y: lenientCoordinate(0),
    z: lenientCoordinate(0),
    width: lenientCoordinate(DEFAULT_WINDOW_WIDTH),
    height: lenientCoordinate(DEFAULT_WINDOW_HEIGHT),
    depth: z.number().finite().optional().catch(undefined),
  })
  .catch({
    x: 0,
    y: 0,
    z: 0,
    width: DEFAULT_WINDOW_WIDTH,
    height: DEFAULT_WINDOW_HEIGHT,
  });

const StateFieldsSchema = z
  .object({
    minimized: z.boolean().catch(false),
    maximized: z.boolean().catch(false),
    opacity: z.number().finite().min(0).max(1).catch(1),
  })
  .catch({ minimized: false, maximized: false, opacity: 1 });

const TimestampSchema = z.string().datetime({ offset: true });

const TimestampFieldsSchema = z
  .object({
    created: TimestampSchema.optional().catch(undefined),
    modified: TimestampSchema.optional().catch(undefined),
  })
  .catch({});

const StringListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((values) =>
    values.filter((value): value is string => typeof value === "string")
  );

const MetadataSchema = z.record(z.string(), z.unknown()).catch({});

export const resolveMetadata = (value: unknown): Record<string, unknown> =>
  MetadataSchema.parse(value);

export const resolveWindowId = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isSafeInteger(value) && value > 0
    ? value
    : undefined;

/** Set by the exporter when the cell body was generated rather than typed. */
export const resolveGeneratedBody = (value: unknown): boolean =>
  value === true;

export const resolveKind = (value: unknown): WindowKind | undefined =>
  parseWindowKind(value);

export const resolvePosition = (value: unknown): WindowPosition => {
  const { depth, ...rest } = PositionFieldsSchema.parse(value);
  return depth === undefined ? rest : { ...rest, depth };
};

export const resolveTimestamps = (
  value: unknown
): { created?: string; modified?: string } => {
  const { created, modified } = TimestampFieldsSchema.parse(value);
  return {
    ...(created !== undefined ? { created } : {}),
    ...(modified !== undefined ? { modified } : {}),
  };
};

export const resolveTemplate = (
  value: unknown,
  fallback: ExportTemplate
): ExportTemplate => {
  const parsed = ExportTemplateSchema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
};

type WindowPayload = Pick<
  WindowState,
  "dataFrameData" | "pointCloudData" | "model3dData"
>;

/** Reads `window_data` into the payload field the kind owns; anything else is dropped. */
export const resolvePayload = (
  kind: WindowKind,
  value: unknown
): WindowPayload => {
  switch (WINDOW_PAYLOAD_FIELD[kind]) {
    case "dataFrameData": {
      const parsed = DataFrameDataSchema.safeParse(value);
      return parsed.success ? { dataFrameData: parsed.data } : {};
    }
    case "pointCloudData": {
      const parsed = PointCloudDataSchema.safeParse(value);
      return parsed.success ? { pointCloudData: parsed.data } : {};
    }
    case "model3dData": {
      const parsed = Model3DDataSchema.safeParse(value);
      return parsed.success ? { model3dData: parsed.data } : {};
    }
    default:
      return {};
  }
};

export interface ResolvedStateInput {
  kind: WindowKind;
  cellType: CellType;
  metadata: Record<string, unknown>;
  foreign: boolean;
}

const defaultTemplate = (cellType: CellType, foreign: boolean): ExportTemplate => {
  if (cellType !== "code") {
    return "markdown";
  }
  return foreign ? "custom" : "plain";
};

/** Window state without `content`, which the decoder recovers from the source. */
export const resolveState = ({
  kind,
  cellType,
  metadata,
  foreign,
}: ResolvedStateInput): Omit<WindowState, "content"> => {
  const flags = StateFieldsSchema.parse(metadata.state);
  return {
    tags: normalizeTags(StringListSchema.parse(metadata.tags)),
    exportTemplate: resolveTemplate(
      metadata.export_template,
      defaultTemplate(cellType, foreign)
    ),
    customImports: normalizeTags(
      StringListSchema.parse(metadata.custom_imports)
    ),
    isMinimized: flags.minimized,
    isMaximized: flags.maximized,
    opacity: flags.opacity,
    ...resolvePayload(kind, metadata.window_data),
  };
};

const RESERVED_KEYS = new Set<string>(RESERVED_CELL_METADATA_KEYS);

/** Cell metadata keys owned by other tools. */
export const resolveExtraMetadata = (
  metadata: Record<string, unknown>
): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(metadata).filter(([key]) => !RESERVED_KEYS.has(key))
  );
