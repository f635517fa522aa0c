import { z } from "zod";

export const WINDOW_KINDS = [
  "chart",
  "spatialEditor",
  "dataTable",
  "volumeMetric",
  "pointCloud",
  "model3d",
] as const;

export const WindowKindSchema = z.enum(WINDOW_KINDS);
export type WindowKind = z.infer<typeof WindowKindSchema>;

// Names written to `window_type` in exported notebooks.
export const WINDOW_KIND_DISPLAY_NAMES: Record<WindowKind, string> = {
  chart: "Charts",
  spatialEditor: "Spatial Editor",
  dataTable: "DataFrame Viewer",
  volumeMetric: "Model Metric Viewer",
  pointCloud: "Point Cloud Viewer",
  model3d: "3D Model Viewer",
};

export const windowKindDisplayName = (kind: WindowKind): string =>
  WINDOW_KIND_DISPLAY_NAMES[kind];

/**
 * Resolves either the enum key (`dataTable`) or the display name
 * (`DataFrame Viewer`) to a window kind.
 */
export const parseWindowKind = (value: unknown): WindowKind | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  const direct = WindowKindSchema.safeParse(trimmed);
  if (direct.success) {
    return direct.data;
  }
  const match = WINDOW_KINDS.find(
    (kind) => WINDOW_KIND_DISPLAY_NAMES[kind] === trimmed
  );
  return match;
};

export const EXPORT_TEMPLATES = [
  "plain",
  "matplotlib",
  "pandas",
  "numpy",
  "plotly",
  "seaborn",
  "custom",
  "markdown",
] as const;

export const ExportTemplateSchema = z.enum(EXPORT_TEMPLATES);
export type ExportTemplate = z.infer<typeof ExportTemplateSchema>;

export const DEFAULT_WINDOW_WIDTH = 400 as const;
export const DEFAULT_WINDOW_HEIGHT = 300 as const;

const coordinate = z.number().finite();

export const WindowPositionSchema = z.object({
  x: coordinate.default(0),
  y: coordinate.default(0),
  z: coordinate.default(0),
  width: coordinate.default(DEFAULT_WINDOW_WIDTH),
  height: coordinate.default(DEFAULT_WINDOW_HEIGHT),
  depth: coordinate.optional(),
});
export type WindowPosition = z.infer<typeof WindowPositionSchema>;

export const createWindowPosition = (
  partial?: Partial<WindowPosition>
): WindowPosition => WindowPositionSchema.parse(partial ?? {});

export const DataFrameDataSchema = z.object({
  columns: z.array(z.string()).default([]),
  rows: z.array(z.array(z.string())).default([]),
  // column name -> dtype ("int", "float", "datetime", "bool", "string")
  dtypes: z.record(z.string(), z.string()).default({}),
});
export type DataFrameData = z.infer<typeof DataFrameDataSchema>;

export const PointSchema = z.object({
  x: coordinate,
  y: coordinate,
  z: coordinate,
  intensity: coordinate.optional(),
  color: z.string().optional(),
});
export type Point = z.infer<typeof PointSchema>;

export const PointCloudDataSchema = z.object({
  title: z.string().default("Point Cloud Data"),
  xAxisLabel: z.string().default("X"),
  yAxisLabel: z.string().default("Y"),
  zAxisLabel: z.string().default("Z"),
  demoType: z.string().default("custom"),
  parameters: z.record(z.string(), z.number()).default({}),
  points: z.array(PointSchema).default([]),
});
export type PointCloudData = z.infer<typeof PointCloudDataSchema>;

export const Model3DDataSchema = z.object({
  title: z.string().default("3D Model"),
  modelType: z.string().default("mesh"),
  scale: coordinate.default(1),
  vertices: z
    .array(z.object({ x: coordinate, y: coordinate, z: coordinate }))
    .default([]),
  faces: z
    .array(
      z.object({
        vertices: z.array(z.number().int().nonnegative()),
        materialIndex: z.number().int().nonnegative().optional(),
      })
    )
    .default([]),
  materials: z
    .array(
      z.object({
        name: z.string(),
        color: z.string(),
        metallic: z.number().optional(),
        roughness: z.number().optional(),
        transparency: z.number().optional(),
      })
    )
    .default([]),
});
export type Model3DData = z.infer<typeof Model3DDataSchema>;

export const WindowStateSchema = z.object({
  content: z.string().default(""),
  tags: z.array(z.string()).default([]),
  exportTemplate: ExportTemplateSchema.default("plain"),
  customImports: z.array(z.string()).default([]),
  isMinimized: z.boolean().default(false),
  isMaximized: z.boolean().default(false),
  opacity: z.number().finite().min(0).max(1).default(1),
  dataFrameData: DataFrameDataSchema.optional(),
  pointCloudData: PointCloudDataSchema.optional(),
  model3dData: Model3DDataSchema.optional(),
});
export type WindowState = z.infer<typeof WindowStateSchema>;

export type WindowPayloadField =
  | "dataFrameData"
  | "pointCloudData"
  | "model3dData";

// The payload a window of each kind may carry. Other payload fields are dropped.
export const WINDOW_PAYLOAD_FIELD: Record<
  WindowKind,
  WindowPayloadField | undefined
> = {
  chart: undefined,
  spatialEditor: "pointCloudData",
  dataTable: "dataFrameData",
  volumeMetric: undefined,
  pointCloud: "pointCloudData",
  model3d: "model3dData",
};

/** Deduplicates tags keeping the first occurrence; blank tags are dropped. */
export const normalizeTags = (tags: readonly string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (!trimmed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
};

/**
 * Brings a state in line with the record kind: tags collapse to a set and
 * payload fields the kind does not own are removed.
 */
export const normalizeWindowState = (
  kind: WindowKind,
  state: WindowState
): WindowState => {
  const allowed = WINDOW_PAYLOAD_FIELD[kind];
  const normalized: WindowState = {
    ...state,
    tags: normalizeTags(state.tags),
    customImports: normalizeTags(state.customImports),
  };
  if (allowed !== "dataFrameData") delete normalized.dataFrameData;
  if (allowed !== "pointCloudData") delete normalized.pointCloudData;
  if (allowed !== "model3dData") delete normalized.model3dData;
  return normalized;
};

export const createWindowState = (
  partial?: Partial<WindowState>
): WindowState => WindowStateSchema.parse(partial ?? {});

export const WindowRecordSchema = z.object({
  id: z.number().int().positive().safe(),
  kind: WindowKindSchema,
  position: WindowPositionSchema,
  state: WindowStateSchema,
  createdAt: z.string().datetime({ offset: true }),
  lastModified: z.string().datetime({ offset: true }),
  // Cell metadata keys owned by other tools, kept verbatim for round trips.
  extraMetadata: z.record(z.string(), z.unknown()).default({}),
});
export type WindowRecord = z.infer<typeof WindowRecordSchema>;

export * from "./notebook.js";
export * from "./errors.js";
