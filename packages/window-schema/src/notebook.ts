import { z } from "zod";

export const NOTEBOOK_FORMAT = 4 as const;
export const NOTEBOOK_FORMAT_MINOR = 5 as const;

export const DEFAULT_METADATA_NAMESPACE = "spatial_export" as const;

// Cell metadata keys written by the exporter. Everything else is residual.
export const RESERVED_CELL_METADATA_KEYS = [
  "window_id",
  "window_type",
  "position",
  "state",
  "timestamps",
  "export_template",
  "tags",
  "custom_imports",
  "window_data",
  "generated_body",
] as const;

export const StreamOutputSchema = z.object({
  output_type: z.literal("stream"),
  name: z.enum(["stdout", "stderr"]),
  text: z.union([z.string(), z.array(z.string())]),
});

export const DisplayDataOutputSchema = z.object({
  output_type: z.literal("display_data"),
  data: z.record(z.string(), z.unknown()),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export const ExecuteResultOutputSchema = z.object({
  output_type: z.literal("execute_result"),
  data: z.record(z.string(), z.unknown()),
  metadata: z.record(z.string(), z.unknown()).default({}),
  execution_count: z.number().int().nullable().default(null),
});

export const ErrorOutputSchema = z.object({
  output_type: z.literal("error"),
  ename: z.string(),
  evalue: z.string(),
  traceback: z.array(z.string()).default([]),
});

export const NotebookOutputSchema = z.discriminatedUnion("output_type", [
  StreamOutputSchema,
  DisplayDataOutputSchema,
  ExecuteResultOutputSchema,
  ErrorOutputSchema,
]);

export type StreamOutput = z.infer<typeof StreamOutputSchema>;
export type DisplayDataOutput = z.infer<typeof DisplayDataOutputSchema>;
export type ExecuteResultOutput = z.infer<typeof ExecuteResultOutputSchema>;
export type ErrorOutput = z.infer<typeof ErrorOutputSchema>;
export type NotebookOutput = z.infer<typeof NotebookOutputSchema>;

export const CellTypeSchema = z.enum(["code", "markdown", "raw"]);
export type CellType = z.infer<typeof CellTypeSchema>;

export const CellSourceSchema = z.union([z.string(), z.array(z.string())]);

// A cell lacking either field is not read at all.
export const RequiredCellFieldsSchema = z.object({
  cell_type: CellTypeSchema,
  source: CellSourceSchema,
});

const EMPTY_CELL = {
  cell_type: "raw" as const,
  source: "",
  metadata: {},
};

/**
 * A notebook cell as read from disk or a server. Individual fields fall back
 * to defaults instead of failing; outputs stay opaque records.
 */
export const NotebookCellSchema = z
  .object({
    id: z.string().optional().catch(undefined),
    cell_type: CellTypeSchema.catch("raw"),
    source: CellSourceSchema.catch(""),
    metadata: z.record(z.string(), z.unknown()).catch({}),
    execution_count: z.number().int().nullable().optional().catch(undefined),
    outputs: z
      .array(z.record(z.string(), z.unknown()))
      .optional()
      .catch(undefined),
  })
  .catch(EMPTY_CELL);
export type NotebookCell = z.infer<typeof NotebookCellSchema>;

export const NotebookDocumentSchema = z.object({
  cells: z.array(NotebookCellSchema),
  metadata: z.record(z.string(), z.unknown()).catch({}),
  nbformat: z.number().int().catch(NOTEBOOK_FORMAT),
  nbformat_minor: z.number().int().catch(NOTEBOOK_FORMAT_MINOR),
});
export type NotebookDocument = z.infer<typeof NotebookDocumentSchema>;

export const ExportStampSchema = z.object({
  export_date: z.string().catch(""),
  total_windows: z.number().int().nonnegative().catch(0),
  window_types: z.array(z.string()).catch([]),
  export_templates: z.array(z.string()).catch([]),
  all_tags: z.array(z.string()).catch([]),
  created_by: z.string().optional().catch(undefined),
  platform_version: z.string().optional().catch(undefined),
});
export type ExportStamp = z.infer<typeof ExportStampSchema>;

/** Joins a cell source the way nbformat stores it (lines keep their `\n`). */
export const joinCellSource = (source: string | readonly string[]): string =>
  typeof source === "string" ? source : source.join("");

/** Splits text into nbformat source lines; every line but the last keeps `\n`. */
export const splitCellSource = (text: string): string[] => {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split("\n");
  return lines
    .map((line, index) => (index < lines.length - 1 ? `${line}\n` : line))
    .filter((line) => line.length > 0);
};
