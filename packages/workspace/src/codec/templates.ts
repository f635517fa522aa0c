import type {
  CellType,
  DataFrameData,
  ExportTemplate,
  Model3DData,
  PointCloudData,
  WindowKind,
  WindowPosition,
  WindowState,
} from "@spatialnb/window-schema";

export const KIND_CELL_TYPE: Record<WindowKind, Extract<CellType, "code" | "markdown">> = {
  chart: "code",
  spatialEditor: "markdown",
  dataTable: "code",
  volumeMetric: "code",
  pointCloud: "code",
  model3d: "code",
};

const KIND_TITLES: Record<WindowKind, string> = {
  chart: "Chart Window",
  spatialEditor: "Spatial Editor Window",
  dataTable: "DataFrame Viewer Window",
  volumeMetric: "Volume Metrics Window",
  pointCloud: "Point Cloud Window",
  model3d: "3D Model Window",
};

export const KIND_IMPORTS: Record<WindowKind, readonly string[]> = {
  chart: ["import matplotlib.pyplot as plt", "import numpy as np"],
  spatialEditor: [],
  dataTable: ["import pandas as pd", "import numpy as np"],
  volumeMetric: [
    "import matplotlib.pyplot as plt",
    "import numpy as np",
    "import pandas as pd",
  ],
  pointCloud: ["import numpy as np", "import matplotlib.pyplot as plt"],
  model3d: [
    "import matplotlib.pyplot as plt",
    "import numpy as np",
    "from mpl_toolkits.mplot3d.art3d import Poly3DCollection",
  ],
};

export const TEMPLATE_IMPORTS: Record<ExportTemplate, readonly string[]> = {
  plain: [],
  matplotlib: ["import matplotlib.pyplot as plt", "import numpy as np"],
  pandas: ["import pandas as pd", "import numpy as np"],
  numpy: ["import numpy as np"],
  plotly: [
    "import plotly.graph_objects as go",
    "import plotly.express as px",
    "import pandas as pd",
  ],
  seaborn: [
    "import seaborn as sns",
    "import matplotlib.pyplot as plt",
    "import pandas as pd",
  ],
  custom: [],
  markdown: [],
};

export const TEMPLATE_PLACEHOLDERS: Record<ExportTemplate, string> = {
  plain: "# Add your code here",
  matplotlib: [
    "# Create figure and axis",
    "fig, ax = plt.subplots(figsize=(10, 6))",
    "",
    "# Your plotting code here",
    "# ax.plot(x, y)",
    "",
    "plt.show()",
  ].join("\n"),
  pandas: [
    "# Create or load your DataFrame",
    "# df = pd.read_csv('your_file.csv')",
    "",
    "# Display DataFrame info",
    "# print(df.head())",
  ].join("\n"),
  numpy: [
    "# Create numpy arrays",
    "# arr = np.array([1, 2, 3, 4, 5])",
    "",
    "# Your numpy operations here",
  ].join("\n"),
  plotly: [
    "# Create interactive plot",
    "# fig = go.Figure()",
    "# fig.show()",
  ].join("\n"),
  seaborn: [
    'sns.set_style("whitegrid")',
    "",
    "# sns.scatterplot(data=df, x='col1', y='col2')",
    "# plt.show()",
  ].join("\n"),
  custom: "# Add your custom code here",
  markdown: "Add your markdown content here",
};

export const MARKDOWN_PLACEHOLDER = "*No content available*";

export interface PreludeInput {
  id: number;
  kind: WindowKind;
  position: WindowPosition;
  createdAt?: string;
  exportTemplate: ExportTemplate;
  customImports: readonly string[];
}

const formatNumber = (value: number) => String(value);

const uniqueLines = (lines: readonly string[]) => {
  const seen = new Set<string>();
  return lines.filter((line) => {
    const trimmed = line.trim();
    if (!trimmed || seen.has(trimmed)) {
      return false;
    }
    seen.add(trimmed);
    return true;
  });
};

export const importsFor = (
  kind: WindowKind,
  template: ExportTemplate,
  customImports: readonly string[]
): string[] => {
  if (KIND_CELL_TYPE[kind] !== "code") {
    return [];
  }
  return uniqueLines([
    ...KIND_IMPORTS[kind],
    ...TEMPLATE_IMPORTS[template],
    ...customImports,
  ]).map((line) => line.trim());
};

/**
 * Header written ahead of a window's body. Deterministic for a given input,
 * so the decoder can regenerate it and strip it back off.
 */
export const renderPrelude = (input: PreludeInput): string => {
  const { id, kind, position } = input;
  const created = input.createdAt ?? "unknown";
  const coords = `(${formatNumber(position.x)}, ${formatNumber(position.y)}, ${formatNumber(position.z)})`;
  const size = `${formatNumber(position.width)} × ${formatNumber(position.height)}`;

  if (KIND_CELL_TYPE[kind] === "markdown") {
    return [
      `# ${KIND_TITLES[kind]} #${id}`,
      "",
      `**Position:** ${coords}  `,
      `**Size:** ${size}  `,
      `**Created:** ${created}`,
      "",
      "## Spatial Content",
      "",
      "",
    ].join("\n");
  }

  const header = [
    `# ${KIND_TITLES[kind]} #${id}`,
    `# Created: ${created}`,
    `# Position: ${coords}`,
    `# Size: ${size}`,
  ].join("\n");
  const imports = importsFor(kind, input.exportTemplate, input.customImports);
  return imports.length > 0
    ? `${header}\n\n${imports.join("\n")}\n\n`
    : `${header}\n\n`;
};

export const placeholderFor = (
  kind: WindowKind,
  template: ExportTemplate
): string =>
  KIND_CELL_TYPE[kind] === "markdown"
    ? MARKDOWN_PLACEHOLDER
    : TEMPLATE_PLACEHOLDERS[template];

const pyString = (value: string) => JSON.stringify(value);

const NUMERIC_DTYPES = new Set([
  "int",
  "int64",
  "integer",
  "float",
  "float64",
  "double",
  "number",
]);

const pyCell = (value: string | undefined, dtype: string | undefined) => {
  if (value === undefined) {
    return "None";
  }
  const normalized = dtype?.toLowerCase();
  if (normalized && NUMERIC_DTYPES.has(normalized)) {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (trimmed && Number.isFinite(parsed)) {
      return formatNumber(parsed);
    }
    return "None";
  }
  if (normalized === "bool" || normalized === "boolean") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "true") return "True";
    if (lowered === "false") return "False";
    return "None";
  }
  return pyString(value);
};

export const renderDataFrame = (data: DataFrameData): string => {
  if (data.columns.length === 0) {
    return "df = pd.DataFrame()\ndf";
  }
  const lines = [
    `# DataFrame (${data.rows.length} rows × ${data.columns.length} columns)`,
    "df = pd.DataFrame({",
  ];
  data.columns.forEach((column, index) => {
    const values = data.rows.map((row) =>
      pyCell(row[index], data.dtypes[column])
    );
    lines.push(`    ${pyString(column)}: [${values.join(", ")}],`);
  });
  lines.push("})", "df");
  return lines.join("\n");
};

const pyTriple = (x: number, y: number, z: number) =>
  `[${formatNumber(x)}, ${formatNumber(y)}, ${formatNumber(z)}]`;

export const renderPointCloud = (data: PointCloudData): string => {
  const lines = [`# ${data.title}`];
  if (data.points.length === 0) {
    lines.push("points = np.empty((0, 3))");
  } else {
    lines.push("points = np.array([");
    for (const point of data.points) {
      lines.push(`    ${pyTriple(point.x, point.y, point.z)},`);
    }
    lines.push("])");
  }
  lines.push(
    "fig = plt.figure(figsize=(10, 8))",
    'ax = fig.add_subplot(111, projection="3d")',
    "ax.scatter(points[:, 0], points[:, 1], points[:, 2], s=1)",
    `ax.set_xlabel(${pyString(data.xAxisLabel)})`,
    `ax.set_ylabel(${pyString(data.yAxisLabel)})`,
    `ax.set_zlabel(${pyString(data.zAxisLabel)})`,
    `ax.set_title(${pyString(data.title)})`,
    "plt.show()"
  );
  return lines.join("\n");
};

export const renderModel3D = (data: Model3DData): string => {
  const lines = [`# ${data.title} (${data.modelType})`];
  if (data.vertices.length === 0) {
    lines.push("vertices = np.empty((0, 3))");
  } else {
    lines.push("vertices = np.array([");
    for (const vertex of data.vertices) {
      lines.push(`    ${pyTriple(vertex.x, vertex.y, vertex.z)},`);
    }
    lines.push(`]) * ${formatNumber(data.scale)}`);
  }
  lines.push("faces = [");
  for (const face of data.faces) {
    lines.push(`    [${face.vertices.map(formatNumber).join(", ")}],`);
  }
  lines.push(
    "]",
    "fig = plt.figure(figsize=(10, 8))",
    'ax = fig.add_subplot(111, projection="3d")',
    "ax.add_collection3d(Poly3DCollection([vertices[face] for face in faces], alpha=0.7))",
    `ax.set_title(${pyString(data.title)})`,
    "plt.show()"
  );
  return lines.join("\n");
};

/** Python rendering of the payload a code cell carries, if any. */
export const renderPayload = (
  kind: WindowKind,
  state: WindowState
): string | undefined => {
  if (KIND_CELL_TYPE[kind] !== "code") {
    return undefined;
  }
  if (kind === "dataTable" && state.dataFrameData) {
    return renderDataFrame(state.dataFrameData);
  }
  if (kind === "pointCloud" && state.pointCloudData) {
    return renderPointCloud(state.pointCloudData);
  }
  if (kind === "model3d" && state.model3dData) {
    return renderModel3D(state.model3dData);
  }
  return undefined;
};

/** Body written after the prelude: content, rendered payload, or placeholder. */
export const renderBody = (kind: WindowKind, state: WindowState): string => {
  if (state.content.length > 0) {
    return state.content;
  }
  return (
    renderPayload(kind, state) ?? placeholderFor(kind, state.exportTemplate)
  );
};
