import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CellConversionError,
  DocumentParseError,
  FileReadError,
  createWindowPosition,
  createWindowState,
} from "@spatialnb/window-schema";
import {
  WindowStore,
  analyzeNotebook,
  exportNotebook,
  exportNotebookFile,
  importNotebook,
  importNotebookFile,
  importPickedNotebook,
  isImportSuccessful,
  isWorkspaceExport,
  reconcile,
  serializeNotebook,
  summarizeImport,
  type DecodedNotebook,
} from "../src/index.js";

const SOURCE_CLOCK = () => new Date("2024-05-01T10:00:00.000Z");
const TARGET_CLOCK = () => new Date("2024-06-01T08:00:00.000Z");

const exportText = (store: WindowStore) => serializeNotebook(exportNotebook(store));

describe("reconcile", () => {
  it("restores every kind with its position and content", async () => {
    const source = new WindowStore({ now: SOURCE_CLOCK });
    source.create("chart", 1, { x: 1, y: 2, z: 3 }, { content: "plt.show()" });
    source.create("spatialEditor", 2, { width: 800 }, { content: "# Plan" });
    source.create("dataTable", 3, { height: 120.5 });
    source.create("volumeMetric", 4, { z: -7 }, { content: "metrics()" });
    source.create("pointCloud", 5);
    source.create("model3d", 6, { x: -0.25 }, { content: "mesh = load()" });

    const target = new WindowStore({ now: TARGET_CLOCK });
    const result = await importNotebook(exportText(source), target);

    expect(result.errors).toEqual([]);
    expect(result.restoredWindows.map((record) => record.id)).toEqual([
      1, 2, 3, 4, 5, 6,
    ]);
    for (const original of source.listAll()) {
      const restored = target.get(original.id);
      expect(restored?.kind).toBe(original.kind);
      expect(restored?.position).toEqual(original.position);
      expect(restored?.state.content).toBe(original.state.content);
      expect(result.idMapping.get(original.id)).toBe(original.id);
    }
    expect(result.originalMetadata?.total_windows).toBe(6);
  });

  it("round-trips an empty data table at id 3", async () => {
    const source = new WindowStore({ now: SOURCE_CLOCK });
    const original = source.create("dataTable", 3, { x: 12, y: -4, z: 1 });
    const document = exportNotebook(source);

    expect(document.cells).toHaveLength(1);
    expect(document.cells[0]?.metadata.window_id).toBe(3);
    expect(document.cells[0]?.cell_type).toBe("code");

    const fresh = new WindowStore();
    const result = await importNotebook(document, fresh);
    const restored = fresh.get(3);
    expect(restored?.kind).toBe("dataTable");
    expect(restored?.position).toEqual(original.position);
    expect(restored?.state.content).toBe("");
    expect(result.idMapping.get(3)).toBe(3);
    expect(isImportSuccessful(result)).toBe(true);
    expect(summarizeImport(result)).toBe("Successfully restored 1 window(s)");
  });

  it("moves a colliding id past the highest id in the store", async () => {
    const source = new WindowStore({ now: SOURCE_CLOCK });
    source.create("dataTable", 5, undefined, { content: "df.head()" });

    const target = new WindowStore({ now: TARGET_CLOCK });
    target.create("chart", 5, undefined, { content: "unrelated" });
    target.create("chart", 7);

    const result = await importNotebook(exportText(source), target);
    expect(result.idMapping.get(5)).toBe(8);
    expect(target.get(5)?.kind).toBe("chart");
    expect(target.get(5)?.state.content).toBe("unrelated");
    expect(target.get(8)?.kind).toBe("dataTable");
    expect(target.get(8)?.state.content).toBe("df.head()");
  });

  it("overwrites a window that came from the same export", async () => {
    const store = new WindowStore({ now: SOURCE_CLOCK });
    store.create("chart", 5, undefined, { content: "v1" });
    const snapshot = exportText(store);
    store.updateContent(5, "v2");

    const result = await importNotebook(snapshot, store);
    expect(result.idMapping.get(5)).toBe(5);
    expect(store.size).toBe(1);
    expect(store.get(5)?.state.content).toBe("v1");
  });

  it("keeps both windows when a document repeats a window id", async () => {
    const source = new WindowStore({ now: SOURCE_CLOCK });
    source.create("chart", 5, undefined, { content: "a = 1" });
    const document = exportNotebook(source);
    const [cell] = document.cells;
    if (!cell) throw new Error("expected an exported cell");
    document.cells.push({ ...cell, source: "b = 2", metadata: { ...cell.metadata } });

    const target = new WindowStore({ now: TARGET_CLOCK });
    const result = await importNotebook(document, target);
    expect(result.errors).toEqual([]);
    expect(result.restoredWindows.map((record) => record.id)).toEqual([5, 6]);
    expect(target.get(5)?.state.content).toBe("a = 1");
    expect(target.get(6)?.state.content).toBe("b = 2");
    expect(result.idMapping.get(5)).toBe(6);
  });

  it("reports a cell when no window id is left", async () => {
    const source = new WindowStore({ now: SOURCE_CLOCK });
    source.create("pointCloud", Number.MAX_SAFE_INTEGER);
    const target = new WindowStore({ now: TARGET_CLOCK });
    target.create("chart", Number.MAX_SAFE_INTEGER, undefined, { content: "kept" });

    const result = await importNotebook(exportText(source), target);
    expect(result.restoredWindows).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(CellConversionError);
    expect(target.size).toBe(1);
    expect(target.get(Number.MAX_SAFE_INTEGER)?.kind).toBe("chart");
    expect(target.get(Number.MAX_SAFE_INTEGER)?.state.content).toBe("kept");
  });

  it("replaces the store when clearExisting is set", async () => {
    const source = new WindowStore({ now: SOURCE_CLOCK });
    for (const id of [1, 2, 3, 4, 5]) {
      source.create("chart", id, { x: id });
    }
    const target = new WindowStore({ now: TARGET_CLOCK });
    target.create("model3d", 1);
    target.create("dataTable", 2);

    const result = await importNotebook(exportText(source), target, {
      clearExisting: true,
    });
    expect(target.size).toBe(5);
    expect(target.listAll().map((record) => record.id)).toEqual([
      1, 2, 3, 4, 5,
    ]);
    expect(target.listAll().every((record) => record.kind === "chart")).toBe(
      true
    );
    expect(Array.from(result.idMapping.entries())).toEqual([
      [1, 1],
      [2, 2],
      [3, 3],
      [4, 4],
      [5, 5],
    ]);
  });

  it("degrades malformed cells instead of failing", async () => {
    const store = new WindowStore();
    const result = await importNotebook(
      JSON.stringify({
        cells: [
          {
            cell_type: "code",
            source: "print('ok')",
            metadata: { window_id: 2, window_type: "Charts", position: "left" },
          },
          { metadata: { window_id: 9 } },
        ],
      }),
      store
    );
    expect(result.restoredWindows).toHaveLength(1);
    expect(result.errors).toEqual([]);
    expect(store.get(2)?.position).toEqual(createWindowPosition());
  });

  it("returns a single error for a document that is not JSON", async () => {
    const store = new WindowStore();
    store.create("chart", 1);
    const result = await importNotebook("not a notebook", store, {
      clearExisting: true,
    });
    expect(result.restoredWindows).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(DocumentParseError);
    expect(store.size).toBe(1);
    expect(summarizeImport(result)).toBe(
      "Failed to restore windows: 1 error(s)"
    );
  });

  it("keeps going after a candidate that fails validation", () => {
    const decoded: DecodedNotebook = {
      documentMetadata: {},
      windows: [
        {
          cellIndex: 0,
          candidateId: 1,
          origin: "window",
          kind: "chart",
          position: { ...createWindowPosition(), x: Number.NaN },
          state: createWindowState(),
          extraMetadata: {},
        },
        {
          cellIndex: 1,
          candidateId: 2,
          origin: "foreign",
          kind: "spatialEditor",
          position: createWindowPosition(),
          state: createWindowState({ content: "notes" }),
          extraMetadata: {},
        },
      ],
    };
    const store = new WindowStore({ now: TARGET_CLOCK });
    const result = reconcile(decoded, store, { now: TARGET_CLOCK });

    expect(result.restoredWindows.map((record) => record.id)).toEqual([2]);
    expect(result.errors).toHaveLength(1);
    const [error] = result.errors;
    expect(error).toBeInstanceOf(CellConversionError);
    if (error instanceof CellConversionError) {
      expect(error.cellIndex).toBe(0);
      expect(error.candidateId).toBe(1);
    }
    expect(result.idMapping.size).toBe(0);
    expect(store.get(2)?.createdAt).toBe("2024-06-01T08:00:00.000Z");
    expect(summarizeImport(result)).toBe(
      "Restored 1 window(s) with 1 error(s)"
    );
    expect(isImportSuccessful(result)).toBe(false);
  });

  it("allocates the same ids for the same input and store state", () => {
    const decoded: DecodedNotebook = {
      documentMetadata: {},
      windows: [3, 3, 4].map((candidateId, cellIndex) => ({
        cellIndex,
        candidateId,
        origin: "window" as const,
        kind: "chart" as const,
        position: createWindowPosition(),
        state: createWindowState(),
        createdAt: `2024-01-0${cellIndex + 1}T00:00:00.000Z`,
        extraMetadata: {},
      })),
    };
    const seed = (store: WindowStore) => {
      store.create("dataTable", 3);
      return store;
    };
    const first = reconcile(decoded, seed(new WindowStore()));
    const second = reconcile(decoded, seed(new WindowStore()));
    expect(Array.from(first.idMapping.entries())).toEqual(
      Array.from(second.idMapping.entries())
    );
    expect(first.restoredWindows.map((record) => record.id)).toEqual([4, 5, 6]);
  });

  it("serializes concurrent imports into one store", async () => {
    const makeExport = (content: string, clock: () => Date) => {
      const store = new WindowStore({ now: clock });
      store.create("chart", 1, undefined, { content });
      return exportText(store);
    };
    const store = new WindowStore();
    const [first, second] = await Promise.all([
      importNotebook(makeExport("first", SOURCE_CLOCK), store),
      importNotebook(makeExport("second", TARGET_CLOCK), store),
    ]);
    expect(first.idMapping.get(1)).toBe(1);
    expect(second.idMapping.get(1)).toBe(2);
    expect(store.get(2)?.state.content).toBe("second");
  });
});

describe("notebook files", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "spatialnb-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("exports to disk and imports the file back", async () => {
    const source = new WindowStore({ now: SOURCE_CLOCK });
    source.create("pointCloud", 2, { x: 4 }, { content: "scatter()" });
    const path = join(dir, "workspace.ipynb");
    const text = await exportNotebookFile(path, source);
    expect(text.endsWith("\n")).toBe(true);

    const target = new WindowStore();
    const result = await importNotebookFile(path, target);
    expect(result.errors).toEqual([]);
    expect(target.get(2)?.state.content).toBe("scatter()");
    expect(target.get(2)?.position.x).toBe(4);
  });

  it("reports unreadable files", async () => {
    const path = join(dir, "missing.ipynb");
    const result = await importNotebookFile(path, new WindowStore());
    expect(result.restoredWindows).toEqual([]);
    expect(result.errors).toHaveLength(1);
    const [error] = result.errors;
    expect(error).toBeInstanceOf(FileReadError);
    if (error instanceof FileReadError) {
      expect(error.path).toBe(path);
    }
  });

  it("imports through a document picker", async () => {
    const path = join(dir, "picked.ipynb");
    await writeFile(
      path,
      JSON.stringify({ cells: [{ cell_type: "markdown", source: "hi" }] })
    );
    const store = new WindowStore();
    const picked = await importPickedNotebook(
      {
        pick: async () => ({
          filename: "picked.ipynb",
          read: () => readFile(path),
        }),
      },
      store
    );
    expect(picked?.restoredWindows.map((record) => record.kind)).toEqual([
      "spatialEditor",
    ]);
    expect(picked?.idMapping.size).toBe(0);

    const cancelled = await importPickedNotebook(
      { pick: async () => undefined },
      store
    );
    expect(cancelled).toBeUndefined();

    const broken = await importPickedNotebook(
      {
        pick: async () => ({
          filename: "broken.ipynb",
          read: () => Promise.reject(new Error("permission denied")),
        }),
      },
      store
    );
    expect(broken?.errors[0]).toBeInstanceOf(FileReadError);
  });
});

describe("analyzeNotebook", () => {
  it("summarizes an exported notebook", () => {
    const store = new WindowStore({ now: SOURCE_CLOCK });
    store.create("chart", 1, undefined, { exportTemplate: "plotly" });
    store.create("dataTable", 2);
    const document = exportNotebook(store);
    document.cells.push({ cell_type: "markdown", source: "extra", metadata: {} });

    const analysis = analyzeNotebook(document);
    expect(analysis.ok).toBe(true);
    if (!analysis.ok) return;
    expect(analysis.value.totalCells).toBe(3);
    expect(analysis.value.windowCells).toBe(2);
    expect(analysis.value.windowTypes).toEqual(["chart", "dataTable"]);
    expect(analysis.value.exportTemplates).toEqual(["plain", "plotly"]);
    expect(analysis.value.metadata?.total_windows).toBe(2);
    expect(isWorkspaceExport(document)).toBe(true);
  });

  it("uses the configured metadata namespace by default", () => {
    vi.stubEnv("SPATIALNB_METADATA_NAMESPACE", "lab_export");
    try {
      const store = new WindowStore({ now: SOURCE_CLOCK });
      store.create("chart", 1);
      const document = exportNotebook(store);
      expect(Object.keys(document.metadata)).toContain("lab_export");
      expect(document.metadata.spatial_export).toBeUndefined();
      expect(isWorkspaceExport(document)).toBe(true);
      expect(isWorkspaceExport(document, { namespace: "spatial_export" })).toBe(
        false
      );
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it("recognizes foreign notebooks", () => {
    const foreign = { cells: [{ cell_type: "code", source: "1 + 1" }] };
    expect(isWorkspaceExport(foreign)).toBe(false);
    expect(isWorkspaceExport("{")).toBe(false);
    expect(analyzeNotebook("{").ok).toBe(false);
  });
});
