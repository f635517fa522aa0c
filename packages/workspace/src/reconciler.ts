import {
  CellConversionError,
  WindowRecordSchema,
  type ExportStamp,
  type ImportError,
  type WindowRecord,
} from "@spatialnb/window-schema";
import { createLogger } from "@spatialnb/config";
import type { DecodedNotebook, DecodedWindow } from "./codec/decode.js";
import type { WindowStore } from "./store.js";

const logger = createLogger("spatialnb:reconciler");

export interface ImportResult {
  restoredWindows: WindowRecord[];
  errors: ImportError[];
  originalMetadata?: ExportStamp;
  /** Notebook `window_id` → id the window was stored under. */
  idMapping: ReadonlyMap<number, number>;
}

export interface ReconcileOptions {
  clearExisting?: boolean;
  now?: () => Date;
}

const isSameWindow = (existing: WindowRecord, candidate: DecodedWindow) =>
  existing.kind === candidate.kind &&
  candidate.createdAt !== undefined &&
  existing.createdAt === candidate.createdAt;

/**
 * Id a candidate is stored under. A window placed earlier in the same import
 * is never overwritten, even when the candidate claims to be the same window.
 * Undefined when no id is left.
 */
const resolveTargetId = (
  candidate: DecodedWindow,
  store: WindowStore,
  committed: ReadonlySet<number>
): number | undefined => {
  const existing = store.get(candidate.candidateId);
  if (
    !existing ||
    (!committed.has(candidate.candidateId) && isSameWindow(existing, candidate))
  ) {
    return candidate.candidateId;
  }
  return store.hasNextId() ? store.nextId() : undefined;
};

/**
 * Merges decoded candidates into the store one at a time. A candidate that
 * fails validation is reported in `errors` and the rest still land.
 */
export const reconcile = (
  decoded: DecodedNotebook,
  store: WindowStore,
  options: ReconcileOptions = {}
): ImportResult => {
  const now = options.now ?? (() => new Date());
  if (options.clearExisting) {
    store.clear();
  }

  const restoredIds = new Set<number>();
  const errors: ImportError[] = [];
  const idMapping = new Map<number, number>();

  for (const candidate of decoded.windows) {
    const targetId = resolveTargetId(candidate, store, restoredIds);
    if (targetId === undefined) {
      logger.warn(
        { cellIndex: candidate.cellIndex, candidateId: candidate.candidateId },
        "No free window id for cell"
      );
      errors.push(
        new CellConversionError(
          `Cell ${candidate.cellIndex} could not be restored: no free window id`,
          candidate.cellIndex,
          candidate.candidateId
        )
      );
      continue;
    }
    const createdAt = candidate.createdAt ?? now().toISOString();
    const parsed = WindowRecordSchema.safeParse({
      id: targetId,
      kind: candidate.kind,
      position: candidate.position,
      state: candidate.state,
      createdAt,
      lastModified: candidate.lastModified ?? createdAt,
      extraMetadata: candidate.extraMetadata,
    });
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "window"}: ${issue.message}`)
        .join("; ");
      logger.warn(
        { cellIndex: candidate.cellIndex, candidateId: candidate.candidateId },
        "Skipping cell that does not form a valid window"
      );
      errors.push(
        new CellConversionError(
          `Cell ${candidate.cellIndex} could not be restored: ${detail}`,
          candidate.cellIndex,
          candidate.candidateId,
          { cause: parsed.error }
        )
      );
      continue;
    }
    const record = store.restore(parsed.data);
    restoredIds.add(record.id);
    if (candidate.origin === "window") {
      idMapping.set(candidate.candidateId, record.id);
    }
    if (record.id !== candidate.candidateId) {
      logger.debug(
        { from: candidate.candidateId, to: record.id },
        "Remapped colliding window id"
      );
    }
  }

  const restoredWindows = Array.from(restoredIds).flatMap((id) => {
    const record = store.get(id);
    return record ? [record] : [];
  });

  return {
    restoredWindows,
    errors,
    ...(decoded.exportStamp ? { originalMetadata: decoded.exportStamp } : {}),
    idMapping,
  };
};

export const isImportSuccessful = (result: ImportResult): boolean =>
  result.errors.length === 0 && result.restoredWindows.length > 0;

export const summarizeImport = (result: ImportResult): string => {
  const restored = result.restoredWindows.length;
  const failed = result.errors.length;
  if (failed === 0) {
    return `Successfully restored ${restored} window(s)`;
  }
  if (restored > 0) {
    return `Restored ${restored} window(s) with ${failed} error(s)`;
  }
  return `Failed to restore windows: ${failed} error(s)`;
};
