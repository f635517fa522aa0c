import { EventEmitter } from "node:events";
import {
  WindowRecordSchema,
  createWindowPosition,
  createWindowState,
  normalizeTags,
  normalizeWindowState,
  type ExportTemplate,
  type WindowKind,
  type WindowPosition,
  type WindowRecord,
  type WindowState,
} from "@spatialnb/window-schema";

export type WindowStoreEvent =
  | { type: "created"; record: WindowRecord; replaced: boolean }
  | { type: "updated"; record: WindowRecord }
  | { type: "removed"; id: number }
  | { type: "cleared"; removed: number[] };

export interface WindowDraft {
  kind: WindowKind;
  position: WindowPosition;
  state: WindowState;
  extraMetadata: Record<string, unknown>;
}

export interface WindowStoreOptions {
  now?: () => Date;
}

const clone = <T>(value: T): T => structuredClone(value);

/**
 * Authoritative table of windows keyed by id.
 *
 * Reads hand out snapshots; a snapshot is not updated by later mutations.
 * JavaScript runs each mutation to completion, and asynchronous owners
 * (file imports, remote fetches) queue behind {@link WindowStore.exclusive}
 * so their merge steps never interleave.
 */
export class WindowStore {
  private readonly records = new Map<number, WindowRecord>();
  private readonly events = new EventEmitter();
  private readonly now: () => Date;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: WindowStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Inserts a fresh window. An existing window with the same id is replaced
   * (last write wins); only the import reconciler avoids collisions.
   */
  create(
    kind: WindowKind,
    id: number,
    position?: Partial<WindowPosition>,
    state?: Partial<WindowState>
  ): WindowRecord {
    const timestamp = this.now().toISOString();
    const record = WindowRecordSchema.parse({
      id,
      kind,
      position: createWindowPosition(position),
      state: normalizeWindowState(kind, createWindowState(state)),
      createdAt: timestamp,
      lastModified: timestamp,
      extraMetadata: {},
    });
    const replaced = this.records.has(id);
    this.records.set(id, record);
    this.emit({ type: "created", record: clone(record), replaced });
    return clone(record);
  }

  /**
   * Writes a complete record, keeping its timestamps. Replacing an existing
   * window counts as a mutation of it, so `lastModified` never moves back.
   */
  restore(record: WindowRecord): WindowRecord {
    const parsed = WindowRecordSchema.parse(record);
    const existing = this.records.get(parsed.id);
    const normalized: WindowRecord = {
      ...parsed,
      state: normalizeWindowState(parsed.kind, parsed.state),
      ...(existing
        ? { lastModified: this.nextModified(existing.lastModified) }
        : {}),
    };
    const replaced = existing !== undefined;
    this.records.set(normalized.id, normalized);
    this.emit({ type: "created", record: clone(normalized), replaced });
    return clone(normalized);
  }

  get(id: number): WindowRecord | undefined {
    const record = this.records.get(id);
    return record ? clone(record) : undefined;
  }

  has(id: number): boolean {
    return this.records.has(id);
  }

  /**
   * Applies `mutator` to a draft of the window and commits it when the result
   * validates. Returns undefined when the id is unknown.
   */
  update(
    id: number,
    mutator: (draft: WindowDraft) => void
  ): WindowRecord | undefined {
    const current = this.records.get(id);
    if (!current) {
      return undefined;
    }
    const draft: WindowDraft = clone({
      kind: current.kind,
      position: current.position,
      state: current.state,
      extraMetadata: current.extraMetadata,
    });
    mutator(draft);
    const next = WindowRecordSchema.parse({
      ...current,
      kind: draft.kind,
      position: draft.position,
      state: normalizeWindowState(draft.kind, draft.state),
      extraMetadata: draft.extraMetadata,
      lastModified: this.nextModified(current.lastModified),
    });
    this.records.set(id, next);
    this.emit({ type: "updated", record: clone(next) });
    return clone(next);
  }

  updatePosition(id: number, position: Partial<WindowPosition>) {
    return this.update(id, (draft) => {
      draft.position = { ...draft.position, ...position };
    });
  }

  updateContent(id: number, content: string) {
    return this.update(id, (draft) => {
      draft.state.content = content;
    });
  }

  updateTemplate(id: number, template: ExportTemplate) {
    return this.update(id, (draft) => {
      draft.state.exportTemplate = template;
    });
  }

  addTag(id: number, tag: string) {
    return this.update(id, (draft) => {
      draft.state.tags = normalizeTags([...draft.state.tags, tag]);
    });
  }

  removeTag(id: number, tag: string) {
    return this.update(id, (draft) => {
      draft.state.tags = draft.state.tags.filter((entry) => entry !== tag);
    });
  }

  remove(id: number): boolean {
    const existed = this.records.delete(id);
    if (existed) {
      this.emit({ type: "removed", id });
    }
    return existed;
  }

  clear(): void {
    const removed = Array.from(this.records.keys()).sort((a, b) => a - b);
    this.records.clear();
    this.emit({ type: "cleared", removed });
  }

  listAll(): WindowRecord[] {
    return Array.from(this.records.values())
      .sort((a, b) => a.id - b.id)
      .map((record) => clone(record));
  }

  /** Highest id in the store, or 0 when empty. */
  maxId(): number {
    let max = 0;
    for (const id of this.records.keys()) {
      if (id > max) max = id;
    }
    return max;
  }

  /** Throws a RangeError once the highest id is `Number.MAX_SAFE_INTEGER`. */
  nextId(): number {
    const max = this.maxId();
    if (max >= Number.MAX_SAFE_INTEGER) {
      throw new RangeError("No window id is left above the highest one");
    }
    return max + 1;
  }

  /** Like {@link nextId}, without throwing. */
  hasNextId(): boolean {
    return this.maxId() < Number.MAX_SAFE_INTEGER;
  }

  /**
   * Runs `task` after every previously queued task has settled. A rejected
   * task does not block the tasks queued after it.
   */
  exclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.catch(() => undefined);
    return run;
  }

  subscribe(listener: (event: WindowStoreEvent) => void): () => void {
    this.events.on("change", listener);
    return () => {
      this.events.off("change", listener);
    };
  }

  private emit(event: WindowStoreEvent) {
    this.events.emit("change", event);
  }

  private nextModified(previous: string): string {
    const candidate = this.now();
    const previousMs = Date.parse(previous);
    if (Number.isFinite(previousMs) && candidate.getTime() < previousMs) {
      return previous;
    }
    return candidate.toISOString();
  }
}
