import { z } from "zod";

// Notebook server REST models. Only the fields this client reads are declared.

export const ContentsEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string(),
  size: z.number().nullable().optional(),
  last_modified: z.string().optional(),
});
export type ContentsEntry = z.infer<typeof ContentsEntrySchema>;

export const DirectoryContentsSchema = ContentsEntrySchema.extend({
  type: z.literal("directory"),
  content: z.array(ContentsEntrySchema),
});

export const NotebookContentsSchema = ContentsEntrySchema.extend({
  type: z.literal("notebook"),
  content: z.unknown(),
});

export const KernelModelSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  execution_state: z.string().optional(),
  last_activity: z.string().optional(),
  connections: z.number().optional(),
});
export type KernelModel = z.infer<typeof KernelModelSchema>;

export const KernelListSchema = z.array(KernelModelSchema);

export const SessionModelSchema = z.object({
  id: z.string(),
  path: z.string().optional(),
  name: z.string().optional(),
  type: z.string().optional(),
  kernel: KernelModelSchema,
});
export type SessionModel = z.infer<typeof SessionModelSchema>;

export interface RemoteNotebookEntry {
  name: string;
  path: string;
  size?: number;
  lastModified?: string;
}

export const toNotebookEntry = (entry: ContentsEntry): RemoteNotebookEntry => ({
  name: entry.name,
  path: entry.path,
  ...(typeof entry.size === "number" ? { size: entry.size } : {}),
  ...(entry.last_modified ? { lastModified: entry.last_modified } : {}),
});

/** `a b/c.ipynb` → `a%20b/c.ipynb`; leading and trailing slashes are dropped. */
export const encodeContentsPath = (path: string): string =>
  path
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join("/");
