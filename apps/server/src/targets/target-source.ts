import { readFile } from "node:fs/promises";
import { z } from "zod";
import { defaultCollaboratorTimeoutMs, withDeadline } from "../lib/abort";
import { CollaboratorTimeoutError, SourceNotFoundError } from "../lib/errors";
import type { LoadedTargets, TargetEntry, TargetSourceDescriptor } from "../types";
import { resolveSourcePath } from "./source-resolver";
import { normalizeTargetEntries, parseTargetList } from "./target-loader";

export interface TargetSource {
  readonly description: string;
  load(signal?: AbortSignal): Promise<LoadedTargets>;
}

export interface InventoryClient {
  fetchTargets(query: string, signal?: AbortSignal): Promise<TargetEntry[]>;
}

export const defaultInventoryQuery = "default";

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");

export class FileTargetSource implements TargetSource {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = filePath;
  }

  async load(signal?: AbortSignal): Promise<LoadedTargets> {
    let text: string;
    try {
      text = await readFile(this.filePath, { encoding: "utf8", signal });
    } catch (error) {
      if (isNotFound(error)) {
        throw new SourceNotFoundError(this.filePath, [this.filePath]);
      }
      throw error;
    }

    return parseTargetList(text);
  }
}

export class QueryTargetSource implements TargetSource {
  readonly description: string;

  constructor(
    private readonly client: InventoryClient | undefined,
    private readonly query: string,
    private readonly timeoutMs: number = defaultCollaboratorTimeoutMs
  ) {
    this.description = `query:${query}`;
  }

  async load(signal?: AbortSignal): Promise<LoadedTargets> {
    const { client } = this;
    if (!client) {
      throw new SourceNotFoundError(this.description);
    }

    let entries: TargetEntry[];
    try {
      entries = await withDeadline((callSignal) => client.fetchTargets(this.query, callSignal), {
        timeoutMs: this.timeoutMs,
        signal
      });
    } catch (error) {
      if (error instanceof CollaboratorTimeoutError || (signal?.aborted && !(error instanceof SourceNotFoundError))) {
        throw new SourceNotFoundError(this.description, [], { cause: error });
      }
      throw error;
    }

    return normalizeTargetEntries(entries);
  }
}

const inventoryEntrySchema = z.union([
  z.string().min(1).transform((identifier): TargetEntry => ({ identifier })),
  z
    .object({
      identifier: z.string().min(1).optional(),
      ip: z.string().min(1).optional(),
      label: z.string().nullish()
    })
    .refine((entry) => Boolean(entry.identifier ?? entry.ip), "entry needs an identifier or ip")
    .transform((entry): TargetEntry => {
      const identifier = entry.identifier ?? entry.ip ?? "";
      return entry.label ? { identifier, label: entry.label } : { identifier };
    })
]);

const inventoryResponseSchema = z.array(inventoryEntrySchema);

/** Asks an inventory service for the targets behind a named query. */
export class HttpInventoryClient implements InventoryClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async fetchTargets(query: string, signal?: AbortSignal): Promise<TargetEntry[]> {
    const url = new URL(this.baseUrl);
    url.searchParams.set("query", query);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: "application/json" }, signal });
    } catch (error) {
      throw new SourceNotFoundError(`query:${query}`, [url.toString()], { cause: error });
    }

    if (response.status === 404) {
      throw new SourceNotFoundError(`query:${query}`, [url.toString()]);
    }

    if (!response.ok) {
      throw new Error(`Inventory request failed with HTTP ${response.status}.`);
    }

    const parsed = inventoryResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Inventory response for "${query}" is malformed: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }

    return parsed.data;
  }
}

export interface SourceFactoryOptions {
  baseDir: string;
  inventory?: InventoryClient;
  timeoutMs?: number;
}

export const createTargetSource = (
  descriptor: TargetSourceDescriptor,
  { baseDir, inventory, timeoutMs }: SourceFactoryOptions
): TargetSource => {
  if (descriptor.kind === "query") {
    return new QueryTargetSource(inventory, descriptor.query, timeoutMs);
  }

  return new FileTargetSource(resolveSourcePath(descriptor.path, { baseDir }));
};
