import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StateCorruptionError } from "../domain/errors.js";
import type { MonitorState } from "../types/monitor.js";

export interface MonitorStateStore {
  load(): Promise<MonitorState>;
  save(state: MonitorState): Promise<void>;
}

export function createDefaultState(): MonitorState {
  return {
    monitoring_enabled: true,
    last_run_time: null,
    last_run_status: null,
    last_error_message: null,
    last_error_signature: null,
    last_error_time: null,
    last_announcement: null,
  };
}

const nullableString = z.string().nullable().default(null);

const storedAnnouncementSchema = z.object({
  text: z.string(),
  pdf_url: z.string().nullable().default(null),
  first_detected: z.string(),
});

const monitorStateSchema = z.object({
  monitoring_enabled: z.boolean().default(true),
  last_run_time: nullableString,
  last_run_status: z.enum(["success", "failure"]).nullable().default(null),
  last_error_message: nullableString,
  last_error_signature: nullableString,
  last_error_time: nullableString,
  last_announcement: storedAnnouncementSchema.nullable().default(null),
});

function cloneState(state: MonitorState): MonitorState {
  return {
    ...state,
    last_announcement: state.last_announcement ? { ...state.last_announcement } : null,
  };
}

export function parseStateDocument(raw: string): MonitorState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StateCorruptionError("invalid_json", "State document is not valid JSON", { cause: error });
  }

  const result = monitorStateSchema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first?.path.length ? first.path.join(".") : "document";
    throw new StateCorruptionError("invalid_shape", `State document has an invalid ${where}`, { cause: result.error });
  }
  return result.data;
}

export function serializeStateDocument(state: MonitorState): string {
  return `${JSON.stringify(state, null, 2)}\n`;
}

export class InMemoryMonitorStateStore implements MonitorStateStore {
  private state: MonitorState | null;

  constructor(initial?: MonitorState) {
    this.state = initial ? cloneState(initial) : null;
  }

  async load(): Promise<MonitorState> {
    return this.state ? cloneState(this.state) : createDefaultState();
  }

  async save(state: MonitorState): Promise<void> {
    this.state = cloneState(state);
  }

  snapshot(): MonitorState | null {
    return this.state ? cloneState(this.state) : null;
  }
}

/**
 * JSON document on disk. Writes go to a sibling temporary file that is then
 * renamed over the target, so readers only ever see a complete document.
 */
export class FileBackedMonitorStateStore implements MonitorStateStore {
  private readonly statePath: string;
  private readonly tmpPath: string;

  constructor(statePath: string) {
    const absolute = path.isAbsolute(statePath) ? statePath : path.resolve(process.cwd(), statePath);
    this.statePath = absolute;
    this.tmpPath = `${absolute}.tmp`;
  }

  get filePath(): string {
    return this.statePath;
  }

  async load(): Promise<MonitorState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.statePath, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") return createDefaultState();
      throw new StateCorruptionError("unreadable", `State document could not be read (${code ?? "unknown error"})`, {
        cause: error,
      });
    }
    return parseStateDocument(raw);
  }

  async save(state: MonitorState): Promise<void> {
    await fs.mkdir(path.dirname(this.statePath), { recursive: true });
    try {
      await fs.writeFile(this.tmpPath, serializeStateDocument(state), "utf8");
      await fs.rename(this.tmpPath, this.statePath);
    } catch (error) {
      await fs.rm(this.tmpPath, { force: true });
      throw error;
    }
  }
}
