import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { compileSchema, type SchemaCheck } from "../schema/ajv.js";
import { errorMessage } from "../logging/redact.js";

export const STATE_VERSION = 1;

export type Details = Record<string, unknown>;

export type PhaseRecord = {
  completed: boolean;
  timestamp: string;
  details: Details;
};

export type ResourceRecord = {
  created: string;
  details: Details;
};

export type StateDocument = {
  version: typeof STATE_VERSION;
  created: string;
  last_updated: string;
  phases: Record<string, PhaseRecord>;
  resources: Record<string, Record<string, ResourceRecord>>;
};

export function emptyState(now: Date = new Date()): StateDocument {
  const ts = now.toISOString();
  return { version: STATE_VERSION, created: ts, last_updated: ts, phases: {}, resources: {} };
}

let stateCheck: SchemaCheck<StateDocument> | null = null;

function checkState(data: unknown) {
  stateCheck ??= compileSchema<StateDocument>("state");
  return stateCheck(data);
}

/**
 * Durable record of completed phases and created resources.
 * Every mutation is written through to disk before it returns.
 */
export class StateStore {
  private doc: StateDocument;

  constructor(
    readonly filePath: string,
    private readonly logger?: Logger,
  ) {
    this.doc = this.load();
  }

  /** Read the document from disk; anything unreadable yields a fresh empty document. */
  load(): StateDocument {
    this.doc = this.readFromDisk();
    return this.doc;
  }

  private readFromDisk(): StateDocument {
    if (!fs.existsSync(this.filePath)) return emptyState();

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (e) {
      this.logger?.warn({ file: this.filePath, err: errorMessage(e) }, "state file unreadable; starting from empty state");
      return emptyState();
    }

    const res = checkState(parsed);
    if (!res.valid) {
      this.logger?.warn({ file: this.filePath, err: res.errors }, "state file failed validation; starting from empty state");
      return emptyState();
    }
    return res.value;
  }

  /** Atomic write: tmp file, fsync, rename. Mode 0600 since records may hold API tokens. */
  save(): void {
    this.doc.last_updated = new Date().toISOString();
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

    const tmp = `${this.filePath}.tmp-${process.pid}`;
    try {
      const fd = fs.openSync(tmp, "w", 0o600);
      try {
        fs.writeSync(fd, JSON.stringify(this.doc, null, 2) + "\n");
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmp, this.filePath);
    } catch (e) {
      fs.rmSync(tmp, { force: true });
      throw e;
    }
  }

  snapshot(): StateDocument {
    return structuredClone(this.doc);
  }

  isComplete(phase: string): boolean {
    return this.doc.phases[phase]?.completed === true;
  }

  record(phase: string): PhaseRecord | undefined {
    return this.doc.phases[phase];
  }

  markComplete(phase: string, details: Details = {}): void {
    this.doc.phases[phase] = { completed: true, timestamp: new Date().toISOString(), details };
    this.save();
  }

  invalidate(phase: string): void {
    delete this.doc.phases[phase];
    this.save();
  }

  markResourceCreated(type: string, id: string, details: Details = {}): void {
    const bucket = (this.doc.resources[type] ??= {});
    bucket[id] = { created: new Date().toISOString(), details };
    this.save();
  }

  removeResource(type: string, id: string): void {
    const bucket = this.doc.resources[type];
    if (bucket) {
      delete bucket[id];
      if (Object.keys(bucket).length === 0) delete this.doc.resources[type];
    }
    this.save();
  }

  resources(type: string): Record<string, ResourceRecord> {
    return { ...(this.doc.resources[type] ?? {}) };
  }

  reset(): void {
    this.doc = emptyState();
    this.save();
  }
}
