import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { DocumentReference } from "firebase-admin/firestore";
import type { VersionSnapshot } from "./types.js";
import { errorMessage } from "./utils.js";

export interface VersionStore {
  /** Whole snapshot; an empty object only on a first-ever run. */
  load(): Promise<VersionSnapshot>;
  /** Replaces the persisted snapshot in one atomic write. */
  commit(snapshot: VersionSnapshot): Promise<void>;
}

const snapshotSchema = z.record(z.string());

function parseSnapshot(data: unknown, source: string): VersionSnapshot {
  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Stored versions at ${source} are not a flat id -> version mapping`);
  }
  return parsed.data;
}

export class JsonFileVersionStore implements VersionStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<VersionSnapshot> {
    if (!fs.existsSync(this.filePath)) {
      console.log(`[STORE] No state at ${this.filePath}, starting from an empty snapshot`);
      return {};
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch (err) {
      throw new Error(`Failed to read ${this.filePath}: ${errorMessage(err)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Failed to parse ${this.filePath}: ${errorMessage(err)}`);
    }
    return parseSnapshot(data, this.filePath);
  }

  async commit(snapshot: VersionSnapshot): Promise<void> {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

    // Write beside the target and rename so a reader never sees half a file
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2), "utf8");
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      throw err;
    }
  }
}

export class FirestoreVersionStore implements VersionStore {
  constructor(private readonly doc: DocumentReference) {}

  async load(): Promise<VersionSnapshot> {
    const snap = await this.doc.get();
    if (!snap.exists) {
      console.log(`[STORE] No document at ${this.doc.path}, starting from an empty snapshot`);
      return {};
    }
    return parseSnapshot(snap.get("versions"), this.doc.path);
  }

  async commit(snapshot: VersionSnapshot): Promise<void> {
    // set() without merge replaces the whole document, so removed keys do not linger
    await this.doc.set({ versions: snapshot, updatedAt: new Date().toISOString() });
  }
}

export class InMemoryVersionStore implements VersionStore {
  private snapshot: VersionSnapshot;
  commits = 0;

  constructor(initial: VersionSnapshot = {}) {
    this.snapshot = { ...initial };
  }

  async load(): Promise<VersionSnapshot> {
    return { ...this.snapshot };
  }

  async commit(snapshot: VersionSnapshot): Promise<void> {
    this.snapshot = { ...snapshot };
    this.commits += 1;
  }
}
