// nanoid generates short, URL-safe ids for session handles.
import { nanoid } from 'nanoid';
import { SessionRecord } from './sessionTypes';

// Abstracts session existence tracking behind a minimal interface.
export interface SessionRepository {
  // Mints a new opaque session id.
  create(): Promise<SessionRecord>;
  // Returns a session by id or undefined if missing.
  get(id: string): Promise<SessionRecord | undefined>;
  exists(id: string): Promise<boolean>;
  // All known sessions in creation order.
  list(): Promise<SessionRecord[]>;
}

// In-memory repository; sessions live for the lifetime of the process.
export class InMemorySessionRepository implements SessionRepository {
  private sessions = new Map<string, SessionRecord>();

  // Mints a nanoid-backed session with its creation time.
  async create(): Promise<SessionRecord> {
    const rec: SessionRecord = { id: nanoid(), createdAt: new Date().toISOString() };
    this.sessions.set(rec.id, rec);
    return { ...rec };
  }

  // Returns a copy of the stored record.
  async get(id: string): Promise<SessionRecord | undefined> {
    const rec = this.sessions.get(id);
    return rec ? { ...rec } : undefined;
  }

  // True only for ids this repository minted.
  async exists(id: string): Promise<boolean> {
    return this.sessions.has(id);
  }

  // Sessions in creation order.
  async list(): Promise<SessionRecord[]> {
    return [...this.sessions.values()].map(rec => ({ ...rec }));
  }
}
