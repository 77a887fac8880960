import type { Env, Note, NoteStore, StoredNote } from '../src/types';

/**
 * In-process NoteStore for tests. Set `failWith` to make every operation
 * reject, as an unreachable database would.
 */
export class MemoryNoteStore implements NoteStore {
  readonly notes: StoredNote[] = [];
  failWith: Error | null = null;
  private nextId = 1;

  async list(): Promise<StoredNote[]> {
    if (this.failWith) throw this.failWith;
    return this.notes.map((note) => ({ ...note }));
  }

  async insert(note: Note): Promise<StoredNote> {
    if (this.failWith) throw this.failWith;
    const stored: StoredNote = { id: String(this.nextId++), ...note };
    this.notes.push(stored);
    return { ...stored };
  }

  async close(): Promise<void> {}
}

export function createTestEnv(): { env: Env; store: MemoryNoteStore } {
  const store = new MemoryNoteStore();
  return { env: { NOTES_STORE: store }, store };
}
