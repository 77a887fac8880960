export interface Env {
  NOTES_STORE: NoteStore;
}

export interface Note {
  title: string;
  description: string; // Markdown source, stored as submitted
  important: boolean;
}

export interface StoredNote extends Note {
  id: string; // assigned by the store
}

export interface NoteStore {
  list(): Promise<StoredNote[]>;
  insert(note: Note): Promise<StoredNote>;
  close(): Promise<void>;
}

export type NoteFormField = 'title' | 'description' | 'important';

export type NoteFormValues = Partial<Record<NoteFormField, string>>;
