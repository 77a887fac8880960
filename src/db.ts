import { StoreUnavailableError } from './errors';
import { parseNoteInput } from './validation';
import type { Env, NoteFormValues, StoredNote } from './types';

/**
 * Every stored note, oldest first.
 */
export async function getAllNotes(env: Env): Promise<StoredNote[]> {
  try {
    return await env.NOTES_STORE.list();
  } catch (err) {
    throw new StoreUnavailableError(err);
  }
}

/**
 * Validate and insert one note, then return the refreshed listing.
 * Identical submissions are stored as separate notes.
 */
export async function createNote(env: Env, values: NoteFormValues): Promise<StoredNote[]> {
  const note = parseNoteInput(values);

  try {
    await env.NOTES_STORE.insert(note);
  } catch (err) {
    throw new StoreUnavailableError(err);
  }

  return getAllNotes(env);
}
