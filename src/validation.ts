import { ValidationError } from './errors';
import type { Note, NoteFormValues } from './types';

const TRUE_VALUES = new Set(['on', 'true', '1', 'yes']);
const FALSE_VALUES = new Set(['', 'off', 'false', '0', 'no']);

/**
 * Validate a submitted note form. Title and description are kept exactly as
 * sent; `important` follows checkbox semantics (absent means false).
 */
export function parseNoteInput(values: NoteFormValues): Note {
  const errors: Record<string, string> = {};

  const title = values.title ?? '';
  if (title.trim() === '') {
    errors['title'] = 'Title is required';
  }

  const description = values.description ?? '';
  if (description.trim() === '') {
    errors['description'] = 'Description is required';
  }

  const important = parseCheckbox(values.important);
  if (important === null) {
    errors['important'] = 'Important must be a yes/no value';
  }

  if (Object.keys(errors).length > 0 || important === null) {
    throw new ValidationError(errors);
  }

  return { title, description, important };
}

export function parseCheckbox(value: string | undefined): boolean | null {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

/**
 * Pull the note fields out of a form body. Repeated fields keep the first
 * value; file uploads are ignored.
 */
export function readNoteForm(formData: FormData): NoteFormValues {
  const values: NoteFormValues = {};
  for (const field of ['title', 'description', 'important'] as const) {
    const value = formData.get(field);
    if (typeof value === 'string') {
      values[field] = value;
    }
  }
  return values;
}
