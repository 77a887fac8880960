import type { Env, NoteFormValues, StoredNote } from './types';
import { createNote, getAllNotes } from './db';
import { StoreUnavailableError, ValidationError } from './errors';
import { secureResponse } from './headers';
import { renderDescription } from './markdown';
import {
  renderErrorPage,
  renderNotFoundPage,
  renderNotesPage,
  type NoteView,
} from './templates';
import { readNoteForm } from './validation';

export interface FetchHandler {
  fetch(request: Request, env: Env): Promise<Response>;
}

const handler: FetchHandler = {
  async fetch(request: Request, env: Env): Promise<Response> {
    try {
      return await route(request, env);
    } catch (err) {
      return handleError(err);
    }
  },
};

export default handler;

async function route(request: Request, env: Env): Promise<Response> {
  const url = new URL(request.url);
  const path = url.pathname;
  const method = request.method;

  if (path === '/' || path === '') {
    if (method === 'GET' || method === 'HEAD') {
      return handleListNotes(env);
    }
    return methodNotAllowed('GET, HEAD');
  }

  // Trailing slash is optional on the form target
  if (path === '/add_note/' || path === '/add_note') {
    if (method === 'POST') {
      return handleCreateNote(request, env);
    }
    return methodNotAllowed('POST');
  }

  if (path === '/health') {
    if (method === 'GET') {
      return secureResponse(JSON.stringify({ status: 'ok' }), {
        headers: { 'Content-Type': 'application/json' },
      });
    }
    return methodNotAllowed('GET');
  }

  return secureResponse(renderNotFoundPage(), { status: 404 });
}

async function handleListNotes(env: Env): Promise<Response> {
  const notes = await getAllNotes(env);
  return secureResponse(renderNotesPage({ notes: await toNoteViews(notes) }));
}

async function handleCreateNote(request: Request, env: Env): Promise<Response> {
  let values: NoteFormValues = {};

  try {
    const formData = await readFormData(request);
    values = readNoteForm(formData);
    const notes = await createNote(env, values);
    return secureResponse(renderNotesPage({ notes: await toNoteViews(notes) }), { status: 201 });
  } catch (err) {
    if (!(err instanceof ValidationError)) {
      throw err;
    }
    // Re-render the listing with the submitted values so nothing typed is lost
    const notes = await getAllNotes(env);
    const page = renderNotesPage({
      notes: await toNoteViews(notes),
      errors: err.fields,
      values,
    });
    return secureResponse(page, { status: 400 });
  }
}

async function readFormData(request: Request): Promise<FormData> {
  try {
    return await request.formData();
  } catch {
    throw new ValidationError({ body: 'Request body must be form data' });
  }
}

async function toNoteViews(notes: StoredNote[]): Promise<NoteView[]> {
  return Promise.all(
    notes.map(async (note) => ({
      id: note.id,
      title: note.title,
      descriptionHtml: await renderDescription(note.description),
      important: note.important,
    }))
  );
}

function methodNotAllowed(allow: string): Response {
  return secureResponse('Method not allowed', {
    status: 405,
    headers: { Allow: allow, 'Content-Type': 'text/plain; charset=utf-8' },
  });
}

function handleError(err: unknown): Response {
  if (err instanceof StoreUnavailableError) {
    console.error('Note store unavailable:', err.cause);
  } else {
    console.error('Unhandled error:', err);
  }
  return secureResponse(renderErrorPage(), { status: 500 });
}
