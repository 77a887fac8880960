import type { NoteFormValues } from './types';
import { parseCheckbox } from './validation';

export interface NoteView {
  id: string;
  title: string;
  descriptionHtml: string; // already sanitized
  important: boolean;
}

export interface NotesPageOptions {
  notes: NoteView[];
  errors?: Record<string, string>;
  values?: NoteFormValues;
}

const BASE_STYLES = `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    background: #f8f6f1;
    color: #1a1a1a;
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
    font-size: 16px;
    line-height: 1.7;
    min-height: 100vh;
  }
  .container {
    max-width: 640px;
    margin: 0 auto;
    padding: 64px 24px;
  }
  a { color: #1a1a1a; }
  a:hover { opacity: 0.7; }
`;

const TITLE_FONT = `font-family: Georgia, 'Times New Roman', serif;`;

const FORM_STYLES = `
  input, textarea, button {
    font-family: inherit;
    font-size: inherit;
  }
  input[type="text"], textarea {
    width: 100%;
    padding: 12px;
    border: 1px solid #ccc;
    border-radius: 4px;
    background: #fff;
  }
  input[type="text"]:focus, textarea:focus {
    outline: none;
    border-color: #666;
  }
  textarea { resize: vertical; min-height: 120px; }
  button {
    padding: 10px 20px;
    border: none;
    border-radius: 4px;
    cursor: pointer;
    background: #1a1a1a;
    color: #fff;
  }
  button:hover { background: #333; }
  .form-group { margin-bottom: 20px; }
  .form-group.checkbox label { display: inline; margin-left: 6px; color: #1a1a1a; }
  label { display: block; margin-bottom: 6px; font-size: 14px; color: #666; }
  .field-error { color: #c0392b; font-size: 14px; margin-top: 4px; }
  .form-error { color: #c0392b; margin-bottom: 16px; }
`;

const LIST_STYLES = `
  .note { padding: 16px 0; border-bottom: 1px solid #ddd; }
  .note:last-child { border-bottom: none; }
  .note-title { ${TITLE_FONT} font-size: 20px; font-weight: normal; }
  .note-body p { margin-bottom: 0.5em; }
  .note-body code { background: #e8e6e1; padding: 2px 6px; border-radius: 3px; font-size: 0.9em; }
  .note-body pre { background: #e8e6e1; padding: 12px; border-radius: 4px; overflow-x: auto; }
  .note-body pre code { background: none; padding: 0; }
  .note-body ul, .note-body ol { margin: 0.5em 0 0.5em 1.5em; }
  .note.important { border-left: 3px solid #c0392b; padding-left: 12px; }
  .badge { font-size: 12px; color: #c0392b; text-transform: uppercase; letter-spacing: 0.05em; }
  .empty { color: #666; text-align: center; }
`;

function htmlTemplate(title: string, content: string, extraStyles = ''): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${BASE_STYLES}${extraStyles}</style>
</head>
<body>
  <div class="container">
    ${content}
  </div>
</body>
</html>`;
}

function renderNote(note: NoteView): string {
  const badge = note.important ? '<span class="badge">Important</span>' : '';
  return `
      <article class="note${note.important ? ' important' : ''}" id="note-${escapeHtml(note.id)}">
        ${badge}
        <h2 class="note-title">${escapeHtml(note.title)}</h2>
        <div class="note-body">${note.descriptionHtml}</div>
      </article>`;
}

function fieldError(errors: Record<string, string>, field: string): string {
  const message = errors[field];
  return message ? `<p class="field-error">${escapeHtml(message)}</p>` : '';
}

function renderForm(errors: Record<string, string>, values: NoteFormValues): string {
  const hasErrors = Object.keys(errors).length > 0;
  const checked = parseCheckbox(values.important) === true ? ' checked' : '';

  return `
    <form method="POST" action="/add_note/">
      ${hasErrors ? '<p class="form-error">Please fix the highlighted fields.</p>' : ''}
      ${fieldError(errors, 'body')}
      <div class="form-group">
        <label for="title">Title</label>
        <input type="text" id="title" name="title" value="${escapeHtml(values.title ?? '')}" required>
        ${fieldError(errors, 'title')}
      </div>
      <div class="form-group">
        <label for="description">Description (Markdown)</label>
        <textarea id="description" name="description" required>${escapeHtml(values.description ?? '')}</textarea>
        ${fieldError(errors, 'description')}
      </div>
      <div class="form-group checkbox">
        <input type="checkbox" id="important" name="important"${checked}>
        <label for="important">Important</label>
        ${fieldError(errors, 'important')}
      </div>
      <button type="submit">Add Note</button>
    </form>`;
}

export function renderNotesPage(options: NotesPageOptions): string {
  const { notes, errors = {}, values = {} } = options;

  const notesList = notes.length === 0
    ? '<p class="empty">No notes yet.</p>'
    : notes.map(renderNote).join('');

  const content = `
    <h1 style="${TITLE_FONT} font-size: 28px; font-weight: normal; margin-bottom: 32px;">Notes</h1>
    <section style="margin-bottom: 48px;">${renderForm(errors, values)}
    </section>
    <section class="notes">${notesList}
    </section>
  `;

  return htmlTemplate('Notes', content, FORM_STYLES + LIST_STYLES);
}

export function renderNotFoundPage(): string {
  const content = `
    <p style="text-align: center; color: #666;">Page not found.</p>
    <p style="text-align: center; margin-top: 24px;"><a href="/">← back to notes</a></p>
  `;
  return htmlTemplate('Not Found', content);
}

export function renderErrorPage(): string {
  const content = `
    <p style="text-align: center; color: #666;">Something went wrong. Please try again later.</p>
    <p style="text-align: center; margin-top: 24px;"><a href="/">← back to notes</a></p>
  `;
  return htmlTemplate('Error', content);
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
