import { marked } from 'marked';
import sanitizeHtml from 'sanitize-html';

marked.setOptions({
  gfm: true,
  breaks: true,
});

// Allow the HTML Markdown produces, block all scripts
const SANITIZE_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: sanitizeHtml.defaults.allowedTags.filter((tag) => tag !== 'img'),
  allowedAttributes: {
    a: ['href', 'title'],
    code: ['class'],
    pre: ['class'],
    span: ['class'],
  },
  allowedSchemes: ['http', 'https', 'mailto'],
  disallowedTagsMode: 'discard',
};

/**
 * Render a note description as sanitized HTML.
 */
export async function renderDescription(description: string): Promise<string> {
  const rawHtml = await marked.parse(description);
  return sanitizeHtml(rawHtml, SANITIZE_OPTIONS);
}
