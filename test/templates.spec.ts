import { describe, it, expect } from 'vitest';
import { renderDescription } from '../src/markdown';
import { escapeHtml, renderNotesPage } from '../src/templates';

describe('escapeHtml', () => {
	it('escapes markup and quotes', () => {
		expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#039;&amp;&#039;&lt;/a&gt;');
	});
});

describe('renderDescription', () => {
	it('renders Markdown', async () => {
		expect(await renderDescription('**Buy** milk')).toBe('<p><strong>Buy</strong> milk</p>\n');
	});

	it('drops event handlers and javascript links', async () => {
		const html = await renderDescription('<a href="javascript:alert(1)" onclick="x()">link</a>');

		expect(html).toBe('<p><a>link</a></p>\n');
	});
});

describe('renderNotesPage', () => {
	it('marks important notes', () => {
		const html = renderNotesPage({
			notes: [{ id: 'a1', title: 'Urgent', descriptionHtml: '<p>now</p>', important: true }],
		});

		expect(html).toContain('<span class="badge">Important</span>');
		expect(html).toContain('<div class="note-body"><p>now</p></div>');
	});

	it('keeps submitted values and the checkbox state after an error', () => {
		const html = renderNotesPage({
			notes: [],
			errors: { title: 'Title is required' },
			values: { title: '"quoted"', description: 'text', important: 'on' },
		});

		expect(html).toContain('<p class="form-error">Please fix the highlighted fields.</p>');
		expect(html).toContain('value="&quot;quoted&quot;"');
		expect(html).toContain('<input type="checkbox" id="important" name="important" checked>');
	});

	it('posts the form to /add_note/', () => {
		expect(renderNotesPage({ notes: [] })).toContain('<form method="POST" action="/add_note/">');
	});
});
