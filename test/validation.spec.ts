import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/errors';
import { parseNoteInput, readNoteForm } from '../src/validation';

function validationFields(fn: () => unknown): Record<string, string> {
	try {
		fn();
	} catch (err) {
		if (err instanceof ValidationError) return err.fields;
		throw err;
	}
	throw new Error('expected a ValidationError');
}

describe('parseNoteInput', () => {
	it('keeps title and description exactly as submitted', () => {
		expect(parseNoteInput({ title: '  Groceries ', description: 'Buy milk\n', important: 'on' })).toEqual({
			title: '  Groceries ',
			description: 'Buy milk\n',
			important: true,
		});
	});

	it('defaults important to false when omitted', () => {
		expect(parseNoteInput({ title: 'Call Bob', description: 're: project' }).important).toBe(false);
	});

	it.each([
		['on', true],
		['TRUE', true],
		['1', true],
		['yes', true],
		['', false],
		['off', false],
		['false', false],
		['0', false],
	])('reads important=%j as %s', (value, expected) => {
		expect(parseNoteInput({ title: 't', description: 'd', important: value }).important).toBe(expected);
	});

	it('rejects a missing title', () => {
		expect(validationFields(() => parseNoteInput({ description: 'd' }))).toEqual({
			title: 'Title is required',
		});
	});

	it('rejects a whitespace-only title', () => {
		expect(validationFields(() => parseNoteInput({ title: '   ', description: 'd' }))).toEqual({
			title: 'Title is required',
		});
	});

	it('names every offending field', () => {
		const fields = validationFields(() => parseNoteInput({ important: 'maybe' }));
		expect(Object.keys(fields)).toEqual(['title', 'description', 'important']);
		expect(fields['important']).toBe('Important must be a yes/no value');
	});

	it('puts the field names in the error message', () => {
		expect(() => parseNoteInput({ title: 'x' })).toThrow('Invalid fields: description');
	});
});

describe('readNoteForm', () => {
	it('reads only the note fields', () => {
		const formData = new FormData();
		formData.append('title', 'Groceries');
		formData.append('description', 'Buy milk');
		formData.append('other', 'ignored');

		expect(readNoteForm(formData)).toEqual({ title: 'Groceries', description: 'Buy milk' });
	});

	it('keeps the first of repeated fields', () => {
		const formData = new FormData();
		formData.append('title', 'first');
		formData.append('title', 'second');

		expect(readNoteForm(formData).title).toBe('first');
	});
});
