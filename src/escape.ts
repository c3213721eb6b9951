/**
 * xml-tree-writer: escaping
 *
 * Values are escaped once, when they are handed to an element, and stored in
 * escaped form. The serializer writes them out verbatim.
 */

/** Anything with a textual representation. */
export type TextValue = string | number | bigint | boolean | { toString(): string };

/** Textual representation of a caller-supplied value. */
export function toText(value: TextValue): string {
	return typeof value === 'string' ? value : String(value);
}

/**
 * Replace the five XML-reserved characters with entity references.
 *
 * `&` goes first so the entities produced for the other four are left alone.
 * Feeding already-escaped text back in escapes it a second time.
 */
export function escape(input: string): string {
	return input.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/'/g, '&apos;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
