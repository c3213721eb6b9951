/**
 * xml-tree-writer: XML serializer
 *
 * Walks an element tree depth-first and writes one line per tag:
 *
 *   <?xml version = "1.0" encoding = "UTF-8"?>
 *   <root attr="val">
 *   	<child>text</child>
 *   	<empty />
 *   </root>
 *
 * Format contract
 * ───────────────
 * • The declaration line above is always written, verbatim.
 * • One tab per nesting level; the root has none.
 * • Every tag line ends in `\n`. Text stays on its tag's line; newlines
 *   inside the text are written as they are.
 * • Attributes appear in first-insertion order, children in append order.
 * • Values are already escaped by the element and are not escaped again.
 *
 * The tree is only read, never modified.
 */

import type { Element } from './element.ts';
import { MemorySink } from './sink.ts';
import type { Sink } from './sink.ts';

export const XML_DECLARATION = '<?xml version = "1.0" encoding = "UTF-8"?>';

/**
 * Thrown by `writeDocument` when the sink fails. The sink's own error is kept
 * as `cause`; whatever was written before the failure stays in the sink.
 */
export class WriteError extends Error {
	/** Bytes successfully handed to the sink before the failure. */
	readonly bytesWritten: number;

	constructor(bytesWritten: number, cause: unknown) {
		super(`Failed writing XML to sink after ${bytesWritten} bytes`, { cause });
		this.name = 'XmlWriteError';
		this.bytesWritten = bytesWritten;
	}
}

// ---------------------------------------------------------------------------
// Line output
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();

class LineWriter {
	private written = 0;

	constructor(private readonly sink: Sink) {}

	line(s: string): void {
		const bytes = encoder.encode(`${s}\n`);
		try {
			this.sink.write(bytes);
		} catch (err) {
			throw new WriteError(this.written, err);
		}
		this.written += bytes.byteLength;
	}
}

// ---------------------------------------------------------------------------
// Element emission
// ---------------------------------------------------------------------------

function attributeString(el: Element): string {
	let s = '';
	for (const [name, value] of el.attributes) s += ` ${name}="${value}"`;
	return s;
}

function writeElement(out: LineWriter, el: Element, level: number): void {
	const indent = '\t'.repeat(level);
	const attrs = attributeString(el);
	const content = el.content;

	switch (content.type) {
		case 'empty':
			out.line(`${indent}<${el.name}${attrs} />`);
			return;

		case 'children':
			out.line(`${indent}<${el.name}${attrs}>`);
			for (const c of content.children) writeElement(out, c, level + 1);
			out.line(`${indent}</${el.name}>`);
			return;

		case 'text':
			out.line(`${indent}<${el.name}${attrs}>${content.text}</${el.name}>`);
			return;
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Write a complete document rooted at `root` to `sink`: the XML declaration,
 * then the tree.
 *
 * Stops at the first sink failure and throws `WriteError`; there is no retry.
 */
export function writeDocument(root: Element, sink: Sink): void {
	const out = new LineWriter(sink);
	out.line(XML_DECLARATION);
	writeElement(out, root, 0);
}

/** The document `writeDocument` would produce, decoded from an in-memory sink. */
export function serialize(root: Element): string {
	const sink = new MemorySink();
	writeDocument(root, sink);
	return sink.text();
}
