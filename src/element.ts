/**
 * xml-tree-writer: element tree
 *
 * Elements are built bottom-up: create the leaves, give them attributes and
 * text, then hand them to their parents. Content follows a one-way state
 * machine (see `types.ts`); any call that would break it throws a
 * `ContractViolation` and leaves the element untouched.
 *
 * ```ts
 * const person = new Element('person').addAttribute('id', 232);
 * person.addChild(new Element('name').addText('Joe Schmoe'));
 * person.addChild(new Element('age').addText(24));
 * person.addChild(new Element('hobbies'));
 * person.write(sink);
 * ```
 */

import { escape, toText } from './escape.ts';
import type { TextValue } from './escape.ts';
import { serialize, writeDocument } from './serialize.ts';
import type { Sink } from './sink.ts';
import type { Content, ContentOperation } from './types.ts';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a call would produce a structurally invalid tree: text next to
 * child elements, a second text payload, or an element with two parents.
 *
 * This is a programming error. It is kept apart from `WriteError`, which
 * reports sink failures during serialization.
 */
export class ContractViolation extends Error {
	/** Tag name of the element the offending call was made on. */
	readonly element: string;
	readonly operation: ContentOperation;

	constructor(message: string, element: string, operation: ContentOperation) {
		super(`${message} (<${element}>.${operation})`);
		this.name = 'XmlContractViolation';
		this.element = element;
		this.operation = operation;
	}
}

// ---------------------------------------------------------------------------
// Element
// ---------------------------------------------------------------------------

type MutableContent = { type: 'empty' } | { type: 'children'; children: Element[] } | { type: 'text'; text: string };

export class Element {
	readonly name: string;
	private readonly attrs = new Map<string, string>();
	private state: MutableContent = { type: 'empty' };
	private attached = false;

	/** Creates an empty element. The name is used as-is. */
	constructor(name: TextValue) {
		this.name = toText(name);
	}

	/** Attribute name → escaped value, in first-insertion order. */
	get attributes(): ReadonlyMap<string, string> {
		return this.attrs;
	}

	get content(): Content {
		return this.state;
	}

	/**
	 * Sets an attribute. Re-adding an existing name replaces the value but
	 * keeps its original position.
	 */
	addAttribute(name: TextValue, value: TextValue): this {
		this.attrs.set(toText(name), escape(toText(value)));
		return this;
	}

	/**
	 * Appends a child element after any previously added children.
	 *
	 * @throws {ContractViolation} if this element holds text, if `child`
	 *   already has a parent, or if `child` is this element or one of its
	 *   ancestors.
	 */
	addChild(child: Element): this {
		const state = this.state;
		if (state.type === 'text') {
			throw new ContractViolation('Cannot add a child element to an element with text', this.name, 'addChild');
		}
		if (child.attached) {
			throw new ContractViolation(`<${child.name}> already belongs to another element`, this.name, 'addChild');
		}
		if (child === this || child.contains(this)) {
			throw new ContractViolation(`Adding <${child.name}> would create a cycle`, this.name, 'addChild');
		}

		if (state.type === 'empty') this.state = { type: 'children', children: [child] };
		else state.children.push(child);
		child.attached = true;
		return this;
	}

	/**
	 * Sets the text content. Only legal on an element with no children and no
	 * text yet.
	 *
	 * @throws {ContractViolation} if the element is not empty.
	 */
	addText(text: TextValue): this {
		if (this.state.type !== 'empty') {
			const what = this.state.type === 'text' ? 'an element that already has text' : 'an element with children';
			throw new ContractViolation(`Cannot add text to ${what}`, this.name, 'addText');
		}
		this.state = { type: 'text', text: escape(toText(text)) };
		return this;
	}

	/**
	 * Writes a UTF-8 XML document with this element as the root.
	 *
	 * @throws {WriteError} wrapping the first error thrown by the sink.
	 */
	write(sink: Sink): void {
		writeDocument(this, sink);
	}

	/** The document `write` would produce, as a string. */
	toString(): string {
		return serialize(this);
	}

	/** Deep copy. The copy has no parent, so it can be added anywhere. */
	clone(): Element {
		const copy = new Element(this.name);
		for (const [name, value] of this.attrs) copy.attrs.set(name, value);
		const state = this.state;
		switch (state.type) {
			case 'empty':
				break;
			case 'children':
				for (const c of state.children) copy.addChild(c.clone());
				break;
			case 'text':
				copy.state = { type: 'text', text: state.text };
				break;
		}
		return copy;
	}

	/** Structural equality: name, attributes in order, and content. */
	equals(other: Element): boolean {
		if (this === other) return true;
		if (this.name !== other.name || this.attrs.size !== other.attrs.size) return false;

		const theirs = [...other.attrs];
		if (![...this.attrs].every(([name, value], i) => theirs[i]?.[0] === name && theirs[i]?.[1] === value)) return false;

		const a = this.state;
		const b = other.state;
		switch (a.type) {
			case 'empty':
				return b.type === 'empty';
			case 'text':
				return b.type === 'text' && a.text === b.text;
			case 'children':
				return b.type === 'children' && a.children.length === b.children.length && a.children.every((c, j) => b.children[j]?.equals(c) === true);
		}
	}

	/** True if `node` is somewhere below this element. */
	private contains(node: Element): boolean {
		if (this.state.type !== 'children') return false;
		return this.state.children.some((c) => c === node || c.contains(node));
	}
}
