/**
 * xml-tree-writer: type definitions
 *
 * An element's content is exactly one of three shapes, discriminated on
 * `type`:
 *
 *   Content
 *   ├── EmptyContent     <name />
 *   ├── ChildrenContent  <name>…</name> spanning several lines
 *   └── TextContent      <name>text</name>
 *
 * The only legal transitions are empty → children and empty → text.
 */

import type { Element } from './element.ts';

/** All legal values of `content.type`. */
export type ContentType = 'empty' | 'children' | 'text';

/** No children and no text; serialized self-closing. */
export interface EmptyContent {
	readonly type: 'empty';
}

/** One or more child elements in append order. */
export interface ChildrenContent {
	readonly type: 'children';
	readonly children: ReadonlyArray<Element>;
}

/** A text leaf. `text` is already escaped. */
export interface TextContent {
	readonly type: 'text';
	readonly text: string;
}

export type Content = EmptyContent | ChildrenContent | TextContent;

/** Operations that can violate the content contract. */
export type ContentOperation = 'addChild' | 'addText';

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isEmpty(content: Content): content is EmptyContent {
	return content.type === 'empty';
}

export function hasChildren(content: Content): content is ChildrenContent {
	return content.type === 'children';
}

export function hasText(content: Content): content is TextContent {
	return content.type === 'text';
}
