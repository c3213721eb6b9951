/**
 * xml-tree-writer
 *
 * Builds an XML element tree in memory and writes it out as an indented
 * UTF-8 document. Write-only: there is no parser and no query API.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { Element, MemorySink } from 'xml-tree-writer';
 *
 * const root = new Element('root').addAttribute('attr', 'val');
 * root.addChild(new Element('child').addText('text'));
 * root.addChild(new Element('empty'));
 *
 * const sink = new MemorySink();
 * root.write(sink);
 * // sink.text() ===
 * //   <?xml version = "1.0" encoding = "UTF-8"?>
 * //   <root attr="val">
 * //   	<child>text</child>
 * //   	<empty />
 * //   </root>
 * ```
 */

// Element tree and its contract error
export { Element, ContractViolation } from './element.ts';

// Content shapes and type guards
export type { ContentType, EmptyContent, ChildrenContent, TextContent, Content, ContentOperation } from './types.ts';
export { isEmpty, hasChildren, hasText } from './types.ts';

// Serializer
export { writeDocument, serialize, WriteError, XML_DECLARATION } from './serialize.ts';

// Sinks
export type { Sink } from './sink.ts';
export { MemorySink, callbackSink } from './sink.ts';

// Escaping
export type { TextValue } from './escape.ts';
export { escape, toText } from './escape.ts';
