/**
 * Test helpers: a sample document exercising every content shape, and sinks
 * that fail on demand.
 */
import { Element } from '../src/element.ts';
import type { Sink } from '../src/sink.ts';

/** Builds the sample tree bottom-up, the way callers are expected to. */
export function sampleTree(): Element {
	const root = new Element('root');

	const child1 = new Element('child1');
	child1.addChild(new Element('inner'));
	const inner2 = new Element('inner');
	inner2.addText('Example Text\nNew line');
	child1.addChild(inner2);
	root.addChild(child1);

	const child2 = new Element('child2');
	child2.addAttribute('at1', 'test &');
	child2.addAttribute('at2', 'test <');
	child2.addAttribute('at3', 'test "');
	const inner3 = new Element('inner');
	inner3.addAttribute('test', 'example');
	child2.addChild(inner3);
	root.addChild(child2);

	const child3 = new Element('child3');
	child3.addText('&< &');
	root.addChild(child3);

	const child4 = new Element('child4');
	child4.addAttribute('non-str-attribute', 5);
	child4.addText(6);
	root.addChild(child4);

	return root;
}

export const SAMPLE_XML = `<?xml version = "1.0" encoding = "UTF-8"?>
<root>
	<child1>
		<inner />
		<inner>Example Text
New line</inner>
	</child1>
	<child2 at1="test &amp;" at2="test &lt;" at3="test &quot;">
		<inner test="example" />
	</child2>
	<child3>&amp;&lt; &amp;</child3>
	<child4 non-str-attribute="5">6</child4>
</root>
`;

/** A sink that accepts `okWrites` chunks, then throws `error` on every call. */
export class FailingSink implements Sink {
	readonly received: string[] = [];
	calls = 0;

	constructor(
		private readonly okWrites: number,
		readonly error: Error = new Error('disk full'),
	) {}

	write(chunk: Uint8Array): void {
		this.calls++;
		if (this.received.length >= this.okWrites) throw this.error;
		this.received.push(new TextDecoder().decode(chunk));
	}
}
