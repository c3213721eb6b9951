/**
 * xml-tree-writer: byte sinks
 *
 * The serializer only needs somewhere to put bytes, in order. A sink reports
 * failure by throwing from `write`.
 */

export interface Sink {
	write(chunk: Uint8Array): void;
}

/** Collects everything written to it in memory. */
export class MemorySink implements Sink {
	private readonly chunks: Uint8Array[] = [];
	private length = 0;

	write(chunk: Uint8Array): void {
		// copy: the caller may reuse its buffer
		this.chunks.push(chunk.slice());
		this.length += chunk.byteLength;
	}

	/** Number of bytes written so far. */
	get size(): number {
		return this.length;
	}

	/** All bytes written so far, concatenated. */
	bytes(): Uint8Array {
		const out = new Uint8Array(this.length);
		let offset = 0;
		for (const chunk of this.chunks) {
			out.set(chunk, offset);
			offset += chunk.byteLength;
		}
		return out;
	}

	/**
	 * The bytes decoded as UTF-8.
	 *
	 * @throws {TypeError} if the buffer is not valid UTF-8.
	 */
	text(): string {
		return new TextDecoder('utf-8', { fatal: true }).decode(this.bytes());
	}
}

/**
 * Wraps a plain function as a sink, e.g. `callbackSink((b) => fs.writeSync(fd, b))`.
 */
export function callbackSink(fn: (chunk: Uint8Array) => void): Sink {
	return { write: fn };
}
