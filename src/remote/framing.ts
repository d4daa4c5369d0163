/**
 * Line framing for the guider wire protocol.
 * @module
 */

import { StringDecoder } from 'node:string_decoder';

import { FramingError } from '../errors.ts';

/** Terminator appended to every outgoing line. */
export const LINE_TERMINATOR = '\r\n';

/** Longest incoming line accepted before the stream is considered corrupt. */
export const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024;

/**
 * Splits a byte stream into complete, trimmed, non-empty lines.
 *
 * Partial lines are buffered until their terminator arrives. Multi-byte
 * characters split across chunks are reassembled.
 *
 * @example
 * ```typescript
 * const framer = new LineFramer();
 * framer.push('{"Event":"Paus'); // []
 * framer.push('ed"}\r\n');       // ['{"Event":"Paused"}']
 * ```
 */
export class LineFramer {
	private decoder = new StringDecoder('utf8');
	private leftover = '';

	constructor(private readonly maxLineLength = DEFAULT_MAX_LINE_LENGTH) {}

	/**
	 * Feeds one chunk and returns every line it completes.
	 *
	 * @throws {FramingError} If the buffered partial line grows past the limit.
	 */
	push(chunk: Uint8Array | string): string[] {
		const text = typeof chunk === 'string' ? chunk : this.decoder.write(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
		const lines = (this.leftover + text).split('\n');
		this.leftover = lines.pop() ?? '';

		if (this.leftover.length > this.maxLineLength) {
			const length = this.leftover.length;
			this.leftover = '';
			throw new FramingError(`Incoming line exceeds ${this.maxLineLength} characters without a terminator`, { length });
		}

		return lines.map((line) => line.trim()).filter((line) => line.length > 0);
	}

	/**
	 * Returns the unterminated remainder, if any, and resets the framer.
	 */
	flush(): string | undefined {
		const rest = (this.leftover + this.decoder.end()).trim();
		this.leftover = '';
		return rest.length > 0 ? rest : undefined;
	}
}

/**
 * Decodes framed lines into JSON values. Lines that are not valid JSON are
 * logged and skipped.
 */
export async function* decodeMessages(
	chunks: AsyncIterable<Uint8Array | string>,
	framer = new LineFramer(),
): AsyncGenerator<unknown> {
	for await (const chunk of chunks) {
		for (const line of framer.push(chunk)) {
			const value = parseLine(line);
			if (value !== undefined) {
				yield value;
			}
		}
	}

	const rest = framer.flush();
	if (rest !== undefined) {
		const value = parseLine(rest);
		if (value !== undefined) {
			yield value;
		}
	}
}

function parseLine(line: string): unknown {
	try {
		return JSON.parse(line);
	} catch (error) {
		console.warn(`[decodeMessages] Skipping malformed message (${error instanceof Error ? error.message : String(error)}): ${line.slice(0, 200)}`);
		return undefined;
	}
}
