/**
 * In-memory transcript of every emitted line.
 *
 * Unbounded: callers that need a cap clear it periodically.
 */

export class HistoryBuffer {
	private chunks: string[] = [];
	private totalLength = 0;

	/** Append a line followed by a newline */
	append(line: string): void {
		this.push(`${line}\n`);
	}

	/** Append text as-is, without a terminator */
	appendRaw(text: string): void {
		this.push(text);
	}

	clear(): void {
		this.chunks = [];
		this.totalLength = 0;
	}

	contents(): string {
		if (this.chunks.length > 1) {
			this.chunks = [this.chunks.join('')];
		}
		return this.chunks[0] ?? '';
	}

	/** Length of the accumulated text in UTF-16 code units */
	get length(): number {
		return this.totalLength;
	}

	private push(text: string): void {
		this.chunks.push(text);
		this.totalLength += text.length;
	}
}
