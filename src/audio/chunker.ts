export interface AudioChunk {
	samples: Float32Array;
	sampleRate: number;
	sequence: number;
	/** Epoch milliseconds at emission. */
	timestamp: number;
}

/**
 * Accumulates samples and cuts them into fixed-size chunks. The remainder
 * stays buffered until the next push or the final {@link flush}.
 */
export class AudioChunker {
	private buffer: Float32Array;
	private length = 0;
	private sequence = 0;
	public readonly chunkSize: number;

	constructor(
		private readonly sampleRate: number,
		chunkDurationMs: number,
		private readonly now: () => number = Date.now,
	) {
		this.chunkSize = Math.max(1, Math.round((sampleRate * chunkDurationMs) / 1000));
		this.buffer = new Float32Array(this.chunkSize * 2);
	}

	public get buffered(): number {
		return this.length;
	}

	public push(samples: Float32Array): AudioChunk[] {
		this.ensureCapacity(this.length + samples.length);
		this.buffer.set(samples, this.length);
		this.length += samples.length;

		const chunks: AudioChunk[] = [];
		let offset = 0;
		while (this.length - offset >= this.chunkSize) {
			chunks.push(this.makeChunk(offset, this.chunkSize));
			offset += this.chunkSize;
		}

		if (offset > 0) {
			this.buffer.copyWithin(0, offset, this.length);
			this.length -= offset;
		}

		return chunks;
	}

	/** Emits whatever is buffered as one final, possibly short, chunk. */
	public flush(): AudioChunk | null {
		if (this.length === 0) return null;
		const chunk = this.makeChunk(0, this.length);
		this.length = 0;
		return chunk;
	}

	public reset(): void {
		this.length = 0;
		this.sequence = 0;
	}

	private makeChunk(offset: number, size: number): AudioChunk {
		return {
			samples: this.buffer.slice(offset, offset + size),
			sampleRate: this.sampleRate,
			sequence: this.sequence++,
			timestamp: this.now(),
		};
	}

	private ensureCapacity(required: number): void {
		if (required <= this.buffer.length) return;
		let capacity = this.buffer.length;
		while (capacity < required) capacity *= 2;
		const grown = new Float32Array(capacity);
		grown.set(this.buffer.subarray(0, this.length));
		this.buffer = grown;
	}
}
