/**
 * Decodes interleaved signed 16-bit little-endian PCM into mono float32 in
 * [-1, 1), averaging the channels of each frame. Trailing bytes that do not
 * form a whole frame are ignored; callers carry them into the next buffer.
 */
export const pcm16ToMonoFloat32 = (
	buffer: Buffer,
	channels: number,
): Float32Array => {
	const frameBytes = 2 * channels;
	const frames = Math.floor(buffer.length / frameBytes);
	const out = new Float32Array(frames);

	for (let frame = 0; frame < frames; frame++) {
		let sum = 0;
		for (let ch = 0; ch < channels; ch++) {
			sum += buffer.readInt16LE(frame * frameBytes + ch * 2) / 32768;
		}
		out[frame] = sum / channels;
	}

	return out;
};

/**
 * Linear-interpolation resampling.
 *
 * The output has `floor(n * toRate / fromRate)` samples. Output sample `i`
 * reads the source at position `i * fromRate / toRate`, interpolating between
 * the two neighbouring samples; positions past the last sample hold it.
 * Equal rates return a copy of the input.
 */
export const resampleLinear = (
	samples: Float32Array,
	fromRate: number,
	toRate: number,
): Float32Array => {
	if (fromRate === toRate) {
		return Float32Array.from(samples);
	}
	if (samples.length === 0) {
		return new Float32Array(0);
	}

	const ratio = toRate / fromRate;
	const outLength = Math.floor(samples.length * ratio);
	const out = new Float32Array(outLength);
	const last = samples.length - 1;

	for (let i = 0; i < outLength; i++) {
		const position = i / ratio;
		const index = Math.floor(position);
		const fraction = position - index;
		const current = samples[Math.min(index, last)] ?? 0;
		const next = samples[Math.min(index + 1, last)] ?? current;
		out[i] = current + (next - current) * fraction;
	}

	return out;
};
