/**
 * The flag that decides whether captured chunks may be forwarded to the
 * backend. It is the only state shared between the capture callback and
 * the session control flow; both run on the event loop, so reads and
 * writes are never interleaved.
 *
 * The gate remembers which session generation opened it. A chunk callback
 * bound to an older generation never passes, even if the gate is open.
 */
export class ReadyGate {
	private open = false;
	private generation = 0;

	/** Closes the gate and binds it to a new session generation. */
	public reset(generation: number): void {
		this.open = false;
		this.generation = generation;
	}

	/** Opens the gate, unless a newer generation has taken it over. */
	public openFor(generation: number): boolean {
		if (generation !== this.generation) return false;
		this.open = true;
		return true;
	}

	public close(): void {
		this.open = false;
	}

	public isOpen(): boolean {
		return this.open;
	}

	public allows(generation: number): boolean {
		return this.open && generation === this.generation;
	}
}
