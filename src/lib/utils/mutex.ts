// ---------------------------------------------------------------------------
// Promise-based mutex for critical sections
// ---------------------------------------------------------------------------

/** FIFO mutex: waiters are resumed in the order they called `acquire()`. */
export class SimpleMutex {
	private locked = false;
	private queue: Array<() => void> = [];

	async acquire(): Promise<void> {
		return new Promise((resolve) => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				this.queue.push(() => {
					this.locked = true;
					resolve();
				});
			}
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}

	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}
