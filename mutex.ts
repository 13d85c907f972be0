/**
 * Copyright 2025 Mike Odnis
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

export type Release = () => void;

/**
 * Promise-based mutual exclusion. Waiters are served in arrival order and
 * the lock is handed over directly, so nobody can barge in between a
 * release and the next waiter resuming.
 */
export class Mutex {
	private locked = false;
	private readonly waitQueue: Array<() => void> = [];

	get isLocked(): boolean {
		return this.locked;
	}

	/** Number of callers waiting for the lock */
	get pending(): number {
		return this.waitQueue.length;
	}

	async acquire(): Promise<Release> {
		if (!this.locked) {
			this.locked = true;
			return this.createRelease();
		}
		await new Promise<void>((resolve) => {
			this.waitQueue.push(resolve);
		});
		return this.createRelease();
	}

	async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
		const release = await this.acquire();
		try {
			return await fn();
		} finally {
			release();
		}
	}

	// Calling a release twice is a no-op.
	private createRelease(): Release {
		let released = false;
		return () => {
			if (released) return;
			released = true;
			const next = this.waitQueue.shift();
			if (next) {
				next();
			} else {
				this.locked = false;
			}
		};
	}
}
