import { Injectable, Logger } from "@nestjs/common";

/**
 * In-process exclusive locks keyed by record ("pool:USDC", "loan:42").
 *
 * Keys are acquired in sorted order so that two operations touching the
 * same records never wait on each other in opposite order. Locks are
 * released on every exit path of the guarded function.
 */
@Injectable()
export class RecordLockService {
	private readonly logger = new Logger(RecordLockService.name);
	private readonly tails = new Map<string, Promise<void>>();

	async withLocks<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
		const ordered = [...new Set(keys)].sort();
		const releases: Array<() => void> = [];
		try {
			for (const key of ordered) {
				releases.push(await this.acquire(key));
			}
			return await fn();
		} finally {
			for (const release of releases.reverse()) {
				release();
			}
		}
	}

	isLocked(key: string): boolean {
		return this.tails.has(key);
	}

	private async acquire(key: string): Promise<() => void> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);
		await previous;
		this.logger.verbose(`acquired ${key}`);
		return () => {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		};
	}
}
